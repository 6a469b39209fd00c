import { decTag, encTag } from "../codec/rlp";
import { defineObject } from "./object";

/* Tags are wire values: keep them explicit, never rely on declaration order. */

export enum ConnectionState {
  Unknown = 1,
  Init = 2,
  OpenTry = 3,
  Open = 4,
  Closed = 5,
  Frozen = 6,
}

export enum ChannelOrdering {
  Unknown = 1,
  Unordered = 2,
  Ordered = 3,
}

const CONNECTION_STATE_BY_TAG: ReadonlyMap<number, ConnectionState> = new Map([
  [1, ConnectionState.Unknown],
  [2, ConnectionState.Init],
  [3, ConnectionState.OpenTry],
  [4, ConnectionState.Open],
  [5, ConnectionState.Closed],
  [6, ConnectionState.Frozen],
]);

const CHANNEL_ORDERING_BY_TAG: ReadonlyMap<number, ChannelOrdering> = new Map([
  [1, ChannelOrdering.Unknown],
  [2, ChannelOrdering.Unordered],
  [3, ChannelOrdering.Ordered],
]);

export const connectionStateFromTag = (tag: number): ConnectionState => {
  const state = CONNECTION_STATE_BY_TAG.get(tag);
  if (state === undefined) throw new Error(`invalid connection state tag ${tag}`);
  return state;
};

export const channelOrderingFromTag = (tag: number): ChannelOrdering => {
  const ordering = CHANNEL_ORDERING_BY_TAG.get(tag);
  if (ordering === undefined) throw new Error(`invalid channel ordering tag ${tag}`);
  return ordering;
};

export const connectionStateCodec = defineObject<ConnectionState>("ConnectionState", {
  toItem: (state) => encTag(state),
  fromItem: (item) => connectionStateFromTag(decTag(item, "state")),
  equals: (a, b) => a === b,
});

export const channelOrderingCodec = defineObject<ChannelOrdering>("ChannelOrdering", {
  toItem: (ordering) => encTag(ordering),
  fromItem: (item) => channelOrderingFromTag(decTag(item, "ordering")),
  equals: (a, b) => a === b,
});
