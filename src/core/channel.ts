import { parse } from "valibot";
import { decList, decStr, encList, encStr, expectList } from "../codec/rlp";
import { arrayEqual } from "../utils/equal";
import { defineObject } from "./object";
import {
  ChannelOrdering,
  ConnectionState,
  channelOrderingCodec,
  connectionStateCodec,
} from "./state";
import { channelCounterpartySchema, channelEndSchema } from "./validation";

export interface ChannelCounterparty {
  readonly portId: string;
  readonly channelId: string;
}

export interface ChannelEnd {
  readonly state: ConnectionState;
  readonly ordering: ChannelOrdering;
  readonly remote: ChannelCounterparty;
  /** Connection identifiers the channel runs over, in path order. */
  readonly connectionHops: readonly string[];
}

export const createChannelCounterparty = (
  over: Partial<ChannelCounterparty> = {},
): ChannelCounterparty =>
  parse(channelCounterpartySchema, { portId: "", channelId: "", ...over });

export const createChannelEnd = (over: Partial<ChannelEnd> = {}): ChannelEnd =>
  parse(channelEndSchema, {
    state: ConnectionState.Unknown,
    ordering: ChannelOrdering.Unknown,
    remote: createChannelCounterparty(),
    connectionHops: [],
    ...over,
  });

export const channelCounterpartyCodec = defineObject<ChannelCounterparty>(
  "ChannelCounterparty",
  {
    toItem: (c) => [encStr(c.portId), encStr(c.channelId)],
    fromItem: (item) => {
      const [portId, channelId] = expectList(item, 2, "ChannelCounterparty");
      return {
        portId: decStr(portId, "port_id"),
        channelId: decStr(channelId, "channel_id"),
      };
    },
    equals: (a, b) => a.portId === b.portId && a.channelId === b.channelId,
  },
);

export const channelEndCodec = defineObject<ChannelEnd>("ChannelEnd", {
  toItem: (c) => [
    connectionStateCodec.toItem(c.state),
    channelOrderingCodec.toItem(c.ordering),
    channelCounterpartyCodec.toItem(c.remote),
    encList(c.connectionHops, encStr),
  ],
  fromItem: (item) => {
    const [state, ordering, remote, hops] = expectList(item, 4, "ChannelEnd");
    return {
      state: connectionStateCodec.fromItem(state),
      ordering: channelOrderingCodec.fromItem(ordering),
      remote: channelCounterpartyCodec.fromItem(remote),
      connectionHops: decList(hops, (i) => decStr(i, "connection_hop"), "connection_hops"),
    };
  },
  equals: (a, b) =>
    a.state === b.state &&
    a.ordering === b.ordering &&
    channelCounterpartyCodec.equals(a.remote, b.remote) &&
    arrayEqual(a.connectionHops, b.connectionHops),
});
