import {
  array,
  bigint,
  check,
  custom,
  enum_,
  instance,
  integer,
  maxValue,
  minValue,
  number,
  object,
  optional,
  pipe,
  string,
} from "valibot";
import type { RlpItem } from "../codec/rlp";
import { isWellFormed } from "../utils/bytes";
import { U16_MAX, U256_MAX, U64_MAX } from "../types/primitives";
import { ChannelOrdering, ConnectionState } from "./state";

export const u16Schema = pipe(number(), integer(), minValue(0), maxValue(U16_MAX));
export const u64Schema = pipe(bigint(), minValue(0n), maxValue(U64_MAX));
export const u256Schema = pipe(bigint(), minValue(0n), maxValue(U256_MAX));
export const textSchema = pipe(string(), check(isWellFormed, "unpaired surrogate in string"));
export const bytesSchema = instance(Uint8Array);

const isRlpItem = (v: unknown): v is RlpItem =>
  v instanceof Uint8Array || (Array.isArray(v) && v.every(isRlpItem));

export const rlpItemSchema = custom<RlpItem>(isRlpItem, "expected an RLP item");

export const connectionCounterpartySchema = object({
  clientId: textSchema,
  connectionId: optional(textSchema),
  commitmentPrefix: bytesSchema,
});

export const versionSchema = object({
  identifier: textSchema,
  features: array(textSchema),
});

export const connectionEndSchema = object({
  state: enum_(ConnectionState),
  clientId: textSchema,
  counterparty: connectionCounterpartySchema,
  delayPeriod: u64Schema,
  versions: array(versionSchema),
});

export const channelCounterpartySchema = object({
  portId: textSchema,
  channelId: textSchema,
});

export const channelEndSchema = object({
  state: enum_(ConnectionState),
  ordering: enum_(ChannelOrdering),
  remote: channelCounterpartySchema,
  connectionHops: array(textSchema),
});

export const packetSchema = object({
  sequence: u16Schema,
  sourcePortId: textSchema,
  sourceChannelId: textSchema,
  destinationPortId: textSchema,
  destinationChannelId: textSchema,
  data: bytesSchema,
  timeoutHeight: u64Schema,
  timeoutTimestamp: u64Schema,
});

export const packetAckSchema = object({
  ack: bytesSchema,
  packet: packetSchema,
});

export const proofBundleSchema = object({
  height: u256Schema,
  objectProof: rlpItemSchema,
  clientProof: bytesSchema,
});
