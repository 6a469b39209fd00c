export type { Bytes, U16, U256, U64, U8, UintWidth } from "./types/primitives";
export { U16_MAX, U256_MAX, U64_MAX } from "./types/primitives";

export { byte32ToHex, bytesEqual, channelIdStr } from "./utils/bytes";

export type { RlpItem } from "./codec/rlp";

export { VerifyError, VerifyFailure, isVerifyErrorCode, verifyErrorName } from "./core/errors";
export type { DecodeResult, ItemCodec, ObjectCodec } from "./core/object";
export { defineObject } from "./core/object";

export {
  COMMITMENT_PREFIX,
  DEFAULT_VERSION_FEATURES,
  DEFAULT_VERSION_IDENTIFIER,
  ZERO_CHANNEL_ID,
  ZERO_ID,
} from "./core/consts";

export {
  ChannelOrdering,
  ConnectionState,
  channelOrderingCodec,
  channelOrderingFromTag,
  connectionStateCodec,
  connectionStateFromTag,
} from "./core/state";

export type { ConnectionCounterparty, ConnectionEnd, Version } from "./core/connection";
export {
  connectionCounterpartyCodec,
  connectionEndCodec,
  createConnectionCounterparty,
  createConnectionEnd,
  createVersion,
  versionCodec,
} from "./core/connection";

export type { ChannelCounterparty, ChannelEnd } from "./core/channel";
export {
  channelCounterpartyCodec,
  channelEndCodec,
  createChannelCounterparty,
  createChannelEnd,
} from "./core/channel";

export type { Packet, PacketAck } from "./core/packet";
export {
  createPacket,
  createPacketAck,
  equalUnlessSequence,
  hasTimeout,
  packetAckCodec,
  packetCodec,
} from "./core/packet";

export type { ObjectProof, ProofBundle } from "./core/proof";
export { createProofBundle, itemEqual, proofBundleCodec } from "./core/proof";

export type { Config, LogLevel } from "./config";
export { DEFAULT_CONFIG, loadConfig } from "./config";
export type { Logger } from "./logging";
export { logger, makeLogger, resetLogger, setLogger } from "./logging";
