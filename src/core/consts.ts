import { byte32ToHex, channelIdStr, utf8ToBytes } from "../utils/bytes";

/** Key prefix under which the counterparty stores its commitments. */
export const COMMITMENT_PREFIX: Uint8Array = utf8ToBytes("ibc");

export const DEFAULT_VERSION_IDENTIFIER = "1";
export const DEFAULT_VERSION_FEATURES = ["ORDER_ORDERED", "ORDER_UNORDERED"] as const;

/** Hex of 32 zero bytes: the "unset" client and port identifier. */
export const ZERO_ID = byte32ToHex(new Uint8Array(32));

export const ZERO_CHANNEL_ID = channelIdStr(0);
