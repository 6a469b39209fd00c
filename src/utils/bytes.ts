import { equals, fromString, toString } from "uint8arrays";

/** Bare lowercase hex of a 32-byte value, the form identifiers are rendered in. */
export const byte32ToHex = (bytes: Uint8Array): string => {
  if (bytes.length !== 32) {
    throw new RangeError(`expected 32 bytes, got ${bytes.length}`);
  }
  return toString(bytes, "base16");
};

export const channelIdStr = (n: number): string => `channel-${n}`;

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => equals(a, b);

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** False when `s` holds an unpaired surrogate, which has no UTF-8 form. */
export const isWellFormed = (s: string): boolean => !LONE_SURROGATE.test(s);

export const utf8ToBytes = (s: string): Uint8Array => fromString(s, "utf8");

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// throws TypeError on malformed sequences
export const bytesToUtf8 = (b: Uint8Array): string => strictUtf8.decode(b);
