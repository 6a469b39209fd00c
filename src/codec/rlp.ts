// Item-level RLP helpers (canonical form only) on top of the `rlp` package.

import { decode as rlpDecode, encode as rlpEncode } from "rlp";
import { fromString, toString } from "uint8arrays";
import type { UintWidth } from "../types/primitives";
import { bytesToUtf8, isWellFormed, utf8ToBytes } from "../utils/bytes";

/** A decoded RLP value: a byte string or a list of items. */
export type RlpItem = Uint8Array | RlpItem[];

/* — whole-buffer — */

export const encodeItem = (item: RlpItem): Uint8Array => rlpEncode(item);

/** Throws on non-canonical prefixes, truncation and trailing bytes. */
export const decodeItem = (bytes: Uint8Array): RlpItem => rlpDecode(bytes);

/* — shape guards — */

export const expectBytes = (item: RlpItem, what = "value"): Uint8Array => {
  if (!(item instanceof Uint8Array)) {
    throw new Error(`expected byte string for ${what}, got list`);
  }
  return item;
};

export const expectList = (
  item: RlpItem,
  len?: number,
  what = "value",
): RlpItem[] => {
  if (item instanceof Uint8Array) {
    throw new Error(`expected list for ${what}, got byte string`);
  }
  if (len !== undefined && item.length !== len) {
    throw new Error(`expected ${len} items for ${what}, got ${item.length}`);
  }
  return item;
};

/* — unsigned integers: minimal big-endian, zero is the empty string — */

export const encUint = (n: number | bigint, bits: UintWidth): Uint8Array => {
  if (typeof n === "number" && !Number.isSafeInteger(n)) {
    throw new RangeError(`u${bits} must be an integer, got ${n}`);
  }
  const v = BigInt(n);
  if (v < 0n || v >> BigInt(bits) !== 0n) {
    throw new RangeError(`${v} does not fit in u${bits}`);
  }
  if (v === 0n) return new Uint8Array(0);
  const hex = v.toString(16);
  return fromString(hex.length % 2 === 0 ? hex : `0${hex}`, "base16");
};

export const decUint = (item: RlpItem, bits: UintWidth, what = "uint"): bigint => {
  const b = expectBytes(item, what);
  if (b.length === 0) return 0n;
  if (b[0] === 0) throw new Error(`leading zero in ${what}`);
  if (b.length * 8 > bits) {
    throw new Error(`${what} is ${b.length} bytes, wider than u${bits}`);
  }
  return BigInt(`0x${toString(b, "base16")}`);
};

/** `decUint` for widths that fit a JS number. */
export const decSmallUint = (item: RlpItem, bits: 8 | 16, what = "uint"): number =>
  Number(decUint(item, bits, what));

/* — strings & blobs — */

// Strings go in as UTF-8 bytes: the `rlp` package would hex-decode a "0x…" string.
export const encStr = (s: string): Uint8Array => {
  if (!isWellFormed(s)) throw new RangeError("string holds an unpaired surrogate");
  return utf8ToBytes(s);
};

export const decStr = (item: RlpItem, what = "string"): string =>
  bytesToUtf8(expectBytes(item, what));

export const encBytes = (b: Uint8Array): Uint8Array => b;

export const decBytes = (item: RlpItem, what = "bytes"): Uint8Array =>
  Uint8Array.from(expectBytes(item, what));

/* — optionals: absent = [], present = [value] — */

export const encOption = <T>(
  v: T | undefined,
  enc: (v: T) => RlpItem,
): RlpItem => (v === undefined ? [] : [enc(v)]);

export const decOption = <T>(
  item: RlpItem,
  dec: (item: RlpItem) => T,
  what = "optional",
): T | undefined => {
  const list = expectList(item, undefined, what);
  if (list.length === 0) return undefined;
  if (list.length === 1) return dec(list[0]);
  throw new Error(`expected 0 or 1 items for ${what}, got ${list.length}`);
};

/* — sequences — */

export const encList = <T>(xs: readonly T[], enc: (v: T) => RlpItem): RlpItem[] =>
  xs.map(enc);

export const decList = <T>(
  item: RlpItem,
  dec: (item: RlpItem) => T,
  what = "list",
): T[] => expectList(item, undefined, what).map(dec);

/* — enum tags travel as a one-element list — */

export const encTag = (tag: number): RlpItem => [encUint(tag, 8)];

export const decTag = (item: RlpItem, what = "tag"): number =>
  decSmallUint(expectList(item, 1, what)[0], 8, what);
