/* ── wire-level primitive aliases ────────────────────────── */
export type Bytes = Uint8Array;
export type U8 = number;
export type U16 = number;
export type U64 = bigint;
export type U256 = bigint;

/** Bit widths of the fixed-width unsigned integers carried on the wire. */
export type UintWidth = 8 | 16 | 64 | 256;

export const U16_MAX = 0xffff;
export const U64_MAX = (1n << 64n) - 1n;
export const U256_MAX = (1n << 256n) - 1n;
