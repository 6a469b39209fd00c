import { decodeItem, encodeItem } from "../codec/rlp";
import type { RlpItem } from "../codec/rlp";
import { logger } from "../logging";
import { VerifyError, VerifyFailure } from "./errors";

/** Field-level mapping between an entity and its RLP item. */
export interface ItemCodec<T> {
  readonly toItem: (value: T) => RlpItem;
  readonly fromItem: (item: RlpItem) => T;
}

export type DecodeResult<T> =
  | { readonly success: true; readonly output: T }
  | { readonly success: false; readonly error: VerifyFailure };

/** Canonical byte form of a protocol entity. */
export interface ObjectCodec<T> extends ItemCodec<T> {
  readonly name: string;
  encode(value: T): Uint8Array;
  /** Throws `VerifyFailure(SerdeError)` on any malformed input. */
  decode(bytes: Uint8Array): T;
  safeDecode(bytes: Uint8Array): DecodeResult<T>;
  equals(a: T, b: T): boolean;
}

export const defineObject = <T>(
  name: string,
  codec: ItemCodec<T> & { readonly equals: (a: T, b: T) => boolean },
): ObjectCodec<T> => {
  const decode = (bytes: Uint8Array): T => {
    try {
      return codec.fromItem(decodeItem(bytes));
    } catch (err) {
      const failure = new VerifyFailure(VerifyError.SerdeError, `cannot decode ${name}`, {
        cause: err,
      });
      logger().debug({ object: name, err, size: bytes.length }, "decode failed");
      throw failure;
    }
  };

  return {
    name,
    toItem: codec.toItem,
    fromItem: codec.fromItem,
    equals: codec.equals,
    encode: (value) => encodeItem(codec.toItem(value)),
    decode,
    safeDecode: (bytes) => {
      try {
        return { success: true, output: decode(bytes) };
      } catch (err) {
        if (err instanceof VerifyFailure) return { success: false, error: err };
        throw err;
      }
    },
  };
};
