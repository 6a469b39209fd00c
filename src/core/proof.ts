import { parse } from "valibot";
import { decBytes, decUint, encBytes, encUint, expectList } from "../codec/rlp";
import type { RlpItem } from "../codec/rlp";
import type { Bytes, U256 } from "../types/primitives";
import { bytesEqual } from "../utils/bytes";
import { defineObject } from "./object";
import { proofBundleSchema } from "./validation";

/**
 * Proof material produced by the proof-verification subsystem. Carried as the
 * RLP item that subsystem encodes it to, without interpretation.
 */
export type ObjectProof = RlpItem;

export interface ProofBundle {
  /** Height the proofs were generated at. */
  readonly height: U256;
  readonly objectProof: ObjectProof;
  readonly clientProof: Bytes;
}

const copyItem = (item: RlpItem): RlpItem =>
  item instanceof Uint8Array ? Uint8Array.from(item) : item.map(copyItem);

export const itemEqual = (a: RlpItem, b: RlpItem): boolean => {
  if (a instanceof Uint8Array) return b instanceof Uint8Array && bytesEqual(a, b);
  if (b instanceof Uint8Array || a.length !== b.length) return false;
  return a.every((x, i) => itemEqual(x, b[i]));
};

export const createProofBundle = (over: Partial<ProofBundle> = {}): ProofBundle =>
  parse(proofBundleSchema, {
    height: 0n,
    objectProof: [],
    clientProof: new Uint8Array(0),
    ...over,
  });

export const proofBundleCodec = defineObject<ProofBundle>("ProofBundle", {
  toItem: (p) => [encUint(p.height, 256), p.objectProof, encBytes(p.clientProof)],
  fromItem: (item) => {
    const [height, objectProof, clientProof] = expectList(item, 3, "ProofBundle");
    return {
      height: decUint(height, 256, "height"),
      objectProof: copyItem(objectProof),
      clientProof: decBytes(clientProof, "client_proof"),
    };
  },
  equals: (a, b) =>
    a.height === b.height &&
    itemEqual(a.objectProof, b.objectProof) &&
    bytesEqual(a.clientProof, b.clientProof),
});
