import { describe, it, expect } from "vitest";
import { ValiError, parse } from "valibot";
import { createProofBundle, itemEqual, proofBundleCodec } from "../src/core/proof";
import { proofBundleSchema } from "../src/core/validation";
import { U256_MAX } from "../src/types/primitives";
import { expectSerdeError, hex, unhex } from "./helpers/fixtures";

describe("ProofBundle", () => {
  it("carries the object proof verbatim", () => {
    const bundle = createProofBundle({
      height: 7n,
      objectProof: [Uint8Array.of(0xaa), []],
      clientProof: Uint8Array.of(0xbb, 0xcc),
    });
    const bytes = proofBundleCodec.encode(bundle);
    expect(hex(bytes)).toBe("c807c381aac082bbcc");
    const back = proofBundleCodec.decode(bytes);
    expect(back).toEqual(bundle);
    expect(proofBundleCodec.equals(back, bundle)).toBe(true);
  });

  it("round-trips the widest height", () => {
    const bundle = createProofBundle({ height: U256_MAX });
    const back = proofBundleCodec.decode(proofBundleCodec.encode(bundle));
    expect(back.height).toBe(U256_MAX);
  });

  it("rejects a height wider than 256 bits", () => {
    // height = 2^256 as 33 bytes
    expectSerdeError(() => proofBundleCodec.decode(unhex(`e4a101${"00".repeat(32)}c080`)));
    expect(() => createProofBundle({ height: U256_MAX + 1n })).toThrow(ValiError);
  });

  it("defaults to height zero and an empty proof", () => {
    const bundle = createProofBundle();
    expect(hex(proofBundleCodec.encode(bundle))).toBe("c380c080");
  });

  it("rejects an object proof that is not an RLP item", () => {
    const input = { height: 1n, objectProof: [Uint8Array.of(1), ["x"]], clientProof: new Uint8Array(0) };
    expect(() => parse(proofBundleSchema, input)).toThrow(ValiError);
  });
});

describe("itemEqual", () => {
  it("compares nested items structurally", () => {
    expect(itemEqual([Uint8Array.of(1), []], [Uint8Array.of(1), []])).toBe(true);
    expect(itemEqual([Uint8Array.of(1)], Uint8Array.of(1))).toBe(false);
    expect(itemEqual([[]], [])).toBe(false);
  });
});
