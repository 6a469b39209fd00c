import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { channelEndCodec } from "../src/core/channel";
import {
  connectionCounterpartyCodec,
  connectionEndCodec,
  versionCodec,
} from "../src/core/connection";
import type { ObjectCodec } from "../src/core/object";
import { equalUnlessSequence, packetAckCodec, packetCodec } from "../src/core/packet";
import { proofBundleCodec } from "../src/core/proof";
import { channelOrderingCodec, connectionStateCodec } from "../src/core/state";
import { bytesEqual } from "../src/utils/bytes";
import {
  channelEndArb,
  channelOrderingArb,
  connectionCounterpartyArb,
  connectionEndArb,
  connectionStateArb,
  packetAckArb,
  packetArb,
  proofBundleArb,
  unicodePacketArb,
  versionArb,
} from "./helpers/arbitraries";

interface Case<T> {
  readonly codec: ObjectCodec<T>;
  readonly arb: fc.Arbitrary<T>;
}

const caseOf = <T>(codec: ObjectCodec<T>, arb: fc.Arbitrary<T>): Case<T> => ({ codec, arb });

const decodeFails = <T>(codec: ObjectCodec<T>, bytes: Uint8Array): boolean =>
  !codec.safeDecode(bytes).success;

const checkCodec = <T>({ codec, arb }: Case<T>) => {
  describe(codec.name, () => {
    it("round-trips", () => {
      fc.assert(
        fc.property(arb, (x) => codec.equals(codec.decode(codec.encode(x)), x)),
      );
    });

    it("encodes deterministically and without collisions", () => {
      fc.assert(
        fc.property(arb, arb, (a, b) => {
          const ea = codec.encode(a);
          expect(bytesEqual(ea, codec.encode(a))).toBe(true);
          return codec.equals(a, b) === bytesEqual(ea, codec.encode(b));
        }),
      );
    });

    it("rejects every truncation", () => {
      fc.assert(
        fc.property(arb, (x) => {
          const bytes = codec.encode(x);
          for (let cut = 0; cut < bytes.length; cut++) {
            if (!decodeFails(codec, bytes.subarray(0, cut))) return false;
          }
          return true;
        }),
        { numRuns: 30 },
      );
    });

    it("rejects a flipped leading length byte", () => {
      fc.assert(
        fc.property(arb, (x) => {
          const bytes = Uint8Array.from(codec.encode(x));
          bytes[0] = ~bytes[0] & 0xff;
          return decodeFails(codec, bytes);
        }),
      );
    });
  });
};

describe("codec properties", () => {
  checkCodec(caseOf(connectionStateCodec, connectionStateArb));
  checkCodec(caseOf(channelOrderingCodec, channelOrderingArb));
  checkCodec(caseOf(connectionCounterpartyCodec, connectionCounterpartyArb));
  checkCodec(caseOf(versionCodec, versionArb));
  checkCodec(caseOf(connectionEndCodec, connectionEndArb));
  checkCodec(caseOf(channelEndCodec, channelEndArb));
  checkCodec(caseOf(packetCodec, packetArb));
  checkCodec(caseOf(packetCodec, unicodePacketArb));
  checkCodec(caseOf(packetAckCodec, packetAckArb));
  checkCodec(caseOf(proofBundleCodec, proofBundleArb));
});

describe("equalUnlessSequence", () => {
  it("is reflexive and symmetric", () => {
    fc.assert(
      fc.property(packetArb, packetArb, (a, b) =>
        equalUnlessSequence(a, a) && equalUnlessSequence(a, b) === equalUnlessSequence(b, a),
      ),
    );
  });

  it("ignores only the sequence", () => {
    fc.assert(
      fc.property(packetArb, fc.integer({ min: 0, max: 0xffff }), (p, sequence) =>
        equalUnlessSequence(p, { ...p, sequence }),
      ),
    );
  });

  it("is transitive", () => {
    fc.assert(
      fc.property(packetArb, fc.integer({ min: 0, max: 0xffff }), fc.integer({ min: 0, max: 0xffff }), (p, s1, s2) => {
        const q = { ...p, sequence: s1 };
        const r = { ...p, sequence: s2 };
        return equalUnlessSequence(p, q) && equalUnlessSequence(q, r) && equalUnlessSequence(p, r);
      }),
    );
  });

  it("notices a changed payload", () => {
    fc.assert(
      fc.property(packetArb, fc.uint8Array({ minLength: 1, maxLength: 8 }), (p, extra) => {
        const data = Uint8Array.from([...p.data, ...extra]);
        return !equalUnlessSequence(p, { ...p, data });
      }),
    );
  });
});
