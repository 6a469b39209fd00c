import { fromString, toString } from "uint8arrays";
import { expect } from "vitest";
import { VerifyError, VerifyFailure } from "../../src/core/errors";
import { createPacket } from "../../src/core/packet";
import type { Packet } from "../../src/core/packet";

export const hex = (b: Uint8Array): string => toString(b, "base16");
export const unhex = (s: string): Uint8Array => fromString(s, "base16");

/** The relay scenario used across packet tests. */
export const mkPacket = (over: Partial<Packet> = {}): Packet =>
  createPacket({
    sequence: 5,
    sourcePortId: "p1",
    sourceChannelId: "channel-0",
    destinationPortId: "p1",
    destinationChannelId: "channel-1",
    data: Uint8Array.of(1, 2, 3),
    timeoutHeight: 100n,
    timeoutTimestamp: 0n,
    ...over,
  });

/** Asserts `fn` throws the generic structural decode failure. */
export const expectSerdeError = (fn: () => unknown) => {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(VerifyFailure);
    if (err instanceof VerifyFailure) expect(err.code).toBe(VerifyError.SerdeError);
    return;
  }
  throw new Error("expected decode to fail");
};
