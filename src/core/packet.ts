import { parse } from "valibot";
import {
  decBytes,
  decSmallUint,
  decStr,
  decUint,
  encBytes,
  encStr,
  encUint,
  expectList,
} from "../codec/rlp";
import type { Bytes, U16, U64 } from "../types/primitives";
import { bytesEqual } from "../utils/bytes";
import { ZERO_CHANNEL_ID, ZERO_ID } from "./consts";
import { defineObject } from "./object";
import { packetAckSchema, packetSchema } from "./validation";

export interface Packet {
  readonly sequence: U16;
  readonly sourcePortId: string;
  readonly sourceChannelId: string;
  readonly destinationPortId: string;
  readonly destinationChannelId: string;
  readonly data: Bytes;
  readonly timeoutHeight: U64;
  readonly timeoutTimestamp: U64;
}

/** Acknowledgement written by the receiving chain; `ack` is opaque here. */
export interface PacketAck {
  readonly ack: Bytes;
  readonly packet: Packet;
}

export const createPacket = (over: Partial<Packet> = {}): Packet =>
  parse(packetSchema, {
    sequence: 0,
    sourcePortId: ZERO_ID,
    sourceChannelId: ZERO_CHANNEL_ID,
    destinationPortId: ZERO_ID,
    destinationChannelId: ZERO_CHANNEL_ID,
    data: new Uint8Array(0),
    timeoutHeight: 0n,
    timeoutTimestamp: 0n,
    ...over,
  });

export const createPacketAck = (over: Partial<PacketAck> = {}): PacketAck =>
  parse(packetAckSchema, {
    ack: new Uint8Array(0),
    packet: createPacket(),
    ...over,
  });

/** 0/0 is the "never times out" marker. */
export const hasTimeout = (p: Packet): boolean =>
  p.timeoutHeight !== 0n || p.timeoutTimestamp !== 0n;

/**
 * Same logical packet, possibly a different delivery attempt: every field
 * except `sequence` matches.
 */
export const equalUnlessSequence = (a: Packet, b: Packet): boolean =>
  a.sourcePortId === b.sourcePortId &&
  a.sourceChannelId === b.sourceChannelId &&
  a.destinationPortId === b.destinationPortId &&
  a.destinationChannelId === b.destinationChannelId &&
  bytesEqual(a.data, b.data) &&
  a.timeoutHeight === b.timeoutHeight &&
  a.timeoutTimestamp === b.timeoutTimestamp;

export const packetCodec = defineObject<Packet>("Packet", {
  toItem: (p) => [
    encUint(p.sequence, 16),
    encStr(p.sourcePortId),
    encStr(p.sourceChannelId),
    encStr(p.destinationPortId),
    encStr(p.destinationChannelId),
    encBytes(p.data),
    encUint(p.timeoutHeight, 64),
    encUint(p.timeoutTimestamp, 64),
  ],
  fromItem: (item) => {
    const [seq, srcPort, srcChan, dstPort, dstChan, data, tHeight, tStamp] =
      expectList(item, 8, "Packet");
    return {
      sequence: decSmallUint(seq, 16, "sequence"),
      sourcePortId: decStr(srcPort, "source_port_id"),
      sourceChannelId: decStr(srcChan, "source_channel_id"),
      destinationPortId: decStr(dstPort, "destination_port_id"),
      destinationChannelId: decStr(dstChan, "destination_channel_id"),
      data: decBytes(data, "data"),
      timeoutHeight: decUint(tHeight, 64, "timeout_height"),
      timeoutTimestamp: decUint(tStamp, 64, "timeout_timestamp"),
    };
  },
  equals: (a, b) => a.sequence === b.sequence && equalUnlessSequence(a, b),
});

export const packetAckCodec = defineObject<PacketAck>("PacketAck", {
  toItem: (a) => [encBytes(a.ack), packetCodec.toItem(a.packet)],
  fromItem: (item) => {
    const [ack, packet] = expectList(item, 2, "PacketAck");
    return { ack: decBytes(ack, "ack"), packet: packetCodec.fromItem(packet) };
  },
  equals: (a, b) => bytesEqual(a.ack, b.ack) && packetCodec.equals(a.packet, b.packet),
});
