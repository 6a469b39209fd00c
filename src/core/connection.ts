import { parse } from "valibot";
import {
  decBytes,
  decList,
  decOption,
  decStr,
  decUint,
  encBytes,
  encList,
  encOption,
  encStr,
  encUint,
  expectList,
} from "../codec/rlp";
import type { Bytes, U64 } from "../types/primitives";
import { bytesEqual } from "../utils/bytes";
import { arrayEqual } from "../utils/equal";
import {
  COMMITMENT_PREFIX,
  DEFAULT_VERSION_FEATURES,
  DEFAULT_VERSION_IDENTIFIER,
  ZERO_ID,
} from "./consts";
import { defineObject } from "./object";
import { ConnectionState, connectionStateCodec } from "./state";
import {
  connectionCounterpartySchema,
  connectionEndSchema,
  versionSchema,
} from "./validation";

/* ── types ───────────────────────────────────────────────── */

export interface ConnectionCounterparty {
  readonly clientId: string;
  /** Unset until the counterparty's handshake step assigns one. */
  readonly connectionId?: string;
  readonly commitmentPrefix: Bytes;
}

export interface Version {
  readonly identifier: string;
  /** Order is significant. */
  readonly features: readonly string[];
}

export interface ConnectionEnd {
  readonly state: ConnectionState;
  readonly clientId: string;
  readonly counterparty: ConnectionCounterparty;
  readonly delayPeriod: U64;
  readonly versions: readonly Version[];
}

/* ── constructors ────────────────────────────────────────── */

export const createConnectionCounterparty = (
  over: Partial<ConnectionCounterparty> = {},
): ConnectionCounterparty =>
  parse(connectionCounterpartySchema, {
    clientId: "",
    commitmentPrefix: Uint8Array.from(COMMITMENT_PREFIX),
    ...over,
  });

export const createVersion = (over: Partial<Version> = {}): Version =>
  parse(versionSchema, {
    identifier: DEFAULT_VERSION_IDENTIFIER,
    features: [...DEFAULT_VERSION_FEATURES],
    ...over,
  });

export const createConnectionEnd = (over: Partial<ConnectionEnd> = {}): ConnectionEnd =>
  parse(connectionEndSchema, {
    state: ConnectionState.Unknown,
    clientId: ZERO_ID,
    counterparty: createConnectionCounterparty(),
    delayPeriod: 0n,
    versions: [],
    ...over,
  });

/* ── codecs ──────────────────────────────────────────────── */

export const connectionCounterpartyCodec = defineObject<ConnectionCounterparty>(
  "ConnectionCounterparty",
  {
    toItem: (c) => [
      encStr(c.clientId),
      encOption(c.connectionId, encStr),
      encBytes(c.commitmentPrefix),
    ],
    fromItem: (item) => {
      const [clientId, connectionId, prefix] = expectList(item, 3, "ConnectionCounterparty");
      return {
        clientId: decStr(clientId, "client_id"),
        connectionId: decOption(connectionId, (i) => decStr(i, "connection_id"), "connection_id"),
        commitmentPrefix: decBytes(prefix, "commitment_prefix"),
      };
    },
    equals: (a, b) =>
      a.clientId === b.clientId &&
      a.connectionId === b.connectionId &&
      bytesEqual(a.commitmentPrefix, b.commitmentPrefix),
  },
);

export const versionCodec = defineObject<Version>("Version", {
  toItem: (v) => [encStr(v.identifier), encList(v.features, encStr)],
  fromItem: (item) => {
    const [identifier, features] = expectList(item, 2, "Version");
    return {
      identifier: decStr(identifier, "identifier"),
      features: decList(features, (i) => decStr(i, "feature"), "features"),
    };
  },
  equals: (a, b) => a.identifier === b.identifier && arrayEqual(a.features, b.features),
});

export const connectionEndCodec = defineObject<ConnectionEnd>("ConnectionEnd", {
  toItem: (c) => [
    connectionStateCodec.toItem(c.state),
    encStr(c.clientId),
    connectionCounterpartyCodec.toItem(c.counterparty),
    encUint(c.delayPeriod, 64),
    encList(c.versions, versionCodec.toItem),
  ],
  fromItem: (item) => {
    const [state, clientId, counterparty, delayPeriod, versions] = expectList(
      item,
      5,
      "ConnectionEnd",
    );
    return {
      state: connectionStateCodec.fromItem(state),
      clientId: decStr(clientId, "client_id"),
      counterparty: connectionCounterpartyCodec.fromItem(counterparty),
      delayPeriod: decUint(delayPeriod, 64, "delay_period"),
      versions: decList(versions, versionCodec.fromItem, "versions"),
    };
  },
  equals: (a, b) =>
    a.state === b.state &&
    a.clientId === b.clientId &&
    connectionCounterpartyCodec.equals(a.counterparty, b.counterparty) &&
    a.delayPeriod === b.delayPeriod &&
    arrayEqual(a.versions, b.versions, versionCodec.equals),
});
