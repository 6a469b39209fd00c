/**
 * Failure vocabulary shared with the host. Only the integer code crosses the
 * boundary, so every value is pinned and must never be reassigned.
 */
export enum VerifyError {
  FoundNoMessage = 100,
  EventNotMatch = 101,
  InvalidReceiptProof = 102,
  SerdeError = 103,

  WrongClient = 104,
  WrongConnectionId = 105,
  WrongConnectionNumber = 106,
  WrongPortId = 107,
  WrongCommonHexId = 108,

  ConnectionsWrong = 109,

  WrongConnectionCnt = 110,
  WrongConnectionState = 111,
  WrongConnectionCounterparty = 112,
  WrongConnectionClient = 113,
  WrongConnectionNextChannelNumber = 114,
  WrongConnectionArgs = 115,

  WrongChannelState = 116,
  WrongChannel = 117,
  WrongChannelArgs = 118,
  WrongChannelSequence = 119,

  WrongUnusedPacket = 120,
  WrongPacketSequence = 121,
  WrongPacketStatus = 122,
  WrongPacketContent = 123,
  WrongPacketArgs = 124,
}

const NAMES = new Map<number, string>(
  Object.entries(VerifyError).flatMap(([name, code]) =>
    typeof code === "number" ? [[code, name] as const] : [],
  ),
);

export const isVerifyErrorCode = (n: number): n is VerifyError => NAMES.has(n);

export const verifyErrorName = (code: number): string | undefined =>
  NAMES.get(code);

export class VerifyFailure extends Error {
  readonly code: VerifyError;

  constructor(code: VerifyError, message?: string, options?: ErrorOptions) {
    super(message ?? `${verifyErrorName(code) ?? "UnknownError"} (${code})`, options);
    this.name = "VerifyFailure";
    this.code = code;
  }
}
