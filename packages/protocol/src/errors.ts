/**
 * Named protocol failures.
 *
 * Every precondition violation aborts the call with one of these codes;
 * the surrounding transaction reverts all of its effects.
 */

export const PROTOCOL_ERROR_CODES = [
  // access + pause
  "Unauthorized",
  "EnforcedPause",
  "ExpectedPause",
  // admin parameters
  "InvalidParameter",
  // value transfer
  "TransferFailed",
  // stake registry
  "BelowMinimumStake",
  "Frozen",
  "NotStaked",
  // postage ledger
  "ZeroAddress",
  "InvalidDepth",
  "BatchExists",
  "BatchDoesNotExist",
  "BatchExpired",
  "BatchTooSmall",
  "BatchIsImmutable",
  "NotBatchOwner",
  "DepthNotIncreasing",
  "InsufficientBalance",
  "InsufficientChunkCount",
  // price oracle
  "PriceAlreadyAdjusted",
  "UnexpectedZero",
  // redistribution
  "MustStake2Rounds",
  "NotCommitPhase",
  "NotRevealPhase",
  "NotClaimPhase",
  "PhaseLastBlock",
  "CommitRoundOver",
  "CommitRoundNotStarted",
  "AlreadyCommitted",
  "NoCommitsReceived",
  "NoMatchingCommit",
  "AlreadyRevealed",
  "OutOfDepth",
  "OutOfDepthReveal",
  "NoReveals",
  "AlreadyClaimed",
  "FirstRevealDone",
  "WrongPhase",
] as const;

export type ProtocolErrorCode = (typeof PROTOCOL_ERROR_CODES)[number];

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: ProtocolErrorCode, details?: Record<string, unknown>) {
    super(details ? `${code}: ${JSON.stringify(details, bigintReplacer)}` : code);
    this.name = "ProtocolError";
    this.code = code;
    this.details = details;
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

/** Assert a precondition, failing with the given code. */
export function ensure(
  condition: boolean,
  code: ProtocolErrorCode,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) throw new ProtocolError(code, details);
}

/** JSON.stringify replacer that renders bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
