/**
 * @streamledger/ledger - Type definitions.
 */

import type {
  AccountId,
  StreamId,
  StreamRecord,
  StreamStatus,
  UnixSeconds,
} from "@streamledger/types";

// ─── Errors ─────────────────────────────────────────────────────────────

export type StreamLedgerErrorCode =
  | "INVALID_TIME_PARAMETERS"
  | "ZERO_OR_MISSING_FUNDS"
  | "SELF_STREAM"
  | "STREAM_NOT_FOUND"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_AVAILABLE_BALANCE"
  | "TRANSFER_FAILED"
  | "INVALID_AMOUNT";

export class StreamLedgerError extends Error {
  public readonly code: StreamLedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: StreamLedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "StreamLedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Results ────────────────────────────────────────────────────────────

/**
 * Outcome of a ledger operation. Failures are values, not exceptions:
 * a failed result guarantees the ledger state is unchanged.
 */
export type LedgerResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: StreamLedgerError };

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value };
}

export function fail<T>(
  code: StreamLedgerErrorCode,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): LedgerResult<T> {
  return { ok: false, error: new StreamLedgerError(code, message, details) };
}

/**
 * Return the value of a successful result, or throw its error.
 * For host boundaries that report failures by throwing.
 */
export function unwrap<T>(result: LedgerResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// ─── Operation inputs ───────────────────────────────────────────────────

/**
 * Per-call context supplied by the host: who is calling and what time it is.
 * `now` is read once per operation and never re-read. It must be whole
 * non-negative seconds; anything else fails with INVALID_TIME_PARAMETERS.
 */
export interface RequestContext {
  readonly caller: AccountId;
  readonly now: UnixSeconds;
}

export interface CreateStreamParams {
  readonly recipient: AccountId;
  /** Absolute end of vesting. Mutually exclusive with `duration`. */
  readonly endDate?: UnixSeconds | undefined;
  /** Vesting length in seconds from now. Mutually exclusive with `endDate`. */
  readonly duration?: number | undefined;
  /** Value attached to the call, already held in custody. */
  readonly fundedAmount: bigint;
}

export interface WithdrawParams {
  readonly streamId: StreamId;
  /** When omitted, everything currently withdrawable is taken. */
  readonly withdrawalAmount?: bigint | undefined;
}

export interface StreamFilter {
  readonly payer?: AccountId | undefined;
  readonly recipient?: AccountId | undefined;
}

// ─── Read models ────────────────────────────────────────────────────────

export interface StreamBalance {
  readonly streamId: StreamId;
  readonly vested: bigint;
  readonly withdrawn: bigint;
  readonly withdrawable: bigint;
  readonly status: StreamStatus;
  readonly asOf: UnixSeconds;
}

// ─── Snapshot ───────────────────────────────────────────────────────────

export interface StreamLedgerSnapshot {
  readonly version: 1;
  readonly owner: AccountId;
  readonly nextId: StreamId;
  readonly streams: readonly StreamRecord[];
}
