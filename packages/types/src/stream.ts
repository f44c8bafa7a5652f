/**
 * Stream Types
 *
 * Core primitives for time-vested value streams.
 *
 * Rules:
 * - Amounts are unsigned integers in the smallest indivisible unit (bigint)
 * - Dates are whole seconds since the Unix epoch
 * - Identifiers are allocated once and never reused
 */

/**
 * Identity of a participant (payer, recipient, ledger owner).
 * Opaque to the ledger; resolved and verified by the host.
 */
export type AccountId = string;

/**
 * Unsigned integer stream identifier, starting at 1.
 */
export type StreamId = number;

/**
 * Seconds since the Unix epoch.
 */
export type UnixSeconds = number;

/**
 * A one-directional, linearly vesting commitment of value
 * from a payer to a recipient.
 */
export interface Stream {
  /** Funder of the stream. Immutable. */
  readonly payer: AccountId;

  /** Beneficiary of the stream. Immutable. */
  readonly recipient: AccountId;

  /** Total amount committed at creation. Immutable, always > 0. */
  readonly originalBalance: bigint;

  /**
   * Amount not yet withdrawn.
   * Only ever decreases; 0 <= currentBalance <= originalBalance.
   */
  readonly currentBalance: bigint;

  /** Vesting start (creation time). */
  readonly startDate: UnixSeconds;

  /** Vesting end. Always later than startDate. */
  readonly endDate: UnixSeconds;
}

/**
 * Lifecycle state derived from the balance.
 * A drained stream never becomes active again.
 */
export type StreamStatus = "active" | "drained";

/**
 * Serializable form of a stream, as stored on disk and returned over HTTP.
 * Amounts are base-10 strings because JSON has no bigint.
 */
export interface StreamRecord {
  readonly id: StreamId;
  readonly payer: AccountId;
  readonly recipient: AccountId;
  readonly originalBalance: string;
  readonly currentBalance: string;
  readonly startDate: UnixSeconds;
  readonly endDate: UnixSeconds;
}
