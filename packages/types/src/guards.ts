/**
 * Runtime Type Guards
 *
 * Narrowing functions for stream domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, persisted records).
 */

import type { AccountId, Stream, StreamId, StreamRecord, StreamStatus } from "./stream.js";

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;
const STREAM_STATUSES = new Set<string>(["active", "drained"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isUnixSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Primitive guards
// =============================================================================

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isStreamId(value: unknown): value is StreamId {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 1;
}

/** An unsigned base-10 integer string without leading zeros. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isStreamStatus(value: unknown): value is StreamStatus {
  return typeof value === "string" && STREAM_STATUSES.has(value);
}

// =============================================================================
// Stream guards
// =============================================================================

/**
 * Structural check plus the balance and date invariants.
 */
export function isStream(value: unknown): value is Stream {
  if (!isRecord(value)) return false;
  const { payer, recipient, originalBalance, currentBalance, startDate, endDate } = value;
  return (
    isAccountId(payer) &&
    isAccountId(recipient) &&
    typeof originalBalance === "bigint" &&
    typeof currentBalance === "bigint" &&
    originalBalance > 0n &&
    currentBalance >= 0n &&
    currentBalance <= originalBalance &&
    isUnixSeconds(startDate) &&
    isUnixSeconds(endDate) &&
    endDate > startDate
  );
}

/**
 * Structural check of the serialized form. Amount ordering is
 * checked by the ledger when the record is decoded.
 */
export function isStreamRecord(value: unknown): value is StreamRecord {
  if (!isRecord(value)) return false;
  return (
    isStreamId(value.id) &&
    isAccountId(value.payer) &&
    isAccountId(value.recipient) &&
    isAmountString(value.originalBalance) &&
    isAmountString(value.currentBalance) &&
    isUnixSeconds(value.startDate) &&
    isUnixSeconds(value.endDate)
  );
}
