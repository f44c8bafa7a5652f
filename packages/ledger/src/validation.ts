/**
 * @streamledger/ledger - Creation and withdrawal input checks.
 *
 * Each check returns a LedgerResult so the ledger can stop at the first
 * failure without touching state.
 */

import type { AccountId, UnixSeconds } from "@streamledger/types";
import { isAmountInRange } from "./amount.js";
import type { LedgerResult } from "./types.js";
import { fail, ok } from "./types.js";

function isWholeSeconds(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * The host clock must report whole, non-negative seconds.
 */
export function validateNow(now: UnixSeconds): LedgerResult<UnixSeconds> {
  if (!isWholeSeconds(now)) {
    return fail("INVALID_TIME_PARAMETERS", `now must be whole seconds, got ${String(now)}`);
  }
  return ok(now);
}

/**
 * Resolve the vesting end from exactly one of `endDate` / `duration`.
 *
 * The resulting window must be at least `minDurationSeconds` long,
 * which also guarantees endDate > startDate.
 */
export function resolveEndDate(
  endDate: UnixSeconds | undefined,
  duration: number | undefined,
  startDate: UnixSeconds,
  minDurationSeconds: number,
): LedgerResult<UnixSeconds> {
  if (endDate !== undefined && duration !== undefined) {
    return fail(
      "INVALID_TIME_PARAMETERS",
      "Provide either endDate or duration, not both",
    );
  }

  let resolved: UnixSeconds;
  if (endDate !== undefined) {
    if (!isWholeSeconds(endDate)) {
      return fail("INVALID_TIME_PARAMETERS", `endDate must be whole seconds, got ${String(endDate)}`);
    }
    resolved = endDate;
  } else if (duration !== undefined) {
    if (!isWholeSeconds(duration)) {
      return fail("INVALID_TIME_PARAMETERS", `duration must be whole seconds, got ${String(duration)}`);
    }
    resolved = startDate + duration;
    if (!Number.isSafeInteger(resolved)) {
      return fail("INVALID_TIME_PARAMETERS", "startDate + duration overflows");
    }
  } else {
    return fail("INVALID_TIME_PARAMETERS", "Either endDate or duration is required");
  }

  if (resolved <= startDate) {
    return fail(
      "INVALID_TIME_PARAMETERS",
      `endDate ${String(resolved)} must be later than startDate ${String(startDate)}`,
      { startDate, endDate: resolved },
    );
  }

  if (resolved - startDate < minDurationSeconds) {
    return fail(
      "INVALID_TIME_PARAMETERS",
      `Stream must last at least ${String(minDurationSeconds)}s, got ${String(resolved - startDate)}s`,
      { startDate, endDate: resolved, minDurationSeconds },
    );
  }

  return ok(resolved);
}

/**
 * The attached value must be positive and representable.
 */
export function validateFunding(fundedAmount: bigint): LedgerResult<bigint> {
  if (fundedAmount <= 0n) {
    return fail("ZERO_OR_MISSING_FUNDS", "A stream must be funded with a positive amount");
  }
  if (!isAmountInRange(fundedAmount)) {
    return fail("INVALID_AMOUNT", `Funded amount ${fundedAmount.toString()} exceeds the maximum amount`);
  }
  return ok(fundedAmount);
}

export function validateCounterparty(
  payer: AccountId,
  recipient: AccountId,
): LedgerResult<AccountId> {
  if (payer === recipient) {
    return fail("SELF_STREAM", `Recipient cannot be the payer ("${payer}")`);
  }
  return ok(recipient);
}

/**
 * A requested withdrawal must be positive and covered by what is available.
 */
export function validateWithdrawal(
  requested: bigint,
  available: bigint,
): LedgerResult<bigint> {
  if (requested <= 0n) {
    return fail(
      "INSUFFICIENT_AVAILABLE_BALANCE",
      "Withdrawal amount must be greater than zero",
      { requested: requested.toString(), available: available.toString() },
    );
  }
  if (requested > available) {
    return fail(
      "INSUFFICIENT_AVAILABLE_BALANCE",
      `Requested ${requested.toString()} exceeds available ${available.toString()}`,
      { requested: requested.toString(), available: available.toString() },
    );
  }
  return ok(requested);
}
