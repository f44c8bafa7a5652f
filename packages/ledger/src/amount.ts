/**
 * @streamledger/ledger - Smallest-unit amount arithmetic.
 *
 * Amounts are unsigned integers held as bigint. On the wire and on disk
 * they travel as base-10 strings.
 *
 * Rules:
 * - No floating-point operations
 * - No negative amounts
 * - Upper bound is MAX_AMOUNT (128-bit unsigned)
 */

import { StreamLedgerError } from "./types.js";

/** Largest representable amount: 2^128 - 1. */
export const MAX_AMOUNT = (1n << 128n) - 1n;

/**
 * Parse an unsigned base-10 integer string.
 *
 * "1000" → 1000n
 * "0" → 0n
 * "1.5", "-1", "1e3", "" → INVALID_AMOUNT
 */
export function parseAmount(text: string): bigint {
  const trimmed = text.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new StreamLedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const value = BigInt(trimmed);
  assertAmountInRange(value);
  return value;
}

/**
 * Format an amount as a base-10 string.
 */
export function formatAmount(value: bigint): string {
  assertAmountInRange(value);
  return value.toString();
}

/**
 * Check that a bigint lies within [0, MAX_AMOUNT].
 */
export function isAmountInRange(value: bigint): boolean {
  return value >= 0n && value <= MAX_AMOUNT;
}

export function assertAmountInRange(value: bigint): void {
  if (!isAmountInRange(value)) {
    throw new StreamLedgerError(
      "INVALID_AMOUNT",
      `Amount ${value.toString()} is outside [0, ${MAX_AMOUNT.toString()}]`,
    );
  }
}

