/**
 * @streamledger/ledger - Linear payment-stream ledger engine.
 *
 * A pure TypeScript engine with zero runtime dependencies.
 * Enforces the stream invariants:
 * - 0 <= currentBalance <= originalBalance, at all times
 * - Withdrawn value never exceeds vested value
 * - Stream ids are monotonic and never reused
 * - A failed payout leaves the ledger exactly as it was
 *
 * Design rules:
 * - All types are readonly
 * - Time and identity are inputs, never ambient reads
 * - Failures are typed results, not exceptions
 */

// Core engine
export { StreamLedger, DEFAULT_MIN_DURATION_SECONDS } from "./stream-ledger.js";
export type { StreamLedgerOptions } from "./stream-ledger.js";

// Vesting calculator
export {
  vestedAmount,
  withdrawableAmount,
  withdrawnAmount,
  streamStatus,
} from "./vesting.js";

// Input validation
export {
  resolveEndDate,
  validateFunding,
  validateCounterparty,
  validateNow,
  validateWithdrawal,
} from "./validation.js";

// Storage
export {
  InMemoryStreamStore,
  StreamStoreError,
  FIRST_STREAM_ID,
} from "./store.js";
export type { StreamStore, StoredStream, StreamStoreErrorCode } from "./store.js";

// Custody
export { InMemoryCustody } from "./custody.js";
export type { ValueCustody, TransferResult, InMemoryCustodyOptions } from "./custody.js";

// Amounts and records
export {
  MAX_AMOUNT,
  parseAmount,
  formatAmount,
  isAmountInRange,
  assertAmountInRange,
} from "./amount.js";
export { toStreamRecord, fromStreamRecord } from "./records.js";

// Types
export type {
  StreamLedgerErrorCode,
  LedgerResult,
  RequestContext,
  CreateStreamParams,
  WithdrawParams,
  StreamFilter,
  StreamBalance,
  StreamLedgerSnapshot,
} from "./types.js";

export { StreamLedgerError, ok, fail, unwrap } from "./types.js";
