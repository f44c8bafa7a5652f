/**
 * @streamledger/types - Shared domain types for the stream ledger.
 *
 * Used by the engine, the persistence adapter and the HTTP host.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types - meaning lives in consuming code
 */

export type {
  AccountId,
  StreamId,
  UnixSeconds,
  Stream,
  StreamStatus,
  StreamRecord,
} from "./stream.js";

export {
  isAccountId,
  isStreamId,
  isAmountString,
  isStreamStatus,
  isStream,
  isStreamRecord,
} from "./guards.js";
