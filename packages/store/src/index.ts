/**
 * @streamledger/store - Durable persistence for the stream ledger.
 *
 * Provides:
 * - JsonlStreamStore, an fsync'd JSON-lines StreamStore
 *
 * @packageDocumentation
 */

export { JsonlStreamStore } from "./jsonl-store.js";
export type { JsonlStreamStoreOptions } from "./jsonl-store.js";
