/**
 * Authentication types.
 *
 * Every API caller acts as a ledger account. Two ways to name it:
 * 1. API key via X-Api-Key header (secured mode)
 * 2. X-Account-Id header (unsecured mode, tests and development)
 */

import type { AccountId } from "@streamledger/types";

/**
 * Resolved caller identity, set by the identity middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly accountId: AccountId;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly accountId: AccountId;
}
