/**
 * Identity middleware.
 *
 * Resolves which ledger account a request acts as:
 * - Secured mode (AuthConfig given): X-Api-Key, looked up in the key registry
 * - Unsecured mode: X-Account-Id, taken as-is
 *
 * Requests without an identity pass through with `auth` unset; reads are
 * open to everyone. Handlers that mutate call requireCaller(), which
 * fails with 401 UNAUTHENTICATED. A key or account header that is present
 * but invalid is rejected immediately.
 */

import type { Context, MiddlewareHandler } from "hono";
import { isAccountId } from "@streamledger/types";
import type { AccountId } from "@streamledger/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_ID_HEADER = "X-Account-Id";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

// =============================================================================
// Middleware
// =============================================================================

export function identityMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    if (config !== undefined) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey !== undefined) {
        const record = config.apiKeys.get(apiKey);
        if (record === undefined) {
          return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
        }
        auth = { type: "api-key", accountId: record.accountId };
      }
    } else {
      const accountId = c.req.header(ACCOUNT_ID_HEADER);
      if (accountId !== undefined) {
        if (!isAccountId(accountId)) {
          return c.json(
            createErrorEnvelope("UNAUTHENTICATED", `${ACCOUNT_ID_HEADER} must not be blank`),
            401,
          );
        }
        auth = { type: "header", accountId };
      }
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Guard
// =============================================================================

/**
 * The account the request acts as. Throws UNAUTHENTICATED when none.
 */
export function requireCaller(c: Context<AppEnv>): AccountId {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new ApiError("UNAUTHENTICATED", "This operation requires a caller identity");
  }
  return auth.accountId;
}

/**
 * Build the key registry from parsed API_KEYS entries.
 */
export function buildAuthConfig(keys: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(keys.map((k) => [k.key, k])) };
}
