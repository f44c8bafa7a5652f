/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger and API error codes to HTTP status codes. Anything
 * without a known code is a 500 whose message is not exposed.
 */

import type { Context, ErrorHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Error Code → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 422 | 500 | 502;

const STATUS_MAP = new Map<string, ErrorStatus>([
  // Ledger errors
  ["INVALID_TIME_PARAMETERS", 400],
  ["ZERO_OR_MISSING_FUNDS", 400],
  ["SELF_STREAM", 400],
  ["INVALID_AMOUNT", 400],
  ["STREAM_NOT_FOUND", 404],
  ["UNAUTHORIZED", 403],
  ["INSUFFICIENT_AVAILABLE_BALANCE", 422],
  ["TRANSFER_FAILED", 502],

  // API errors
  ["VALIDATION_ERROR", 400],
  ["UNAUTHENTICATED", 401],
  ["INSUFFICIENT_FUNDS", 422],
  ["NOT_FOUND", 404],
]);

function errorCodeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorDetailsOf(err: Error): Record<string, unknown> | undefined {
  if (!("details" in err)) return undefined;
  const details = err.details;
  if (typeof details !== "object" || details === null || Array.isArray(details)) {
    return undefined;
  }
  return { ...details };
}

export function statusForError(err: Error): ErrorStatus {
  const code = errorCodeOf(err);
  if (code === undefined) {
    return 500;
  }
  return STATUS_MAP.get(code) ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Called for errors that map to 500, before the response is rendered.
 */
export type InternalErrorReporter = (err: Error, c: Context<AppEnv>) => void;

/**
 * Build the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(
  onInternalError?: InternalErrorReporter,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    const status = statusForError(err);

    if (status === 500) {
      onInternalError?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const code = errorCodeOf(err) ?? "INTERNAL_ERROR";
    const envelope = createErrorEnvelope(code, err.message, errorDetailsOf(err));
    return c.json(envelope, status);
  };
}

export const handleError: ErrorHandler<AppEnv> = createErrorHandler();
