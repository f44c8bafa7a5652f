/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability - tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { StreamService } from "./services/stream-service.js";
import type { StreamServiceConfig } from "./services/stream-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { InternalErrorReporter } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { identityMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createStreamRoutes } from "./routes/streams.js";
import { createLedgerRoutes } from "./routes/ledger.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: StreamServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called with every error that becomes a 500. */
  readonly onInternalError?: InternalErrorReporter | undefined;
  /** Auth configuration. When provided, callers are identified by API key. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StreamService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new StreamService(options.serviceConfig);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no identity required) ───────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  // Secured mode: X-Api-Key. Unsecured mode (tests, dev): X-Account-Id.
  app.use("/api/*", identityMiddleware(options.auth));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/streams", createStreamRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());

  return { app, service };
}
