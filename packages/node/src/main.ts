/**
 * @streamledger/node - Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { JsonlStreamStore } from "@streamledger/store";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { buildAuthConfig } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    auth = buildAuthConfig(parsedKeys);
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured - callers are identified by X-Account-Id");
  }

  let store: JsonlStreamStore | undefined;
  if (config.STORE_PATH !== undefined) {
    store = new JsonlStreamStore({ filePath: config.STORE_PATH });
    if (store.skippedLines > 0) {
      logger.warn({ skippedLines: store.skippedLines }, "Skipped torn lines in stream store");
    }
    logger.info({ path: store.filePath }, "Using JSONL stream store");
  }

  const { app } = createApp({
    serviceConfig: {
      owner: config.LEDGER_OWNER,
      minDurationSeconds: config.MIN_STREAM_DURATION_SECONDS,
      store,
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, owner: config.LEDGER_OWNER },
    "Stream ledger node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
