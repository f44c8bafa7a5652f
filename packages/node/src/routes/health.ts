/**
 * Health check route.
 *
 * GET /health - Liveness probe (always 200 if the server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { StreamService } from "../services/stream-service.js";

export function createHealthRoutes(service: StreamService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      streams: service.ledger.streamCount,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
