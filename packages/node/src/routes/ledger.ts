/**
 * Ledger summary route.
 *
 * GET /api/v1/ledger - Owner, next stream id, stream count and value held
 */

import { Hono } from "hono";
import { formatAmount } from "@streamledger/ledger";
import type { AppEnv } from "../types/api-contract.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const info = c.get("service").info();
    return c.json({
      data: {
        owner: info.owner,
        nextId: info.nextId,
        streamCount: info.streamCount,
        minDurationSeconds: info.minDurationSeconds,
        held: formatAmount(info.held),
      },
    });
  });

  return routes;
}
