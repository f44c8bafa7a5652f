/**
 * Sandbox account routes.
 *
 * POST /api/v1/accounts/deposit              - Credit the caller
 * GET  /api/v1/accounts/:accountId/balance   - Custody balance of any account
 */

import { Hono } from "hono";
import { formatAmount } from "@streamledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { AccountIdSchema, DepositSchema } from "../types/dto.js";
import { readBody, readParam } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, DepositSchema);

    const balance = c.get("service").deposit(caller, body.amount);

    return c.json({ data: { accountId: caller, balance: formatAmount(balance) } });
  });

  routes.get("/:accountId/balance", (c) => {
    const accountId = readParam(c, "accountId", AccountIdSchema);
    const balance = c.get("service").accountBalance(accountId);

    return c.json({ data: { accountId, balance: formatAmount(balance) } });
  });

  return routes;
}
