/**
 * Stream routes.
 *
 * POST /api/v1/streams                 - Fund and open a stream (caller is payer)
 * GET  /api/v1/streams                 - List streams, optionally by payer/recipient
 * GET  /api/v1/streams/:id             - Get a single stream
 * GET  /api/v1/streams/:id/balance     - Vested/withdrawable amounts now
 * POST /api/v1/streams/:id/withdraw    - Recipient withdrawal
 *
 * Amounts are returned as base-10 strings.
 */

import { Hono } from "hono";
import { formatAmount } from "@streamledger/ledger";
import type { StreamBalance } from "@streamledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateStreamSchema,
  ListStreamsQuerySchema,
  StreamIdParamSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { readBody, readParam, readQuery } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

function toBalanceView(balance: StreamBalance) {
  return {
    streamId: balance.streamId,
    vested: formatAmount(balance.vested),
    withdrawn: formatAmount(balance.withdrawn),
    withdrawable: formatAmount(balance.withdrawable),
    status: balance.status,
    asOf: balance.asOf,
  };
}

export function createStreamRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/streams - Create
  routes.post("/", async (c) => {
    const caller = requireCaller(c);
    const body = await readBody(c, CreateStreamSchema);

    const stream = c.get("service").createStream(caller, {
      recipient: body.recipient,
      endDate: body.endDate,
      duration: body.duration,
      amount: body.amount,
    });

    return c.json({ data: stream }, 201);
  });

  // GET /api/v1/streams - List
  routes.get("/", (c) => {
    const query = readQuery(c, ListStreamsQuerySchema);
    const streams = c.get("service").listStreams({
      payer: query.payer,
      recipient: query.recipient,
    });

    return c.json({ data: streams });
  });

  // GET /api/v1/streams/:id - Get
  routes.get("/:id", (c) => {
    const id = readParam(c, "id", StreamIdParamSchema);
    return c.json({ data: c.get("service").getStream(id) });
  });

  // GET /api/v1/streams/:id/balance - Vesting read model
  routes.get("/:id/balance", (c) => {
    const id = readParam(c, "id", StreamIdParamSchema);
    return c.json({ data: toBalanceView(c.get("service").getBalance(id)) });
  });

  // POST /api/v1/streams/:id/withdraw - Withdraw
  routes.post("/:id/withdraw", async (c) => {
    const caller = requireCaller(c);
    const id = readParam(c, "id", StreamIdParamSchema);
    const body = await readBody(c, WithdrawSchema);

    const receipt = c.get("service").withdraw(caller, id, body.amount);

    return c.json({
      data: {
        streamId: receipt.streamId,
        amount: formatAmount(receipt.amount),
        stream: receipt.stream,
      },
    });
  });

  return routes;
}
