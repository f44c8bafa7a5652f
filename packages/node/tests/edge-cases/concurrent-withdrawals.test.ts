/**
 * Tests for concurrent withdrawals against one stream.
 *
 * Ledger operations are synchronous, so requests in flight together
 * are applied one after another and can never pay out more than vested.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { asAccount, createTestApp } from "../setup.js";
import type { TestApp } from "../setup.js";

let instance: TestApp;

beforeEach(async () => {
  instance = createTestApp();
  await instance.app.request(
    asAccount("alice", "/api/v1/accounts/deposit", "POST", { amount: "1000" }),
  );
  await instance.app.request(
    asAccount("alice", "/api/v1/streams", "POST", { recipient: "bob", duration: 1000, amount: "1000" }),
  );
  instance.clock.advance(500);
});

describe("concurrent withdrawals", () => {
  it("fixed amounts - only as many as fit succeed", async () => {
    const responses = await Promise.all(
      Array.from({ length: 5 }, () =>
        instance.app.request(
          asAccount("bob", "/api/v1/streams/1/withdraw", "POST", { amount: "200" }),
        ),
      ),
    );

    const statuses = responses.map((r) => r.status).sort();
    expect(statuses).toEqual([200, 200, 422, 422, 422]);
    expect(instance.service.accountBalance("bob")).toBe(400n);
    expect(instance.service.getStream(1).currentBalance).toBe("600");
  });

  it("withdraw-all - one request takes everything, the rest get 0", async () => {
    const responses = await Promise.all(
      Array.from({ length: 4 }, () =>
        instance.app.request(asAccount("bob", "/api/v1/streams/1/withdraw", "POST")),
      ),
    );

    const amounts: string[] = [];
    for (const res of responses) {
      expect(res.status).toBe(200);
      const body = (await res.json()) as { data: { amount: string } };
      amounts.push(body.data.amount);
    }

    expect(amounts.sort()).toEqual(["0", "0", "0", "500"]);
    expect(instance.service.accountBalance("bob")).toBe(500n);
  });
});
