/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { asAccount, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
      accountId: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("records the caller and error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      asAccount("alice", "/api/v1/streams", "POST", { recipient: "alice", duration: 5, amount: "0" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/streams",
      status: 400,
      accountId: "alice",
    });
  });
});
