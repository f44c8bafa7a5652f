/**
 * Tests for the health check endpoint and unmatched routes.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok" and the stream count
 * - X-Request-Id is set on responses
 * - Unknown routes return the 404 error envelope
 */

import { describe, it, expect } from "vitest";
import { asAccount, createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; streams: number; timestamp: string };
    expect(body.status).toBe("ok");
    expect(body.streams).toBe(0);
    expect(typeof body.timestamp).toBe("string");
  });

  it("counts streams", async () => {
    const { app } = createTestApp();
    await app.request(asAccount("alice", "/api/v1/accounts/deposit", "POST", { amount: "5" }));
    await app.request(
      asAccount("alice", "/api/v1/streams", "POST", { recipient: "bob", duration: 5, amount: "5" }),
    );

    const res = await app.request("/health");
    const body = (await res.json()) as { streams: number };
    expect(body.streams).toBe(1);
  });

  it("includes a generated X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an X-Request-Id with unsafe characters", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "bad id<script>",
      }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("bad id<script>");
    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("unknown routes", () => {
  it("returns 404 with the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nothing-here" },
    });
  });
});
