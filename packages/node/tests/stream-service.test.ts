/**
 * Tests for StreamService.
 *
 * Verifies:
 * - Funding is collected before creation and refunded on rejection
 * - Ledger failures surface as thrown StreamLedgerErrors
 * - Streams resumed from a JSONL store are still payable
 * - Creations and withdrawals are logged
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pino } from "pino";
import { InMemoryStreamStore, StreamLedgerError } from "@streamledger/ledger";
import type { Stream, StreamId } from "@streamledger/types";
import { JsonlStreamStore } from "@streamledger/store";
import { StreamService } from "../src/services/stream-service.js";
import { ApiError } from "../src/types/error.js";
import { TestClock } from "./setup.js";

let clock: TestClock;
let service: StreamService;

beforeEach(() => {
  clock = new TestClock(1000);
  service = new StreamService({ owner: "owner", now: clock.now });
});

describe("createStream", () => {
  it("moves the funded amount into custody", () => {
    service.deposit("alice", 100n);

    const record = service.createStream("alice", { recipient: "bob", duration: 10, amount: 60n });

    expect(record).toEqual({
      id: 1,
      payer: "alice",
      recipient: "bob",
      originalBalance: "60",
      currentBalance: "60",
      startDate: 1000,
      endDate: 1010,
    });
    expect(service.accountBalance("alice")).toBe(40n);
    expect(service.custody.held).toBe(60n);
  });

  it("throws INSUFFICIENT_FUNDS before touching the ledger", () => {
    expect(() =>
      service.createStream("alice", { recipient: "bob", duration: 10, amount: 1n }),
    ).toThrow(ApiError);
    expect(service.ledger.nextId).toBe(1);
  });

  it("refunds when the ledger rejects the stream", () => {
    service.deposit("alice", 100n);

    expect(() =>
      service.createStream("alice", { recipient: "bob", endDate: 1000, amount: 100n }),
    ).toThrow(StreamLedgerError);

    expect(service.accountBalance("alice")).toBe(100n);
    expect(service.custody.held).toBe(0n);
  });
});

describe("createStream with a failing store", () => {
  class FailingStore extends InMemoryStreamStore {
    override insert(_id: StreamId, _stream: Stream): void {
      throw new Error("disk full");
    }
  }

  it("refunds the payer and rethrows when the store throws", () => {
    const fragile = new StreamService({ owner: "owner", now: clock.now, store: new FailingStore() });
    fragile.deposit("alice", 100n);

    expect(() =>
      fragile.createStream("alice", { recipient: "bob", duration: 10, amount: 100n }),
    ).toThrow("disk full");

    expect(fragile.accountBalance("alice")).toBe(100n);
    expect(fragile.custody.held).toBe(0n);
    expect(fragile.ledger.streamCount).toBe(0);
  });
});

describe("withdraw", () => {
  beforeEach(() => {
    service.deposit("alice", 100n);
    service.createStream("alice", { recipient: "bob", duration: 100, amount: 100n });
  });

  it("pays the recipient and returns a receipt", () => {
    clock.advance(30);

    const receipt = service.withdraw("bob", 1);

    expect(receipt.amount).toBe(30n);
    expect(receipt.stream.currentBalance).toBe("70");
    expect(service.accountBalance("bob")).toBe(30n);
  });

  it("throws the ledger error for a stranger", () => {
    clock.advance(30);

    let caught: unknown;
    try {
      service.withdraw("mallory", 1);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StreamLedgerError);
    expect(caught).toMatchObject({ code: "UNAUTHORIZED" });
  });

  it("reports the balance at the current time", () => {
    clock.advance(50);
    expect(service.getBalance(1)).toEqual({
      streamId: 1,
      vested: 50n,
      withdrawn: 0n,
      withdrawable: 50n,
      status: "active",
      asOf: 1050,
    });
  });

  it("summarizes the ledger", () => {
    expect(service.info()).toEqual({
      owner: "owner",
      nextId: 2,
      streamCount: 1,
      minDurationSeconds: 1,
      held: 100n,
    });
  });
});

describe("resuming from a JSONL store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "streamledger-service-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("restores custody for open streams so they stay payable", () => {
    const filePath = join(dir, "streams.jsonl");
    const first = new StreamService({
      owner: "owner",
      now: clock.now,
      store: new JsonlStreamStore({ filePath }),
    });
    first.deposit("alice", 500n);
    first.createStream("alice", { recipient: "bob", duration: 100, amount: 500n });
    clock.advance(20);
    first.withdraw("bob", 1);

    const second = new StreamService({
      owner: "owner",
      now: clock.now,
      store: new JsonlStreamStore({ filePath }),
    });
    expect(second.custody.held).toBe(400n);

    clock.advance(80);
    const receipt = second.withdraw("bob", 1);
    expect(receipt.amount).toBe(400n);
    expect(receipt.stream.currentBalance).toBe("0");
  });
});

describe("logging", () => {
  it("logs creations and withdrawals with the service component", () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (msg: string) => lines.push(msg) });
    const logged = new StreamService({ owner: "owner", now: clock.now, logger });

    logged.deposit("alice", 10n);
    logged.createStream("alice", { recipient: "bob", duration: 10, amount: 10n });
    clock.advance(10);
    logged.withdraw("bob", 1);

    const entries = lines.map((line): unknown => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      component: "stream-service",
      msg: "Stream created",
      streamId: 1,
      payer: "alice",
      amount: "10",
    });
    expect(entries[1]).toMatchObject({ msg: "Withdrawal paid", streamId: 1, amount: "10" });
  });
});
