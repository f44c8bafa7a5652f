/**
 * StreamService - Composition root for the ledger host.
 *
 * Route handlers delegate to this service; they never touch the engine
 * directly. The service owns the ledger, the sandbox custody book and
 * the clock, and turns ledger failures into thrown StreamLedgerErrors
 * for the HTTP error handler.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import {
  InMemoryCustody,
  StreamLedger,
  toStreamRecord,
  unwrap,
} from "@streamledger/ledger";
import type { LedgerResult, StreamBalance, StreamFilter, StreamStore } from "@streamledger/ledger";
import type { AccountId, StreamId, StreamRecord, UnixSeconds } from "@streamledger/types";
import { ApiError } from "../types/error.js";

// =============================================================================
// Configuration
// =============================================================================

export interface StreamServiceConfig {
  readonly owner: AccountId;
  readonly minDurationSeconds?: number | undefined;
  /** Durable store; streams already in it are resumed. Default: in-memory. */
  readonly store?: StreamStore | undefined;
  /** Current time in whole seconds. Default: the system clock. */
  readonly now?: (() => UnixSeconds) | undefined;
  readonly logger?: Logger | undefined;
}

export interface CreateStreamInput {
  readonly recipient: AccountId;
  readonly endDate?: UnixSeconds | undefined;
  readonly duration?: number | undefined;
  readonly amount: bigint;
}

export interface WithdrawalReceipt {
  readonly streamId: StreamId;
  readonly amount: bigint;
  readonly stream: StreamRecord;
}

export interface LedgerInfo {
  readonly owner: AccountId;
  readonly nextId: StreamId;
  readonly streamCount: number;
  readonly minDurationSeconds: number;
  readonly held: bigint;
}

export function systemNow(): UnixSeconds {
  return Math.floor(Date.now() / 1000);
}

// =============================================================================
// Service
// =============================================================================

export class StreamService {
  readonly ledger: StreamLedger;
  readonly custody: InMemoryCustody;

  private readonly _now: () => UnixSeconds;
  private readonly _log: Logger;

  constructor(config: StreamServiceConfig) {
    this._now = config.now ?? systemNow;
    this._log = (config.logger ?? pino({ level: "silent" })).child({ component: "stream-service" });

    // Value backing resumed streams is still owed to their recipients.
    let held = 0n;
    for (const { stream } of config.store?.list() ?? []) {
      held += stream.currentBalance;
    }
    this.custody = new InMemoryCustody({ held });

    this.ledger = new StreamLedger({
      owner: config.owner,
      custody: this.custody,
      store: config.store,
      minDurationSeconds: config.minDurationSeconds,
    });

    if (this.ledger.streamCount > 0) {
      this._log.info(
        { streams: this.ledger.streamCount, held: held.toString() },
        "Resumed streams from store",
      );
    }
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  deposit(account: AccountId, amount: bigint): bigint {
    const balance = this.custody.deposit(account, amount);
    this._log.debug({ account, amount: amount.toString() }, "Deposit credited");
    return balance;
  }

  accountBalance(account: AccountId): bigint {
    return this.custody.balanceOf(account);
  }

  // ─── Streams ───────────────────────────────────────────────────────

  /**
   * Collect `amount` from the caller into custody and open a stream.
   * If the ledger rejects the stream, the collected value is returned.
   */
  createStream(caller: AccountId, input: CreateStreamInput): StreamRecord {
    const collected = this.custody.collect(caller, input.amount);
    if (!collected.ok) {
      this._log.warn({ caller, amount: input.amount.toString() }, "Stream funding refused");
      throw new ApiError("INSUFFICIENT_FUNDS", collected.reason, {
        account: caller,
        amount: input.amount.toString(),
      });
    }

    let result: LedgerResult<StreamId>;
    try {
      result = this.ledger.createStream(
        { caller, now: this._now() },
        {
          recipient: input.recipient,
          endDate: input.endDate,
          duration: input.duration,
          fundedAmount: input.amount,
        },
      );
    } catch (err) {
      this._refund(caller, input.amount);
      this._log.error({ caller, err }, "Stream creation aborted");
      throw err;
    }

    if (!result.ok) {
      this._refund(caller, input.amount);
      this._log.info({ caller, code: result.error.code }, "Stream rejected");
      throw result.error;
    }

    const record = this.getStream(result.value);
    this._log.info(
      {
        streamId: record.id,
        payer: record.payer,
        recipient: record.recipient,
        amount: record.originalBalance,
        endDate: record.endDate,
      },
      "Stream created",
    );
    return record;
  }

  private _refund(caller: AccountId, amount: bigint): void {
    const refund = this.custody.transfer(caller, amount);
    if (!refund.ok) {
      this._log.error({ caller, reason: refund.reason }, "Refund of rejected stream failed");
    }
  }

  withdraw(caller: AccountId, streamId: StreamId, amount?: bigint): WithdrawalReceipt {
    const result = this.ledger.recipientWithdraw(
      { caller, now: this._now() },
      { streamId, withdrawalAmount: amount },
    );

    if (!result.ok) {
      const level = result.error.code === "TRANSFER_FAILED" ? "error" : "warn";
      this._log[level](
        { streamId, caller, code: result.error.code },
        "Withdrawal rejected",
      );
      throw result.error;
    }

    if (result.value > 0n) {
      this._log.info({ streamId, amount: result.value.toString() }, "Withdrawal paid");
    }

    return { streamId, amount: result.value, stream: this.getStream(streamId) };
  }

  getStream(streamId: StreamId): StreamRecord {
    return toStreamRecord(streamId, unwrap(this.ledger.getStreamById(streamId)));
  }

  getBalance(streamId: StreamId): StreamBalance {
    return unwrap(this.ledger.getStreamBalance(streamId, this._now()));
  }

  listStreams(filter?: StreamFilter): readonly StreamRecord[] {
    return this.ledger.listStreams(filter);
  }

  info(): LedgerInfo {
    return {
      owner: this.ledger.owner,
      nextId: this.ledger.nextId,
      streamCount: this.ledger.streamCount,
      minDurationSeconds: this.ledger.minDurationSeconds,
      held: this.custody.held,
    };
  }
}
