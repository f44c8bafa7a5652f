/**
 * @streamledger/ledger - Core StreamLedger class.
 *
 * Owns every stream, allocates identifiers and applies the two write
 * operations. Time and identity arrive in a RequestContext; value
 * movement goes through the injected ValueCustody.
 *
 * API surface:
 * - createStream() - Open a stream funded by the caller
 * - recipientWithdraw() - Pay out vested value to the recipient
 * - getStreamById() - Read a stream (no access control)
 * - getStreamBalance() - Vesting read model at a given instant
 * - listStreams() - Streams by payer and/or recipient
 * - snapshot() / fromSnapshot() - Serialize and restore
 *
 * There is NO delete(). A drained stream stays queryable.
 */

import type { AccountId, Stream, StreamId, StreamRecord, UnixSeconds } from "@streamledger/types";
import type { ValueCustody } from "./custody.js";
import { fromStreamRecord, toStreamRecord } from "./records.js";
import type { StreamStore } from "./store.js";
import { InMemoryStreamStore } from "./store.js";
import type {
  CreateStreamParams,
  LedgerResult,
  RequestContext,
  StreamBalance,
  StreamFilter,
  StreamLedgerSnapshot,
  WithdrawParams,
} from "./types.js";
import { fail, ok } from "./types.js";
import {
  resolveEndDate,
  validateCounterparty,
  validateFunding,
  validateNow,
  validateWithdrawal,
} from "./validation.js";
import {
  streamStatus,
  vestedAmount,
  withdrawableAmount,
  withdrawnAmount,
} from "./vesting.js";

export interface StreamLedgerOptions {
  /** Administrator identity. Recorded, never consulted for authority. */
  readonly owner: AccountId;
  readonly custody: ValueCustody;
  /** Defaults to a fresh InMemoryStreamStore. */
  readonly store?: StreamStore | undefined;
  /** Shortest allowed vesting window. Default: 1 (endDate > startDate). */
  readonly minDurationSeconds?: number | undefined;
}

export const DEFAULT_MIN_DURATION_SECONDS = 1;

export class StreamLedger {
  private readonly _owner: AccountId;
  private readonly _custody: ValueCustody;
  private readonly _store: StreamStore;
  private readonly _minDurationSeconds: number;

  constructor(options: StreamLedgerOptions) {
    const minDuration = options.minDurationSeconds ?? DEFAULT_MIN_DURATION_SECONDS;
    if (!Number.isSafeInteger(minDuration) || minDuration < 1) {
      throw new RangeError(`minDurationSeconds must be a positive integer, got ${String(minDuration)}`);
    }

    this._owner = options.owner;
    this._custody = options.custody;
    this._store = options.store ?? new InMemoryStreamStore();
    this._minDurationSeconds = minDuration;
  }

  // ─── Write Operations ────────────────────────────────────────────────

  /**
   * Open a stream from the caller to `params.recipient`.
   *
   * Validation order (first failure wins, nothing is written):
   * 1. Recipient differs from caller
   * 2. Positive funded amount
   * 3. Exactly one of endDate / duration
   * 4. Resolved window is long enough
   */
  createStream(ctx: RequestContext, params: CreateStreamParams): LedgerResult<StreamId> {
    const clock = validateNow(ctx.now);
    if (!clock.ok) return clock;

    const counterparty = validateCounterparty(ctx.caller, params.recipient);
    if (!counterparty.ok) return counterparty;

    const funding = validateFunding(params.fundedAmount);
    if (!funding.ok) return funding;

    if ((params.endDate === undefined) === (params.duration === undefined)) {
      return fail(
        "INVALID_TIME_PARAMETERS",
        params.endDate === undefined
          ? "Either endDate or duration is required"
          : "Provide either endDate or duration, not both",
      );
    }

    const startDate = ctx.now;
    const endDate = resolveEndDate(
      params.endDate,
      params.duration,
      startDate,
      this._minDurationSeconds,
    );
    if (!endDate.ok) return endDate;

    const stream: Stream = {
      payer: ctx.caller,
      recipient: params.recipient,
      originalBalance: funding.value,
      currentBalance: funding.value,
      startDate,
      endDate: endDate.value,
    };

    const id = this._store.getNextId();
    this._store.insert(id, stream);
    this._store.setNextId(id + 1);

    return ok(id);
  }

  /**
   * Withdraw vested value. Only the recipient may call this.
   *
   * With no amount, everything currently withdrawable is paid out; if
   * nothing is withdrawable this succeeds with 0 and changes nothing.
   *
   * The balance decrement is written before custody pays out and is
   * restored if the payout is refused or throws.
   */
  recipientWithdraw(ctx: RequestContext, params: WithdrawParams): LedgerResult<bigint> {
    const clock = validateNow(ctx.now);
    if (!clock.ok) return clock;

    const stream = this._store.get(params.streamId);
    if (stream === undefined) {
      return fail("STREAM_NOT_FOUND", `Stream ${String(params.streamId)} does not exist`);
    }

    if (ctx.caller !== stream.recipient) {
      return fail(
        "UNAUTHORIZED",
        `Only the recipient may withdraw from stream ${String(params.streamId)}`,
      );
    }

    const available = withdrawableAmount(stream, ctx.now);

    let amount: bigint;
    if (params.withdrawalAmount !== undefined) {
      const checked = validateWithdrawal(params.withdrawalAmount, available);
      if (!checked.ok) return checked;
      amount = checked.value;
    } else {
      amount = available;
    }

    if (amount === 0n) {
      return ok(0n);
    }

    const updated: Stream = { ...stream, currentBalance: stream.currentBalance - amount };
    this._store.update(params.streamId, updated);

    let refusal: string | undefined;
    try {
      const transfer = this._custody.transfer(stream.recipient, amount);
      if (!transfer.ok) {
        refusal = transfer.reason;
      }
    } catch (err) {
      refusal = err instanceof Error ? err.message : String(err);
    }

    if (refusal !== undefined) {
      this._store.update(params.streamId, stream);
      return fail(
        "TRANSFER_FAILED",
        `Payout of ${amount.toString()} to "${stream.recipient}" failed: ${refusal}`,
        { streamId: params.streamId, amount: amount.toString() },
      );
    }

    return ok(amount);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Get a stream by id. Any caller may read any stream.
   */
  getStreamById(streamId: StreamId): LedgerResult<Stream> {
    const stream = this._store.get(streamId);
    if (stream === undefined) {
      return fail("STREAM_NOT_FOUND", `Stream ${String(streamId)} does not exist`);
    }
    return ok(stream);
  }

  /**
   * Vested, withdrawn and withdrawable amounts at `now`.
   */
  getStreamBalance(streamId: StreamId, now: UnixSeconds): LedgerResult<StreamBalance> {
    const clock = validateNow(now);
    if (!clock.ok) return clock;

    const found = this.getStreamById(streamId);
    if (!found.ok) return found;

    const stream = found.value;
    return ok({
      streamId,
      vested: vestedAmount(stream, now),
      withdrawn: withdrawnAmount(stream),
      withdrawable: withdrawableAmount(stream, now),
      status: streamStatus(stream),
      asOf: now,
    });
  }

  /**
   * Streams matching every provided filter field, ordered by id.
   */
  listStreams(filter?: StreamFilter): readonly StreamRecord[] {
    return this._store
      .list()
      .filter(({ stream }) => {
        if (filter?.payer !== undefined && stream.payer !== filter.payer) {
          return false;
        }
        if (filter?.recipient !== undefined && stream.recipient !== filter.recipient) {
          return false;
        }
        return true;
      })
      .map(({ id, stream }) => toStreamRecord(id, stream));
  }

  get owner(): AccountId {
    return this._owner;
  }

  get nextId(): StreamId {
    return this._store.getNextId();
  }

  get streamCount(): number {
    return this._store.size;
  }

  get minDurationSeconds(): number {
    return this._minDurationSeconds;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): StreamLedgerSnapshot {
    return {
      version: 1,
      owner: this._owner,
      nextId: this._store.getNextId(),
      streams: this._store.list().map(({ id, stream }) => toStreamRecord(id, stream)),
    };
  }

  /**
   * Restore a ledger from a snapshot into an empty store.
   * Every record is decoded and checked before it is inserted.
   */
  static fromSnapshot(
    snapshot: StreamLedgerSnapshot,
    options: Omit<StreamLedgerOptions, "owner">,
  ): StreamLedger {
    const ledger = new StreamLedger({ ...options, owner: snapshot.owner });

    let highestId = 0;
    for (const record of snapshot.streams) {
      const { id, stream } = fromStreamRecord(record);
      ledger._store.insert(id, stream);
      highestId = Math.max(highestId, id);
    }

    const nextId = Math.max(snapshot.nextId, highestId + 1);
    if (nextId > ledger._store.getNextId()) {
      ledger._store.setNextId(nextId);
    }

    return ledger;
  }
}
