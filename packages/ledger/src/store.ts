/**
 * @streamledger/ledger - Stream storage seam.
 *
 * The ledger persists streams and its id counter through this interface.
 * Hosts supply a durable implementation; InMemoryStreamStore backs tests
 * and embedded use.
 *
 * Rules:
 * - insert() never overwrites; update() never creates
 * - Entries are never removed
 * - A fresh store starts allocating ids at 1
 */

import type { Stream, StreamId } from "@streamledger/types";

export type StreamStoreErrorCode =
  | "DUPLICATE_STREAM_ID"
  | "UNKNOWN_STREAM_ID"
  | "INVALID_NEXT_ID"
  | "CORRUPT_RECORD";

export class StreamStoreError extends Error {
  public readonly code: StreamStoreErrorCode;

  constructor(code: StreamStoreErrorCode, message: string) {
    super(message);
    this.name = "StreamStoreError";
    this.code = code;
  }
}

export interface StoredStream {
  readonly id: StreamId;
  readonly stream: Stream;
}

export interface StreamStore {
  get(id: StreamId): Stream | undefined;
  insert(id: StreamId, stream: Stream): void;
  update(id: StreamId, stream: Stream): void;
  getNextId(): StreamId;
  setNextId(id: StreamId): void;
  /** All streams ordered by id. */
  list(): readonly StoredStream[];
  readonly size: number;
}

export const FIRST_STREAM_ID: StreamId = 1;

/**
 * Map-backed StreamStore.
 */
export class InMemoryStreamStore implements StreamStore {
  private readonly _streams = new Map<StreamId, Stream>();
  private _nextId: StreamId = FIRST_STREAM_ID;

  get(id: StreamId): Stream | undefined {
    return this._streams.get(id);
  }

  insert(id: StreamId, stream: Stream): void {
    if (this._streams.has(id)) {
      throw new StreamStoreError("DUPLICATE_STREAM_ID", `Stream ${String(id)} already exists`);
    }
    this._streams.set(id, stream);
  }

  update(id: StreamId, stream: Stream): void {
    if (!this._streams.has(id)) {
      throw new StreamStoreError("UNKNOWN_STREAM_ID", `Stream ${String(id)} does not exist`);
    }
    this._streams.set(id, stream);
  }

  getNextId(): StreamId {
    return this._nextId;
  }

  setNextId(id: StreamId): void {
    if (!Number.isSafeInteger(id) || id < this._nextId) {
      throw new StreamStoreError(
        "INVALID_NEXT_ID",
        `Next id must not move backwards: ${String(this._nextId)} → ${String(id)}`,
      );
    }
    this._nextId = id;
  }

  list(): readonly StoredStream[] {
    return [...this._streams.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, stream]) => ({ id, stream }));
  }

  get size(): number {
    return this._streams.size;
  }
}
