/**
 * @streamledger/store - File-based JSONL StreamStore implementation.
 *
 * Persists every store mutation as one JSON object per line.
 *
 * Crash safety:
 * - Each write flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * Properties:
 * - Append-only: the file is never truncated or rewritten
 * - Last write per stream id wins on replay
 * - The replayed next id is never at or below an existing stream id
 *
 * File format:
 * {"kind":"stream","record":{"id":1,"payer":"...","originalBalance":"1000",...}}
 * {"kind":"next-id","value":2}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { Stream, StreamId } from "@streamledger/types";
import { isStreamId } from "@streamledger/types";
import {
  FIRST_STREAM_ID,
  StreamStoreError,
  fromStreamRecord,
  toStreamRecord,
} from "@streamledger/ledger";
import type { StoredStream, StreamStore } from "@streamledger/ledger";

export interface JsonlStreamStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

type JsonlLine =
  | { readonly kind: "stream"; readonly record: unknown }
  | { readonly kind: "next-id"; readonly value: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toJsonlLine(value: unknown): JsonlLine | undefined {
  if (!isRecord(value)) return undefined;
  if (value["kind"] === "stream") return { kind: "stream", record: value["record"] };
  if (value["kind"] === "next-id") return { kind: "next-id", value: value["value"] };
  return undefined;
}

/**
 * Durable stream store.
 *
 * The in-memory index is rebuilt from the file on construction.
 * Memory is only updated after the line has reached disk.
 */
export class JsonlStreamStore implements StreamStore {
  private readonly _filePath: string;
  private readonly _streams = new Map<StreamId, Stream>();
  private _nextId: StreamId = FIRST_STREAM_ID;
  private _skippedLines = 0;

  /**
   * Open (or prepare to create) the store at `options.filePath`.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlStreamStoreOptions) {
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });

    this._loadFromFile();
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get(id: StreamId): Stream | undefined {
    return this._streams.get(id);
  }

  getNextId(): StreamId {
    return this._nextId;
  }

  list(): readonly StoredStream[] {
    return [...this._streams.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, stream]) => ({ id, stream }));
  }

  get size(): number {
    return this._streams.size;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  insert(id: StreamId, stream: Stream): void {
    if (this._streams.has(id)) {
      throw new StreamStoreError("DUPLICATE_STREAM_ID", `Stream ${String(id)} already exists`);
    }
    this._writeStream(id, stream);
  }

  update(id: StreamId, stream: Stream): void {
    if (!this._streams.has(id)) {
      throw new StreamStoreError("UNKNOWN_STREAM_ID", `Stream ${String(id)} does not exist`);
    }
    this._writeStream(id, stream);
  }

  setNextId(id: StreamId): void {
    if (!Number.isSafeInteger(id) || id < this._nextId) {
      throw new StreamStoreError(
        "INVALID_NEXT_ID",
        `Next id must not move backwards: ${String(this._nextId)} → ${String(id)}`,
      );
    }
    this._writeAndSync(JSON.stringify({ kind: "next-id", value: id }) + "\n");
    this._nextId = id;
  }

  // ─── Diagnostics ────────────────────────────────────────────────────

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  /** Lines dropped during load because they were not valid JSON. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _writeStream(id: StreamId, stream: Stream): void {
    const line = JSON.stringify({ kind: "stream", record: toStreamRecord(id, stream) });
    this._writeAndSync(line + "\n");
    this._streams.set(id, stream);
  }

  /**
   * Replay the file into memory.
   *
   * Unparseable lines (a torn write after an unclean shutdown) are skipped.
   * A line that parses but fails validation means the file was altered,
   * and loading stops with CORRUPT_RECORD.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    let highestId = 0;

    for (const [index, raw] of content.split("\n").entries()) {
      const trimmed = raw.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn line - skip (crash safety)
        this._skippedLines++;
        continue;
      }

      const line = toJsonlLine(parsed);
      if (line === undefined) {
        throw new StreamStoreError(
          "CORRUPT_RECORD",
          `Unrecognized entry on line ${String(index + 1)} of ${this._filePath}`,
        );
      }

      if (line.kind === "stream") {
        const { id, stream } = fromStreamRecord(line.record);
        this._streams.set(id, stream);
        highestId = Math.max(highestId, id);
      } else {
        if (!isStreamId(line.value)) {
          throw new StreamStoreError(
            "CORRUPT_RECORD",
            `Invalid next id on line ${String(index + 1)} of ${this._filePath}`,
          );
        }
        this._nextId = Math.max(this._nextId, line.value);
      }
    }

    this._nextId = Math.max(this._nextId, highestId + 1);
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}
