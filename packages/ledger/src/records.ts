/**
 * @streamledger/ledger - Conversion between Stream and StreamRecord.
 */

import type { Stream, StreamId, StreamRecord } from "@streamledger/types";
import { isStream, isStreamRecord } from "@streamledger/types";
import { formatAmount, parseAmount } from "./amount.js";
import { StreamStoreError } from "./store.js";

export function toStreamRecord(id: StreamId, stream: Stream): StreamRecord {
  return {
    id,
    payer: stream.payer,
    recipient: stream.recipient,
    originalBalance: formatAmount(stream.originalBalance),
    currentBalance: formatAmount(stream.currentBalance),
    startDate: stream.startDate,
    endDate: stream.endDate,
  };
}

/**
 * Decode and validate a serialized record.
 * Throws CORRUPT_RECORD if the shape or the invariants do not hold.
 */
export function fromStreamRecord(value: unknown): { id: StreamId; stream: Stream } {
  if (!isStreamRecord(value)) {
    throw new StreamStoreError("CORRUPT_RECORD", "Malformed stream record");
  }

  const stream: Stream = {
    payer: value.payer,
    recipient: value.recipient,
    originalBalance: parseAmount(value.originalBalance),
    currentBalance: parseAmount(value.currentBalance),
    startDate: value.startDate,
    endDate: value.endDate,
  };

  if (!isStream(stream)) {
    throw new StreamStoreError(
      "CORRUPT_RECORD",
      `Stream record ${String(value.id)} violates balance or date invariants`,
    );
  }

  return { id: value.id, stream };
}
