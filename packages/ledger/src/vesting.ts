/**
 * @streamledger/ledger - Linear vesting calculator.
 *
 * Pure functions over a stream and a caller-supplied instant.
 * Never reads the clock, never mutates the stream.
 *
 * Rules:
 * - Nothing vests until after startDate
 * - Everything has vested from endDate on
 * - In between, vesting is linear and truncated toward zero
 * - Products are taken in bigint so the full 128-bit range cannot overflow
 */

import type { Stream, StreamStatus, UnixSeconds } from "@streamledger/types";

/**
 * Cumulative amount vested at `now`.
 */
export function vestedAmount(stream: Stream, now: UnixSeconds): bigint {
  if (now <= stream.startDate) {
    return 0n;
  }
  if (now >= stream.endDate) {
    return stream.originalBalance;
  }

  const elapsed = BigInt(now - stream.startDate);
  const duration = BigInt(stream.endDate - stream.startDate);

  return (stream.originalBalance * elapsed) / duration;
}

/**
 * Amount already taken out of the stream.
 */
export function withdrawnAmount(stream: Stream): bigint {
  return stream.originalBalance - stream.currentBalance;
}

/**
 * Vested minus withdrawn, floored at zero.
 */
export function withdrawableAmount(stream: Stream, now: UnixSeconds): bigint {
  const available = vestedAmount(stream, now) - withdrawnAmount(stream);
  return available > 0n ? available : 0n;
}

export function streamStatus(stream: Stream): StreamStatus {
  return stream.currentBalance === 0n ? "drained" : "active";
}
