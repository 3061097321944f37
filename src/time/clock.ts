// This module captures wall-clock instants with nanosecond resolution for every time response.

export interface TimeSnapshot {
  readonly seconds: number;
  readonly nanos: number;
  readonly nanosSinceEpoch: bigint;
}

export type EpochNanosSource = () => bigint;

const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS_PER_MILLI = 1_000_000n;

// This helper splits one epoch nanosecond count into floor seconds and a non-negative remainder.
export function snapshotFromEpochNanos(nanosSinceEpoch: bigint): TimeSnapshot {
  let seconds = nanosSinceEpoch / NANOS_PER_SECOND;
  let nanos = nanosSinceEpoch % NANOS_PER_SECOND;
  if (nanos < 0n) {
    seconds -= 1n;
    nanos += NANOS_PER_SECOND;
  }

  return Object.freeze({
    seconds: Number(seconds),
    nanos: Number(nanos),
    nanosSinceEpoch
  });
}

export function snapshotFromEpochSeconds(seconds: number): TimeSnapshot {
  return snapshotFromEpochNanos(BigInt(seconds) * NANOS_PER_SECOND);
}

// The monotonic clock supplies sub-millisecond digits; the anchor is reset whenever the
// interpolated value drifts more than one millisecond from Date.now(), so clock steps applied
// by the time daemon show up immediately.
export function createSystemClock(): EpochNanosSource {
  let anchorEpoch = BigInt(Date.now()) * NANOS_PER_MILLI;
  let anchorHr = process.hrtime.bigint();

  return () => {
    const hr = process.hrtime.bigint();
    const wallMs = BigInt(Date.now());
    const estimate = anchorEpoch + (hr - anchorHr);
    const drift = estimate / NANOS_PER_MILLI - wallMs;

    if (drift > 1n || drift < -1n) {
      anchorEpoch = wallMs * NANOS_PER_MILLI;
      anchorHr = hr;
      return anchorEpoch;
    }

    return estimate;
  };
}

// This helper builds a clock that always returns the same instant, used by tests and replays.
export function createFixedClock(nanosSinceEpoch: bigint): EpochNanosSource {
  return () => nanosSinceEpoch;
}

export interface TimeService {
  snapshotTime(): TimeSnapshot;
}

export function createTimeService(source: EpochNanosSource = createSystemClock()): TimeService {
  return {
    snapshotTime: () => snapshotFromEpochNanos(source())
  };
}
