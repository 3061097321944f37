// This module is the only reader of the NTP shared-memory refclock segment ("struct shmTime").
// The segment is written by an external process without locking, so every sample goes through
// the count double-read before any typed value leaves this module.

import { open, type FileHandle } from 'node:fs/promises';
import { AppError } from '../utils/errors.js';
import type { SyncStatus } from './types.js';

// Byte offsets of struct shmTime on LP64 little-endian hosts (time_t is 64-bit, 4 bytes of
// padding after clockTimeStampUSec, trailing int dummy[8], total size rounded to 8).
export const SHM_LAYOUT = Object.freeze({
  mode: 0,
  count: 4,
  clockTimeStampSec: 8,
  clockTimeStampUSec: 16,
  receiveTimeStampSec: 24,
  receiveTimeStampUSec: 32,
  leap: 36,
  precision: 40,
  nsamples: 44,
  valid: 48,
  clockTimeStampNSec: 52,
  receiveTimeStampNSec: 56
});

export const SHM_RECORD_SIZE = 96;

// NTP leap indicator 3 means the writer's clock is not synchronized.
const LEAP_NOT_IN_SYNC = 3;

export interface ShmSegment {
  read(offset: number, length: number): Promise<Buffer>;
  close(): Promise<void>;
}

export type ShmSegmentOpener = () => Promise<ShmSegment>;

export interface ShmRecord {
  mode: number;
  count: number;
  clockSec: number;
  clockNsec: number;
  receiveSec: number;
  receiveNsec: number;
  leap: number;
  precision: number;
  nsamples: number;
  valid: number;
}

export type ShmReadResult =
  | { kind: 'sample'; record: ShmRecord; attempts: number }
  | { kind: 'torn'; attempts: number };

// Read-only view of a segment exposed as a file (a POSIX shm object under /dev/shm or a bridge file).
export class FileShmSegment implements ShmSegment {
  private readonly handle: FileHandle;

  private constructor(handle: FileHandle) {
    this.handle = handle;
  }

  public static async open(path: string): Promise<FileShmSegment> {
    const handle = await open(path, 'r');
    try {
      const stats = await handle.stat();
      if (stats.size < SHM_RECORD_SIZE) {
        throw new AppError(503, 'sync_unavailable', `Shared-memory segment is ${stats.size} bytes, expected ${SHM_RECORD_SIZE}.`, {
          path
        });
      }
      return new FileShmSegment(handle);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  public async read(offset: number, length: number): Promise<Buffer> {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, offset);
    if (bytesRead !== length) {
      throw new AppError(503, 'sync_unavailable', `Short read from shared-memory segment (${bytesRead}/${length} bytes).`);
    }
    return buffer;
  }

  public async close(): Promise<void> {
    await this.handle.close();
  }
}

// Prefer the nanosecond field only when it agrees with the microsecond field, as ntpd does.
function pickNanos(usec: number, nsec: number): number {
  return Math.floor(nsec / 1000) === usec && nsec < 1_000_000_000 ? nsec : usec * 1000;
}

// This function decodes one full record; the caller is responsible for consistency checks.
export function decodeShmRecord(buffer: Buffer): ShmRecord {
  if (buffer.length !== SHM_RECORD_SIZE) {
    throw new AppError(503, 'sync_unavailable', `Shared-memory record must be ${SHM_RECORD_SIZE} bytes, got ${buffer.length}.`);
  }

  const clockUsec = buffer.readInt32LE(SHM_LAYOUT.clockTimeStampUSec);
  const receiveUsec = buffer.readInt32LE(SHM_LAYOUT.receiveTimeStampUSec);

  return {
    mode: buffer.readInt32LE(SHM_LAYOUT.mode),
    count: buffer.readInt32LE(SHM_LAYOUT.count),
    clockSec: Number(buffer.readBigInt64LE(SHM_LAYOUT.clockTimeStampSec)),
    clockNsec: pickNanos(clockUsec, buffer.readUInt32LE(SHM_LAYOUT.clockTimeStampNSec)),
    receiveSec: Number(buffer.readBigInt64LE(SHM_LAYOUT.receiveTimeStampSec)),
    receiveNsec: pickNanos(receiveUsec, buffer.readUInt32LE(SHM_LAYOUT.receiveTimeStampNSec)),
    leap: buffer.readInt32LE(SHM_LAYOUT.leap),
    precision: buffer.readInt32LE(SHM_LAYOUT.precision),
    nsamples: buffer.readInt32LE(SHM_LAYOUT.nsamples),
    valid: buffer.readInt32LE(SHM_LAYOUT.valid)
  };
}

async function readCount(segment: ShmSegment): Promise<number> {
  return (await segment.read(SHM_LAYOUT.count, 4)).readInt32LE(0);
}

// Leading count, payload, trailing count. The writer bumps count before and after each update,
// so an odd or changed counter means the payload may be torn and the attempt is discarded.
export async function readConsistentRecord(
  segment: ShmSegment,
  maxAttempts: number,
  signal?: AbortSignal
): Promise<ShmReadResult> {
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    if (signal?.aborted) {
      throw new AppError(504, 'request_timeout', 'Shared-memory read aborted.');
    }

    const leading = await readCount(segment);
    const payload = await segment.read(0, SHM_RECORD_SIZE);
    const trailing = await readCount(segment);

    if (leading !== trailing || leading % 2 !== 0) {
      continue;
    }

    const record = decodeShmRecord(payload);
    if (record.count !== leading) {
      continue;
    }

    return { kind: 'sample', record, attempts: attempt };
  }

  return { kind: 'torn', attempts };
}

// This function turns one consistent record into a status, or null when the record holds no usable sample.
export function shmRecordToStatus(record: ShmRecord, now: Date, maxSampleAgeMs: number): SyncStatus | null {
  if ((record.mode !== 0 && record.mode !== 1) || record.receiveSec === 0) {
    return null;
  }

  const offsetMs = (record.clockSec - record.receiveSec) * 1000 + (record.clockNsec - record.receiveNsec) / 1_000_000;
  const receiveMs = record.receiveSec * 1000 + record.receiveNsec / 1_000_000;
  const ageMs = now.getTime() - receiveMs;

  return {
    available: true,
    synced: Math.abs(ageMs) <= maxSampleAgeMs && record.leap !== LEAP_NOT_IN_SYNC,
    offset_ms: offsetMs,
    // The segment is fed by reference hardware, which puts this host one hop away from it.
    stratum: 1,
    source: 'SharedMemory',
    sampled_at: now.toISOString(),
    precision: record.precision,
    leap: record.leap
  };
}
