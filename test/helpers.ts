// Shared fixtures: a fixed clock, a scripted sync reader, dispatch contexts and SHM record encoding.

import { SHM_LAYOUT, SHM_RECORD_SIZE, type ShmRecord, type ShmSegment } from '../src/sync/shm.js';
import { unavailableStatus, type SyncStatus } from '../src/sync/types.js';
import type { DispatchContext } from '../src/mcp/dispatcher.js';
import { createDefaultRegistry, type Registry, type SyncStatusReader } from '../src/mcp/registry.js';
import type { PeerListResult } from '../src/sync/monitor.js';
import { ServiceMetrics } from '../src/observability/metrics.js';
import { createFixedClock, createTimeService, snapshotFromEpochNanos, type TimeService } from '../src/time/clock.js';
import { createSilentLogger } from '../src/utils/logger.js';

// Tue 2023-11-14 22:13:20.123456789 UTC.
export const FIXED_NANOS = 1_700_000_000_123_456_789n;
export const FIXED_SNAPSHOT = snapshotFromEpochNanos(FIXED_NANOS);
export const FIXED_DATE = new Date(1_700_000_000_123);

export function fixedTimeService(): TimeService {
  return createTimeService(createFixedClock(FIXED_NANOS));
}

export const SYNCED_STATUS: SyncStatus = {
  available: true,
  synced: true,
  offset_ms: -0.231,
  stratum: 2,
  source: 'PeerQuery',
  sampled_at: FIXED_DATE.toISOString(),
  peer: '192.0.2.10'
};

export const NTPQ_BILLBOARD = [
  '     remote           refid      st t when poll reach   delay   offset  jitter',
  '==============================================================================',
  '*192.0.2.10      .GPS.            1 u   33   64  377    0.512   -0.231   0.044',
  '+192.0.2.11      192.0.2.1        2 u   12   64  377    1.204    0.118   0.090',
  ' 192.0.2.12      .INIT.          16 u    -   64    0    0.000    0.000   0.000',
  ''
].join('\n');

export const NTPQ_SYSTEM_VARIABLES = [
  'associd=0 status=0615 leap_none, sync_ntp, 1 event, clock_sync,',
  'version="ntpd 4.2.8p15@1.3728-o (1)", processor="x86_64",',
  'system="Linux/6.1.0", leap=00, stratum=2, precision=-23,',
  'rootdelay=0.512, rootdisp=7.815, refid=192.0.2.10,',
  'reftime=e9000000.00000000  Tue, Nov 14 2023 22:13:20.000,',
  'clock=e9000001.00000000  Tue, Nov 14 2023 22:13:21.000, peer=12345, tc=6,',
  'mintc=3, offset=-0.231000, frequency=-12.345, sys_jitter=0.044000,',
  'clk_jitter=0.012, clk_wander=0.003',
  ''
].join('\n');

export class ScriptedSync implements SyncStatusReader {
  public statusCalls = 0;
  public lastSignal: AbortSignal | undefined;

  public constructor(
    private readonly status: (signal?: AbortSignal) => Promise<SyncStatus> = async () => SYNCED_STATUS,
    private readonly peers: () => Promise<PeerListResult> = async () => ({ available: false, error: 'Peer query is disabled.' })
  ) {}

  public async queryStatus(_timeoutMs?: number, signal?: AbortSignal): Promise<SyncStatus> {
    this.statusCalls += 1;
    this.lastSignal = signal;
    return this.status(signal);
  }

  public async queryPeers(_timeoutMs?: number, signal?: AbortSignal): Promise<PeerListResult> {
    this.lastSignal = signal;
    return this.peers();
  }
}

export function unavailableSync(): ScriptedSync {
  return new ScriptedSync(async () => unavailableStatus(FIXED_DATE));
}

// A status query that never settles, for timeout paths.
export function hangingSync(): ScriptedSync {
  return new ScriptedSync(() => new Promise<SyncStatus>(() => undefined));
}

export function createTestContext(overrides: Partial<DispatchContext> = {}): DispatchContext {
  return {
    registry: overrides.registry ?? sharedRegistry(),
    time: fixedTimeService(),
    sync: new ScriptedSync(),
    logger: createSilentLogger(),
    transport: 'stdio',
    metrics: new ServiceMetrics({ collectDefaults: false }),
    ...overrides
  };
}

let registry: Registry | undefined;
function sharedRegistry(): Registry {
  registry ??= createDefaultRegistry();
  return registry;
}

export function encodeShmRecord(fields: Partial<ShmRecord> = {}): Buffer {
  const record: ShmRecord = {
    mode: 1,
    count: 4,
    clockSec: 1_700_000_000,
    clockNsec: 500_000_000,
    receiveSec: 1_700_000_000,
    receiveNsec: 250_000_000,
    leap: 0,
    precision: -20,
    nsamples: 3,
    valid: 1,
    ...fields
  };

  const buffer = Buffer.alloc(SHM_RECORD_SIZE);
  buffer.writeInt32LE(record.mode, SHM_LAYOUT.mode);
  buffer.writeInt32LE(record.count, SHM_LAYOUT.count);
  buffer.writeBigInt64LE(BigInt(record.clockSec), SHM_LAYOUT.clockTimeStampSec);
  buffer.writeInt32LE(Math.floor(record.clockNsec / 1000), SHM_LAYOUT.clockTimeStampUSec);
  buffer.writeBigInt64LE(BigInt(record.receiveSec), SHM_LAYOUT.receiveTimeStampSec);
  buffer.writeInt32LE(Math.floor(record.receiveNsec / 1000), SHM_LAYOUT.receiveTimeStampUSec);
  buffer.writeInt32LE(record.leap, SHM_LAYOUT.leap);
  buffer.writeInt32LE(record.precision, SHM_LAYOUT.precision);
  buffer.writeInt32LE(record.nsamples, SHM_LAYOUT.nsamples);
  buffer.writeInt32LE(record.valid, SHM_LAYOUT.valid);
  buffer.writeUInt32LE(record.clockNsec, SHM_LAYOUT.clockTimeStampNSec);
  buffer.writeUInt32LE(record.receiveNsec, SHM_LAYOUT.receiveTimeStampNSec);
  return buffer;
}

// In-memory segment; the hook runs before each read with its 1-based sequence number, so tests can
// play the part of a writer updating the record between the reader's steps.
export class MemoryShmSegment implements ShmSegment {
  public reads = 0;
  public closed = false;

  public constructor(
    public readonly buffer: Buffer,
    private readonly beforeRead: (sequence: number, buffer: Buffer) => void = () => undefined
  ) {}

  public async read(offset: number, length: number): Promise<Buffer> {
    this.reads += 1;
    this.beforeRead(this.reads, this.buffer);
    return Buffer.from(this.buffer.subarray(offset, offset + length));
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}
