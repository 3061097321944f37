// This test suite verifies the shared-memory, peer-query and unavailable tiers of the sync monitor.

import { describe, expect, it } from 'vitest';
import { SyncStatusMonitor, type SharedMemoryOptions } from '../src/sync/monitor.js';
import { FileShmSegment, SHM_LAYOUT } from '../src/sync/shm.js';
import {
  NtpqPeerQuery,
  parseNtpqBillboard,
  parseSystemVariables,
  type PeerQuery,
  type SystemVariablesQuery
} from '../src/sync/peers.js';
import type { PeerList, SystemVariables } from '../src/sync/types.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { MemoryShmSegment, NTPQ_BILLBOARD, NTPQ_SYSTEM_VARIABLES, encodeShmRecord } from './helpers.js';

const NOW = new Date(1_700_000_010_000);

class FakePeerQuery implements PeerQuery {
  public calls = 0;
  public lastSignal: AbortSignal | undefined;

  public constructor(private readonly result: (signal?: AbortSignal) => Promise<PeerList>) {}

  public async queryPeers(_timeoutMs: number, signal?: AbortSignal): Promise<PeerList> {
    this.calls += 1;
    this.lastSignal = signal;
    return this.result(signal);
  }
}

class FakeSystemVariablesQuery implements SystemVariablesQuery {
  public calls = 0;

  public constructor(private readonly result: () => Promise<SystemVariables>) {}

  public async querySystemVariables(): Promise<SystemVariables> {
    this.calls += 1;
    return this.result();
  }
}

const billboardQuery = () => new FakePeerQuery(async () => parseNtpqBillboard(NTPQ_BILLBOARD));
const failingQuery = () => new FakePeerQuery(async () => Promise.reject(new Error('spawn ntpq ENOENT')));
const hangingQuery = () => new FakePeerQuery(() => new Promise<PeerList>(() => undefined));

function memory(segment: MemoryShmSegment): SharedMemoryOptions {
  return { open: async () => segment, maxAttempts: 3, maxSampleAgeMs: 60_000 };
}

function monitor(sharedMemory: SharedMemoryOptions | null, peerQuery: PeerQuery | null, timeoutMs = 500): SyncStatusMonitor {
  return new SyncStatusMonitor({ sharedMemory, peerQuery, timeoutMs, logger: createSilentLogger(), now: () => NOW });
}

describe('SyncStatusMonitor.queryStatus', () => {
  it('prefers a consistent shared-memory sample and closes the segment', async () => {
    const segment = new MemoryShmSegment(encodeShmRecord());
    const peers = billboardQuery();

    const status = await monitor(memory(segment), peers).queryStatus();

    expect(status).toMatchObject({ available: true, synced: true, offset_ms: 250, stratum: 1, source: 'SharedMemory' });
    expect(segment.closed).toBe(true);
    expect(peers.calls).toBe(0);
  });

  it('falls back to the peer query when the segment cannot be opened', async () => {
    const sharedMemory: SharedMemoryOptions = {
      open: async () => Promise.reject(new Error('ENOENT')),
      maxAttempts: 3,
      maxSampleAgeMs: 60_000
    };

    const status = await monitor(sharedMemory, billboardQuery()).queryStatus();

    expect(status).toEqual({
      available: true,
      synced: true,
      offset_ms: -0.231,
      stratum: 2,
      source: 'PeerQuery',
      sampled_at: NOW.toISOString(),
      peer: '192.0.2.10'
    });
  });

  it('falls back to the peer query when every read is torn', async () => {
    const segment = new MemoryShmSegment(encodeShmRecord(), (_sequence, buffer) => {
      buffer.writeInt32LE(buffer.readInt32LE(SHM_LAYOUT.count) + 1, SHM_LAYOUT.count);
    });

    const status = await monitor(memory(segment), billboardQuery()).queryStatus();

    expect(status.source).toBe('PeerQuery');
    expect(segment.reads).toBe(9);
    expect(segment.closed).toBe(true);
  });

  it('falls back to the peer query when the segment holds no sample', async () => {
    const status = await monitor(memory(new MemoryShmSegment(encodeShmRecord({ mode: 2 }))), billboardQuery()).queryStatus();

    expect(status.source).toBe('PeerQuery');
  });

  it('reports unavailable when both sources fail', async () => {
    const status = await monitor(null, failingQuery()).queryStatus();

    expect(status).toEqual({
      available: false,
      synced: false,
      offset_ms: 0,
      stratum: 16,
      source: 'Unavailable',
      sampled_at: NOW.toISOString()
    });
  });

  it('reports unavailable when no source is configured', async () => {
    const status = await monitor(null, null).queryStatus();

    expect(status.source).toBe('Unavailable');
  });

  it('bounds a hanging query by the timeout and aborts it', async () => {
    const peers = hangingQuery();

    const status = await monitor(null, peers, 20).queryStatus();

    expect(status).toMatchObject({ available: false, source: 'Unavailable', error: 'Sync status query exceeded 20 ms.' });
    expect(peers.lastSignal?.aborted).toBe(true);
  });

  it('stops when the caller aborts and kills the running query', async () => {
    const peers = hangingQuery();
    const controller = new AbortController();

    const pending = monitor(null, peers, 5_000).queryStatus(undefined, controller.signal);
    setTimeout(() => controller.abort(), 10);
    const status = await pending;

    expect(status).toMatchObject({ available: false, source: 'Unavailable', error: 'Sync status query was cancelled.' });
    expect(peers.lastSignal?.aborted).toBe(true);
  });

  it('degrades deterministically with a missing segment file and ntpq binary', async () => {
    const sync = new SyncStatusMonitor({
      sharedMemory: {
        open: () => FileShmSegment.open('/nonexistent/shm/ntpd0'),
        maxAttempts: 3,
        maxSampleAgeMs: 60_000
      },
      peerQuery: new NtpqPeerQuery('/nonexistent/bin/ntpq'),
      timeoutMs: 2_000,
      logger: createSilentLogger(),
      now: () => NOW
    });

    const status = await sync.queryStatus();

    expect(status.source).toBe('Unavailable');
    expect(status.available).toBe(false);
  });
});

describe('SyncStatusMonitor system variables', () => {
  function withVariables(
    sharedMemory: SharedMemoryOptions | null,
    variables: FakeSystemVariablesQuery
  ): SyncStatusMonitor {
    return new SyncStatusMonitor({
      sharedMemory,
      peerQuery: billboardQuery(),
      systemVariables: variables,
      timeoutMs: 500,
      logger: createSilentLogger(),
      now: () => NOW
    });
  }

  it('adds the daemon figures to a peer-derived status', async () => {
    const variables = new FakeSystemVariablesQuery(async () => parseSystemVariables(NTPQ_SYSTEM_VARIABLES));

    const status = await withVariables(null, variables).queryStatus();

    expect(status).toEqual({
      available: true,
      synced: true,
      offset_ms: -0.231,
      stratum: 2,
      source: 'PeerQuery',
      sampled_at: NOW.toISOString(),
      peer: '192.0.2.10',
      precision: -23,
      leap: 0,
      root_delay_ms: 0.512,
      root_dispersion_ms: 7.815
    });
  });

  it('keeps the peer status when the variables cannot be read', async () => {
    const variables = new FakeSystemVariablesQuery(async () => Promise.reject(new Error('ntpq: read: Connection refused')));

    const status = await withVariables(null, variables).queryStatus();

    expect(status).toEqual({
      available: true,
      synced: true,
      offset_ms: -0.231,
      stratum: 2,
      source: 'PeerQuery',
      sampled_at: NOW.toISOString(),
      peer: '192.0.2.10'
    });
    expect(variables.calls).toBe(1);
  });

  it('skips the variables for a shared-memory sample', async () => {
    const variables = new FakeSystemVariablesQuery(async () => parseSystemVariables(NTPQ_SYSTEM_VARIABLES));

    const status = await withVariables(memory(new MemoryShmSegment(encodeShmRecord())), variables).queryStatus();

    expect(status.source).toBe('SharedMemory');
    expect(variables.calls).toBe(0);
  });
});

describe('SyncStatusMonitor.queryPeers', () => {
  it('returns the billboard when ntpq answers', async () => {
    const result = await monitor(null, billboardQuery()).queryPeers();

    expect(result.available).toBe(true);
    if (result.available) {
      expect(result.list.peers).toHaveLength(3);
    }
  });

  it('reports disabled, failed and timed-out peer queries', async () => {
    expect(await monitor(null, null).queryPeers()).toEqual({ available: false, error: 'Peer query is disabled.' });
    expect(await monitor(null, failingQuery()).queryPeers()).toEqual({
      available: false,
      error: 'NTP daemon not available or ntpq command failed.'
    });
    expect(await monitor(null, hangingQuery()).queryPeers(15)).toEqual({ available: false, error: 'Peer query exceeded 15 ms.' });
  });

  it('reports a query whose caller already gave up as cancelled', async () => {
    expect(await monitor(null, billboardQuery()).queryPeers(undefined, AbortSignal.abort())).toEqual({
      available: false,
      error: 'Peer query was cancelled.'
    });
  });
});
