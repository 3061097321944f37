// This module owns the Prometheus registries: a process registry for request counters and a
// per-scrape registry that carries the freshly sampled clock values.

import client, { type Counter, type Registry } from 'prom-client';
import type { MethodFamily } from '../mcp/methods.js';
import type { SyncSource, SyncStatus } from '../sync/types.js';
import type { TimeSnapshot } from '../time/clock.js';

export type RpcTransport = 'stdio' | 'http';
// Envelopes that fail validation have no method family.
export type RpcFamily = MethodFamily | 'invalid';
export type RpcOutcome = 'success' | 'error' | 'notification';

const SYNC_SOURCES: readonly SyncSource[] = ['SharedMemory', 'PeerQuery', 'Unavailable'];

export class ServiceMetrics {
  public readonly registry: Registry;
  private readonly rpcRequestsTotal: Counter<'transport' | 'family' | 'outcome'>;

  public constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new client.Registry();
    if (options.collectDefaults ?? true) {
      client.collectDefaultMetrics({ register: this.registry, prefix: 'mcp_' });
    }

    this.rpcRequestsTotal = new client.Counter({
      name: 'mcp_rpc_requests_total',
      help: 'JSON-RPC messages handled, by transport, method family and outcome',
      labelNames: ['transport', 'family', 'outcome'],
      registers: [this.registry]
    });
  }

  public recordRpc(transport: RpcTransport, family: RpcFamily, outcome: RpcOutcome): void {
    this.rpcRequestsTotal.inc({ transport, family, outcome });
  }

  // Nothing sampled is cached: every scrape builds its gauges from the values passed in.
  public async render(snapshot: TimeSnapshot, status: SyncStatus): Promise<{ contentType: string; body: string }> {
    const scrape = new client.Registry();
    const gauge = (name: string, help: string, value: number): void => {
      new client.Gauge({ name, help, registers: [scrape] }).set(value);
    };

    gauge('mcp_time_seconds', 'Current Unix timestamp', snapshot.seconds);
    gauge('mcp_time_nanos', 'Current nanoseconds component', snapshot.nanos);
    gauge('mcp_sync_available', 'Whether a synchronization source answered (1) or not (0)', status.available ? 1 : 0);
    gauge('mcp_sync_synced', 'Whether the host clock is synchronized (1) or not (0)', status.synced ? 1 : 0);
    gauge('mcp_sync_offset_ms', 'Clock offset against the reference in milliseconds', status.offset_ms);
    gauge('mcp_sync_stratum', 'NTP stratum of this host', status.stratum);

    const source = new client.Gauge({
      name: 'mcp_sync_source',
      help: 'Synchronization source that produced the current status',
      labelNames: ['source'],
      registers: [scrape]
    });
    for (const candidate of SYNC_SOURCES) {
      source.set({ source: candidate }, candidate === status.source ? 1 : 0);
    }

    const merged = client.Registry.merge([scrape, this.registry]);
    return { contentType: merged.contentType, body: await merged.metrics() };
  }
}
