// This file defines the synchronization status shapes produced by the clock-sync subsystem.

export type SyncSource = 'SharedMemory' | 'PeerQuery' | 'Unavailable';

export type SyncHealth = 'healthy' | 'degraded' | 'unhealthy';

export interface SyncStatus {
  available: boolean;
  synced: boolean;
  offset_ms: number;
  stratum: number;
  source: SyncSource;
  sampled_at: string;
  precision?: number;
  leap?: number;
  root_delay_ms?: number;
  root_dispersion_ms?: number;
  peer?: string;
  error?: string;
}

export interface PeerEntry {
  tally: string;
  remote: string;
  refid: string;
  stratum: number;
  type: string;
  when: string;
  poll: number;
  reach: string;
  delay_ms: number;
  offset_ms: number;
  jitter_ms: number;
}

// Daemon system variables as reported by `ntpq -c rv`; absent fields were not in the output.
export interface SystemVariables {
  stratum?: number;
  precision?: number;
  leap?: number;
  root_delay_ms?: number;
  root_dispersion_ms?: number;
}

export interface PeerList {
  peers: PeerEntry[];
  raw: string;
}

// Stratum 16 marks an unsynchronized clock in NTP.
export const UNSYNCHRONIZED_STRATUM = 16;

export function unavailableStatus(sampledAt: Date, error?: string): SyncStatus {
  return {
    available: false,
    synced: false,
    offset_ms: 0,
    stratum: UNSYNCHRONIZED_STRATUM,
    source: 'Unavailable',
    sampled_at: sampledAt.toISOString(),
    ...(error ? { error } : {})
  };
}

// This helper grades one status for health documents and the status tool.
export function classifySyncHealth(status: SyncStatus): SyncHealth {
  if (status.available && status.synced && Math.abs(status.offset_ms) < 100) {
    return 'healthy';
  }

  if (status.available && status.synced) {
    return 'degraded';
  }

  return 'unhealthy';
}
