// This module resolves a fresh synchronization status per call: shared memory first, then the
// peer query, and an unavailable status when neither answers in time.

import type { FastifyBaseLogger } from 'fastify';
import type { AppConfig } from '../config/env.js';
import { errorForLog } from '../utils/logger.js';
import {
  NtpqPeerQuery,
  findSystemPeer,
  peersToStatus,
  withSystemVariables,
  type PeerQuery,
  type SystemVariablesQuery
} from './peers.js';
import { FileShmSegment, readConsistentRecord, shmRecordToStatus, type ShmSegment, type ShmSegmentOpener } from './shm.js';
import { unavailableStatus, type PeerList, type SyncStatus } from './types.js';

export interface SharedMemoryOptions {
  open: ShmSegmentOpener;
  maxAttempts: number;
  maxSampleAgeMs: number;
}

export interface SyncStatusMonitorOptions {
  sharedMemory: SharedMemoryOptions | null;
  peerQuery: PeerQuery | null;
  // Read after a successful peer query to fill in stratum, precision and root figures.
  systemVariables?: SystemVariablesQuery | null;
  timeoutMs: number;
  logger: FastifyBaseLogger;
  now?: () => Date;
}

export type PeerListResult = { available: true; list: PeerList } | { available: false; error: string };

type DeadlineReason = 'timeout' | 'aborted';

export class SyncStatusMonitor {
  private readonly sharedMemory: SharedMemoryOptions | null;
  private readonly peerQuery: PeerQuery | null;
  private readonly systemVariables: SystemVariablesQuery | null;
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => Date;
  public readonly timeoutMs: number;

  public constructor(options: SyncStatusMonitorOptions) {
    this.sharedMemory = options.sharedMemory;
    this.peerQuery = options.peerQuery;
    this.systemVariables = options.systemVariables ?? null;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  // This method never rejects; every failure path degrades into an unavailable status. An aborted
  // caller signal ends the query early and kills any running ntpq child.
  public async queryStatus(timeoutMs = this.timeoutMs, signal?: AbortSignal): Promise<SyncStatus> {
    const startedAt = Date.now();
    const status = await this.withDeadline(
      timeoutMs,
      signal,
      (deadlineSignal) => this.resolveStatus(deadlineSignal, timeoutMs),
      (reason) =>
        unavailableStatus(
          this.now(),
          reason === 'aborted' ? 'Sync status query was cancelled.' : `Sync status query exceeded ${timeoutMs} ms.`
        )
    );

    this.logger.debug(
      {
        event: 'sync_status_resolved',
        source: status.source,
        available: status.available,
        synced: status.synced,
        durationMs: Date.now() - startedAt
      },
      'sync_status_resolved'
    );

    return status;
  }

  // This method returns the raw peer billboard for the peers tool, bounded by the same timeout.
  public async queryPeers(timeoutMs = this.timeoutMs, signal?: AbortSignal): Promise<PeerListResult> {
    const peerQuery = this.peerQuery;
    if (!peerQuery) {
      return { available: false, error: 'Peer query is disabled.' };
    }

    return this.withDeadline<PeerListResult>(
      timeoutMs,
      signal,
      async (deadlineSignal) => {
        try {
          return { available: true, list: await peerQuery.queryPeers(timeoutMs, deadlineSignal) };
        } catch (error) {
          this.logger.warn({ event: 'sync_peer_query_failed', error: errorForLog(error) }, 'sync_peer_query_failed');
          return { available: false, error: 'NTP daemon not available or ntpq command failed.' };
        }
      },
      (reason) => ({
        available: false,
        error: reason === 'aborted' ? 'Peer query was cancelled.' : `Peer query exceeded ${timeoutMs} ms.`
      })
    );
  }

  // The work callback must not reject; on timeout or caller abort the signal is aborted so child
  // processes are killed.
  private async withDeadline<T>(
    timeoutMs: number,
    callerSignal: AbortSignal | undefined,
    work: (signal: AbortSignal) => Promise<T>,
    onDeadline: (reason: DeadlineReason) => T
  ): Promise<T> {
    const controller = new AbortController();
    let settle: (reason: DeadlineReason) => void = () => undefined;
    const deadline = new Promise<T>((resolve) => {
      settle = (reason) => {
        controller.abort();
        resolve(onDeadline(reason));
      };
    });

    const timer = setTimeout(() => {
      this.logger.warn({ event: 'sync_query_timeout', timeoutMs }, 'sync_query_timeout');
      settle('timeout');
    }, timeoutMs);
    const onCallerAbort = (): void => {
      this.logger.debug({ event: 'sync_query_aborted' }, 'sync_query_aborted');
      settle('aborted');
    };
    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      return await Promise.race([deadline, work(controller.signal)]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
      controller.abort();
    }
  }

  private async resolveStatus(signal: AbortSignal, timeoutMs: number): Promise<SyncStatus> {
    const fromSharedMemory = await this.readSharedMemory(signal);
    if (fromSharedMemory) {
      return fromSharedMemory;
    }

    if (!this.peerQuery || signal.aborted) {
      return unavailableStatus(this.now());
    }

    try {
      const list = await this.peerQuery.queryPeers(timeoutMs, signal);
      const status = peersToStatus(list, this.now());
      this.logger.debug(
        { event: 'sync_peer_query_succeeded', peers: list.peers.length, systemPeer: findSystemPeer(list)?.remote ?? null },
        'sync_peer_query_succeeded'
      );
      return await this.addSystemVariables(status, signal, timeoutMs);
    } catch (error) {
      this.logger.debug({ event: 'sync_peer_query_failed', error: errorForLog(error) }, 'sync_peer_query_failed');
      return unavailableStatus(this.now());
    }
  }

  // A failed system-variable read keeps the peer-derived status.
  private async addSystemVariables(status: SyncStatus, signal: AbortSignal, timeoutMs: number): Promise<SyncStatus> {
    if (!this.systemVariables || signal.aborted) {
      return status;
    }

    try {
      return withSystemVariables(status, await this.systemVariables.querySystemVariables(timeoutMs, signal));
    } catch (error) {
      this.logger.debug({ event: 'sync_system_variables_failed', error: errorForLog(error) }, 'sync_system_variables_failed');
      return status;
    }
  }

  private async readSharedMemory(signal: AbortSignal): Promise<SyncStatus | null> {
    const options = this.sharedMemory;
    if (!options) {
      return null;
    }

    let segment: ShmSegment;
    try {
      segment = await options.open();
    } catch (error) {
      this.logger.debug({ event: 'sync_shm_unavailable', error: errorForLog(error) }, 'sync_shm_unavailable');
      return null;
    }

    try {
      const result = await readConsistentRecord(segment, options.maxAttempts, signal);
      if (result.kind === 'torn') {
        this.logger.warn({ event: 'sync_shm_torn', attempts: result.attempts }, 'sync_shm_torn');
        return null;
      }

      const status = shmRecordToStatus(result.record, this.now(), options.maxSampleAgeMs);
      if (!status) {
        this.logger.debug({ event: 'sync_shm_no_sample', mode: result.record.mode }, 'sync_shm_no_sample');
      }
      return status;
    } catch (error) {
      this.logger.debug({ event: 'sync_shm_read_failed', error: errorForLog(error) }, 'sync_shm_read_failed');
      return null;
    } finally {
      await segment.close().catch((error: unknown) => {
        this.logger.warn({ event: 'sync_shm_close_failed', error: errorForLog(error) }, 'sync_shm_close_failed');
      });
    }
  }
}

// This factory wires the file-backed segment and ntpq according to the runtime configuration.
export function createSyncStatusMonitor(config: AppConfig, logger: FastifyBaseLogger): SyncStatusMonitor {
  const ntpq = new NtpqPeerQuery(config.ntpqPath);
  return new SyncStatusMonitor({
    sharedMemory: config.shm.enabled
      ? {
          open: () => FileShmSegment.open(config.shm.path),
          maxAttempts: config.shm.maxAttempts,
          maxSampleAgeMs: config.shm.maxSampleAgeMs
        }
      : null,
    peerQuery: ntpq,
    systemVariables: ntpq,
    timeoutMs: config.syncQueryTimeoutMs,
    logger: logger.child({ component: 'sync' })
  });
}
