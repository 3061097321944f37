// This module queries the NTP daemon's peer billboard through an external command.

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { AppError } from '../utils/errors.js';
import { UNSYNCHRONIZED_STRATUM, type PeerEntry, type PeerList, type SyncStatus, type SystemVariables } from './types.js';

const execFileAsync = promisify(execFile);

// Tally codes for the peer the daemon currently synchronizes to ("o" when it is PPS-disciplined).
const SYSTEM_PEER_TALLIES = new Set(['*', 'o']);

const HEADER_PATTERN = /^\s*remote\s+refid\s+st\s+t\s+when\s+poll\s+reach\s+delay\s+offset\s+(jitter|disp)\s*$/;

export interface PeerQuery {
  queryPeers(timeoutMs: number, signal?: AbortSignal): Promise<PeerList>;
}

export interface SystemVariablesQuery {
  querySystemVariables(timeoutMs: number, signal?: AbortSignal): Promise<SystemVariables>;
}

// Matches `name=value` where the value is quoted or runs to the next comma or blank.
const VARIABLE_PATTERN = /(?:^|[\s,])([a-z_]+)=("[^"]*"|[^,\s]*)/g;

function parseNumber(value: string, column: string, line: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(503, 'sync_unavailable', `Unparsable ${column} column in ntpq output.`, { line });
  }
  return parsed;
}

// This function parses `ntpq -pn` output; anything without the billboard header is rejected.
export function parseNtpqBillboard(raw: string): PeerList {
  const lines = raw.split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => HEADER_PATTERN.test(line));
  if (headerIndex === -1 || !/^=+$/.test((lines[headerIndex + 1] ?? '').trim())) {
    throw new AppError(503, 'sync_unavailable', 'Unrecognized ntpq peer output.');
  }

  const peers: PeerEntry[] = [];
  for (const line of lines.slice(headerIndex + 2)) {
    if (line.trim().length === 0) {
      continue;
    }

    const columns = line.slice(1).trim().split(/\s+/);
    if (columns.length !== 10) {
      throw new AppError(503, 'sync_unavailable', 'Unexpected column count in ntpq output.', { line });
    }

    const [remote, refid, stratum, type, when, poll, reach, delay, offset, jitter] = columns;
    peers.push({
      tally: line.charAt(0),
      remote,
      refid,
      stratum: parseNumber(stratum, 'st', line),
      type,
      when,
      poll: parseNumber(poll, 'poll', line),
      reach,
      delay_ms: parseNumber(delay, 'delay', line),
      offset_ms: parseNumber(offset, 'offset', line),
      jitter_ms: parseNumber(jitter, 'jitter', line)
    });
  }

  return { peers, raw };
}

function parseVariableNumber(raw: string | undefined, integer: boolean): number | undefined {
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    return undefined;
  }
  return parsed;
}

// This function parses `ntpq -c rv` output. Unparsable values are left out rather than defaulted.
export function parseSystemVariables(raw: string): SystemVariables {
  const values = new Map<string, string>();
  for (const match of raw.matchAll(VARIABLE_PATTERN)) {
    values.set(match[1], match[2]);
  }

  if (values.size === 0) {
    throw new AppError(503, 'sync_unavailable', 'Unrecognized ntpq system variable output.');
  }

  const stratum = parseVariableNumber(values.get('stratum'), true);
  const precision = parseVariableNumber(values.get('precision'), true);
  const rootDelay = parseVariableNumber(values.get('rootdelay'), false);
  const rootDispersion = parseVariableNumber(values.get('rootdisp'), false);
  // leap is printed as two binary digits, 00 through 11.
  const leapRaw = values.get('leap');
  const leap = leapRaw !== undefined && /^[01]{2}$/.test(leapRaw) ? Number.parseInt(leapRaw, 2) : undefined;

  return {
    ...(stratum !== undefined ? { stratum } : {}),
    ...(precision !== undefined ? { precision } : {}),
    ...(leap !== undefined ? { leap } : {}),
    ...(rootDelay !== undefined ? { root_delay_ms: rootDelay } : {}),
    ...(rootDispersion !== undefined ? { root_dispersion_ms: rootDispersion } : {})
  };
}

// The daemon's own stratum replaces the one derived from the system peer.
export function withSystemVariables(status: SyncStatus, variables: SystemVariables): SyncStatus {
  const { stratum, ...details } = variables;
  return {
    ...status,
    ...details,
    ...(stratum !== undefined && status.synced ? { stratum: Math.min(stratum, UNSYNCHRONIZED_STRATUM) } : {})
  };
}

export function findSystemPeer(list: PeerList): PeerEntry | undefined {
  return list.peers.find((peer) => SYSTEM_PEER_TALLIES.has(peer.tally));
}

// This function derives the host's status from the peer it synchronizes to.
export function peersToStatus(list: PeerList, now: Date): SyncStatus {
  const systemPeer = findSystemPeer(list);
  if (!systemPeer) {
    return {
      available: true,
      synced: false,
      offset_ms: 0,
      stratum: UNSYNCHRONIZED_STRATUM,
      source: 'PeerQuery',
      sampled_at: now.toISOString()
    };
  }

  return {
    available: true,
    synced: true,
    offset_ms: systemPeer.offset_ms,
    stratum: Math.min(systemPeer.stratum + 1, UNSYNCHRONIZED_STRATUM),
    source: 'PeerQuery',
    sampled_at: now.toISOString(),
    peer: systemPeer.remote
  };
}

// Runs ntpq with a hard timeout; the child is killed when the timeout or the signal fires.
export class NtpqPeerQuery implements PeerQuery, SystemVariablesQuery {
  private readonly binary: string;

  public constructor(binary = 'ntpq') {
    this.binary = binary;
  }

  public async queryPeers(timeoutMs: number, signal?: AbortSignal): Promise<PeerList> {
    return parseNtpqBillboard(await this.run(['-p', '-n'], timeoutMs, signal));
  }

  public async querySystemVariables(timeoutMs: number, signal?: AbortSignal): Promise<SystemVariables> {
    return parseSystemVariables(await this.run(['-c', 'rv'], timeoutMs, signal));
  }

  private async run(args: string[], timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, args, {
      encoding: 'utf8',
      timeout: timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: 256 * 1024,
      signal,
      windowsHide: true
    });
    return stdout;
  }
}
