// This module serves the REST time API, a read-only mirror of the time tools for plain HTTP clients.

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ApiKeyValidator } from '../config/api-keys.js';
import type { SyncStatusReader } from '../mcp/registry.js';
import { classifySyncHealth } from '../sync/types.js';
import type { TimeService } from '../time/clock.js';
import { buildNanos, buildTimeResponse, buildTimezoneList, buildUnixTime, convertTimestamp } from '../time/responses.js';
import { assertTimeZone } from '../time/timezones.js';
import { AppError } from '../utils/errors.js';
import { createApiKeyGuard } from './auth.js';

export interface ApiRouteDeps {
  time: TimeService;
  sync: SyncStatusReader;
  apiKeys: ApiKeyValidator;
  containerMode: boolean;
}

export const AVAILABLE_ENDPOINTS: readonly string[] = Object.freeze([
  'GET /health',
  'GET /metrics',
  'GET /version',
  'GET /mcp',
  'POST /mcp',
  'GET /api/time',
  'GET /api/unix',
  'GET /api/nanos',
  'GET /api/timezones',
  'GET /api/time/timezone/{timezone}',
  'GET /api/convert?timestamp={seconds}&to={timezone}[&from={timezone}]',
  'GET /api/ntp/status',
  'GET /api/ntp/peers'
]);

const convertQuerySchema = z.object({
  // Digits only: an empty value must not read as epoch 0.
  timestamp: z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform(Number),
  to: z.string().trim().min(1).max(100),
  from: z.string().trim().min(1).max(100).optional()
});

export async function registerApiRoutes(fastify: FastifyInstance, deps: ApiRouteDeps): Promise<void> {
  const authGuard = createApiKeyGuard(deps.apiKeys);

  fastify.addHook('onRequest', async (request, reply) => {
    await authGuard(request, reply);
  });

  fastify.get('/api/time', async () => buildTimeResponse(deps.time.snapshotTime()));

  fastify.get('/api/unix', async () => buildUnixTime(deps.time.snapshotTime()));

  fastify.get('/api/nanos', async () => buildNanos(deps.time.snapshotTime()));

  fastify.get('/api/timezones', async () => buildTimezoneList());

  // Zone names contain slashes, so the whole remainder of the path is the zone.
  fastify.get<{ Params: { '*': string } }>('/api/time/timezone/*', async (request) => {
    return buildTimeResponse(deps.time.snapshotTime(), assertTimeZone(request.params['*']));
  });

  fastify.get('/api/convert', async (request) => {
    const parsed = convertQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new AppError(400, 'validation_error', 'Query requires timestamp and to.', parsed.error.flatten().fieldErrors);
    }
    return convertTimestamp(parsed.data.timestamp, parsed.data.to, parsed.data.from);
  });

  fastify.get('/api/ntp/status', async () => {
    const status = await deps.sync.queryStatus();
    return {
      ...status,
      health: classifySyncHealth(status),
      container_mode: deps.containerMode
    };
  });

  fastify.get('/api/ntp/peers', async () => {
    const result = await deps.sync.queryPeers();
    if (!result.available) {
      return { available: false, error: result.error, container_mode: deps.containerMode };
    }
    return { available: true, peers: result.list.peers, raw_output: result.list.raw };
  });
}
