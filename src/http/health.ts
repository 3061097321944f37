// This module exposes liveness, Prometheus metrics and identity endpoints. Each scrape samples the
// clock and the sync status afresh; an unavailable sync source degrades the document, never the reply.

import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config/env.js';
import type { SyncStatusReader } from '../mcp/registry.js';
import type { ServiceMetrics } from '../observability/metrics.js';
import { classifySyncHealth } from '../sync/types.js';
import type { TimeService } from '../time/clock.js';
import { formatTime } from '../time/strftime.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';

export interface HealthRouteDeps {
  time: TimeService;
  sync: SyncStatusReader;
  metrics: ServiceMetrics;
  config: Pick<AppConfig, 'enableStdio' | 'enableHttp' | 'containerMode' | 'ntpServers' | 'hardware' | 'localStratum'>;
}

export async function registerHealthRoutes(fastify: FastifyInstance, deps: HealthRouteDeps): Promise<void> {
  fastify.get('/health', async () => {
    const snapshot = deps.time.snapshotTime();
    const sync = await deps.sync.queryStatus();
    const status = classifySyncHealth(sync);

    fastify.log.debug({ event: 'health_check', status, source: sync.source }, 'health_check');

    return {
      ok: true,
      status,
      service: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      timestamp: formatTime(snapshot, '%Y-%m-%dT%H:%M:%S%.9fZ'),
      sync
    };
  });

  fastify.get('/metrics', async (_request, reply) => {
    const snapshot = deps.time.snapshotTime();
    const sync = await deps.sync.queryStatus();
    const { contentType, body } = await deps.metrics.render(snapshot, sync);

    reply.header('content-type', contentType);
    return body;
  });

  // This endpoint exposes canonical server and protocol version metadata for external monitoring and debugging.
  fastify.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION,
      transports: {
        stdio: deps.config.enableStdio,
        http: deps.config.enableHttp,
        containerMode: deps.config.containerMode
      },
      timeSources: {
        ntpServers: deps.config.ntpServers,
        pps: deps.config.hardware.pps,
        gps: deps.config.hardware.gps,
        localStratum: deps.config.localStratum ?? null
      }
    };
  });

  fastify.get('/', async () => {
    return {
      ok: true,
      service: MCP_SERVER_NAME,
      mcpEndpoint: '/mcp',
      apiEndpoint: '/api/time'
    };
  });
}
