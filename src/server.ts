// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance, type FastifyRequest } from 'fastify';
import type { ApiKeyValidator } from './config/api-keys.js';
import type { AppConfig } from './config/env.js';
import { AVAILABLE_ENDPOINTS, registerApiRoutes } from './http/api.js';
import { registerHealthRoutes } from './http/health.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { Registry, SyncStatusReader } from './mcp/registry.js';
import type { ServiceMetrics } from './observability/metrics.js';
import type { TimeService } from './time/clock.js';
import { AppError, normalizeError } from './utils/errors.js';
import { errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerDeps {
  config: AppConfig;
  logger: FastifyBaseLogger;
  registry: Registry;
  time: TimeService;
  sync: SyncStatusReader;
  metrics: ServiceMetrics;
  apiKeys: ApiKeyValidator;
}

// This map stores high-resolution request start times without touching the request object.
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(headers: FastifyRequest['headers']): unknown {
  return sanitizeForLog({
    host: headers.host ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null
  });
}

// This function builds and configures the full HTTP application.
export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    loggerInstance: deps.logger,
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  // Hooks and handlers are installed before any route plugin so every scope inherits them.
  app.addHook('onRequest', async (request, reply) => {
    requestStartTimes.set(request, process.hrtime.bigint());
    reply.header('access-control-allow-origin', '*');

    request.log.debug(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request.headers)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const normalized =
      error instanceof AppError || error.statusCode === undefined || error.statusCode >= 500
        ? normalizeError(error)
        : new AppError(error.statusCode, 'invalid_request', error.message);
    const logPayload = {
      event: 'http_request_failed',
      requestId: request.id,
      code: normalized.code,
      details: sanitizeForLog(normalized.details),
      error: errorForLog(error)
    };
    if (normalized.statusCode >= 500) {
      request.log.error(logPayload, 'http_request_failed');
    } else {
      request.log.warn(logPayload, 'http_request_failed');
    }

    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.statusCode >= 500 && normalized.code === 'internal_error' ? 'Internal server error.' : normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      },
      available_endpoints: AVAILABLE_ENDPOINTS
    });
  });

  // Preflight for browser clients of the REST and JSON-RPC routes.
  app.options('/*', async (_request, reply) => {
    reply
      .header('access-control-allow-methods', 'GET, POST, OPTIONS')
      .header('access-control-allow-headers', 'authorization, content-type, x-api-key')
      .code(204)
      .send();
  });

  await app.register(registerHealthRoutes, {
    time: deps.time,
    sync: deps.sync,
    metrics: deps.metrics,
    config: deps.config
  });
  await app.register(registerApiRoutes, {
    time: deps.time,
    sync: deps.sync,
    apiKeys: deps.apiKeys,
    containerMode: deps.config.containerMode
  });
  await app.register(registerMcpRoutes, {
    registry: deps.registry,
    services: { time: deps.time, sync: deps.sync },
    metrics: deps.metrics,
    apiKeys: deps.apiKeys,
    requestTimeoutMs: deps.config.httpRequestTimeoutMs
  });

  return app;
}
