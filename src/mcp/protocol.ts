// This module implements the streamable HTTP JSON-RPC endpoint on top of the shared dispatcher.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createApiKeyGuard } from '../http/auth.js';
import type { ApiKeyValidator } from '../config/api-keys.js';
import type { ServiceMetrics } from '../observability/metrics.js';
import type { JsonRpcId } from '../types/mcp.js';
import { MCP_SERVER_NAME } from '../version.js';
import { RPC_ERROR_CODES, dispatchPayload, parseJsonRpc, rpcError, type DispatchContext } from './dispatcher.js';
import { SUPPORTED_METHODS } from './methods.js';
import type { Registry, ServiceContext } from './registry.js';

export interface McpRouteDeps {
  registry: Registry;
  services: Omit<ServiceContext, 'logger' | 'signal'>;
  metrics: ServiceMetrics;
  apiKeys: ApiKeyValidator;
  requestTimeoutMs: number;
}

// This helper recovers the id of a single request so a timeout reply can still be correlated.
function requestIdOf(payload: unknown): JsonRpcId {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload) || !('id' in payload)) {
    return null;
  }
  const id = payload.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

// This function registers the MCP routes inside their own scope, where bodies stay raw text so
// malformed JSON reaches the dispatcher and is answered with a parse error instead of a 400 page.
export async function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): Promise<void> {
  const authGuard = createApiKeyGuard(deps.apiKeys);

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.get('/mcp', async (request, reply) => {
    const authContext = await authGuard(request, reply);

    request.log.info(
      {
        event: 'mcp_transport_discovery',
        keyId: authContext.principal?.keyId ?? null
      },
      'mcp_transport_discovery'
    );

    reply.send({
      name: MCP_SERVER_NAME,
      transport: 'streamable-http',
      endpoint: '/mcp',
      methods: SUPPORTED_METHODS
    });
  });

  fastify.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
    const authContext = await authGuard(request, reply);
    const requestLogger = request.log.child({
      component: 'mcp',
      keyId: authContext.principal?.keyId ?? null
    });

    const raw = typeof request.body === 'string' ? request.body : '';
    if (raw.trim().length === 0) {
      requestLogger.warn({ event: 'mcp_post_missing_payload' }, 'mcp_post_missing_payload');
      reply.code(400).send(rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Missing JSON-RPC request payload.'));
      return;
    }

    const parsed = parseJsonRpc(raw);
    if (!parsed.ok) {
      requestLogger.warn({ event: 'mcp_post_parse_error', length: raw.length }, 'mcp_post_parse_error');
      deps.metrics.recordRpc('http', 'invalid', 'error');
      reply.code(400).send(parsed.response);
      return;
    }

    // Aborting at the deadline stops sync queries and the rest of a batch.
    const controller = new AbortController();
    const context: DispatchContext = {
      ...deps.services,
      registry: deps.registry,
      transport: 'http',
      metrics: deps.metrics,
      logger: requestLogger,
      signal: controller.signal
    };

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve('timeout');
      }, deps.requestTimeoutMs);
    });

    let outcome: Awaited<ReturnType<typeof dispatchPayload>> | 'timeout';
    try {
      outcome = await Promise.race([dispatchPayload(parsed.payload, context), deadline]);
    } finally {
      clearTimeout(timer);
    }

    if (outcome === 'timeout') {
      requestLogger.warn(
        { event: 'mcp_post_timeout', timeoutMs: deps.requestTimeoutMs },
        'mcp_post_timeout'
      );
      reply.code(504).send(rpcError(requestIdOf(parsed.payload), RPC_ERROR_CODES.internalError, 'Request timed out'));
      return;
    }

    if (outcome === null) {
      reply.code(202).send();
      return;
    }

    reply.send(outcome);
  });
}
