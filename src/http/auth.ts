// This module contains the API-key guard for the JSON-RPC and REST routes.

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ApiKeyPrincipal, ApiKeyValidator } from '../config/api-keys.js';
import { AppError } from '../utils/errors.js';

export interface AuthContext {
  // Null when no keys are configured and the routes are open.
  principal: ApiKeyPrincipal | null;
}

// This helper extracts bearer tokens from Authorization headers.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const [scheme, token] = authHeader.split(' ', 2);
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

// This helper reads the key from "Authorization: Bearer" first, then from "X-API-Key".
export function extractApiKey(request: FastifyRequest): string | null {
  const bearer = extractBearerToken(request.headers.authorization);
  if (bearer) {
    return bearer;
  }

  const header = request.headers['x-api-key'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : null;
}

export function createApiKeyGuard(validator: ApiKeyValidator) {
  return async function apiKeyGuard(request: FastifyRequest, reply: FastifyReply): Promise<AuthContext> {
    if (!validator.hasKeys()) {
      return { principal: null };
    }

    const token = extractApiKey(request);
    if (!token) {
      request.log.warn(
        {
          event: 'http_auth_missing_key',
          requestId: request.id,
          path: request.url
        },
        'http_auth_missing_key'
      );
      reply.header('WWW-Authenticate', 'Bearer realm="utc-time-mcp"');
      throw new AppError(401, 'unauthorized', 'Missing API key. Use "Authorization: Bearer <key>" or "X-API-Key".');
    }

    const principal = validator.validate(token);
    if (!principal) {
      request.log.warn(
        {
          event: 'http_auth_invalid_key',
          requestId: request.id,
          path: request.url
        },
        'http_auth_invalid_key'
      );
      reply.header('WWW-Authenticate', 'Bearer realm="utc-time-mcp", error="invalid_token"');
      throw new AppError(401, 'unauthorized', 'Invalid API key.');
    }

    request.log.debug(
      {
        event: 'http_auth_success',
        requestId: request.id,
        keyId: principal.keyId,
        keyName: principal.name
      },
      'http_auth_success'
    );
    return { principal };
  };
}
