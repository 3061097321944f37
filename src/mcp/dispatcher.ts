// This module is the transport-independent JSON-RPC engine: parse, validate, classify, route, envelope.
// Every request with a non-null id yields exactly one response; notifications yield none, except for
// parse and invalid-request errors, which are reported with a null id.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { RpcFamily, RpcTransport, ServiceMetrics } from '../observability/metrics.js';
import type { JsonRpcError, JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError, type AppErrorCode } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { executeLegacyMethod } from './legacy.js';
import { assertNever, classifyMethod, type MethodClass } from './methods.js';
import { getPrompt } from './prompts.js';
import type { Registry, ServiceContext } from './registry.js';
import { executeTool } from './tools.js';

export const RPC_ERROR_CODES = Object.freeze({
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
});

// One table maps every application error code to its JSON-RPC code.
const RPC_CODE_BY_APP_ERROR: Record<AppErrorCode, number> = {
  parse_error: RPC_ERROR_CODES.parseError,
  invalid_request: RPC_ERROR_CODES.invalidRequest,
  method_not_found: RPC_ERROR_CODES.methodNotFound,
  validation_error: RPC_ERROR_CODES.invalidParams,
  tool_not_found: RPC_ERROR_CODES.invalidParams,
  prompt_not_found: RPC_ERROR_CODES.invalidParams,
  prompt_argument_missing: RPC_ERROR_CODES.invalidParams,
  invalid_timezone: RPC_ERROR_CODES.invalidParams,
  format_error: RPC_ERROR_CODES.invalidParams,
  unauthorized: -32001,
  not_found: -32004,
  request_timeout: RPC_ERROR_CODES.internalError,
  sync_unavailable: RPC_ERROR_CODES.internalError,
  config_invalid: RPC_ERROR_CODES.internalError,
  internal_error: RPC_ERROR_CODES.internalError
};

const SERVER_INSTRUCTIONS = [
  'High-precision time, timezone, and NTP synchronization status service.',
  'Time tools: get_time, get_unix_time, get_nanos, get_time_formatted, get_time_with_timezone, list_timezones, convert_time',
  'NTP tools: get_ntp_status, get_ntp_peers',
  'Prompts: /time, /unix_time, /time_in <timezone>, /format_time <format>'
].join('\n');

export interface DispatchContext extends ServiceContext {
  registry: Registry;
  transport: RpcTransport;
  metrics?: ServiceMetrics;
}

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

const promptGetParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional()
});

interface ValidRequest {
  id: JsonRpcId | undefined;
  method: string;
  params: Record<string, unknown> | undefined;
}

type Validation = { ok: true; request: ValidRequest } | { ok: false; response: JsonRpcResponse | null };

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: '2.0', id, error };
}

export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  const code = RPC_CODE_BY_APP_ERROR[error.code];
  if (code === RPC_ERROR_CODES.internalError) {
    return { code, message: error.code === 'internal_error' ? 'Internal error' : error.message };
  }
  return error.details === undefined ? { code, message: error.message } : { code, message: error.message, data: error.details };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

// Absent and null ids both mark a notification.
function isNotification(id: JsonRpcId | undefined): boolean {
  return id === undefined || id === null;
}

function validateEnvelope(payload: unknown): Validation {
  if (!isRecord(payload)) {
    return { ok: false, response: rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Invalid Request: expected a JSON-RPC object.') };
  }

  const rawId: unknown = payload.id;
  let id: JsonRpcId | undefined;
  if (rawId === undefined) {
    id = undefined;
  } else if (isJsonRpcId(rawId)) {
    id = rawId;
  } else {
    return { ok: false, response: rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Invalid Request: id must be a string, number or null.') };
  }
  const echoId: JsonRpcId = id ?? null;

  if (payload.jsonrpc !== '2.0') {
    return { ok: false, response: rpcError(echoId, RPC_ERROR_CODES.invalidRequest, 'Invalid Request: jsonrpc must be "2.0".') };
  }

  const method: unknown = payload.method;
  if (typeof method !== 'string') {
    return { ok: false, response: rpcError(echoId, RPC_ERROR_CODES.invalidRequest, 'Invalid Request: method must be a string.') };
  }

  const rawParams: unknown = payload.params;
  let params: Record<string, unknown> | undefined;
  if (rawParams === undefined || rawParams === null) {
    params = undefined;
  } else if (isRecord(rawParams)) {
    params = rawParams;
  } else {
    return {
      ok: false,
      response: isNotification(id) ? null : rpcError(echoId, RPC_ERROR_CODES.invalidParams, 'Invalid params: params must be an object.')
    };
  }

  return { ok: true, request: { id, method, params } };
}

function parseParams<Schema extends z.ZodTypeAny>(method: string, schema: Schema, params: unknown): z.infer<Schema> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')).filter((path) => path.length > 0))];
    const summary = fields.length > 0 ? ` (${fields.join(', ')})` : '';
    throw new AppError(400, 'validation_error', `${method} requires valid params${summary}.`, parsed.error.flatten());
  }
  return parsed.data;
}

async function routeRequest(classified: MethodClass, request: ValidRequest, context: DispatchContext): Promise<unknown> {
  switch (classified.family) {
    case 'lifecycle':
      switch (classified.method) {
        case 'initialize':
          return {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: {
              tools: { listChanged: false },
              prompts: { listChanged: false }
            },
            serverInfo: { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
            instructions: SERVER_INSTRUCTIONS
          };
        case 'ping':
        case 'notifications/initialized':
        case 'notifications/cancelled':
          return {};
        default:
          return assertNever(classified.method);
      }

    case 'tools':
      switch (classified.method) {
        case 'tools/list':
          return { tools: context.registry.listTools() };
        case 'tools/call': {
          const params = parseParams(classified.method, toolCallParamsSchema, request.params);
          return executeTool(context.registry, params.name, params.arguments, context);
        }
        default:
          return assertNever(classified.method);
      }

    case 'prompts':
      switch (classified.method) {
        case 'prompts/list':
          return { prompts: context.registry.listPrompts() };
        case 'prompts/get': {
          const params = parseParams(classified.method, promptGetParamsSchema, request.params);
          return getPrompt(context.registry, params.name, params.arguments, context);
        }
        default:
          return assertNever(classified.method);
      }

    case 'legacy':
      return executeLegacyMethod(classified.method, request.params, context);

    case 'unknown':
      return undefined;

    default:
      return assertNever(classified);
  }
}

// This function handles one envelope and returns either a response object or null for notifications.
async function dispatchMessage(payload: unknown, context: DispatchContext): Promise<JsonRpcResponse | null> {
  const validation = validateEnvelope(payload);
  if (!validation.ok) {
    context.logger.warn(
      { event: 'mcp_rpc_invalid_request', transport: context.transport, payload: sanitizeForLog(payload) },
      'mcp_rpc_invalid_request'
    );
    context.metrics?.recordRpc(context.transport, 'invalid', 'error');
    return validation.response;
  }

  const { request } = validation;
  const notification = isNotification(request.id);
  const responseId: JsonRpcId = request.id ?? null;
  const classified = classifyMethod(request.method);
  const family: RpcFamily = classified.family;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  context.logger.debug(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: responseId,
      method: request.method,
      family,
      transport: context.transport
    },
    'mcp_rpc_request_received'
  );

  if (classified.family === 'unknown') {
    context.metrics?.recordRpc(context.transport, family, notification ? 'notification' : 'error');
    context.logger.info({ event: 'mcp_rpc_method_not_found', rpcTraceId, method: request.method }, 'mcp_rpc_method_not_found');
    return notification ? null : rpcError(responseId, RPC_ERROR_CODES.methodNotFound, `Method not found: ${request.method}`);
  }

  try {
    const result = await routeRequest(classified, request, context);
    context.metrics?.recordRpc(context.transport, family, notification ? 'notification' : 'success');
    return notification ? null : { jsonrpc: '2.0', id: responseId, result };
  } catch (error) {
    const appError = normalizeError(error);
    const mapped = mapAppErrorToRpc(appError);

    const level = mapped.code === RPC_ERROR_CODES.internalError ? 'error' : 'warn';
    context.logger[level](
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: responseId,
        method: request.method,
        code: appError.code,
        rpcCode: mapped.code,
        details: sanitizeForLog(appError.details),
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );
    context.metrics?.recordRpc(context.transport, family, notification ? 'notification' : 'error');

    return notification ? null : { jsonrpc: '2.0', id: responseId, error: mapped };
  } finally {
    context.logger.debug(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        method: request.method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// Batches run element by element in order; an all-notification batch produces no response at all.
// Once the context signal is aborted, the remaining elements are not started.
export async function dispatchPayload(
  payload: unknown,
  context: DispatchContext
): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
  if (!Array.isArray(payload)) {
    return dispatchMessage(payload, context);
  }

  if (payload.length === 0) {
    context.metrics?.recordRpc(context.transport, 'invalid', 'error');
    return rpcError(null, RPC_ERROR_CODES.invalidRequest, 'Invalid Request: empty batch.');
  }

  const responses: JsonRpcResponse[] = [];
  for (const item of payload) {
    if (context.signal?.aborted) {
      context.logger.info(
        { event: 'mcp_rpc_batch_aborted', transport: context.transport, answered: responses.length },
        'mcp_rpc_batch_aborted'
      );
      break;
    }
    const response = await dispatchMessage(item, context);
    if (response) {
      responses.push(response);
    }
  }

  return responses.length > 0 ? responses : null;
}

export function parseJsonRpc(raw: string): { ok: true; payload: unknown } | { ok: false; response: JsonRpcResponse } {
  try {
    return { ok: true, payload: JSON.parse(raw) };
  } catch (error) {
    return {
      ok: false,
      response: rpcError(null, RPC_ERROR_CODES.parseError, 'Parse error', { reason: errorForLog(error).message })
    };
  }
}

// This function takes one raw message (a STDIO line or an HTTP body) and returns the serialized reply, if any.
export async function dispatchRaw(raw: string, context: DispatchContext): Promise<string | null> {
  const parsed = parseJsonRpc(raw);
  if (!parsed.ok) {
    context.logger.warn({ event: 'mcp_rpc_parse_error', transport: context.transport, length: raw.length }, 'mcp_rpc_parse_error');
    context.metrics?.recordRpc(context.transport, 'invalid', 'error');
    return JSON.stringify(parsed.response);
  }

  const response = await dispatchPayload(parsed.payload, context);
  return response === null ? null : JSON.stringify(response);
}
