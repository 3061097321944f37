// This module implements the time tool handlers and the flagged-result contract of tools/call.

import { z } from 'zod';
import { findSystemPeer } from '../sync/peers.js';
import { classifySyncHealth } from '../sync/types.js';
import {
  buildFormattedTime,
  buildNanos,
  buildTimeResponse,
  buildTimezoneList,
  buildUnixTime,
  convertTimestamp
} from '../time/responses.js';
import { assertTimeZone } from '../time/timezones.js';
import type { ToolCallResult } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { Registry, ServiceContext, ToolDefinition, ToolHandler } from './registry.js';
import { toolEntries, toolInputSchema, toolSchemas, type ToolName } from './tool-schemas.js';

// This helper parses raw arguments with the tool's schema before the typed handler runs.
function withArguments<Schema extends z.ZodTypeAny>(
  schema: Schema,
  handler: (args: z.infer<Schema>, context: ServiceContext) => Promise<object>
): ToolHandler {
  return async (args, context) => handler(schema.parse(args ?? {}), context);
}

const toolHandlers: Record<ToolName, ToolHandler> = {
  get_time: withArguments(toolSchemas.get_time, async (_args, context) => buildTimeResponse(context.time.snapshotTime())),

  get_unix_time: withArguments(toolSchemas.get_unix_time, async (_args, context) => buildUnixTime(context.time.snapshotTime())),

  get_nanos: withArguments(toolSchemas.get_nanos, async (_args, context) => buildNanos(context.time.snapshotTime())),

  get_time_formatted: withArguments(toolSchemas.get_time_formatted, async (args, context) =>
    buildFormattedTime(context.time.snapshotTime(), args.format)
  ),

  get_time_with_timezone: withArguments(toolSchemas.get_time_with_timezone, async (args, context) =>
    buildTimeResponse(context.time.snapshotTime(), assertTimeZone(args.timezone))
  ),

  list_timezones: withArguments(toolSchemas.list_timezones, async () => buildTimezoneList()),

  convert_time: withArguments(toolSchemas.convert_time, async (args) =>
    convertTimestamp(args.timestamp, args.to_timezone, args.from_timezone)
  ),

  get_ntp_status: withArguments(toolSchemas.get_ntp_status, async (_args, context) => {
    const status = await context.sync.queryStatus(undefined, context.signal);
    return {
      ...status,
      health: classifySyncHealth(status),
      ...(status.available ? {} : { message: 'NTP not available or not synchronized' })
    };
  }),

  get_ntp_peers: withArguments(toolSchemas.get_ntp_peers, async (_args, context) => {
    const result = await context.sync.queryPeers(undefined, context.signal);
    if (!result.available) {
      return { available: false, error: result.error };
    }

    return {
      available: true,
      system_peer: findSystemPeer(result.list)?.remote ?? null,
      peers: result.list.peers,
      raw_output: result.list.raw
    };
  })
};

// Descriptors follow the listing order of tool-schemas.
export function buildToolDefinitions(): ToolDefinition[] {
  return toolEntries.map((entry) => ({
    descriptor: {
      name: entry.name,
      title: entry.title,
      description: entry.description,
      inputSchema: toolInputSchema(entry.name)
    },
    handler: toolHandlers[entry.name]
  }));
}

// This helper wraps structured objects in both text and structured fields for connector compatibility.
function mcpResult(payload: object): ToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload,
    isError: false
  };
}

function mcpError(text: string): ToolCallResult {
  return {
    content: [{ type: 'text', text }],
    isError: true
  };
}

function describeValidationError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`);
  return `Tool input validation failed: ${issues.join('; ')}`;
}

// Tool failures never escape as protocol errors: unknown names and handler failures become flagged results.
export async function executeTool(
  registry: Registry,
  toolName: string,
  args: unknown,
  context: ServiceContext
): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.debug(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  const tool = registry.resolveTool(toolName);
  if (!tool) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        toolName
      },
      'mcp_tool_not_found'
    );
    return mcpError(`Unknown tool: ${toolName}`);
  }

  try {
    const payload = await tool.handler(args, context);

    context.logger.debug(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        result: sanitizeForLog({ keys: Object.keys(payload) })
      },
      'mcp_tool_execution_completed'
    );

    return mcpResult(payload);
  } catch (error) {
    context.logger.warn(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    if (error instanceof z.ZodError) {
      return mcpError(describeValidationError(error));
    }

    return mcpError(normalizeError(error).message);
  }
}
