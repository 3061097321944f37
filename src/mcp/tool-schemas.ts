// This module defines the time tool contracts and exports their JSON Schema for discovery.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const emptyArgumentsSchema = z.object({});

export const formatArgumentsSchema = z.object({
  format: z.string().min(1).max(512).describe("strftime format string (e.g., '%Y-%m-%d %H:%M:%S')")
});

export const timezoneArgumentsSchema = z.object({
  timezone: z.string().trim().min(1).max(100).describe("IANA timezone name (e.g., 'America/New_York', 'Europe/London')")
});

export const convertTimeArgumentsSchema = z.object({
  timestamp: z.number().int().describe('Unix timestamp in seconds'),
  to_timezone: z.string().trim().min(1).max(100).describe('Target timezone'),
  from_timezone: z.string().trim().min(1).max(100).optional().describe('Source timezone (optional, defaults to UTC)')
});

// This registry maps tool names to runtime schemas for strict MCP argument validation.
export const toolSchemas = {
  get_time: emptyArgumentsSchema,
  get_unix_time: emptyArgumentsSchema,
  get_nanos: emptyArgumentsSchema,
  get_time_formatted: formatArgumentsSchema,
  get_time_with_timezone: timezoneArgumentsSchema,
  list_timezones: emptyArgumentsSchema,
  convert_time: convertTimeArgumentsSchema,
  get_ntp_status: emptyArgumentsSchema,
  get_ntp_peers: emptyArgumentsSchema
} as const;

export type ToolName = keyof typeof toolSchemas;

// Listing order of tools/list.
export const toolEntries: ReadonlyArray<{ name: ToolName; title: string; description: string }> = [
  { name: 'get_time', title: 'Get Current Time', description: 'Get current UTC time with full Unix/POSIX details' },
  { name: 'get_unix_time', title: 'Get Unix Time', description: 'Get Unix epoch time with nanosecond precision' },
  { name: 'get_nanos', title: 'Get Nanoseconds', description: 'Get nanoseconds since Unix epoch' },
  {
    name: 'get_time_formatted',
    title: 'Get Formatted Time',
    description: "Get time formatted with strftime format string (e.g., '%Y-%m-%d %H:%M:%S')"
  },
  {
    name: 'get_time_with_timezone',
    title: 'Get Time in Timezone',
    description: "Get time in specified timezone (IANA name like 'America/New_York')"
  },
  { name: 'list_timezones', title: 'List Timezones', description: 'List all available IANA timezones' },
  { name: 'convert_time', title: 'Convert Time', description: 'Convert Unix timestamp between timezones' },
  {
    name: 'get_ntp_status',
    title: 'Get NTP Status',
    description: 'Get NTP synchronization status and performance metrics (read-only)'
  },
  { name: 'get_ntp_peers', title: 'Get NTP Peers', description: 'Get information about NTP peers and their status (read-only)' }
];

// This helper renders one tool schema inline, without $ref indirection, as MCP clients expect.
export function toolInputSchema(name: ToolName): Record<string, unknown> {
  const { $schema: _schema, ...schema } = zodToJsonSchema(toolSchemas[name], { $refStrategy: 'none' }) as Record<string, unknown>;
  return schema;
}
