// This module defines the prompt templates. Unlike tools, prompt failures surface as protocol errors.

import { z } from 'zod';
import { buildFormattedTime, buildTimeResponse, buildUnixTime } from '../time/responses.js';
import { assertTimeZone } from '../time/timezones.js';
import type { McpPromptArgument, PromptGetResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import type { PromptDefinition, Registry, ServiceContext } from './registry.js';

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;

const promptArgumentsSchema = z.record(z.string()).nullish();

interface PromptTemplate {
  name: string;
  title: string;
  description: string;
  arguments: McpPromptArgument[];
  // Templates for the result description and the single user message.
  resultDescription: string;
  text: string;
  // Values computed at render time, substituted next to the caller's arguments.
  values: (args: Readonly<Record<string, string>>, context: ServiceContext) => Promise<Record<string, string>>;
}

// Single pass: substituted values are never scanned for placeholders again.
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => values[name] ?? match);
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

const promptTemplates: PromptTemplate[] = [
  {
    name: 'time',
    title: 'Current Time',
    description: 'Get the current UTC time with detailed information',
    arguments: [],
    resultDescription: 'Current UTC time with full details',
    text: 'Here is the current UTC time:\n\n{{time}}',
    values: async (_args, context) => ({ time: pretty(buildTimeResponse(context.time.snapshotTime())) })
  },
  {
    name: 'time_in',
    title: 'Time in Timezone',
    description: 'Get the current time in a specific timezone',
    arguments: [{ name: 'timezone', description: "IANA timezone name (e.g., 'America/New_York')", required: true }],
    resultDescription: 'Current time in {{timezone}}',
    text: 'Here is the current time in {{timezone}}:\n\n{{time}}',
    values: async (args, context) => ({
      time: pretty(buildTimeResponse(context.time.snapshotTime(), assertTimeZone(args.timezone ?? 'UTC')))
    })
  },
  {
    name: 'format_time',
    title: 'Format Time',
    description: 'Get the current time in a custom format',
    arguments: [{ name: 'format', description: "strftime format string (e.g., '%Y-%m-%d %H:%M:%S')", required: true }],
    resultDescription: "Time formatted as '{{format}}'",
    text: "Here is the current time formatted as '{{format}}':\n\n{{time}}",
    values: async (args, context) => ({
      time: pretty(buildFormattedTime(context.time.snapshotTime(), args.format ?? ''))
    })
  },
  {
    name: 'unix_time',
    title: 'Unix Timestamp',
    description: 'Get the current Unix timestamp with nanosecond precision',
    arguments: [],
    resultDescription: 'Current Unix timestamp',
    text: 'Here is the current Unix timestamp:\n\n{{time}}',
    values: async (_args, context) => ({ time: pretty(buildUnixTime(context.time.snapshotTime())) })
  }
];

function definePrompt(template: PromptTemplate): PromptDefinition {
  return {
    descriptor: {
      name: template.name,
      title: template.title,
      description: template.description,
      arguments: template.arguments
    },
    render: async (args, context) => {
      for (const argument of template.arguments) {
        if (argument.required && (args[argument.name] === undefined || args[argument.name].length === 0)) {
          throw new AppError(400, 'prompt_argument_missing', `Missing required argument '${argument.name}' for prompt '${template.name}'.`, {
            prompt: template.name,
            argument: argument.name
          });
        }
      }

      const values = { ...args, ...(await template.values(args, context)) };
      return {
        description: renderTemplate(template.resultDescription, values),
        messages: [{ role: 'user', content: { type: 'text', text: renderTemplate(template.text, values) } }]
      };
    }
  };
}

export function buildPromptDefinitions(): PromptDefinition[] {
  return promptTemplates.map(definePrompt);
}

// This function resolves and renders one prompt; unknown names and bad arguments throw for the dispatcher to map.
export async function getPrompt(registry: Registry, name: string, rawArgs: unknown, context: ServiceContext): Promise<PromptGetResult> {
  const prompt = registry.resolvePrompt(name);
  if (!prompt) {
    throw new AppError(404, 'prompt_not_found', `Unknown prompt: ${name}`, { prompt: name });
  }

  const parsed = promptArgumentsSchema.safeParse(rawArgs);
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', 'Prompt arguments must be an object of strings.', parsed.error.flatten());
  }

  context.logger.debug({ event: 'mcp_prompt_rendered', prompt: name }, 'mcp_prompt_rendered');
  return prompt.render(parsed.data ?? {}, context);
}
