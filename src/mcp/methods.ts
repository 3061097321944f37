// This module classifies method names into a closed set of families; matching is exact and case-sensitive.

export type LifecycleMethod = 'initialize' | 'ping' | 'notifications/initialized' | 'notifications/cancelled';
export type ToolsMethod = 'tools/list' | 'tools/call';
export type PromptsMethod = 'prompts/list' | 'prompts/get';
export type LegacyMethod =
  | 'time/get'
  | 'time/get_with_format'
  | 'time/get_with_timezone'
  | 'time/get_unix'
  | 'time/get_nanos'
  | 'time/list_timezones'
  | 'time/convert';

export type MethodClass =
  | { family: 'lifecycle'; method: LifecycleMethod }
  | { family: 'tools'; method: ToolsMethod }
  | { family: 'prompts'; method: PromptsMethod }
  | { family: 'legacy'; method: LegacyMethod }
  | { family: 'unknown'; method: string };

export type MethodFamily = MethodClass['family'];

const LIFECYCLE_METHODS: ReadonlySet<string> = new Set<LifecycleMethod>([
  'initialize',
  'ping',
  'notifications/initialized',
  'notifications/cancelled'
]);
const TOOLS_METHODS: ReadonlySet<string> = new Set<ToolsMethod>(['tools/list', 'tools/call']);
const PROMPTS_METHODS: ReadonlySet<string> = new Set<PromptsMethod>(['prompts/list', 'prompts/get']);
const LEGACY_METHODS: ReadonlySet<string> = new Set<LegacyMethod>([
  'time/get',
  'time/get_with_format',
  'time/get_with_timezone',
  'time/get_unix',
  'time/get_nanos',
  'time/list_timezones',
  'time/convert'
]);

function isLifecycleMethod(method: string): method is LifecycleMethod {
  return LIFECYCLE_METHODS.has(method);
}

function isToolsMethod(method: string): method is ToolsMethod {
  return TOOLS_METHODS.has(method);
}

function isPromptsMethod(method: string): method is PromptsMethod {
  return PROMPTS_METHODS.has(method);
}

function isLegacyMethod(method: string): method is LegacyMethod {
  return LEGACY_METHODS.has(method);
}

export function classifyMethod(method: string): MethodClass {
  if (isLifecycleMethod(method)) {
    return { family: 'lifecycle', method };
  }
  if (isToolsMethod(method)) {
    return { family: 'tools', method };
  }
  if (isPromptsMethod(method)) {
    return { family: 'prompts', method };
  }
  if (isLegacyMethod(method)) {
    return { family: 'legacy', method };
  }
  return { family: 'unknown', method };
}

// Compile-time exhaustiveness guard for switches over the closed unions above.
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export const SUPPORTED_METHODS: readonly string[] = Object.freeze([
  ...LIFECYCLE_METHODS,
  ...TOOLS_METHODS,
  ...PROMPTS_METHODS,
  ...LEGACY_METHODS
]);
