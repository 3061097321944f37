// This module holds the tool and prompt catalog. It is assembled once by a builder and then frozen,
// so concurrent dispatches read it without coordination.

import type { FastifyBaseLogger } from 'fastify';
import type { SyncStatusMonitor } from '../sync/monitor.js';
import type { TimeService } from '../time/clock.js';
import type { McpPrompt, McpTool, PromptGetResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { buildPromptDefinitions } from './prompts.js';
import { buildToolDefinitions } from './tools.js';

export type SyncStatusReader = Pick<SyncStatusMonitor, 'queryStatus' | 'queryPeers'>;

export interface ServiceContext {
  time: TimeService;
  sync: SyncStatusReader;
  logger: FastifyBaseLogger;
  // Aborted when the caller stops waiting, such as an HTTP request past its deadline.
  signal?: AbortSignal;
}

export type ToolHandler = (args: unknown, context: ServiceContext) => Promise<object>;

export interface ToolDefinition {
  readonly descriptor: McpTool;
  readonly handler: ToolHandler;
}

export type PromptRenderer = (args: Readonly<Record<string, string>>, context: ServiceContext) => Promise<PromptGetResult>;

export interface PromptDefinition {
  readonly descriptor: McpPrompt;
  readonly render: PromptRenderer;
}

export interface Registry {
  resolveTool(name: string): ToolDefinition | undefined;
  resolvePrompt(name: string): PromptDefinition | undefined;
  listTools(): readonly McpTool[];
  listPrompts(): readonly McpPrompt[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

class FrozenRegistry implements Registry {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly prompts: ReadonlyMap<string, PromptDefinition>;
  private readonly toolList: readonly McpTool[];
  private readonly promptList: readonly McpPrompt[];

  public constructor(tools: ToolDefinition[], prompts: PromptDefinition[]) {
    this.tools = new Map(tools.map((tool) => [tool.descriptor.name, Object.freeze(tool)]));
    this.prompts = new Map(prompts.map((prompt) => [prompt.descriptor.name, Object.freeze(prompt)]));
    this.toolList = Object.freeze(tools.map((tool) => tool.descriptor));
    this.promptList = Object.freeze(prompts.map((prompt) => prompt.descriptor));
    Object.freeze(this);
  }

  public resolveTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  public resolvePrompt(name: string): PromptDefinition | undefined {
    return this.prompts.get(name);
  }

  public listTools(): readonly McpTool[] {
    return this.toolList;
  }

  public listPrompts(): readonly McpPrompt[] {
    return this.promptList;
  }
}

export class RegistryBuilder {
  private readonly tools: ToolDefinition[] = [];
  private readonly prompts: PromptDefinition[] = [];
  private built = false;

  public addTool(tool: ToolDefinition): this {
    this.assertOpen();
    if (this.tools.some((entry) => entry.descriptor.name === tool.descriptor.name)) {
      throw new AppError(500, 'internal_error', `Duplicate tool name: ${tool.descriptor.name}`);
    }
    this.tools.push({ descriptor: deepFreeze(structuredClone(tool.descriptor)), handler: tool.handler });
    return this;
  }

  public addPrompt(prompt: PromptDefinition): this {
    this.assertOpen();
    if (this.prompts.some((entry) => entry.descriptor.name === prompt.descriptor.name)) {
      throw new AppError(500, 'internal_error', `Duplicate prompt name: ${prompt.descriptor.name}`);
    }
    this.prompts.push({ descriptor: deepFreeze(structuredClone(prompt.descriptor)), render: prompt.render });
    return this;
  }

  // A builder yields exactly one registry; later additions would otherwise leak into a live catalog.
  public build(): Registry {
    this.assertOpen();
    this.built = true;
    return new FrozenRegistry([...this.tools], [...this.prompts]);
  }

  private assertOpen(): void {
    if (this.built) {
      throw new AppError(500, 'internal_error', 'Registry has already been built.');
    }
  }
}

// This function assembles the process-wide catalog of time tools and prompts.
export function createDefaultRegistry(): Registry {
  const builder = new RegistryBuilder();
  for (const tool of buildToolDefinitions()) {
    builder.addTool(tool);
  }
  for (const prompt of buildPromptDefinitions()) {
    builder.addPrompt(prompt);
  }
  return builder.build();
}
