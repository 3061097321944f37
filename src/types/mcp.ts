// This file defines the JSON-RPC envelopes and MCP descriptor shapes shared by every transport.

export type JsonRpcId = string | number | null;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcError };

export interface McpTool {
  name: string;
  title: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface McpPromptArgument {
  name: string;
  description: string;
  required: boolean;
}

export interface McpPrompt {
  name: string;
  title: string;
  description: string;
  arguments: McpPromptArgument[];
}

export interface TextContent {
  type: 'text';
  text: string;
}

// This type captures the normalized MCP tool output format returned to the connector.
export interface ToolCallResult {
  content: TextContent[];
  structuredContent?: object;
  isError: boolean;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: TextContent;
}

export interface PromptGetResult {
  description: string;
  messages: PromptMessage[];
}
