// This module centralizes server identity values so protocol metadata and tools stay in sync.

export const MCP_SERVER_NAME = 'utc-time-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';
