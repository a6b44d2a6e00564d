// This module centralizes server identity values so protocol metadata and HTTP routes stay in sync.

export const MCP_SERVER_NAME = 'store-mcp-server';
export const MCP_SERVER_VERSION = '0.002';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
