// This module defines the tools/call parameter contract and the fixed tool catalog with generated input schemas.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool } from '../types/mcp.js';

export const callToolParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).optional()
});

export type CallToolParams = z.infer<typeof callToolParamsSchema>;

// Arguments are accepted and currently do not shape the result.
export const listIndianStoresSchema = z.object({}).passthrough();

interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
}

const toolDefinitions: readonly ToolDefinition[] = [
  {
    name: 'list_indian_stores',
    description: 'List popular Indian online stores',
    schema: listIndianStoresSchema
  }
];

// This function builds the MCP tool catalog; the set is fixed for the lifetime of the process.
export function buildToolList(): McpTool[] {
  return toolDefinitions.map((definition) => ({
    name: definition.name,
    description: definition.description,
    inputSchema: zodToJsonSchema(definition.schema, { $refStrategy: 'none' }) as Record<string, unknown>
  }));
}
