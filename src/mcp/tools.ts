// This module implements the MCP tool handlers behind tools/call.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { SessionView } from './session.js';
import { listIndianStoresSchema } from './tool-schemas.js';

export interface ToolRuntimeContext {
  session: SessionView;
  logger: FastifyBaseLogger;
}

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Promise<ToolCallResult>;

export const INDIAN_STORES_TEXT = 'Flipkart, Amazon India, Reliance Digital, Myntra, Snapdeal, Tata CLiQ';

function textResult(text: string): ToolCallResult {
  return {
    content: [{ type: 'text', text }],
    isError: false
  };
}

async function handleListIndianStores(args: unknown): Promise<ToolCallResult> {
  listIndianStoresSchema.parse(args);
  return textResult(INDIAN_STORES_TEXT);
}

const toolHandlers: ReadonlyMap<string, ToolHandler> = new Map<string, ToolHandler>([
  ['list_indian_stores', handleListIndianStores]
]);

// This function executes one tool by name and converts argument validation failures into AppError.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      client: context.session.getClientInfo(),
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  const handler = toolHandlers.get(toolName);
  if (!handler) {
    context.logger.warn({ event: 'mcp_tool_not_found', toolName }, 'mcp_tool_not_found');
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${toolName}`, toolName);
  }

  try {
    const result = await handler(args, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        contentBlocks: result.content.length
      },
      'mcp_tool_execution_completed'
    );

    return result;
  } catch (error) {
    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    if (error instanceof z.ZodError) {
      throw new AppError(400, 'validation_error', 'Tool input validation failed.', error.flatten());
    }

    throw error;
  }
}
