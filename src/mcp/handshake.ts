// This module implements the initialize handshake that unlocks the gated MCP methods.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { InitializeResult, RawParams } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { SessionState } from './session.js';

export const initializeParamsSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()),
  clientInfo: z.object({
    name: z.string(),
    version: z.string()
  })
});

export type InitializeParams = z.infer<typeof initializeParamsSchema>;

export function buildInitializeResult(): InitializeResult {
  return {
    protocolVersion: MCP_PROTOCOL_VERSION,
    capabilities: {
      tools: {
        listChanged: false
      }
    },
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    }
  };
}

// The server always answers with its own protocol version; the client's request is only logged.
export function handleInitialize(params: RawParams, session: SessionState, logger: FastifyBaseLogger): InitializeResult {
  const parsed = initializeParamsSchema.safeParse(params.kind === 'present' ? params.value : undefined);
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', 'initialize params are invalid.', parsed.error.flatten());
  }

  const alreadyReady = session.isReady();
  session.markReady(parsed.data.clientInfo);

  logger.info(
    {
      event: alreadyReady ? 'mcp_handshake_repeated' : 'mcp_handshake_completed',
      requestedProtocolVersion: parsed.data.protocolVersion,
      clientInfo: sanitizeForLog(parsed.data.clientInfo),
      clientCapabilities: sanitizeForLog(parsed.data.capabilities)
    },
    alreadyReady ? 'mcp_handshake_repeated' : 'mcp_handshake_completed'
  );

  return buildInitializeResult();
}
