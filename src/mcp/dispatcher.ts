// This module routes decoded JSON-RPC requests to MCP handlers and turns every outcome into a response envelope.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcRequest, JsonRpcResponse, RawParams, RequestId } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { decodeRequest, encodeResponse } from './codec.js';
import { handleInitialize } from './handshake.js';
import { mapAppErrorToRpc, rpcError } from './rpc-errors.js';
import { SessionState, type SessionView } from './session.js';
import { callToolParamsSchema, buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export interface HandlerContext {
  session: SessionView;
  logger: FastifyBaseLogger;
}

type MethodHandler = (params: RawParams, context: HandlerContext) => Promise<unknown>;

// Only the handshake route is given write access to the session.
type MethodRoute =
  | { kind: 'handshake' }
  | { kind: 'notification' }
  | { kind: 'handler'; gated: boolean; handler: MethodHandler };

async function handlePing(): Promise<Record<string, never>> {
  return {};
}

async function handleToolsList(): Promise<unknown> {
  return { tools: buildToolList() };
}

async function handleToolsCall(params: RawParams, context: HandlerContext): Promise<unknown> {
  const parsed = callToolParamsSchema.safeParse(params.kind === 'present' ? params.value : undefined);
  if (!parsed.success) {
    context.logger.warn(
      { event: 'mcp_tool_call_invalid_params', issues: parsed.error.flatten() },
      'mcp_tool_call_invalid_params'
    );
    throw new AppError(400, 'validation_error', 'tools/call requires params.name as string.', parsed.error.flatten());
  }

  return executeTool(parsed.data.name, parsed.data.arguments ?? {}, context);
}

const METHOD_TABLE: ReadonlyMap<string, MethodRoute> = new Map<string, MethodRoute>([
  ['initialize', { kind: 'handshake' }],
  ['notifications/initialized', { kind: 'notification' }],
  ['tools/list', { kind: 'handler', gated: true, handler: handleToolsList }],
  ['tools/call', { kind: 'handler', gated: true, handler: handleToolsCall }],
  ['ping', { kind: 'handler', gated: false, handler: handlePing }]
]);

export const SUPPORTED_METHODS: readonly string[] = [...METHOD_TABLE.keys()];

function describeId(id: RequestId): string | number | null {
  return id.kind === 'number' || id.kind === 'string' ? id.value : null;
}

export class McpDispatcher {
  private readonly session = new SessionState();
  private readonly logger: FastifyBaseLogger;

  public constructor(logger: FastifyBaseLogger) {
    this.logger = logger;
  }

  public get sessionView(): SessionView {
    return this.session;
  }

  // This method is the transport entry point: raw bytes in, encoded response or null for notifications out.
  public async handle(raw: string | Uint8Array, logger: FastifyBaseLogger = this.logger): Promise<string | null> {
    const decoded = decodeRequest(raw);
    if (!decoded.ok) {
      logger.warn({ event: 'mcp_rpc_parse_failed', reason: decoded.error.reason }, 'mcp_rpc_parse_failed');
      const mapped = mapAppErrorToRpc(new AppError(400, 'parse_error', 'Parse error', decoded.error.reason));
      return encodeResponse(rpcError({ kind: 'null' }, mapped.code, mapped.message, mapped.data));
    }

    const response = await this.dispatch(decoded.request, logger);
    return response ? encodeResponse(response) : null;
  }

  // This method serves one decoded request and never throws; notifications resolve to null.
  public async dispatch(request: JsonRpcRequest, logger: FastifyBaseLogger = this.logger): Promise<JsonRpcResponse | null> {
    const startedAt = Date.now();
    const rpcLogger = logger.child({
      component: 'mcp',
      rpcTraceId: randomUUID(),
      rpcRequestId: describeId(request.id),
      method: request.method
    });

    rpcLogger.info({ event: 'mcp_rpc_request_received' }, 'mcp_rpc_request_received');

    try {
      const route = METHOD_TABLE.get(request.method);
      if (!route) {
        throw new AppError(404, 'method_not_found', `Unknown method: ${request.method}`, request.method);
      }

      let result: unknown;
      switch (route.kind) {
        case 'notification':
          rpcLogger.info(
            { event: 'mcp_notification_received', sessionReady: this.session.isReady() },
            'mcp_notification_received'
          );
          return null;

        case 'handshake':
          result = handleInitialize(request.params, this.session, rpcLogger);
          break;

        case 'handler':
          if (route.gated && !this.session.isReady()) {
            throw new AppError(409, 'not_initialized', `${request.method} requires a completed initialize handshake.`);
          }
          result = await route.handler(request.params, { session: this.session, logger: rpcLogger });
          break;
      }

      return { jsonrpc: '2.0', id: request.id, result };
    } catch (error) {
      const appError = normalizeError(error);
      const mapped = mapAppErrorToRpc(appError);
      const logPayload = {
        event: 'mcp_rpc_request_failed',
        code: appError.code,
        rpcCode: mapped.code,
        details: sanitizeForLog(appError.details),
        durationMs: Date.now() - startedAt
      };

      if (appError.statusCode >= 500) {
        rpcLogger.error({ ...logPayload, error: errorForLog(error) }, 'mcp_rpc_request_failed');
      } else {
        rpcLogger.warn(logPayload, 'mcp_rpc_request_failed');
      }

      return rpcError(request.id, mapped.code, mapped.message, mapped.data);
    } finally {
      rpcLogger.info(
        { event: 'mcp_rpc_request_completed', durationMs: Date.now() - startedAt },
        'mcp_rpc_request_completed'
      );
    }
  }
}
