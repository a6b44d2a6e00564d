// This module wires all HTTP routes, middleware behavior, and the MCP dispatcher for one server instance.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { AppConfig } from './config/config.js';
import { registerCors } from './http/cors.js';
import { registerOAuthRoutes } from './http/oauth.js';
import { McpDispatcher } from './mcp/dispatcher.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { buildLoggerOptions } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  dispatcher: McpDispatcher;
}

// High-resolution request start times, keyed by request object.
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

// This function builds and configures the full HTTP application around a fresh dispatcher and session.
export function createServer(config: AppConfig): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  const dispatcher = new McpDispatcher(app.log);

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This hook emits explicit timeout events to simplify debugging of stalled requests.
  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  registerCors(app, config.corsAllowOrigin);

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: 'ok',
      ts: new Date().toISOString()
    };
  });

  app.get('/', async () => ({
    ok: true,
    message: `hey there 👋 this is ${MCP_SERVER_NAME}`,
    service: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    mcpEndpoint: '/mcp'
  }));

  registerOAuthRoutes(app, config.oauth);
  registerMcpRoutes(app, { dispatcher });

  return { app, dispatcher };
}
