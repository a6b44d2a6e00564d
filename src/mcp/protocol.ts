// This module exposes the MCP dispatcher over a streamable HTTP JSON-RPC endpoint.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { MCP_SERVER_NAME } from '../version.js';
import { SUPPORTED_METHODS, type McpDispatcher } from './dispatcher.js';

interface McpRouteDeps {
  dispatcher: McpDispatcher;
}

// This function registers the /mcp routes; the body is handed to the dispatcher as raw bytes so malformed JSON or UTF-8 maps to -32700.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  void fastify.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
      const raw = request.body instanceof Uint8Array ? request.body : new Uint8Array(0);
      request.log.debug({ event: 'mcp_post_received', bodyBytes: raw.byteLength }, 'mcp_post_received');

      const response = await deps.dispatcher.handle(raw, request.log);
      if (response === null) {
        reply.code(202).send();
        return;
      }

      reply.header('content-type', 'application/json; charset=utf-8').send(response);
    });

    scope.route({
      method: ['GET', 'PUT', 'PATCH', 'DELETE'],
      url: '/mcp',
      handler: async (request, reply) => {
        request.log.info({ event: 'mcp_method_not_allowed', method: request.method }, 'mcp_method_not_allowed');
        reply.code(405).header('allow', 'POST').send({
          error: 'method_not_allowed',
          message: 'POST only',
          service: MCP_SERVER_NAME,
          methods: SUPPORTED_METHODS
        });
      }
    });
  });
}
