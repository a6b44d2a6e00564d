// This module adds CORS headers to every response and answers preflight requests.

import type { FastifyInstance } from 'fastify';

const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const ALLOWED_HEADERS = 'content-type, authorization, mcp-protocol-version';

export function registerCors(fastify: FastifyInstance, allowOrigin: string): void {
  fastify.addHook('onRequest', async (_request, reply) => {
    reply.header('access-control-allow-origin', allowOrigin);
    reply.header('access-control-allow-methods', ALLOWED_METHODS);
    reply.header('access-control-allow-headers', ALLOWED_HEADERS);
    if (allowOrigin !== '*') {
      reply.header('vary', 'origin');
    }
  });

  fastify.options('*', async (_request, reply) => {
    reply.code(204).send();
  });
}
