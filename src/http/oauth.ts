// This module serves static OAuth authorization-server discovery metadata; nothing here validates tokens.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { OAuthDiscoveryConfig } from '../config/config.js';

export interface AuthorizationServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  jwks_uri: string;
  response_types_supported: string[];
  grant_types_supported: string[];
  scopes_supported: string[];
}

// This function builds discovery metadata from configuration only.
export function buildAuthorizationServerMetadata(config: OAuthDiscoveryConfig): AuthorizationServerMetadata {
  return {
    issuer: config.issuer,
    authorization_endpoint: config.authorizationEndpoint,
    token_endpoint: config.tokenEndpoint,
    jwks_uri: config.jwksUri,
    response_types_supported: ['code'],
    grant_types_supported: ['authorization_code'],
    scopes_supported: [...config.scopes]
  };
}

// Serve discovery metadata at the standard and MCP-relative paths for client compatibility.
export function registerOAuthRoutes(fastify: FastifyInstance, config: OAuthDiscoveryConfig): void {
  const metadata = buildAuthorizationServerMetadata(config);

  const sendAuthorizationServerMetadata = async (_request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    reply.header('cache-control', 'no-store');
    reply.send(metadata);
  };

  fastify.get('/.well-known/oauth-authorization-server', sendAuthorizationServerMetadata);
  fastify.get('/mcp/.well-known/oauth-authorization-server', sendAuthorizationServerMetadata);
}
