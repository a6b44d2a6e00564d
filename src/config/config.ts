// This module reads process environment into one validated runtime configuration.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ALLOW_ORIGIN: z.string().trim().min(1).default('*'),
  OAUTH_ISSUER: z.string().default(''),
  OAUTH_AUTHORIZATION_ENDPOINT: z.string().default(''),
  OAUTH_TOKEN_ENDPOINT: z.string().default(''),
  OAUTH_JWKS_URI: z.string().default(''),
  OAUTH_SCOPES: z.string().default('openid profile email')
});

export interface OAuthDiscoveryConfig {
  issuer: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  jwksUri: string;
  scopes: string[];
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  corsAllowOrigin: string;
  oauth: OAuthDiscoveryConfig;
}

// Empty variables count as unset, so `PORT=` falls back to the default instead of failing coercion.
function dropEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

// This function validates environment variables and throws one AppError listing every invalid field.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropEmptyValues(env));
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid server configuration.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    corsAllowOrigin: values.CORS_ALLOW_ORIGIN,
    oauth: {
      issuer: values.OAUTH_ISSUER,
      authorizationEndpoint: values.OAUTH_AUTHORIZATION_ENDPOINT,
      tokenEndpoint: values.OAUTH_TOKEN_ENDPOINT,
      jwksUri: values.OAUTH_JWKS_URI,
      scopes: values.OAUTH_SCOPES.split(' ').filter((scope) => scope.length > 0)
    }
  };
}
