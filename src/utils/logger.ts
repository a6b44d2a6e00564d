// This module centralizes structured logging configuration and bounded payload shaping for RPC traces.

import { createHash } from 'node:crypto';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

const MAX_DEPTH = 4;
const MAX_STRING_LENGTH = 512;
const MAX_COLLECTION_ENTRIES = 20;

// Header and field paths that pino removes before a line is written.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  '*.authorization',
  '*.cookie',
  '*.token',
  '*.password',
  '*.clientSecret'
];

const SENSITIVE_KEY_PATTERN = /token|password|passphrase|secret|authorization|cookie|api_?key/i;

function clip(value: string): string {
  if (value.length <= MAX_STRING_LENGTH) {
    return value;
  }

  return `${value.slice(0, MAX_STRING_LENGTH)}...[truncated:${value.length - MAX_STRING_LENGTH}]`;
}

// This helper replaces a sensitive value with a short digest so equal values still correlate across lines.
function redactValue(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return `[redacted:${createHash('sha256').update(serialized).digest('hex').slice(0, 12)}]`;
}

// This helper copies client-supplied payloads (tool arguments, handshake client info) into a log-safe shape.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return clip(value);
  }

  if (depth >= MAX_DEPTH) {
    return '[depth-limited]';
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_COLLECTION_ENTRIES).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > MAX_COLLECTION_ENTRIES) {
      items.push(`[truncated-items:${value.length - MAX_COLLECTION_ENTRIES}]`);
    }
    return items;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const target: Record<string, unknown> = {};

    for (const [key, entryValue] of entries.slice(0, MAX_COLLECTION_ENTRIES)) {
      target[key] = SENSITIVE_KEY_PATTERN.test(key) ? redactValue(entryValue) : sanitizeForLog(entryValue, depth + 1);
    }

    if (entries.length > MAX_COLLECTION_ENTRIES) {
      target.__truncatedKeys = entries.length - MAX_COLLECTION_ENTRIES;
    }

    return target;
  }

  return String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
