// This module converts raw request bytes into typed JSON-RPC envelopes and responses back into wire text.

import type { JsonRpcRequest, JsonRpcResponse, RawParams, RequestId } from '../types/mcp.js';

// Decode failures always answer with a null id.
export interface DecodeError {
  reason: string;
}

export type DecodeResult = { ok: true; request: JsonRpcRequest } | { ok: false; error: DecodeError };

const NULL_ID: RequestId = { kind: 'null' };

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper reads the id member into its tagged form, or returns null when the member has an unusable type.
function readRequestId(envelope: Record<string, unknown>): RequestId | null {
  if (!hasOwn(envelope, 'id')) {
    return { kind: 'absent' };
  }

  const value = envelope.id;
  if (value === null) {
    return NULL_ID;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return { kind: 'number', value };
  }

  if (typeof value === 'string') {
    return { kind: 'string', value };
  }

  return null;
}

function readParams(envelope: Record<string, unknown>): RawParams {
  return hasOwn(envelope, 'params') ? { kind: 'present', value: envelope.params } : { kind: 'absent' };
}

function toText(raw: string | Uint8Array): string {
  if (typeof raw === 'string') {
    return raw;
  }

  return new TextDecoder('utf-8', { fatal: true }).decode(raw);
}

function fail(reason: string): DecodeResult {
  return { ok: false, error: { reason } };
}

// A missing method reads as the empty name and is answered as an unknown method.
function readMethod(envelope: Record<string, unknown>): string | null {
  if (!hasOwn(envelope, 'method')) {
    return '';
  }

  return typeof envelope.method === 'string' ? envelope.method : null;
}

// This function decodes one request envelope; only structurally malformed input is rejected.
export function decodeRequest(raw: string | Uint8Array): DecodeResult {
  let payload: unknown;
  try {
    payload = JSON.parse(toText(raw));
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'Request body is not valid JSON.');
  }

  if (!isPlainObject(payload)) {
    return fail('Request body must be a single JSON object.');
  }

  const id = readRequestId(payload);
  if (!id) {
    return fail('Request id must be a string, a number, or null.');
  }

  const method = readMethod(payload);
  if (method === null) {
    return fail('Request method must be a string.');
  }

  return {
    ok: true,
    request: {
      jsonrpc: payload.jsonrpc,
      id,
      method,
      params: readParams(payload)
    }
  };
}

function idToWire(id: RequestId): string | number | null {
  switch (id.kind) {
    case 'number':
    case 'string':
      return id.value;
    default:
      return null;
  }
}

// This function serializes a response envelope; an absent request id stays absent on the wire.
export function encodeResponse(response: JsonRpcResponse): string {
  const wire: Record<string, unknown> = { jsonrpc: response.jsonrpc };

  if (response.id.kind !== 'absent') {
    wire.id = idToWire(response.id);
  }

  if ('error' in response) {
    const { code, message, data } = response.error;
    wire.error = data === undefined ? { code, message } : { code, message, data };
  } else {
    wire.result = response.result ?? null;
  }

  return JSON.stringify(wire);
}
