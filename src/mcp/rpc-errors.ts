// This module maps application failures onto the JSON-RPC error taxonomy served by the dispatcher.

import type { JsonRpcError, JsonRpcResponse, RequestId } from '../types/mcp.js';
import type { AppError } from '../utils/errors.js';

export const RPC_ERROR_CODES = {
  parseError: -32700,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  notInitialized: -32002
} as const;

// This helper creates a canonical JSON-RPC error envelope.
export function rpcError(id: RequestId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

// This helper maps application error codes into JSON-RPC error objects.
export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  switch (error.code) {
    case 'parse_error':
      return { code: RPC_ERROR_CODES.parseError, message: 'Parse error', data: error.details };
    case 'method_not_found':
      return { code: RPC_ERROR_CODES.methodNotFound, message: 'Method not found', data: error.details };
    case 'tool_not_found':
      return { code: RPC_ERROR_CODES.methodNotFound, message: error.message, data: error.details };
    case 'validation_error':
      return { code: RPC_ERROR_CODES.invalidParams, message: 'Invalid params', data: error.details };
    case 'not_initialized':
      return { code: RPC_ERROR_CODES.notInitialized, message: 'Server not initialized' };
    default:
      // Internal details stay in the logs.
      return { code: RPC_ERROR_CODES.internalError, message: 'Internal error' };
  }
}
