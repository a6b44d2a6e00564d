// This file defines JSON-RPC envelope and MCP payload types shared by the codec, dispatcher, and handlers.

// Request identifiers are echoed exactly as received, including the case where the member was omitted.
export type RequestId =
  | { kind: 'absent' }
  | { kind: 'null' }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string };

// Params stay unparsed until the handler that knows their shape reads them.
export type RawParams = { kind: 'absent' } | { kind: 'present'; value: unknown };

export interface JsonRpcRequest {
  jsonrpc: unknown;
  id: RequestId;
  method: string;
  params: RawParams;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: RequestId; result: unknown }
  | { jsonrpc: '2.0'; id: RequestId; error: JsonRpcError };

export interface ClientInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: {
    tools: {
      listChanged: boolean;
    };
  };
  serverInfo: {
    name: string;
    version: string;
  };
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
}
