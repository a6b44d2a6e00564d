// This test suite verifies the MCP method table, handshake gating, and error mapping end to end through handle().

import Fastify from 'fastify';
import { describe, expect, it } from 'vitest';
import { McpDispatcher } from '../src/mcp/dispatcher.js';

const INITIALIZE_REQUEST = JSON.stringify({
  jsonrpc: '2.0',
  id: 3,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' }
  }
});

const INITIALIZE_RESPONSE =
  '{"jsonrpc":"2.0","id":3,"result":{"protocolVersion":"2024-11-05","capabilities":{"tools":{"listChanged":false}},"serverInfo":{"name":"store-mcp-server","version":"0.002"}}}';

function makeDispatcher(): McpDispatcher {
  return new McpDispatcher(Fastify({ logger: false }).log);
}

async function makeInitializedDispatcher(): Promise<McpDispatcher> {
  const dispatcher = makeDispatcher();
  await dispatcher.handle(INITIALIZE_REQUEST);
  return dispatcher;
}

describe('mcp dispatcher', () => {
  it('answers ping with an empty result', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":1,"method":"ping"}')).toBe('{"jsonrpc":"2.0","id":1,"result":{}}');
  });

  it('rejects tools/list before the handshake', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":2,"method":"tools/list"}')).toBe(
      '{"jsonrpc":"2.0","id":2,"error":{"code":-32002,"message":"Server not initialized"}}'
    );
  });

  it('rejects tools/call before the handshake even with a valid tool name', async () => {
    const dispatcher = makeDispatcher();
    const response = await dispatcher.handle(
      '{"jsonrpc":"2.0","id":"c1","method":"tools/call","params":{"name":"list_indian_stores"}}'
    );

    expect(response).toBe('{"jsonrpc":"2.0","id":"c1","error":{"code":-32002,"message":"Server not initialized"}}');
  });

  it('completes the handshake and lists exactly one tool', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle(INITIALIZE_REQUEST)).toBe(INITIALIZE_RESPONSE);
    expect(dispatcher.sessionView.isReady()).toBe(true);

    const listed = JSON.parse((await dispatcher.handle('{"jsonrpc":"2.0","id":4,"method":"tools/list"}')) ?? 'null');
    expect(listed.id).toBe(4);
    expect(listed.result.tools).toHaveLength(1);
    expect(listed.result.tools[0].name).toBe('list_indian_stores');
    expect(listed.result.tools[0].description).toBe('List popular Indian online stores');
  });

  it('returns the same metadata for repeated handshakes', async () => {
    const dispatcher = makeDispatcher();

    const first = await dispatcher.handle(INITIALIZE_REQUEST);
    const second = await dispatcher.handle(INITIALIZE_REQUEST);

    expect(first).toBe(INITIALIZE_RESPONSE);
    expect(second).toBe(INITIALIZE_RESPONSE);
    expect(dispatcher.sessionView.getClientInfo()).toEqual({ name: 'test-client', version: '1.0.0' });
  });

  it('calls the store tool and returns one text block', async () => {
    const dispatcher = await makeInitializedDispatcher();

    expect(
      await dispatcher.handle('{"jsonrpc":"2.0","id":5,"method":"tools/call","params":{"name":"list_indian_stores"}}')
    ).toBe(
      '{"jsonrpc":"2.0","id":5,"result":{"content":[{"type":"text","text":"Flipkart, Amazon India, Reliance Digital, Myntra, Snapdeal, Tata CLiQ"}],"isError":false}}'
    );
  });

  it('ignores tool arguments', async () => {
    const dispatcher = await makeInitializedDispatcher();
    const response = JSON.parse(
      (await dispatcher.handle(
        '{"jsonrpc":"2.0","id":8,"method":"tools/call","params":{"name":"list_indian_stores","arguments":{"city":"Pune"}}}'
      )) ?? 'null'
    );

    expect(response.result.content[0].text).toBe('Flipkart, Amazon India, Reliance Digital, Myntra, Snapdeal, Tata CLiQ');
  });

  it('reports unknown tools with the requested name', async () => {
    const dispatcher = await makeInitializedDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":6,"method":"tools/call","params":{"name":"bogus"}}')).toBe(
      '{"jsonrpc":"2.0","id":6,"error":{"code":-32601,"message":"Unknown tool: bogus","data":"bogus"}}'
    );
    expect(dispatcher.sessionView.isReady()).toBe(true);
  });

  it('reports invalid tools/call params', async () => {
    const dispatcher = await makeInitializedDispatcher();
    const response = JSON.parse((await dispatcher.handle('{"jsonrpc":"2.0","id":9,"method":"tools/call","params":{"name":5}}')) ?? 'null');

    expect(response.id).toBe(9);
    expect(response.error.code).toBe(-32602);
    expect(response.error.message).toBe('Invalid params');
    expect(response.error.data.fieldErrors.name).toHaveLength(1);
  });

  it('leaves the session untouched when initialize params are invalid', async () => {
    const dispatcher = makeDispatcher();
    const response = JSON.parse(
      (await dispatcher.handle('{"jsonrpc":"2.0","id":10,"method":"initialize","params":{"protocolVersion":42}}')) ?? 'null'
    );

    expect(response.error.code).toBe(-32602);
    expect(dispatcher.sessionView.isReady()).toBe(false);
    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":11,"method":"tools/list"}')).toBe(
      '{"jsonrpc":"2.0","id":11,"error":{"code":-32002,"message":"Server not initialized"}}'
    );
  });

  it('rejects initialize without params', async () => {
    const dispatcher = makeDispatcher();
    const response = JSON.parse((await dispatcher.handle('{"jsonrpc":"2.0","id":12,"method":"initialize"}')) ?? 'null');

    expect(response.error.code).toBe(-32602);
  });

  it('never answers notifications/initialized', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toBeNull();

    await dispatcher.handle(INITIALIZE_REQUEST);
    expect(await dispatcher.handle('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toBeNull();
    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":13,"method":"notifications/initialized"}')).toBeNull();
  });

  it('reports unknown methods with the method name as data', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":"abc","method":"resources/list"}')).toBe(
      '{"jsonrpc":"2.0","id":"abc","error":{"code":-32601,"message":"Method not found","data":"resources/list"}}'
    );
  });

  it('matches method names case-sensitively and only on table entries', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":1,"method":"PING"}')).toBe(
      '{"jsonrpc":"2.0","id":1,"error":{"code":-32601,"message":"Method not found","data":"PING"}}'
    );
    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":2,"method":"constructor"}')).toBe(
      '{"jsonrpc":"2.0","id":2,"error":{"code":-32601,"message":"Method not found","data":"constructor"}}'
    );
  });

  it('echoes absent, null, and string ids exactly', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","method":"ping"}')).toBe('{"jsonrpc":"2.0","result":{}}');
    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":null,"method":"ping"}')).toBe('{"jsonrpc":"2.0","id":null,"result":{}}');
    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":"42","method":"ping"}')).toBe('{"jsonrpc":"2.0","id":"42","result":{}}');
  });

  it('serves requests without a protocol tag', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"id":9,"method":"ping"}')).toBe('{"jsonrpc":"2.0","id":9,"result":{}}');
  });

  it('answers truncated input with a parse error and null id', async () => {
    const dispatcher = makeDispatcher();
    const response = JSON.parse((await dispatcher.handle('{"jsonrpc":"2.0","id":7,"meth')) ?? 'null');

    expect(response.jsonrpc).toBe('2.0');
    expect(response.id).toBeNull();
    expect(response.error.code).toBe(-32700);
    expect(response.error.message).toBe('Parse error');
    expect(typeof response.error.data).toBe('string');
  });

  it('answers invalid bytes and empty bodies with a parse error', async () => {
    const dispatcher = makeDispatcher();

    const fromBytes = JSON.parse((await dispatcher.handle(Uint8Array.from([0xff, 0xfe]))) ?? 'null');
    const fromEmpty = JSON.parse((await dispatcher.handle('')) ?? 'null');

    expect(fromBytes.error.code).toBe(-32700);
    expect(fromBytes.id).toBeNull();
    expect(fromEmpty.error.code).toBe(-32700);
    expect(fromEmpty.id).toBeNull();
  });

  it('answers a missing method as an unknown empty method name', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":11}')).toBe(
      '{"jsonrpc":"2.0","id":11,"error":{"code":-32601,"message":"Method not found","data":""}}'
    );
  });

  it('answers a non-string method with a parse error and null id', async () => {
    const dispatcher = makeDispatcher();

    expect(await dispatcher.handle('{"jsonrpc":"2.0","id":12,"method":["ping"]}')).toBe(
      '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error","data":"Request method must be a string."}}'
    );
  });

  it('serves concurrent gated calls once the handshake has been issued', async () => {
    const dispatcher = makeDispatcher();
    const handshake = dispatcher.handle(INITIALIZE_REQUEST);
    const calls = Array.from({ length: 10 }, (_, index) =>
      dispatcher.handle(`{"jsonrpc":"2.0","id":${100 + index},"method":"tools/list"}`)
    );

    expect(await handshake).toBe(INITIALIZE_RESPONSE);
    const responses = (await Promise.all(calls)).map((raw) => JSON.parse(raw ?? 'null'));
    expect(responses.map((response) => response.id)).toEqual(Array.from({ length: 10 }, (_, index) => 100 + index));
    expect(responses.every((response) => Array.isArray(response.result.tools))).toBe(true);
  });

  it('keeps handshake state per dispatcher instance', async () => {
    const initialized = await makeInitializedDispatcher();
    const fresh = makeDispatcher();

    expect(initialized.sessionView.isReady()).toBe(true);
    expect(await fresh.handle('{"jsonrpc":"2.0","id":1,"method":"tools/list"}')).toBe(
      '{"jsonrpc":"2.0","id":1,"error":{"code":-32002,"message":"Server not initialized"}}'
    );
  });

  it('dispatches decoded envelopes directly', async () => {
    const dispatcher = makeDispatcher();

    expect(
      await dispatcher.dispatch({ jsonrpc: '2.0', id: { kind: 'number', value: 1 }, method: 'ping', params: { kind: 'absent' } })
    ).toEqual({ jsonrpc: '2.0', id: { kind: 'number', value: 1 }, result: {} });
  });
});
