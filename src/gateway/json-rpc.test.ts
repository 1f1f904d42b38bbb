/**
 * JsonRpcServer Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { JsonRpcServer, createNotification, createRequest, parseParams } from './json-rpc.js';
import { createLogger } from '../utils/logger.js';

describe('JsonRpcServer', () => {
  let server: JsonRpcServer;

  beforeEach(() => {
    server = new JsonRpcServer(createLogger({ level: 'error' }));
    server.register('echo', async (params) => params);
    server.register('fail', async () => {
      throw new Error('database unavailable');
    });
    server.register('typed', async (params) => {
      const { count } = parseParams('typed', z.object({ count: z.number().int() }), params);
      return { doubled: count * 2 };
    });
  });

  it('should answer a request with its result', async () => {
    const response = await server.handleMessage(createRequest('echo', { a: 1 }, 7));

    expect(JSON.parse(response ?? '')).toEqual({ jsonrpc: '2.0', id: 7, result: { a: 1 } });
  });

  it('should answer null results explicitly', async () => {
    const response = await server.handleMessage(createRequest('echo', undefined, 'r1'));

    expect(JSON.parse(response ?? '')).toEqual({ jsonrpc: '2.0', id: 'r1', result: null });
  });

  it('should return nothing for notifications', async () => {
    const response = await server.handleMessage(createNotification('echo', { a: 1 }));

    expect(response).toBeNull();
  });

  it('should report parse errors', async () => {
    const response = await server.handleMessage('{not json');

    expect(JSON.parse(response ?? '')).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error' },
    });
  });

  it('should report invalid requests with the id when it can be read', async () => {
    const response = await server.handleMessage(JSON.stringify({ jsonrpc: '1.0', id: 3, method: 'echo' }));

    expect(JSON.parse(response ?? '')).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32600, message: 'Invalid Request' },
    });
  });

  it('should report unknown methods', async () => {
    const response = await server.handleMessage(createRequest('nope', {}, 1));

    expect(JSON.parse(response ?? '').error).toEqual({ code: -32601, message: 'Method not found' });
  });

  it('should reject scalar params', async () => {
    const response = await server.handleMessage(JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'echo', params: 5 }));

    expect(JSON.parse(response ?? '').error).toEqual({
      code: -32602,
      message: 'Invalid params',
      data: 'params must be an object or array',
    });
  });

  it('should map validation failures to invalid params', async () => {
    const response = await server.handleMessage(createRequest('typed', { count: 'two' }, 2));

    const parsed = JSON.parse(response ?? '');
    expect(parsed.error.code).toBe(-32602);
    expect(parsed.error.data).toEqual(['count: Expected number, received string']);
  });

  it('should run validated handlers', async () => {
    const response = await server.handleMessage(createRequest('typed', { count: 4 }, 3));

    expect(JSON.parse(response ?? '').result).toEqual({ doubled: 8 });
  });

  it('should report handler failures as internal errors', async () => {
    const response = await server.handleMessage(createRequest('fail', {}, 4));

    expect(JSON.parse(response ?? '').error).toMatchObject({ code: -32603, message: 'Internal error' });
  });

  it('should list and unregister methods', () => {
    expect(server.methods()).toEqual(['echo', 'fail', 'typed']);

    server.unregister('fail');

    expect(server.methods()).toEqual(['echo', 'typed']);
  });
});
