/**
 * @fileoverview Tests for resource and request schemas
 */

import { describe, expect, test } from '@jest/globals';
import {
  CreateServerRequestSchema,
  PoolSpecSchema,
  parseOrThrow,
  parseServer,
  ServerSpecSchema
} from './schemas';
import { InvalidSpecError } from '../types/errors';
import { ServerPhase } from '../types/resources';
import { JsonRpcMessageSchema, isNotification, isRequest, isResponse } from '../types/protocol';

describe('PoolSpecSchema', () => {
  test('applies defaults for capacity, idle timeout and transport', () => {
    const spec = PoolSpecSchema.parse({ template: { image: 'ghcr.io/example/mcp-time:1.0' } });
    expect(spec.maxServers).toBe(100);
    expect(spec.idleTimeout).toBe(60);
    expect(spec.template.transport).toEqual({ type: 'stdio' });
  });

  test('defaults the sse port to 3000', () => {
    const spec = PoolSpecSchema.parse({ template: { image: 'img', transport: { type: 'sse' } } });
    expect(spec.template.transport).toEqual({ type: 'sse', port: 3000 });
  });

  test('rejects a zero capacity pool', () => {
    const result = PoolSpecSchema.safeParse({ maxServers: 0, template: { image: 'img' } });
    expect(result.success).toBe(false);
  });
});

describe('ServerSpecSchema', () => {
  test('defaults the pool reference', () => {
    expect(ServerSpecSchema.parse({}).pool).toBe('default');
  });

  test('create request requires a DNS-compatible name', () => {
    expect(CreateServerRequestSchema.safeParse({ name: 'Bad_Name' }).success).toBe(false);
    const ok = CreateServerRequestSchema.parse({ name: 'weather-1' });
    expect(ok.spec.pool).toBe('default');
  });
});

describe('parseOrThrow', () => {
  test('reports every issue with its path', () => {
    let caught: unknown;
    try {
      parseOrThrow(PoolSpecSchema, { maxServers: -1, template: {} }, 'pool spec');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidSpecError);
    expect(caught instanceof InvalidSpecError && caught.message).toBe(
      'Invalid pool spec: maxServers: Number must be greater than 0; template.image: Required'
    );
  });

  test('parses a server resource envelope with status', () => {
    const server = parseServer({
      metadata: { name: 's1', resourceVersion: '7', generation: 2 },
      spec: { pool: 'p1' },
      status: { phase: 'Running', createdAt: '2024-05-01T00:00:00.000Z' }
    });
    expect(server.status?.phase).toBe(ServerPhase.RUNNING);
    expect(server.status?.totalRequests).toBe(0);
    expect(server.status?.conditions).toEqual([]);
  });
});

describe('JSON-RPC messages', () => {
  test('classifies requests, notifications and responses', () => {
    const request = JsonRpcMessageSchema.parse({ jsonrpc: '2.0', id: 1, method: 'tools/list' });
    const notification = JsonRpcMessageSchema.parse({ jsonrpc: '2.0', method: 'notifications/initialized' });
    const response = JsonRpcMessageSchema.parse({ jsonrpc: '2.0', id: 'a', result: { tools: [] } });

    expect(isRequest(request)).toBe(true);
    expect(isNotification(notification)).toBe(true);
    expect(isResponse(response)).toBe(true);
    expect(isRequest(response)).toBe(false);
  });

  test('rejects messages without the 2.0 marker', () => {
    expect(JsonRpcMessageSchema.safeParse({ id: 1, method: 'ping' }).success).toBe(false);
  });
});
