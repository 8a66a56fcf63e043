/**
 * @fileoverview Tests for the upstream SSE channel
 */

import { PassThrough } from 'stream';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from '@jest/globals';
import type { JsonRpcMessage } from '@mcpfleet/core';
import type { WorkloadBinding } from '@mcpfleet/controller';
import { LoggerFactory } from '@mcpfleet/shared';
import { stdioBinding } from '../__tests__/fixtures';
import { SseChannelFactory } from './sse-upstream';
import type { StreamFetch } from './sse-upstream';

interface Upstream {
  stream: PassThrough;
  gets: string[];
  posts: Array<{ url: string | undefined; body: unknown }>;
  http: AxiosInstance;
  fetch: StreamFetch;
}

const binding: WorkloadBinding = {
  ...stdioBinding('s2'),
  transport: { type: 'sse', port: 8080 },
  endpoint: 'http://mcp-server-s2.default.svc:8080'
};

async function until(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !predicate(); i++) {
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}

/**
 * Upstream server answered in process: the stream comes from `fetch`,
 * message POSTs are recorded by the axios adapter
 */
function upstream(): Upstream {
  const stream = new PassThrough();
  const gets: string[] = [];
  const posts: Array<{ url: string | undefined; body: unknown }> = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
      posts.push({ url: config.url, body });
      return { data: '', status: 202, statusText: 'Accepted', headers: {}, config };
    }
  });
  const fetch: StreamFetch = async url => {
    gets.push(String(url));
    return new Response(stream, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
  };
  return { stream, gets, posts, http, fetch };
}

describe('SseChannelFactory', () => {
  it('should open the stream and post messages to the announced endpoint', async () => {
    const { stream, gets, posts, http, fetch } = upstream();
    const factory = new SseChannelFactory(LoggerFactory.silent(), http, { connectTimeoutMs: 1000, fetch });

    const opening = factory.open(binding);
    stream.write('event: endpoint\ndata: /messages?session_id=abc\n\n');
    const channel = await opening;
    await channel.send({ jsonrpc: '2.0', id: 's:1', method: 'tools/list' });

    expect(factory.shared).toBe(false);
    expect(gets).toEqual(['http://mcp-server-s2.default.svc:8080/sse']);
    expect(posts).toEqual([
      {
        url: 'http://mcp-server-s2.default.svc:8080/messages?session_id=abc',
        body: { jsonrpc: '2.0', id: 's:1', method: 'tools/list' }
      }
    ]);
    await channel.close();
  });

  it('should deliver valid upstream messages and drop the rest', async () => {
    const { stream, http, fetch } = upstream();
    const factory = new SseChannelFactory(LoggerFactory.silent(), http, { connectTimeoutMs: 1000, fetch });
    stream.write('event: endpoint\ndata: /messages\n\n');
    const channel = await factory.open(binding);
    const received: JsonRpcMessage[] = [];
    channel.onMessage(message => received.push(message));

    stream.write('event: message\ndata: not json\n\n');
    stream.write('event: message\ndata: {"hello":"world"}\n\n');
    stream.write('event: message\ndata: {"jsonrpc":"2.0","id":"s:1","result":{"ok":true}}\n\n');
    await until(() => received.length > 0);

    expect(received).toEqual([{ jsonrpc: '2.0', id: 's:1', result: { ok: true } }]);
    await channel.close();
  });

  it('should end the channel when the upstream stream ends', async () => {
    const { stream, http, fetch } = upstream();
    const factory = new SseChannelFactory(LoggerFactory.silent(), http, { connectTimeoutMs: 1000, fetch });
    stream.write('event: endpoint\ndata: /messages\n\n');
    const channel = await factory.open(binding);
    const reasons: Array<string | undefined> = [];
    channel.onClose(error => reasons.push(error?.message));

    stream.end();
    await until(() => reasons.length > 0);

    expect(reasons).toEqual(['upstream stream ended']);
  });

  it('should fail when no endpoint event arrives in time', async () => {
    const { gets, http, fetch } = upstream();
    const factory = new SseChannelFactory(LoggerFactory.silent(), http, { connectTimeoutMs: 20, fetch });

    await expect(factory.open(binding)).rejects.toThrow(
      'no endpoint event from http://mcp-server-s2.default.svc:8080/sse within 20ms'
    );
    expect(gets).toHaveLength(1);
  });

  it('should fail when the stream ends before announcing an endpoint', async () => {
    const { stream, http, fetch } = upstream();
    const factory = new SseChannelFactory(LoggerFactory.silent(), http, { connectTimeoutMs: 1000, fetch });

    const opening = factory.open(binding);
    stream.end(': hello\n\n');

    await expect(opening).rejects.toThrow('upstream stream ended');
  });
});
