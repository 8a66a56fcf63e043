/**
 * @fileoverview Tests for the transport bridge
 */

import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { InvalidSpecError, ServerPhase } from '@mcpfleet/core';
import { LoggerFactory } from '@mcpfleet/shared';
import {
  FakeBackend,
  FakeChannelFactory,
  RecordingSink,
  echoResponder,
  stdioBinding
} from '../__tests__/fixtures';
import type { Responder } from '../__tests__/fixtures';
import { TransportBridge, messagePath } from './transport-bridge';
import type { BridgeConfig } from './transport-bridge';

interface Setup {
  backend: FakeBackend;
  stdio: FakeChannelFactory;
  sse: FakeChannelFactory;
  bridge: TransportBridge;
}

const tick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('TransportBridge', () => {
  let current: Setup | undefined;

  function setup(options: { responder?: Responder; config?: Partial<BridgeConfig> } = {}): Setup {
    const backend = new FakeBackend();
    const stdio = new FakeChannelFactory(true, options.responder);
    const sse = new FakeChannelFactory(false, options.responder);
    const bridge = new TransportBridge(
      backend,
      { stdio, sse },
      { readyTimeoutMs: 0, requestTimeoutMs: 1000, keepaliveMs: 15000, ...options.config },
      LoggerFactory.silent()
    );
    current = { backend, stdio, sse, bridge };
    return current;
  }

  afterEach(async () => {
    await current?.bridge.cleanup();
    current = undefined;
    jest.useRealTimers();
  });

  describe('sessions', () => {
    it('should announce the message endpoint first', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();

      const handle = await bridge.openSession('s1', sink);

      expect(sink.events).toEqual([
        { kind: 'endpoint', data: `/api/v1/servers/s1/message?sessionId=${handle.id}` }
      ]);
      expect(sink.sessionId).toBe(handle.id);
      expect(bridge.sessionCount).toBe(1);
      expect(stdio.opened).toHaveLength(1);
      expect(backend.activity).toEqual(['connect:s1']);
    });

    it('should serve idle servers', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.IDLE);

      const handle = await bridge.openSession('s1', new RecordingSink());

      expect(handle.serverName).toBe('s1');
    });

    it('should rewrite request ids upstream and restore them on the way back', async () => {
      const { backend, stdio, bridge } = setup({ responder: echoResponder });
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      const handle = await bridge.openSession('s1', sink);

      await bridge.submit('s1', handle.id, { jsonrpc: '2.0', id: 7, method: 'tools/list' });

      expect(stdio.last?.sent).toEqual([{ jsonrpc: '2.0', id: `${handle.id}:1`, method: 'tools/list' }]);
      expect(sink.events[1]).toEqual({
        kind: 'message',
        data: { jsonrpc: '2.0', id: 7, result: { echoed: 'tools/list' } }
      });
      expect(backend.activity).toEqual(['connect:s1', 'request:s1']);
    });

    it('should forward notifications unchanged', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const handle = await bridge.openSession('s1', new RecordingSink());

      await bridge.submit('s1', handle.id, { jsonrpc: '2.0', method: 'notifications/initialized' });

      expect(stdio.last?.sent).toEqual([{ jsonrpc: '2.0', method: 'notifications/initialized' }]);
    });

    it('should route responses to the session that sent the request', async () => {
      const { backend, stdio, bridge } = setup({ responder: echoResponder });
      backend.addServer('s1', ServerPhase.RUNNING);
      const first = new RecordingSink();
      const second = new RecordingSink();
      const a = await bridge.openSession('s1', first);
      const b = await bridge.openSession('s1', second);

      await bridge.submit('s1', a.id, { jsonrpc: '2.0', id: 1, method: 'tools/list' });
      await bridge.submit('s1', b.id, { jsonrpc: '2.0', id: 1, method: 'resources/list' });

      expect(stdio.opened).toHaveLength(1);
      expect(first.events.slice(1)).toEqual([
        { kind: 'message', data: { jsonrpc: '2.0', id: 1, result: { echoed: 'tools/list' } } }
      ]);
      expect(second.events.slice(1)).toEqual([
        { kind: 'message', data: { jsonrpc: '2.0', id: 1, result: { echoed: 'resources/list' } } }
      ]);
    });

    it('should broadcast server notifications to every session on the channel', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const first = new RecordingSink();
      const second = new RecordingSink();
      await bridge.openSession('s1', first);
      await bridge.openSession('s1', second);

      stdio.last?.push({ jsonrpc: '2.0', method: 'notifications/tools/list_changed' });

      const expected = { kind: 'message', data: { jsonrpc: '2.0', method: 'notifications/tools/list_changed' } };
      expect(first.events[1]).toEqual(expected);
      expect(second.events[1]).toEqual(expected);
    });

    it('should drop responses with unknown ids', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      await bridge.openSession('s1', sink);

      stdio.last?.push({ jsonrpc: '2.0', id: 'stale:1', result: {} });

      expect(sink.events).toHaveLength(1);
    });

    it('should open one channel per session for sse servers', async () => {
      const { backend, stdio, sse, bridge } = setup();
      backend.addServer('s2', ServerPhase.RUNNING, {
        ...stdioBinding('s2'),
        transport: { type: 'sse', port: 8080 },
        endpoint: 'http://mcp-server-s2.default.svc:8080'
      });
      const sink = new RecordingSink();

      const handle = await bridge.openSession('s2', sink);
      await bridge.openSession('s2', new RecordingSink());

      expect(sse.opened).toHaveLength(2);
      expect(stdio.opened).toHaveLength(0);

      handle.close();
      await tick();

      expect(sink.closed).toBe(true);
      expect(sse.opened[0].released).toBe(true);
      expect(sse.opened[1].released).toBe(false);
      expect(backend.activity).toEqual(['connect:s2', 'connect:s2', 'disconnect:s2']);
    });

    it('should close the shared channel with its last session', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const a = await bridge.openSession('s1', new RecordingSink());
      const b = await bridge.openSession('s1', new RecordingSink());

      a.close();
      await tick();
      expect(stdio.last?.released).toBe(false);

      b.close();
      await tick();
      expect(stdio.last?.released).toBe(true);
      expect(bridge.sessionCount).toBe(0);
    });

    it('should send keepalive comments', async () => {
      jest.useFakeTimers();
      const { backend, bridge } = setup({ config: { keepaliveMs: 1000 } });
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      await bridge.openSession('s1', sink);

      jest.advanceTimersByTime(2500);

      expect(sink.comments).toEqual(['keepalive', 'keepalive']);
    });

    it('should report a channel that cannot be opened', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      stdio.openError = new Error('attach refused');
      const sink = new RecordingSink();

      await expect(bridge.openSession('s1', sink)).rejects.toMatchObject({ reason: 'channel closed', statusCode: 502 });

      expect(sink.events.map(event => event.kind)).toEqual(['endpoint', 'error']);
      expect(sink.events[1]).toEqual({ kind: 'error', data: 'channel closed' });
      expect(sink.closed).toBe(true);
      expect(bridge.sessionCount).toBe(0);
    });
  });

  describe('session setup', () => {
    it('should accept messages posted before the upstream channel is open', async () => {
      const { backend, stdio, bridge } = setup({ responder: echoResponder });
      backend.addServer('s1', ServerPhase.RUNNING);
      const openChannel = stdio.hold();
      const sink = new RecordingSink();

      const opening = bridge.openSession('s1', sink);
      await tick();
      expect(sink.events.map(event => event.kind)).toEqual(['endpoint']);

      const submitted = bridge.submit('s1', sink.sessionId, { jsonrpc: '2.0', id: 3, method: 'tools/list' });
      openChannel();
      await opening;
      await submitted;

      expect(sink.events[1]).toEqual({
        kind: 'message',
        data: { jsonrpc: '2.0', id: 3, result: { echoed: 'tools/list' } }
      });
      expect(backend.activity).toEqual(['connect:s1', 'request:s1']);
    });

    it('should release the channel of a session closed while it was opening', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const openChannel = stdio.hold();
      const sink = new RecordingSink();

      const opening = bridge.openSession('s1', sink);
      await tick();
      backend.remove('s1');
      openChannel();

      await expect(opening).rejects.toMatchObject({ reason: 'channel closed' });
      expect(sink.events[1]).toEqual({ kind: 'error', data: 'server unavailable' });
      expect(stdio.last?.released).toBe(true);
      expect(bridge.sessionCount).toBe(0);
      expect(backend.activity).toEqual([]);
    });
  });

  describe('submit errors', () => {
    it('should reject unknown sessions', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);

      await expect(
        bridge.submit('s1', 'missing', { jsonrpc: '2.0', id: 1, method: 'ping' })
      ).rejects.toMatchObject({ reason: 'session not found', statusCode: 404 });
    });

    it('should reject a session id used against another server', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const handle = await bridge.openSession('s1', new RecordingSink());

      await expect(
        bridge.submit('s2', handle.id, { jsonrpc: '2.0', id: 1, method: 'ping' })
      ).rejects.toMatchObject({ reason: 'session not found' });
    });

    it('should reject bodies that are not JSON-RPC', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const handle = await bridge.openSession('s1', new RecordingSink());

      await expect(bridge.submit('s1', handle.id, { hello: 'world' })).rejects.toBeInstanceOf(InvalidSpecError);
    });
  });

  describe('server readiness', () => {
    it('should refuse a starting server when not waiting', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.STARTING);
      const sink = new RecordingSink();

      await expect(bridge.openSession('s1', sink)).rejects.toMatchObject({ reason: 'server not ready', statusCode: 503 });
      expect(sink.events).toEqual([]);
    });

    it('should refuse stopped servers', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.STOPPED, null);

      await expect(bridge.openSession('s1', new RecordingSink())).rejects.toMatchObject({ reason: 'server unavailable' });
    });

    it('should refuse servers that do not exist', async () => {
      const { bridge } = setup();

      await expect(bridge.openSession('ghost', new RecordingSink())).rejects.toMatchObject({
        reason: 'server unavailable'
      });
    });

    it('should refuse a serving server whose workload is not ready', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING, stdioBinding('s1', false));

      await expect(bridge.openSession('s1', new RecordingSink())).rejects.toMatchObject({ reason: 'server not ready' });
    });

    it('should wait for a starting server to come up', async () => {
      const { backend, bridge } = setup({ config: { readyTimeoutMs: 1000 } });
      backend.addServer('s1', ServerPhase.STARTING);
      const sink = new RecordingSink();

      const opening = bridge.openSession('s1', sink);
      await tick();
      expect(sink.events).toEqual([]);

      backend.setPhase('s1', ServerPhase.RUNNING);
      const handle = await opening;

      expect(sink.events[0]).toEqual({ kind: 'endpoint', data: messagePath('s1', handle.id) });
    });

    it('should give up when the server fails while waiting', async () => {
      const { backend, bridge } = setup({ config: { readyTimeoutMs: 1000 } });
      backend.addServer('s1', ServerPhase.PENDING);

      const opening = bridge.openSession('s1', new RecordingSink());
      await tick();
      backend.setPhase('s1', ServerPhase.FAILED);

      await expect(opening).rejects.toMatchObject({ reason: 'server unavailable' });
    });

    it('should time out waiting for a server that never starts', async () => {
      const { backend, bridge } = setup({ config: { readyTimeoutMs: 20 } });
      backend.addServer('s1', ServerPhase.STARTING);

      await expect(bridge.openSession('s1', new RecordingSink())).rejects.toMatchObject({ reason: 'server not ready' });
    });
  });

  describe('server lifecycle', () => {
    it('should end sessions when their server stops', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      backend.addServer('s2', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      const other = new RecordingSink();
      await bridge.openSession('s1', sink);
      await bridge.openSession('s2', other);

      backend.setPhase('s1', ServerPhase.STOPPING);

      expect(sink.events[1]).toEqual({ kind: 'error', data: 'server unavailable' });
      expect(sink.closed).toBe(true);
      expect(other.closed).toBe(false);
      expect(bridge.sessionCount).toBe(1);
      expect(backend.activity).toContain('disconnect:s1');
    });

    it('should end sessions when their server is deleted', async () => {
      const { backend, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      await bridge.openSession('s1', sink);

      backend.remove('s1');

      expect(sink.events[1]).toEqual({ kind: 'error', data: 'server unavailable' });
      expect(sink.closed).toBe(true);
    });

    it('should end sessions when the upstream channel is lost and open a fresh one afterwards', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      await bridge.openSession('s1', sink);

      stdio.last?.drop(new Error('container exited'));

      expect(sink.events[1]).toEqual({ kind: 'error', data: 'channel closed' });
      expect(sink.closed).toBe(true);

      await bridge.openSession('s1', new RecordingSink());
      expect(stdio.opened).toHaveLength(2);
    });

    it('should close sessions quietly on cleanup', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      const sink = new RecordingSink();
      await bridge.openSession('s1', sink);

      await bridge.cleanup();

      expect(sink.events).toHaveLength(1);
      expect(sink.closed).toBe(true);
      expect(stdio.last?.released).toBe(true);
    });
  });

  describe('request', () => {
    it('should make a single round trip and release the channel', async () => {
      const { backend, stdio, bridge } = setup({ responder: echoResponder });
      backend.addServer('s1', ServerPhase.RUNNING);

      const response = await bridge.request('s1', { jsonrpc: '2.0', id: 'r1', method: 'ping' });

      expect(response).toEqual({ jsonrpc: '2.0', id: 'r1', result: { echoed: 'ping' } });
      expect(stdio.last?.released).toBe(true);
      expect(backend.activity).toEqual(['request:s1']);
    });

    it('should resolve null for notifications', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);

      const response = await bridge.request('s1', { jsonrpc: '2.0', method: 'notifications/cancelled' });

      expect(response).toBeNull();
      expect(stdio.last?.sent).toEqual([{ jsonrpc: '2.0', method: 'notifications/cancelled' }]);
    });

    it('should time out when no response arrives', async () => {
      const { backend, bridge } = setup({ config: { requestTimeoutMs: 20 } });
      backend.addServer('s1', ServerPhase.RUNNING);

      await expect(bridge.request('s1', { jsonrpc: '2.0', id: 1, method: 'ping' })).rejects.toMatchObject({
        reason: 'request timeout',
        statusCode: 504
      });
    });

    it('should fail when the channel is lost mid-request', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);

      const pending = bridge.request('s1', { jsonrpc: '2.0', id: 1, method: 'ping' });
      await tick();
      stdio.last?.drop(new Error('container exited'));

      await expect(pending).rejects.toMatchObject({ reason: 'channel closed' });
    });

    it('should report a send that breaks the channel as a closed channel', async () => {
      const { backend, stdio, bridge } = setup();
      backend.addServer('s1', ServerPhase.RUNNING);
      stdio.breakOnSend = new Error('pipe broke');

      await expect(bridge.request('s1', { jsonrpc: '2.0', id: 1, method: 'ping' })).rejects.toMatchObject({
        reason: 'channel closed',
        statusCode: 502
      });
      expect(stdio.last?.released).toBe(true);
    });

    it('should share the channel with open sessions', async () => {
      const { backend, stdio, bridge } = setup({ responder: echoResponder });
      backend.addServer('s1', ServerPhase.RUNNING);
      await bridge.openSession('s1', new RecordingSink());

      await bridge.request('s1', { jsonrpc: '2.0', id: 2, method: 'ping' });

      expect(stdio.opened).toHaveLength(1);
      expect(stdio.last?.released).toBe(false);
    });
  });
});
