/**
 * @fileoverview Transport bridge between SSE clients and upstream MCP server channels
 *
 * A client opens an event stream for a server and gets back an `endpoint`
 * event naming the URL to POST its messages to. Requests are forwarded with
 * their ids rewritten to `<sessionId>:<seq>` so that responses find their way
 * back to the session that sent them with the original id restored.
 */

import {
  NotFoundError,
  ServerPhase,
  TransportError,
  isRequest,
  isResponse,
  parseOrThrow,
  JsonRpcMessageSchema
} from '@mcpfleet/core';
import type { BridgeEvent, JsonRpcId, JsonRpcMessage, JsonRpcResponse, Server } from '@mcpfleet/core';
import {
  SERVER_DELETED_EVENT,
  SERVER_PHASE_EVENT,
  isServerDeletedEvent,
  isServerPhaseEvent
} from '@mcpfleet/controller';
import type { ServerPhaseEvent, WorkloadBinding } from '@mcpfleet/controller';
import { EventManager, EventSubscription, Logger, generateId } from '@mcpfleet/shared';
import type { GatewayConfigType } from '@mcpfleet/shared';
import type { ChannelFactory, UpstreamChannel } from '../channels/types';

/**
 * What the bridge needs from the controller
 */
export interface BridgeBackend {
  readonly events: EventManager;
  getServer(name: string): Promise<Server>;
  getBinding(name: string): Promise<WorkloadBinding | undefined>;
  notifyConnect(name: string): void;
  notifyDisconnect(name: string): void;
  notifyRequest(name: string): void;
}

/**
 * Where a session's events go; the HTTP layer writes them to the response
 */
export interface SessionSink {
  send(event: BridgeEvent): void;
  comment(text: string): void;
  close(): void;
}

export interface SessionHandle {
  readonly id: string;
  readonly serverName: string;
  close(): void;
}

export type ChannelFactories = Readonly<Record<'stdio' | 'sse', ChannelFactory>>;

export type BridgeConfig = Pick<GatewayConfigType, 'readyTimeoutMs' | 'requestTimeoutMs' | 'keepaliveMs'>;

interface SessionState {
  readonly id: string;
  readonly serverName: string;
  readonly sink: SessionSink;
  /** Settles once the upstream channel is open; messages posted before then wait on it */
  readonly ready: Promise<ChannelEntry>;
  readonly keepalive: NodeJS.Timeout;
  channel?: ChannelEntry;
  seq: number;
  connected: boolean;
  closed: boolean;
}

type PendingRequest =
  | { readonly kind: 'session'; readonly sessionId: string; readonly originalId: JsonRpcId }
  | {
      readonly kind: 'request';
      readonly originalId: JsonRpcId;
      readonly resolve: (response: JsonRpcResponse) => void;
      readonly reject: (error: Error) => void;
    };

interface ChannelEntry {
  readonly key: string;
  readonly serverName: string;
  readonly channel: UpstreamChannel;
  /** Session and one-shot request ids currently using the channel */
  readonly users: Set<string>;
  readonly pending: Map<string, PendingRequest>;
  open: boolean;
}

const SERVING_PHASES: ReadonlySet<ServerPhase> = new Set([ServerPhase.RUNNING, ServerPhase.IDLE]);
const STARTING_PHASES: ReadonlySet<ServerPhase> = new Set([ServerPhase.PENDING, ServerPhase.STARTING]);
const GONE_PHASES: ReadonlySet<ServerPhase> = new Set([ServerPhase.STOPPING, ServerPhase.STOPPED, ServerPhase.FAILED]);

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function messagePath(serverName: string, sessionId: string): string {
  return `/api/v1/servers/${encodeURIComponent(serverName)}/message?sessionId=${encodeURIComponent(sessionId)}`;
}

export class TransportBridge {
  private readonly sessions = new Map<string, SessionState>();
  private readonly channels = new Map<string, Promise<ChannelEntry>>();
  private readonly subscriptions: EventSubscription[];
  private readonly logger: Logger;

  constructor(
    private readonly backend: BridgeBackend,
    private readonly factories: ChannelFactories,
    private readonly config: BridgeConfig,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'transport-bridge' });
    this.subscriptions = [
      backend.events.subscribe(SERVER_DELETED_EVENT, isServerDeletedEvent, event => {
        this.closeServerSessions(event.name, 'server unavailable');
      }),
      backend.events.subscribe(SERVER_PHASE_EVENT, isServerPhaseEvent, event => {
        if (GONE_PHASES.has(event.phase)) {
          this.closeServerSessions(event.name, 'server unavailable');
        }
      })
    ];
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Start a client session on a serving server, waiting for one that is still starting
   */
  async openSession(serverName: string, sink: SessionSink): Promise<SessionHandle> {
    const binding = await this.awaitServing(serverName);
    const id = generateId();

    const keepalive = setInterval(() => sink.comment('keepalive'), this.config.keepaliveMs);
    keepalive.unref();

    // Registered before the endpoint goes out so that a client posting right away finds it;
    // the channel is acquired after the endpoint event is written
    const session: SessionState = {
      id,
      serverName,
      sink,
      ready: Promise.resolve().then(() => this.acquire(binding, id)),
      keepalive,
      seq: 0,
      connected: false,
      closed: false
    };
    this.sessions.set(id, session);
    sink.send({ kind: 'endpoint', data: messagePath(serverName, id) });

    let entry: ChannelEntry;
    try {
      entry = await session.ready;
    } catch (error) {
      const detail = describeError(error);
      this.logger.warn('Could not open upstream channel', { server: serverName, session: id, error: detail });
      this.closeSession(id, 'channel closed');
      throw new TransportError('channel closed', serverName, detail);
    }

    if (session.closed) {
      await this.release(entry, id);
      throw new TransportError('channel closed', serverName, 'session closed while opening');
    }
    session.channel = entry;
    session.connected = true;
    this.backend.notifyConnect(serverName);
    this.logger.info('Session opened', { server: serverName, session: id, sessions: this.sessions.size });

    return {
      id,
      serverName,
      close: () => this.closeSession(id)
    };
  }

  /**
   * Forward a client message sent on an open session
   */
  async submit(serverName: string, sessionId: string, body: unknown): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session || session.serverName !== serverName) {
      throw new TransportError('session not found', serverName, sessionId);
    }

    const message = parseOrThrow(JsonRpcMessageSchema, body, 'JSON-RPC message');

    const entry = await session.ready.catch((error: unknown) => {
      throw new TransportError('channel closed', serverName, describeError(error));
    });
    if (session.closed) {
      throw new TransportError('channel closed', serverName, 'session closed');
    }
    this.backend.notifyRequest(serverName);

    let outgoing: JsonRpcMessage = message;
    if (isRequest(message)) {
      session.seq += 1;
      const upstreamId = `${sessionId}:${session.seq}`;
      entry.pending.set(upstreamId, { kind: 'session', sessionId, originalId: message.id });
      outgoing = { ...message, id: upstreamId };
    }

    try {
      await entry.channel.send(outgoing);
    } catch (error) {
      if (isRequest(outgoing)) entry.pending.delete(String(outgoing.id));
      throw new TransportError('channel closed', serverName, describeError(error));
    }
  }

  /**
   * One round trip without a session. Notifications resolve with null once sent.
   */
  async request(serverName: string, body: unknown): Promise<JsonRpcResponse | null> {
    const message = parseOrThrow(JsonRpcMessageSchema, body, 'JSON-RPC message');
    const binding = await this.awaitServing(serverName);
    const requestId = generateId('request');
    const entry = await this.acquire(binding, requestId).catch((error: unknown) => {
      throw new TransportError('channel closed', serverName, describeError(error));
    });
    this.backend.notifyRequest(serverName);

    const send = (outgoing: JsonRpcMessage): Promise<void> =>
      entry.channel.send(outgoing).catch((error: unknown) => {
        throw new TransportError('channel closed', serverName, describeError(error));
      });

    try {
      if (!isRequest(message)) {
        await send(message);
        return null;
      }

      const upstreamId = `${requestId}:1`;
      let timer: NodeJS.Timeout | undefined;
      const response = new Promise<JsonRpcResponse>((resolve, reject) => {
        entry.pending.set(upstreamId, { kind: 'request', originalId: message.id, resolve, reject });
        timer = setTimeout(() => reject(new TransportError('request timeout', serverName)), this.config.requestTimeoutMs);
      });

      try {
        // Both settle under one handler: the response can be rejected while the send is in flight
        const [, reply] = await Promise.all([send({ ...message, id: upstreamId }), response]);
        return reply;
      } finally {
        if (timer) clearTimeout(timer);
        entry.pending.delete(upstreamId);
      }
    } finally {
      await this.release(entry, requestId);
    }
  }

  /**
   * Close every session, for shutdown
   */
  async cleanup(): Promise<void> {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    for (const id of [...this.sessions.keys()]) {
      this.closeSession(id);
    }
    const entries = await Promise.allSettled([...this.channels.values()]);
    this.channels.clear();
    for (const result of entries) {
      if (result.status === 'fulfilled' && result.value.open) {
        result.value.open = false;
        await result.value.channel.close();
      }
    }
    this.logger.info('Transport bridge stopped');
  }

  private async awaitServing(serverName: string): Promise<WorkloadBinding> {
    const waiter = this.config.readyTimeoutMs > 0
      ? this.backend.events.waitForEvent(
          SERVER_PHASE_EVENT,
          isServerPhaseEvent,
          (event: ServerPhaseEvent) =>
            event.name === serverName && (SERVING_PHASES.has(event.phase) || GONE_PHASES.has(event.phase)),
          this.config.readyTimeoutMs
        )
      : undefined;

    try {
      const server = await this.getServer(serverName);
      const phase = server.status?.phase ?? ServerPhase.PENDING;

      if (STARTING_PHASES.has(phase)) {
        if (!waiter) throw new TransportError('server not ready', serverName);
        this.logger.debug('Waiting for server to start', { server: serverName, phase });
        const event = await waiter.promise;
        if (!event) throw new TransportError('server not ready', serverName);
        if (!SERVING_PHASES.has(event.phase)) throw new TransportError('server unavailable', serverName);
      } else if (!SERVING_PHASES.has(phase)) {
        throw new TransportError('server unavailable', serverName);
      }
    } finally {
      waiter?.cancel();
    }

    const binding = await this.backend.getBinding(serverName);
    if (!binding?.ready) {
      throw new TransportError('server not ready', serverName);
    }
    return binding;
  }

  private async getServer(serverName: string): Promise<Server> {
    try {
      return await this.backend.getServer(serverName);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new TransportError('server unavailable', serverName);
      }
      throw error;
    }
  }

  private async acquire(binding: WorkloadBinding, userId: string): Promise<ChannelEntry> {
    const factory = this.factories[binding.transport.type];
    const key = factory.shared ? `server:${binding.serverName}` : `user:${userId}`;

    for (;;) {
      let pending = this.channels.get(key);
      if (!pending) {
        pending = this.openChannel(factory, binding, key);
        this.channels.set(key, pending);
        pending.catch(() => {
          this.channels.delete(key);
        });
      }

      const entry = await pending;
      // The channel may have been released or lost while we waited for it
      if (entry.open) {
        entry.users.add(userId);
        return entry;
      }
    }
  }

  private async openChannel(factory: ChannelFactory, binding: WorkloadBinding, key: string): Promise<ChannelEntry> {
    const channel = await factory.open(binding);
    const entry: ChannelEntry = {
      key,
      serverName: binding.serverName,
      channel,
      users: new Set(),
      pending: new Map(),
      open: true
    };
    channel.onMessage(message => this.route(entry, message));
    channel.onClose(error => this.channelLost(entry, error));
    this.logger.debug('Upstream channel opened', { server: binding.serverName, channel: key });
    return entry;
  }

  private async release(entry: ChannelEntry, userId: string): Promise<void> {
    entry.users.delete(userId);
    if (entry.users.size > 0 || !entry.open) return;

    entry.open = false;
    this.channels.delete(entry.key);
    await entry.channel.close();
    this.logger.debug('Upstream channel closed', { server: entry.serverName, channel: entry.key });
  }

  private route(entry: ChannelEntry, message: JsonRpcMessage): void {
    if (!isResponse(message)) {
      // Notifications and server-initiated requests go to every session on the channel
      for (const userId of entry.users) {
        this.sessions.get(userId)?.sink.send({ kind: 'message', data: message });
      }
      return;
    }

    const upstreamId = message.id === null ? undefined : String(message.id);
    const pending = upstreamId === undefined ? undefined : entry.pending.get(upstreamId);
    if (!upstreamId || !pending) {
      this.logger.warn('Dropping response with unknown id', { server: entry.serverName, id: message.id });
      return;
    }
    entry.pending.delete(upstreamId);

    const restored: JsonRpcResponse = { ...message, id: pending.originalId };
    if (pending.kind === 'request') {
      pending.resolve(restored);
      return;
    }
    const session = this.sessions.get(pending.sessionId);
    if (session && !session.closed) {
      session.sink.send({ kind: 'message', data: restored });
    }
  }

  private channelLost(entry: ChannelEntry, error?: Error): void {
    if (!entry.open) return;
    entry.open = false;
    this.channels.delete(entry.key);
    this.logger.warn('Upstream channel lost', {
      server: entry.serverName,
      channel: entry.key,
      error: error?.message
    });
    for (const userId of [...entry.users]) {
      if (this.sessions.has(userId)) {
        this.closeSession(userId, 'channel closed');
      }
    }
    entry.users.clear();

    for (const pending of entry.pending.values()) {
      if (pending.kind === 'request') {
        pending.reject(new TransportError('channel closed', entry.serverName, error?.message));
      }
    }
    entry.pending.clear();
  }

  private closeServerSessions(serverName: string, reason: string): void {
    for (const session of [...this.sessions.values()]) {
      if (session.serverName === serverName) {
        this.closeSession(session.id, reason);
      }
    }
  }

  private closeSession(id: string, reason?: string): void {
    const session = this.sessions.get(id);
    if (!session || session.closed) return;
    session.closed = true;
    this.sessions.delete(id);
    clearInterval(session.keepalive);

    if (reason) {
      session.sink.send({ kind: 'error', data: reason });
    }
    session.sink.close();
    if (session.connected) {
      this.backend.notifyDisconnect(session.serverName);
    }
    this.logger.info('Session closed', { server: session.serverName, session: id, reason });

    const entry = session.channel;
    if (!entry) return;
    for (const [upstreamId, pending] of entry.pending) {
      if (pending.kind === 'session' && pending.sessionId === id) {
        entry.pending.delete(upstreamId);
      }
    }
    this.release(entry, id).catch((error: unknown) => {
      this.logger.warn('Failed to release upstream channel', {
        server: session.serverName,
        error: describeError(error)
      });
    });
  }
}
