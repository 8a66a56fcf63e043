/**
 * @fileoverview Test fixtures for the gateway: fake channels, a scripted backend and recording sinks
 */

import { ServerPhase, NotFoundError } from '@mcpfleet/core';
import type { BridgeEvent, JsonRpcMessage, Server, ServerTemplate, WorkloadState } from '@mcpfleet/core';
import { SERVER_DELETED_EVENT, SERVER_PHASE_EVENT } from '@mcpfleet/controller';
import type {
  ServerDeletedEvent,
  ServerPhaseEvent,
  WorkloadBinding,
  WorkloadInspection,
  WorkloadManager
} from '@mcpfleet/controller';
import { EventManager, GatewayConfigSchema, LoggerFactory } from '@mcpfleet/shared';
import type { GatewayConfigType } from '@mcpfleet/shared';
import type { BridgeBackend, SessionSink } from '../bridge/transport-bridge';
import { BaseChannel } from '../channels/types';
import type { ChannelFactory, UpstreamChannel } from '../channels/types';

export type Responder = (message: JsonRpcMessage) => JsonRpcMessage | undefined;

/**
 * Channel whose upstream side is driven by the test
 */
export class FakeChannel extends BaseChannel {
  readonly sent: JsonRpcMessage[] = [];
  released = false;
  /** When set, a send drops the channel with this error and then throws */
  breakOnSend?: Error;

  constructor(private readonly responder?: Responder) {
    super(LoggerFactory.silent());
  }

  async send(message: JsonRpcMessage): Promise<void> {
    if (this.isClosed) throw new Error('channel closed');
    if (this.breakOnSend) {
      this.fail(this.breakOnSend);
      throw new Error('write after end');
    }
    this.sent.push(message);
    const reply = this.responder?.(message);
    if (reply) this.deliver(reply);
  }

  /** Deliver a message as if the server wrote it */
  push(message: JsonRpcMessage): void {
    this.deliver(message);
  }

  /** Simulate the server side going away */
  drop(error: Error): void {
    this.fail(error);
  }

  protected async release(): Promise<void> {
    this.released = true;
  }
}

export class FakeChannelFactory implements ChannelFactory {
  readonly opened: FakeChannel[] = [];
  openError?: Error;
  breakOnSend?: Error;
  private gate?: Promise<void>;

  constructor(
    readonly shared: boolean,
    private readonly responder?: Responder
  ) {}

  /** Keep `open` pending until the returned function is called */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>(resolve => {
      release = resolve;
    });
    return release;
  }

  async open(_binding: WorkloadBinding): Promise<UpstreamChannel> {
    if (this.gate) await this.gate;
    if (this.openError) throw this.openError;
    const channel = new FakeChannel(this.responder);
    channel.breakOnSend = this.breakOnSend;
    this.opened.push(channel);
    return channel;
  }

  get last(): FakeChannel | undefined {
    return this.opened[this.opened.length - 1];
  }
}

/**
 * Echoes every request back as a response carrying the request's method
 */
export const echoResponder: Responder = message =>
  'method' in message && 'id' in message
    ? { jsonrpc: '2.0', id: message.id, result: { echoed: message.method } }
    : undefined;

export class RecordingSink implements SessionSink {
  readonly events: BridgeEvent[] = [];
  readonly comments: string[] = [];
  closed = false;

  send(event: BridgeEvent): void {
    this.events.push(event);
  }

  comment(text: string): void {
    this.comments.push(text);
  }

  close(): void {
    this.closed = true;
  }

  /** Session id announced by the endpoint event */
  get sessionId(): string {
    const endpoint = this.events.find(event => event.kind === 'endpoint');
    const match = endpoint?.kind === 'endpoint' ? /sessionId=([^&]+)/.exec(endpoint.data) : null;
    return match ? decodeURIComponent(match[1]) : '';
  }
}

export function stdioBinding(serverName: string, ready = true): WorkloadBinding {
  return {
    serverName,
    podName: `mcp-server-${serverName}`,
    containerName: 'mcp-server',
    namespace: 'default',
    transport: { type: 'stdio' },
    endpoint: `mcp-server-${serverName}/mcp-server`,
    ready
  };
}

/**
 * Backend with directly settable server phases
 */
export class FakeBackend implements BridgeBackend {
  readonly events = new EventManager('test-backend');
  readonly servers = new Map<string, Server>();
  readonly bindings = new Map<string, WorkloadBinding>();
  readonly activity: string[] = [];

  /** `binding` null leaves the server without a workload */
  addServer(name: string, phase: ServerPhase, binding: WorkloadBinding | null = stdioBinding(name)): void {
    this.servers.set(name, {
      metadata: { name },
      spec: { pool: 'tools' },
      status: {
        phase,
        conditions: [],
        createdAt: '2025-05-01T10:00:00.000Z',
        running: phase === ServerPhase.RUNNING || phase === ServerPhase.IDLE,
        idle: phase === ServerPhase.IDLE,
        totalRequests: 0,
        currentConnections: 0
      }
    });
    if (binding) this.bindings.set(name, binding);
  }

  /** Change the phase and announce it the way the controller does */
  setPhase(name: string, phase: ServerPhase): void {
    const server = this.servers.get(name);
    const previous = server?.status?.phase ?? ServerPhase.PENDING;
    this.addServer(name, phase, this.bindings.get(name) ?? null);
    const event: ServerPhaseEvent = { name, phase, previous };
    this.events.emitEvent(SERVER_PHASE_EVENT, event);
  }

  remove(name: string): void {
    this.servers.delete(name);
    const event: ServerDeletedEvent = { name };
    this.events.emitEvent(SERVER_DELETED_EVENT, event);
  }

  async getServer(name: string): Promise<Server> {
    const server = this.servers.get(name);
    if (!server) throw new NotFoundError('Server', name);
    return server;
  }

  async getBinding(name: string): Promise<WorkloadBinding | undefined> {
    return this.bindings.get(name);
  }

  notifyConnect(name: string): void {
    this.activity.push(`connect:${name}`);
  }

  notifyDisconnect(name: string): void {
    this.activity.push(`disconnect:${name}`);
  }

  notifyRequest(name: string): void {
    this.activity.push(`request:${name}`);
  }
}

/**
 * Workload manager whose workloads are ready as soon as they exist
 */
export class InstantWorkloadManager implements WorkloadManager {
  readonly running = new Set<string>();

  async ensure(server: Server, _template: ServerTemplate): Promise<WorkloadBinding> {
    this.running.add(server.metadata.name);
    return stdioBinding(server.metadata.name);
  }

  async teardown(name: string): Promise<void> {
    this.running.delete(name);
  }

  async inspect(name: string): Promise<WorkloadInspection> {
    const state: WorkloadState = this.running.has(name) ? 'ready' : 'absent';
    return state === 'ready' ? { state, binding: stdioBinding(name) } : { state };
  }
}

export function testGatewayConfig(overrides: Partial<GatewayConfigType> = {}): GatewayConfigType {
  return GatewayConfigSchema.parse({
    environment: 'test',
    logLevel: 'silent',
    port: 8080,
    readyTimeoutMs: 0,
    requestTimeoutMs: 1000,
    keepaliveMs: 15000,
    ...overrides
  });
}
