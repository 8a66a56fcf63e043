/**
 * @fileoverview sse channel: an upstream MCP server that speaks the SSE transport itself
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { EventSource } from 'eventsource';
import { JsonRpcMessageSchema } from '@mcpfleet/core';
import type { JsonRpcMessage } from '@mcpfleet/core';
import type { WorkloadBinding } from '@mcpfleet/controller';
import { Logger } from '@mcpfleet/shared';
import { BaseChannel } from './types';
import type { ChannelFactory, UpstreamChannel } from './types';

type EventSourceOptions = NonNullable<ConstructorParameters<typeof EventSource>[1]>;

/**
 * The fetch implementation EventSource opens the stream with
 */
export type StreamFetch = NonNullable<EventSourceOptions['fetch']>;

export interface SseChannelOptions {
  /** Path of the upstream event stream, relative to the binding endpoint */
  readonly streamPath: string;
  /** How long to wait for the upstream `endpoint` event */
  readonly connectTimeoutMs: number;
  readonly fetch?: StreamFetch;
}

export const DEFAULT_SSE_CHANNEL_OPTIONS: SseChannelOptions = {
  streamPath: '/sse',
  connectTimeoutMs: 10000
};

function preview(data: unknown): string {
  return String(data).slice(0, 200);
}

export class SseChannel extends BaseChannel {
  private readonly abort = new AbortController();
  private source?: EventSource;
  private messageUrl?: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly binding: WorkloadBinding,
    private readonly options: SseChannelOptions,
    logger: Logger
  ) {
    super(logger.child({ component: 'sse-channel', server: binding.serverName }));
  }

  /**
   * Open the upstream stream and wait for it to announce its message URL
   */
  async connect(): Promise<void> {
    const streamUrl = new URL(this.options.streamPath, this.binding.endpoint).toString();
    const source = this.options.fetch
      ? new EventSource(streamUrl, { fetch: this.options.fetch })
      : new EventSource(streamUrl);
    this.source = source;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`no endpoint event from ${streamUrl} within ${this.options.connectTimeoutMs}ms`));
      }, this.options.connectTimeoutMs);

      source.addEventListener('endpoint', event => {
        this.messageUrl = new URL(String(event.data), streamUrl).toString();
        clearTimeout(timer);
        resolve();
      });
      source.onmessage = event => this.handleMessage(event.data);

      // No reconnect: a new upstream connection would be a new MCP session
      source.onerror = event => {
        this.logger.debug('Upstream stream error', { code: event.code, message: event.message });
        source.close();
        clearTimeout(timer);
        reject(new Error('upstream stream ended'));
        this.fail(new Error('upstream stream ended'));
      };
    });
    this.logger.debug('Upstream stream open', { messageUrl: this.messageUrl });
  }

  async send(message: JsonRpcMessage): Promise<void> {
    if (this.isClosed || !this.messageUrl) {
      throw new Error('channel closed');
    }
    await this.http.post(this.messageUrl, message, { signal: this.abort.signal });
  }

  protected async release(): Promise<void> {
    this.abort.abort();
    this.source?.close();
  }

  private handleMessage(data: unknown): void {
    let value: unknown;
    try {
      value = JSON.parse(String(data));
    } catch {
      this.logger.warn('Dropping malformed upstream message', { data: preview(data) });
      return;
    }
    const result = JsonRpcMessageSchema.safeParse(value);
    if (result.success) {
      this.deliver(result.data);
    } else {
      this.logger.warn('Dropping invalid upstream message', { data: preview(data) });
    }
  }
}

export class SseChannelFactory implements ChannelFactory {
  readonly shared = false;
  private readonly options: SseChannelOptions;

  constructor(
    private readonly logger: Logger,
    private readonly http: AxiosInstance = axios.create(),
    options: Partial<SseChannelOptions> = {}
  ) {
    this.options = { ...DEFAULT_SSE_CHANNEL_OPTIONS, ...options };
  }

  async open(binding: WorkloadBinding): Promise<UpstreamChannel> {
    const channel = new SseChannel(this.http, binding, this.options, this.logger);
    try {
      await channel.connect();
    } catch (error) {
      await channel.close();
      throw error;
    }
    return channel;
  }
}
