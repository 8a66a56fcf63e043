/**
 * @fileoverview Upstream channels: the gateway's connection to one MCP server process
 */

import { EventEmitter2 } from 'eventemitter2';
import type { JsonRpcMessage } from '@mcpfleet/core';
import type { WorkloadBinding } from '@mcpfleet/controller';
import { Logger } from '@mcpfleet/shared';

export type MessageListener = (message: JsonRpcMessage) => void;
export type CloseListener = (error?: Error) => void;

export interface UpstreamChannel {
  send(message: JsonRpcMessage): Promise<void>;
  onMessage(listener: MessageListener): void;
  /** Called once, when the channel ends for any reason other than `close()` */
  onClose(listener: CloseListener): void;
  close(): Promise<void>;
}

export interface ChannelFactory {
  /** One channel per server shared by its sessions, or one per session */
  readonly shared: boolean;
  open(binding: WorkloadBinding): Promise<UpstreamChannel>;
}

const MESSAGE = 'message';
const CLOSED = 'closed';

/**
 * Listener bookkeeping shared by the channel implementations
 */
export abstract class BaseChannel implements UpstreamChannel {
  private readonly emitter = new EventEmitter2();
  private ended = false;

  constructor(protected readonly logger: Logger) {}

  abstract send(message: JsonRpcMessage): Promise<void>;

  onMessage(listener: MessageListener): void {
    this.emitter.on(MESSAGE, listener);
  }

  onClose(listener: CloseListener): void {
    this.emitter.on(CLOSED, listener);
  }

  async close(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.emitter.removeAllListeners();
    await this.release();
  }

  get isClosed(): boolean {
    return this.ended;
  }

  protected abstract release(): Promise<void>;

  protected deliver(message: JsonRpcMessage): void {
    if (!this.ended) this.emitter.emit(MESSAGE, message);
  }

  /**
   * The far side went away
   */
  protected fail(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.emitter.emit(CLOSED, error);
    this.emitter.removeAllListeners();
    this.release().catch((releaseError: unknown) => {
      this.logger.debug('Channel release failed', {
        error: releaseError instanceof Error ? releaseError.message : String(releaseError)
      });
    });
  }
}
