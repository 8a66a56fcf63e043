/**
 * @fileoverview stdio channel: line-delimited JSON-RPC over `kubectl attach`
 */

import { createInterface } from 'readline';
import { PassThrough } from 'stream';
import type { Readable, Writable } from 'stream';
import { Attach, KubeConfig } from '@kubernetes/client-node';
import { JsonRpcMessageSchema } from '@mcpfleet/core';
import type { JsonRpcMessage } from '@mcpfleet/core';
import type { WorkloadBinding } from '@mcpfleet/controller';
import { isRecord } from '@mcpfleet/controller';
import { Logger } from '@mcpfleet/shared';
import { BaseChannel } from './types';
import type { ChannelFactory, UpstreamChannel } from './types';

/**
 * The call `Attach` from client-node exposes. It resolves with the websocket
 * carrying the attached streams.
 */
export interface Attacher {
  attach(
    namespace: string,
    podName: string,
    containerName: string,
    stdout: Writable,
    stderr: Writable,
    stdin: Readable,
    tty: boolean
  ): Promise<unknown>;
}

interface SocketLike {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  close(): void;
}

function isSocketLike(value: unknown): value is SocketLike {
  return isRecord(value) && typeof value.on === 'function' && typeof value.close === 'function';
}

/**
 * Parse one line of server output; anything that is not a JSON-RPC message yields undefined
 */
export function parseLine(line: string): JsonRpcMessage | undefined {
  const trimmed = line.trim();
  if (trimmed === '') return undefined;

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  const result = JsonRpcMessageSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

export class StdioChannel extends BaseChannel {
  private readonly stdin = new PassThrough();
  private readonly stdout = new PassThrough();
  private readonly stderr = new PassThrough();
  private socket?: SocketLike;

  constructor(
    private readonly binding: WorkloadBinding,
    logger: Logger
  ) {
    super(logger.child({ component: 'stdio-channel', server: binding.serverName }));

    createInterface({ input: this.stdout }).on('line', line => {
      const message = parseLine(line);
      if (message) {
        this.deliver(message);
      } else if (line.trim() !== '') {
        this.logger.debug('Ignoring non-protocol output', { line: line.slice(0, 200) });
      }
    });
    createInterface({ input: this.stderr }).on('line', line => {
      this.logger.debug('Server stderr', { line: line.slice(0, 200) });
    });
  }

  async connect(attacher: Attacher): Promise<void> {
    const { namespace, podName, containerName } = this.binding;
    const socket: unknown = await attacher.attach(
      namespace,
      podName,
      containerName,
      this.stdout,
      this.stderr,
      this.stdin,
      false
    );

    if (isSocketLike(socket)) {
      this.socket = socket;
      socket.on('close', () => this.fail(new Error('attach stream closed')));
      socket.on('error', (error: unknown) => {
        this.fail(error instanceof Error ? error : new Error(String(error)));
      });
    }
    this.logger.debug('Attached to server process', { pod: podName });
  }

  async send(message: JsonRpcMessage): Promise<void> {
    if (this.isClosed) {
      throw new Error('channel closed');
    }
    await new Promise<void>((resolve, reject) => {
      this.stdin.write(`${JSON.stringify(message)}\n`, error => (error ? reject(error) : resolve()));
    });
  }

  protected async release(): Promise<void> {
    this.stdin.end();
    this.stdout.end();
    this.stderr.end();
    this.socket?.close();
  }
}

export class KubeAttachChannelFactory implements ChannelFactory {
  readonly shared = true;

  constructor(
    private readonly attacher: Attacher,
    private readonly logger: Logger
  ) {}

  static fromKubeConfig(kubeConfig: KubeConfig, logger: Logger): KubeAttachChannelFactory {
    return new KubeAttachChannelFactory(new Attach(kubeConfig), logger);
  }

  async open(binding: WorkloadBinding): Promise<UpstreamChannel> {
    const channel = new StdioChannel(binding, this.logger);
    await channel.connect(this.attacher);
    return channel;
  }
}
