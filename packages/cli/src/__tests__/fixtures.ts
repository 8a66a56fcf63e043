/**
 * @fileoverview In-process stand-in for the gateway API used by command tests
 */

import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ServerPhase } from '@mcpfleet/core';
import type { Pool, Server } from '@mcpfleet/core';
import { DEFAULT_CLI_CONFIG } from '../utils';
import type { CommandContext, OutputFormat } from '../types';

export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly params: unknown;
  readonly body: unknown;
}

export interface StubReply {
  readonly status: number;
  readonly data?: unknown;
}

export type Route = (request: RecordedRequest) => StubReply;

/**
 * Axios client whose adapter answers from `route` and records every request
 */
export class StubGateway {
  readonly requests: RecordedRequest[] = [];
  readonly client: AxiosInstance;

  constructor(private readonly route: Route) {
    this.client = axios.create({
      baseURL: 'http://gateway.test',
      adapter: config => this.handle(config)
    });
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined
    };
    this.requests.push(request);

    const reply = this.route(request);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  }
}

export function testContext(outputFormat: OutputFormat = 'table'): CommandContext {
  return {
    config: DEFAULT_CLI_CONFIG,
    gatewayUrl: 'http://gateway.test',
    outputFormat,
    verbose: false,
    quiet: false
  };
}

export function notFound(kind: 'Pool' | 'Server', name: string): StubReply {
  return {
    status: 404,
    data: {
      error: `${kind.toUpperCase()}_NOT_FOUND`,
      message: `${kind} ${name} not found`,
      timestamp: '2025-05-01T10:00:00.000Z'
    }
  };
}

export const toolsPool: Pool = {
  metadata: { name: 'tools', namespace: 'default' },
  spec: {
    maxServers: 2,
    idleTimeout: 60,
    template: { image: 'example/mcp-echo:1.0', transport: { type: 'stdio' } }
  },
  status: { activeServers: 1, pendingServers: 0, totalServers: 1 }
};

export const echoServer: Server = {
  metadata: { name: 'echo', namespace: 'default' },
  spec: { pool: 'tools' },
  status: {
    phase: ServerPhase.RUNNING,
    conditions: [],
    createdAt: '2025-05-01T10:00:00.000Z',
    startedAt: '2025-05-01T10:00:05.000Z',
    running: true,
    idle: false,
    totalRequests: 4,
    currentConnections: 1,
    lastRequestAt: '2025-05-01T10:01:00.000Z'
  }
};
