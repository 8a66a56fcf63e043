/**
 * @fileoverview ResourceStore backed by the Kubernetes custom objects API
 */

import { CustomObjectsApi, KubeConfig, Watch } from '@kubernetes/client-node';
import {
  API_GROUP,
  API_VERSION,
  ConflictError,
  NotFoundError,
  POOL_KIND,
  POOL_PLURAL,
  SERVER_KIND,
  SERVER_PLURAL,
  parsePool,
  parseServer
} from '@mcpfleet/core';
import type { Pool, PoolSpec, ResourceKind, Server, ServerSpec } from '@mcpfleet/core';
import { Logger, computeBackoff } from '@mcpfleet/shared';
import { isRecord, statusCodeOf, toFleetError } from '../kube/errors';
import type { ResourceStore, WatchEventType, WatchHandler } from './types';

type Plural = typeof POOL_PLURAL | typeof SERVER_PLURAL;

/**
 * The slice of CustomObjectsApi and Watch the store needs, bound to one namespace
 */
export interface CustomObjectsClient {
  get(plural: Plural, name: string): Promise<unknown>;
  list(plural: Plural): Promise<unknown>;
  create(plural: Plural, body: object): Promise<unknown>;
  replace(plural: Plural, name: string, body: object): Promise<unknown>;
  replaceStatus(plural: Plural, name: string, body: object): Promise<unknown>;
  delete(plural: Plural, name: string): Promise<void>;
  watch(
    plural: Plural,
    onEvent: (type: string, object: unknown) => void,
    onDone: (error: unknown) => void
  ): Promise<() => void>;
}

function hasAbort(value: unknown): value is { abort: () => void } {
  return isRecord(value) && typeof value.abort === 'function';
}

export function createCustomObjectsClient(kubeConfig: KubeConfig, namespace: string): CustomObjectsClient {
  const api = kubeConfig.makeApiClient(CustomObjectsApi);
  const watcher = new Watch(kubeConfig);

  return {
    async get(plural, name) {
      const { body } = await api.getNamespacedCustomObject(API_GROUP, API_VERSION, namespace, plural, name);
      return body;
    },
    async list(plural) {
      const { body } = await api.listNamespacedCustomObject(API_GROUP, API_VERSION, namespace, plural);
      return body;
    },
    async create(plural, body) {
      const result = await api.createNamespacedCustomObject(API_GROUP, API_VERSION, namespace, plural, body);
      return result.body;
    },
    async replace(plural, name, body) {
      const result = await api.replaceNamespacedCustomObject(API_GROUP, API_VERSION, namespace, plural, name, body);
      return result.body;
    },
    async replaceStatus(plural, name, body) {
      const result = await api.replaceNamespacedCustomObjectStatus(API_GROUP, API_VERSION, namespace, plural, name, body);
      return result.body;
    },
    async delete(plural, name) {
      await api.deleteNamespacedCustomObject(API_GROUP, API_VERSION, namespace, plural, name);
    },
    async watch(plural, onEvent, onDone) {
      const path = `/apis/${API_GROUP}/${API_VERSION}/namespaces/${namespace}/${plural}`;
      const request: unknown = await watcher.watch(path, {}, onEvent, onDone);
      return () => {
        if (hasAbort(request)) request.abort();
      };
    }
  };
}

const WATCH_EVENT_TYPES: ReadonlySet<string> = new Set(['ADDED', 'MODIFIED', 'DELETED']);

function isWatchEventType(type: string): type is WatchEventType {
  return WATCH_EVENT_TYPES.has(type);
}

export interface KubeResourceStoreOptions {
  readonly watchBackoffBaseMs?: number;
  readonly watchBackoffMaxMs?: number;
}

export class KubeResourceStore implements ResourceStore {
  private readonly watchBackoffBaseMs: number;
  private readonly watchBackoffMaxMs: number;

  constructor(
    private readonly client: CustomObjectsClient,
    private readonly logger: Logger,
    options: KubeResourceStoreOptions = {}
  ) {
    this.watchBackoffBaseMs = options.watchBackoffBaseMs ?? 1000;
    this.watchBackoffMaxMs = options.watchBackoffMaxMs ?? 30000;
  }

  async getPool(name: string): Promise<Pool | null> {
    const body = await this.read(POOL_PLURAL, name, 'Pool');
    return body === null ? null : parsePool(body);
  }

  async listPools(): Promise<Pool[]> {
    return (await this.listItems(POOL_PLURAL, 'Pool')).map(parsePool);
  }

  async createPool(name: string, spec: PoolSpec): Promise<Pool> {
    const body = await this.call('create pool', 'Pool', name, () =>
      this.client.create(POOL_PLURAL, { ...this.manifest(POOL_KIND, name), spec })
    );
    return parsePool(body);
  }

  async replacePoolSpec(name: string, spec: PoolSpec): Promise<Pool> {
    const current = await this.requirePool(name);
    const body = await this.call('replace pool', 'Pool', name, () =>
      this.client.replace(POOL_PLURAL, name, { ...this.manifest(POOL_KIND, name), metadata: current.metadata, spec, status: current.status })
    );
    return parsePool(body);
  }

  async deletePool(name: string): Promise<void> {
    await this.call('delete pool', 'Pool', name, () => this.client.delete(POOL_PLURAL, name));
  }

  async updatePoolStatus(pool: Pool): Promise<Pool> {
    const name = pool.metadata.name;
    const body = await this.call('update pool status', 'Pool', name, () =>
      this.client.replaceStatus(POOL_PLURAL, name, { ...this.manifest(POOL_KIND, name), ...pool })
    );
    return parsePool(body);
  }

  async getServer(name: string): Promise<Server | null> {
    const body = await this.read(SERVER_PLURAL, name, 'Server');
    return body === null ? null : parseServer(body);
  }

  async listServers(): Promise<Server[]> {
    return (await this.listItems(SERVER_PLURAL, 'Server')).map(parseServer);
  }

  async createServer(name: string, spec: ServerSpec): Promise<Server> {
    const body = await this.call('create server', 'Server', name, () =>
      this.client.create(SERVER_PLURAL, { ...this.manifest(SERVER_KIND, name), spec })
    );
    return parseServer(body);
  }

  async replaceServerSpec(name: string, spec: ServerSpec): Promise<Server> {
    const current = await this.getServer(name);
    if (!current) {
      throw new NotFoundError('Server', name);
    }
    const body = await this.call('replace server', 'Server', name, () =>
      this.client.replace(SERVER_PLURAL, name, { ...this.manifest(SERVER_KIND, name), metadata: current.metadata, spec, status: current.status })
    );
    return parseServer(body);
  }

  async deleteServer(name: string): Promise<void> {
    await this.call('delete server', 'Server', name, () => this.client.delete(SERVER_PLURAL, name));
  }

  async updateServerStatus(server: Server): Promise<Server> {
    const name = server.metadata.name;
    const body = await this.call('update server status', 'Server', name, () =>
      this.client.replaceStatus(SERVER_PLURAL, name, { ...this.manifest(SERVER_KIND, name), ...server })
    );
    return parseServer(body);
  }

  watch(handler: WatchHandler): () => void {
    const stops: Array<() => void> = [];
    let closed = false;

    const start = (plural: Plural, kind: 'Pool' | 'Server', attempt: number): void => {
      if (closed) return;
      let received = false;

      const onEvent = (type: string, object: unknown): void => {
        received = true;
        const metadata = isRecord(object) ? object.metadata : undefined;
        if (!isWatchEventType(type) || !isRecord(metadata) || typeof metadata.name !== 'string') return;
        handler({ type, kind, name: metadata.name });
      };

      const onDone = (error: unknown): void => {
        if (closed) return;
        const next = received ? 1 : attempt + 1;
        const delay = computeBackoff(next, { baseDelay: this.watchBackoffBaseMs, maxDelay: this.watchBackoffMaxMs });
        this.logger.warn('Watch closed, re-establishing', {
          component: 'kube-store',
          plural,
          delay,
          error: error instanceof Error ? error.message : error === null || error === undefined ? undefined : String(error)
        });
        setTimeout(() => start(plural, kind, next), delay).unref();
      };

      this.client
        .watch(plural, onEvent, onDone)
        .then(stop => {
          if (closed) stop();
          else stops.push(stop);
        })
        .catch(onDone);
    };

    start(POOL_PLURAL, 'Pool', 0);
    start(SERVER_PLURAL, 'Server', 0);

    return () => {
      closed = true;
      for (const stop of stops.splice(0)) stop();
    };
  }

  private manifest(kind: string, name: string): { apiVersion: string; kind: string; metadata: { name: string } } {
    return { apiVersion: `${API_GROUP}/${API_VERSION}`, kind, metadata: { name } };
  }

  private async read(plural: Plural, name: string, kind: ResourceKind): Promise<unknown> {
    try {
      return await this.client.get(plural, name);
    } catch (error) {
      if (statusCodeOf(error) === 404) return null;
      throw toFleetError(error, { operation: `get ${kind.toLowerCase()}`, kind, name });
    }
  }

  private async listItems(plural: Plural, kind: ResourceKind): Promise<unknown[]> {
    const body = await this.call(`list ${plural}`, kind, plural, () => this.client.list(plural));
    return isRecord(body) && Array.isArray(body.items) ? body.items : [];
  }

  private async requirePool(name: string): Promise<Pool> {
    const pool = await this.getPool(name);
    if (!pool) {
      throw new NotFoundError('Pool', name);
    }
    return pool;
  }

  private async call<T>(operation: string, kind: ResourceKind, name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const mapped = toFleetError(error, { operation, kind, name });
      if (mapped instanceof ConflictError) {
        this.logger.debug('Write conflict', { component: 'kube-store', operation, name });
      }
      throw mapped;
    }
  }
}
