/**
 * @fileoverview In-process ResourceStore used by tests and `mcpfleet operator --store memory`
 */

import { ConflictError, NotFoundError, systemClock } from '@mcpfleet/core';
import type { Clock, Pool, PoolSpec, Server, ServerSpec } from '@mcpfleet/core';
import { generateId } from '@mcpfleet/shared';
import type { ResourceStore, WatchEvent, WatchHandler } from './types';

export class InMemoryResourceStore implements ResourceStore {
  private readonly pools = new Map<string, Pool>();
  private readonly servers = new Map<string, Server>();
  private readonly handlers = new Set<WatchHandler>();
  private revision = 0;

  constructor(
    private readonly namespace = 'default',
    private readonly clock: Clock = systemClock
  ) {}

  async getPool(name: string): Promise<Pool | null> {
    return this.pools.get(name) ?? null;
  }

  async listPools(): Promise<Pool[]> {
    return [...this.pools.values()];
  }

  async createPool(name: string, spec: PoolSpec): Promise<Pool> {
    if (this.pools.has(name)) {
      throw new ConflictError('Pool', name);
    }
    const pool: Pool = { metadata: this.newMetadata(name), spec };
    this.pools.set(name, pool);
    this.notify({ type: 'ADDED', kind: 'Pool', name });
    return pool;
  }

  async replacePoolSpec(name: string, spec: PoolSpec): Promise<Pool> {
    const existing = this.requirePool(name);
    const pool: Pool = { ...existing, metadata: this.bumpGeneration(existing.metadata), spec };
    this.pools.set(name, pool);
    this.notify({ type: 'MODIFIED', kind: 'Pool', name });
    return pool;
  }

  async deletePool(name: string): Promise<void> {
    this.requirePool(name);
    this.pools.delete(name);
    this.notify({ type: 'DELETED', kind: 'Pool', name });
  }

  async updatePoolStatus(pool: Pool): Promise<Pool> {
    const existing = this.requirePool(pool.metadata.name);
    this.checkVersion('Pool', existing.metadata.resourceVersion, pool.metadata.resourceVersion, pool.metadata.name);
    const updated: Pool = {
      ...existing,
      metadata: { ...existing.metadata, resourceVersion: this.nextVersion() },
      status: pool.status
    };
    this.pools.set(updated.metadata.name, updated);
    this.notify({ type: 'MODIFIED', kind: 'Pool', name: updated.metadata.name });
    return updated;
  }

  async getServer(name: string): Promise<Server | null> {
    return this.servers.get(name) ?? null;
  }

  async listServers(): Promise<Server[]> {
    return [...this.servers.values()];
  }

  async createServer(name: string, spec: ServerSpec): Promise<Server> {
    if (this.servers.has(name)) {
      throw new ConflictError('Server', name);
    }
    const server: Server = { metadata: this.newMetadata(name), spec };
    this.servers.set(name, server);
    this.notify({ type: 'ADDED', kind: 'Server', name });
    return server;
  }

  async replaceServerSpec(name: string, spec: ServerSpec): Promise<Server> {
    const existing = this.requireServer(name);
    const server: Server = { ...existing, metadata: this.bumpGeneration(existing.metadata), spec };
    this.servers.set(name, server);
    this.notify({ type: 'MODIFIED', kind: 'Server', name });
    return server;
  }

  async deleteServer(name: string): Promise<void> {
    this.requireServer(name);
    this.servers.delete(name);
    this.notify({ type: 'DELETED', kind: 'Server', name });
  }

  async updateServerStatus(server: Server): Promise<Server> {
    const existing = this.requireServer(server.metadata.name);
    this.checkVersion('Server', existing.metadata.resourceVersion, server.metadata.resourceVersion, server.metadata.name);
    const updated: Server = {
      ...existing,
      metadata: { ...existing.metadata, resourceVersion: this.nextVersion() },
      status: server.status
    };
    this.servers.set(updated.metadata.name, updated);
    this.notify({ type: 'MODIFIED', kind: 'Server', name: updated.metadata.name });
    return updated;
  }

  watch(handler: WatchHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private notify(event: WatchEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }

  private newMetadata(name: string): Pool['metadata'] {
    return {
      name,
      namespace: this.namespace,
      uid: generateId(),
      resourceVersion: this.nextVersion(),
      generation: 1,
      creationTimestamp: this.clock().toISOString()
    };
  }

  private bumpGeneration(metadata: Pool['metadata']): Pool['metadata'] {
    return {
      ...metadata,
      generation: (metadata.generation ?? 0) + 1,
      resourceVersion: this.nextVersion()
    };
  }

  private nextVersion(): string {
    this.revision += 1;
    return String(this.revision);
  }

  private checkVersion(kind: 'Pool' | 'Server', stored: string | undefined, given: string | undefined, name: string): void {
    if (given !== undefined && given !== stored) {
      throw new ConflictError(kind, name);
    }
  }

  private requirePool(name: string): Pool {
    const pool = this.pools.get(name);
    if (!pool) throw new NotFoundError('Pool', name);
    return pool;
  }

  private requireServer(name: string): Server {
    const server = this.servers.get(name);
    if (!server) throw new NotFoundError('Server', name);
    return server;
  }
}
