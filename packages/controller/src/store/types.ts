/**
 * @fileoverview Persistence contract for pools and servers
 */

import type { Pool, PoolSpec, Server, ServerSpec } from '@mcpfleet/core';

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED';

export interface WatchEvent {
  readonly type: WatchEventType;
  readonly kind: 'Pool' | 'Server';
  readonly name: string;
}

export type WatchHandler = (event: WatchEvent) => void;

/**
 * Durable record of desired and observed state. Reads return null for
 * absent objects; writes raise ConflictError on stale resourceVersions.
 */
export interface ResourceStore {
  getPool(name: string): Promise<Pool | null>;
  listPools(): Promise<Pool[]>;
  createPool(name: string, spec: PoolSpec): Promise<Pool>;
  replacePoolSpec(name: string, spec: PoolSpec): Promise<Pool>;
  deletePool(name: string): Promise<void>;
  updatePoolStatus(pool: Pool): Promise<Pool>;

  getServer(name: string): Promise<Server | null>;
  listServers(): Promise<Server[]>;
  createServer(name: string, spec: ServerSpec): Promise<Server>;
  replaceServerSpec(name: string, spec: ServerSpec): Promise<Server>;
  deleteServer(name: string): Promise<void>;
  updateServerStatus(server: Server): Promise<Server>;

  /**
   * Subscribe to changes; returns the unsubscribe function
   */
  watch(handler: WatchHandler): () => void;
}
