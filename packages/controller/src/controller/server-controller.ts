/**
 * @fileoverview Reconciliation controller for MCP servers and their pools
 *
 * Every change to a server, its pool or its activity counters enqueues the
 * server's name. A pass reads the record, inspects the workload, asks the
 * lifecycle rules for the next step and performs it, repeating until the
 * server reaches a stable point or has to wait.
 */

import {
  ConditionReason,
  ConditionType,
  ConflictError,
  InvalidSpecError,
  NotFoundError,
  OperationCancelledError,
  ResourceNameSchema,
  ServerPhase,
  countsTowardCapacity,
  decide,
  isDesiredRunning,
  isRetryable,
  parseOrThrow,
  parsePoolSpec,
  parseServerSpec,
  pickEvictionCandidate,
  resolveIdleTimeoutMs,
  resolveTemplate,
  setCondition,
  statusOf,
  systemClock
} from '@mcpfleet/core';
import type {
  Clock,
  ConditionStatus,
  LifecycleTiming,
  Pool,
  Server,
  ServerStatus
} from '@mcpfleet/core';
import { EventManager, Logger, retry } from '@mcpfleet/shared';
import type { ControllerConfigType, RetryOptions } from '@mcpfleet/shared';
import { ActivityTracker } from '../activity/activity-tracker';
import type { ActivitySnapshot } from '../activity/activity-tracker';
import { WorkQueue } from '../queue/work-queue';
import type { WorkResult } from '../queue/work-queue';
import type { ResourceStore, WatchEvent } from '../store/types';
import type { WorkloadBinding, WorkloadInspection, WorkloadManager } from '../workload/types';
import { SERVER_DELETED_EVENT, SERVER_PHASE_EVENT } from './events';
import type { ServerDeletedEvent, ServerPhaseEvent } from './events';
import { KeyedMutex } from './keyed-mutex';
import { foldActivity, statusEquals, transitionStatus } from './status';

const MAX_STEPS = 10;
const MAX_CONFLICT_RETRIES = 3;

export interface ServerControllerOptions {
  readonly store: ResourceStore;
  readonly workloads: WorkloadManager;
  readonly config: ControllerConfigType;
  readonly logger: Logger;
  readonly clock?: Clock;
  readonly events?: EventManager;
  readonly activity?: ActivityTracker;
}

/**
 * Mutable state of one reconcile pass
 */
interface PassState {
  server: Server;
  status: ServerStatus;
  /** What the stored record is compared against while it has no status */
  readonly initial: ServerStatus;
  readonly snapshot: ActivitySnapshot;
  committed: boolean;
  /** Set once the record is gone or the pass was cancelled; suppresses writes */
  abandoned: boolean;
}

export class ServerController {
  readonly events: EventManager;

  private readonly store: ResourceStore;
  private readonly workloads: WorkloadManager;
  private readonly config: ControllerConfigType;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly activity: ActivityTracker;
  private readonly timing: LifecycleTiming;
  private readonly queue: WorkQueue;
  private readonly locks = new KeyedMutex();
  private readonly aborts = new Map<string, AbortController>();

  private unwatch?: () => void;
  private resyncTimer?: NodeJS.Timeout;
  private running = false;

  constructor(options: ServerControllerOptions) {
    this.store = options.store;
    this.workloads = options.workloads;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'server-controller' });
    this.clock = options.clock ?? systemClock;
    this.activity = options.activity ?? new ActivityTracker();
    this.events = options.events ?? new EventManager('controller', {}, this.logger);
    this.timing = {
      readyPollMs: this.config.readyPollMs,
      failedRequeueMs: this.config.failedRequeueMs,
      terminalIdleMs: this.config.terminalIdleMs
    };
    this.queue = new WorkQueue(key => this.reconcile(key), this.logger, {
      concurrency: this.config.concurrency,
      rateLimitBaseMs: this.config.requeueBaseDelayMs,
      rateLimitMaxMs: this.config.requeueMaxDelayMs
    });
  }

  /**
   * Watch the store, enqueue every server and start the periodic resync
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.unwatch = this.store.watch(event => this.handleWatchEvent(event));
    await this.resync();

    if (this.config.resyncIntervalMs > 0) {
      this.resyncTimer = setInterval(() => {
        this.resync().catch((error: unknown) => {
          this.logger.error(error instanceof Error ? error : new Error(String(error)), 'Resync failed');
        });
      }, this.config.resyncIntervalMs);
    }

    this.logger.info('Controller started', {
      namespace: this.config.namespace,
      concurrency: this.config.concurrency
    });
  }

  async stop(): Promise<void> {
    this.unwatch?.();
    this.unwatch = undefined;
    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = undefined;
    }
    for (const controller of this.aborts.values()) {
      controller.abort();
    }
    this.aborts.clear();
    await this.queue.shutdown();
    this.running = false;
    this.logger.info('Controller stopped');
  }

  /**
   * Resolve once no reconcile is queued or running
   */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  // Pools

  async createPool(name: string, spec: unknown): Promise<Pool> {
    parseOrThrow(ResourceNameSchema, name, 'pool name');
    const pool = await this.store.createPool(name, parsePoolSpec(spec));
    this.logger.info('Pool created', { pool: name, maxServers: pool.spec.maxServers });
    return pool;
  }

  async getPool(name: string): Promise<Pool> {
    const pool = await this.store.getPool(name);
    if (!pool) throw new NotFoundError('Pool', name);
    return pool;
  }

  listPools(): Promise<Pool[]> {
    return this.store.listPools();
  }

  async updatePool(name: string, spec: unknown): Promise<Pool> {
    const pool = await this.store.replacePoolSpec(name, parsePoolSpec(spec));
    await this.enqueuePoolMembers(name);
    this.logger.info('Pool updated', { pool: name, generation: pool.metadata.generation });
    return pool;
  }

  async deletePool(name: string): Promise<void> {
    await this.store.deletePool(name);
    await this.enqueuePoolMembers(name);
    this.logger.info('Pool deleted', { pool: name });
  }

  /**
   * Pool a server belongs to, or null when it does not exist
   */
  getPoolFor(server: Server): Promise<Pool | null> {
    return this.store.getPool(server.spec.pool);
  }

  // Servers

  async listServers(pool?: string): Promise<Server[]> {
    const servers = await this.store.listServers();
    return pool === undefined ? servers : servers.filter(server => server.spec.pool === pool);
  }

  async getServer(name: string): Promise<Server> {
    const server = await this.store.getServer(name);
    if (!server) throw new NotFoundError('Server', name);
    return server;
  }

  async createServer(name: string, spec: unknown): Promise<Server> {
    parseOrThrow(ResourceNameSchema, name, 'server name');
    const server = await this.store.createServer(name, parseServerSpec(spec));
    this.logger.info('Server created', { server: name, pool: server.spec.pool });
    this.queue.add(name);
    return server;
  }

  /**
   * Replace a server's spec. The generation change lets a Failed server retry.
   */
  async updateServer(name: string, spec: unknown): Promise<Server> {
    const server = await this.store.replaceServerSpec(name, parseServerSpec(spec));
    this.logger.info('Server updated', { server: name, pool: server.spec.pool, generation: server.metadata.generation });
    this.queue.add(name);
    return server;
  }

  async deleteServer(name: string): Promise<void> {
    this.cancelInFlight(name);
    await this.store.deleteServer(name);
    this.logger.info('Server deleted', { server: name });
    this.queue.add(name);
  }

  startServer(name: string): Promise<Server> {
    return this.setRequested(name, 'True', ConditionReason.MANUAL_START);
  }

  stopServer(name: string): Promise<Server> {
    return this.setRequested(name, 'False', ConditionReason.MANUAL_STOP);
  }

  async getBinding(name: string): Promise<WorkloadBinding | undefined> {
    return (await this.workloads.inspect(name)).binding;
  }

  // Activity reported by the transport bridge

  notifyConnect(name: string): void {
    this.activity.connect(name, this.clock());
    this.queue.add(name);
  }

  notifyDisconnect(name: string): void {
    this.activity.disconnect(name);
    this.queue.add(name);
  }

  notifyRequest(name: string): void {
    this.activity.recordRequest(name, this.clock());
    this.queue.add(name);
  }

  // Reconciliation

  /**
   * One reconcile pass for `name`. Passes for the same server never overlap.
   */
  reconcile(name: string): Promise<WorkResult> {
    return this.locks.run(name, async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          return await this.reconcileOnce(name);
        } catch (error) {
          if (error instanceof ConflictError && attempt < MAX_CONFLICT_RETRIES) {
            this.logger.debug('Status conflict, re-reading', { server: name, attempt });
            continue;
          }
          throw error;
        }
      }
    });
  }

  private async reconcileOnce(name: string): Promise<WorkResult> {
    const server = await this.store.getServer(name);
    if (!server) {
      await this.finalizeDeleted(name);
      return {};
    }

    const pool = await this.store.getPool(server.spec.pool);
    const initial = statusOf(server, this.clock());
    const snapshot = this.activity.snapshot(name);
    const state: PassState = {
      server,
      status: foldActivity(initial, snapshot),
      initial,
      snapshot,
      committed: false,
      abandoned: false
    };
    const signal = this.signalFor(name);

    let result: WorkResult = { requeueAfterMs: this.config.readyPollMs };
    try {
      for (let step = 0; step < MAX_STEPS; step++) {
        const outcome = await this.step(state, pool, signal);
        if (outcome) {
          result = outcome;
          break;
        }
      }
    } catch (error) {
      if (error instanceof ConflictError) throw error;
      result = await this.recordFailure(state, error);
    }

    await this.persist(state, state.status);
    await this.afterPass(server.spec.pool);
    return result;
  }

  /**
   * Perform one lifecycle decision. Returns the pass result once the server
   * is stable or waiting, undefined to keep going.
   */
  private async step(state: PassState, pool: Pool | null, signal: AbortSignal): Promise<WorkResult | undefined> {
    const name = state.server.metadata.name;
    const generation = state.server.metadata.generation;
    const inspection = await this.inspectWorkload(name, signal);
    const now = this.clock();

    const decision = decide({
      generation,
      status: state.status,
      poolExists: pool !== null,
      workload: inspection.state,
      workloadMessage: inspection.message,
      idleTimeoutMs: resolveIdleTimeoutMs(state.server, pool),
      now,
      timing: this.timing
    });
    this.logger.trace('Lifecycle decision', {
      server: name,
      phase: state.status.phase,
      workload: inspection.state,
      action: decision.action
    });

    switch (decision.action) {
      case 'none':
        return decision.requeueAfterMs === undefined ? {} : { requeueAfterMs: decision.requeueAfterMs };

      case 'wait':
        return { requeueAfterMs: decision.requeueAfterMs };

      case 'transition':
        await this.persist(state, transitionStatus(state.status, decision, now, generation));
        return undefined;

      case 'admit':
        return this.admit(state, this.requirePool(pool, state.server), now);

      case 'ensure':
        return this.ensure(state, this.requirePool(pool, state.server), signal);

      case 'teardown': {
        const stopping = state.status.phase === ServerPhase.STOPPING
          ? state.status
          : transitionStatus(
              state.status,
              { phase: ServerPhase.STOPPING, reason: decision.reason, message: decision.message },
              now,
              generation
            );
        await this.persist(state, stopping);
        await this.teardownWorkload(name, signal);
        return undefined;
      }

      case 'delete':
        await this.store.deleteServer(name);
        state.abandoned = true;
        this.logger.info('Deleted long-stopped server', { server: name });
        return {};
    }
  }

  /**
   * A step failed past its retries: mark the server Failed with the cause
   */
  private async recordFailure(state: PassState, error: unknown): Promise<WorkResult> {
    const name = state.server.metadata.name;
    if (error instanceof OperationCancelledError) {
      this.logger.debug('Reconcile pass cancelled', { server: name });
      state.abandoned = true;
      return {};
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(failure, 'Reconcile step failed', { server: name, phase: state.status.phase });
    await this.persist(
      state,
      transitionStatus(
        state.status,
        { phase: ServerPhase.FAILED, reason: ConditionReason.RETRIES_EXHAUSTED, message: failure.message },
        this.clock(),
        state.server.metadata.generation
      )
    );
    return { requeueAfterMs: this.config.failedRequeueMs };
  }

  /**
   * Claim a slot in the pool or wait for one
   */
  private async admit(state: PassState, pool: Pool, now: Date): Promise<WorkResult | undefined> {
    const name = state.server.metadata.name;
    const poolName = pool.metadata.name;
    const members = (await this.store.listServers()).filter(
      server => server.spec.pool === poolName && server.metadata.name !== name
    );
    const active = members.filter(server => countsTowardCapacity(statusOf(server, now).phase)).length;

    if (active >= pool.spec.maxServers) {
      const conditions = setCondition(
        state.status.conditions,
        ConditionType.CAPACITY_EXCEEDED,
        'True',
        ConditionReason.POOL_AT_CAPACITY,
        now,
        `pool ${poolName} is at capacity (${pool.spec.maxServers})`
      );
      await this.persist(state, { ...state.status, conditions });

      const victim = pickEvictionCandidate(
        members
          .map(server => ({ name: server.metadata.name, status: statusOf(server, now) }))
          .filter(candidate => candidate.status.phase === ServerPhase.IDLE && isDesiredRunning(candidate.status))
      );
      if (victim) {
        this.logger.info('Evicting idle server to make room', { server: victim.name, pool: poolName, for: name });
        await this.setRequested(victim.name, 'False', ConditionReason.EVICTION);
      } else {
        this.logger.debug('Pool at capacity', { server: name, pool: poolName, active });
      }
      return { rateLimited: true };
    }

    const conditions = setCondition(
      state.status.conditions,
      ConditionType.CAPACITY_EXCEEDED,
      'False',
      ConditionReason.ADMITTED,
      now
    );
    await this.persist(
      state,
      transitionStatus(
        { ...state.status, conditions },
        { phase: ServerPhase.STARTING, reason: ConditionReason.WORKLOAD_PENDING },
        now,
        state.server.metadata.generation
      )
    );
    return undefined;
  }

  /**
   * Create the workload, retrying transient substrate failures
   */
  private async ensure(state: PassState, pool: Pool, signal: AbortSignal): Promise<WorkResult | undefined> {
    const name = state.server.metadata.name;
    const template = resolveTemplate(state.server, pool);

    try {
      const binding = await retry(() => this.workloads.ensure(state.server, template), {
        ...this.retryOptions(signal),
        onRetry: (error, attempt, delay) => {
          this.logger.warn(error, 'Workload ensure failed, retrying', { server: name, attempt, delay });
        }
      });
      await this.persist(state, { ...state.status, endpoint: binding.endpoint });
      return undefined;
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        this.logger.debug('Workload ensure cancelled', { server: name });
        state.abandoned = true;
        return {};
      }

      const failure = error instanceof Error ? error : new Error(String(error));
      const reason = failure instanceof InvalidSpecError
        ? ConditionReason.INVALID_SPEC
        : ConditionReason.RETRIES_EXHAUSTED;
      this.logger.error(failure, 'Workload could not be started', { server: name, reason });

      await this.teardownWorkload(name, signal);
      await this.persist(
        state,
        transitionStatus(
          state.status,
          { phase: ServerPhase.FAILED, reason, message: failure.message },
          this.clock(),
          state.server.metadata.generation
        )
      );
      return undefined;
    }
  }

  private retryOptions(signal?: AbortSignal): RetryOptions {
    return {
      attempts: this.config.retryAttempts,
      delay: this.config.retryBaseDelayMs,
      maxDelay: this.config.retryMaxDelayMs,
      shouldRetry: isRetryable,
      signal
    };
  }

  private inspectWorkload(name: string, signal: AbortSignal): Promise<WorkloadInspection> {
    return retry(() => this.workloads.inspect(name), this.retryOptions(signal));
  }

  private teardownWorkload(name: string, signal?: AbortSignal): Promise<void> {
    return retry(() => this.workloads.teardown(name), this.retryOptions(signal));
  }

  /**
   * Write `next` unless it equals what is stored; commits folded activity and
   * announces phase changes
   */
  private async persist(state: PassState, next: ServerStatus): Promise<void> {
    if (state.abandoned) return;

    const stored = state.server.status ?? state.initial;
    if (statusEquals(stored, next)) {
      state.status = next;
      return;
    }

    const name = state.server.metadata.name;
    const update: Server = { ...state.server, status: next };
    // A stale resourceVersion is settled by re-reading, not by resending
    state.server = await retry(() => this.store.updateServerStatus(update), {
      ...this.retryOptions(),
      shouldRetry: error => !(error instanceof ConflictError) && isRetryable(error)
    });
    state.status = next;

    if (!state.committed) {
      this.activity.commit(name, state.snapshot);
      state.committed = true;
    }

    if (stored.phase !== next.phase) {
      this.logger.info('Server phase changed', { server: name, phase: next.phase, previous: stored.phase });
      const event: ServerPhaseEvent = { name, phase: next.phase, previous: stored.phase };
      this.events.emitEvent(SERVER_PHASE_EVENT, event, 'controller');
    }
  }

  /**
   * Pool-level bookkeeping after a pass: over-admission and pool status
   */
  private async afterPass(poolName: string): Promise<void> {
    const pool = await this.store.getPool(poolName);
    if (!pool) return;

    const now = this.clock();
    const members = (await this.store.listServers()).filter(server => server.spec.pool === poolName);
    await this.correctOverAdmission(pool, members, now);
    await this.refreshPoolStatus(pool, members, now);
  }

  private async correctOverAdmission(pool: Pool, members: readonly Server[], now: Date): Promise<void> {
    const active = members
      .map(server => ({ name: server.metadata.name, status: statusOf(server, now) }))
      .filter(member => countsTowardCapacity(member.status.phase) && isDesiredRunning(member.status));
    if (active.length <= pool.spec.maxServers) return;

    const victim = pickEvictionCandidate(
      active.filter(member => member.status.phase === ServerPhase.RUNNING || member.status.phase === ServerPhase.IDLE)
    );
    if (!victim) return;

    this.logger.warn('Pool over capacity, evicting', {
      pool: pool.metadata.name,
      server: victim.name,
      active: active.length,
      maxServers: pool.spec.maxServers
    });
    await this.setRequested(victim.name, 'False', ConditionReason.EVICTION);
  }

  private async refreshPoolStatus(pool: Pool, members: readonly Server[], now: Date): Promise<void> {
    const phases = members.map(server => statusOf(server, now).phase);
    const activeServers = phases.filter(countsTowardCapacity).length;
    const pendingServers = phases.filter(phase => phase === ServerPhase.PENDING).length;
    const totalServers = members.length;

    const current = pool.status;
    if (
      current &&
      current.activeServers === activeServers &&
      current.pendingServers === pendingServers &&
      current.totalServers === totalServers &&
      current.observedGeneration === pool.metadata.generation
    ) {
      return;
    }

    try {
      await this.store.updatePoolStatus({
        ...pool,
        status: {
          activeServers,
          pendingServers,
          totalServers,
          lastReconciledAt: now.toISOString(),
          observedGeneration: pool.metadata.generation
        }
      });
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      this.logger.debug('Pool status conflict, next pass will retry', { pool: pool.metadata.name });
    }
  }

  /**
   * Set the Requested condition and enqueue the server
   */
  private async setRequested(name: string, value: ConditionStatus, reason: ConditionReason): Promise<Server> {
    for (let attempt = 1; ; attempt++) {
      const server = await this.getServer(name);
      const now = this.clock();
      const status = statusOf(server, now);
      const next: ServerStatus = {
        ...status,
        conditions: setCondition(status.conditions, ConditionType.REQUESTED, value, reason, now)
      };

      if (server.status && statusEquals(server.status, next)) {
        this.queue.add(name);
        return server;
      }

      try {
        const updated = await this.store.updateServerStatus({ ...server, status: next });
        this.logger.info('Server run request changed', { server: name, requested: value, reason });
        this.queue.add(name);
        return updated;
      } catch (error) {
        if (error instanceof ConflictError && attempt < MAX_CONFLICT_RETRIES) continue;
        throw error;
      }
    }
  }

  private async finalizeDeleted(name: string): Promise<void> {
    this.cancelInFlight(name);
    await this.teardownWorkload(name);
    this.activity.forget(name);
    this.queue.forget(name);

    const event: ServerDeletedEvent = { name };
    this.events.emitEvent(SERVER_DELETED_EVENT, event, 'controller');
    this.logger.debug('Server record gone, workload released', { server: name });
  }

  private requirePool(pool: Pool | null, server: Server): Pool {
    if (!pool) throw new NotFoundError('Pool', server.spec.pool);
    return pool;
  }

  private signalFor(name: string): AbortSignal {
    let controller = this.aborts.get(name);
    if (!controller || controller.signal.aborted) {
      controller = new AbortController();
      this.aborts.set(name, controller);
    }
    return controller.signal;
  }

  private cancelInFlight(name: string): void {
    const controller = this.aborts.get(name);
    if (controller) {
      controller.abort();
      this.aborts.delete(name);
    }
  }

  private handleWatchEvent(event: WatchEvent): void {
    if (event.kind === 'Server') {
      if (event.type === 'DELETED') {
        this.cancelInFlight(event.name);
      }
      this.queue.add(event.name);
      return;
    }

    this.enqueuePoolMembers(event.name).catch((error: unknown) => {
      this.logger.error(error instanceof Error ? error : new Error(String(error)), 'Failed to enqueue pool members', {
        pool: event.name
      });
    });
  }

  private async enqueuePoolMembers(poolName: string): Promise<void> {
    for (const server of await this.store.listServers()) {
      if (server.spec.pool === poolName) {
        this.queue.add(server.metadata.name);
      }
    }
  }

  private async resync(): Promise<void> {
    const servers = await this.store.listServers();
    for (const server of servers) {
      this.queue.add(server.metadata.name);
    }
    this.logger.debug('Resync enqueued servers', { count: servers.length });
  }
}
