/**
 * @fileoverview Keyed work queue driving reconciliation
 *
 * A key is queued at most once and processed by at most one worker at a
 * time. Keys added while in flight are marked dirty and run again as soon
 * as the current pass finishes.
 */

import { Logger, computeBackoff } from '@mcpfleet/shared';

export interface WorkResult {
  /** Run the key again after this many milliseconds */
  readonly requeueAfterMs?: number;
  /** Run the key again with per-key exponential backoff */
  readonly rateLimited?: boolean;
}

export type WorkHandler = (key: string) => Promise<WorkResult | void>;

export interface WorkQueueConfig {
  readonly concurrency: number;
  readonly rateLimitBaseMs: number;
  readonly rateLimitMaxMs: number;
}

export const DEFAULT_WORK_QUEUE_CONFIG: WorkQueueConfig = {
  concurrency: 4,
  rateLimitBaseMs: 1000,
  rateLimitMaxMs: 60000
};

export interface WorkQueueStats {
  readonly queued: number;
  readonly processing: number;
  readonly delayed: number;
}

interface DelayedEntry {
  readonly timer: NodeJS.Timeout;
  readonly dueAt: number;
}

export class WorkQueue {
  private readonly config: WorkQueueConfig;
  private readonly queue: string[] = [];
  private readonly queued = new Set<string>();
  private readonly processing = new Set<string>();
  private readonly dirty = new Set<string>();
  private readonly delayed = new Map<string, DelayedEntry>();
  private readonly failures = new Map<string, number>();
  private idleWaiters: Array<() => void> = [];
  private shuttingDown = false;

  constructor(
    private readonly handler: WorkHandler,
    private readonly logger: Logger,
    config: Partial<WorkQueueConfig> = {}
  ) {
    this.config = { ...DEFAULT_WORK_QUEUE_CONFIG, ...config };
  }

  add(key: string): void {
    if (this.shuttingDown) return;

    if (this.processing.has(key)) {
      this.dirty.add(key);
      return;
    }
    if (this.queued.has(key)) return;

    this.queued.add(key);
    this.queue.push(key);
    this.pump();
  }

  /**
   * Schedule `key`; an earlier pending schedule for the same key wins
   */
  addAfter(key: string, delayMs: number): void {
    if (this.shuttingDown) return;
    if (delayMs <= 0) {
      this.add(key);
      return;
    }

    const dueAt = Date.now() + delayMs;
    const existing = this.delayed.get(key);
    if (existing) {
      if (existing.dueAt <= dueAt) return;
      clearTimeout(existing.timer);
    }

    const timer = setTimeout(() => {
      this.delayed.delete(key);
      this.add(key);
    }, delayMs);
    timer.unref();
    this.delayed.set(key, { timer, dueAt });
  }

  addRateLimited(key: string): void {
    const attempt = (this.failures.get(key) ?? 0) + 1;
    this.failures.set(key, attempt);
    const delay = computeBackoff(attempt, {
      baseDelay: this.config.rateLimitBaseMs,
      maxDelay: this.config.rateLimitMaxMs
    });
    this.logger.debug('Requeueing with backoff', { component: 'work-queue', key, attempt, delay });
    this.addAfter(key, delay);
  }

  /**
   * Reset the backoff for `key`
   */
  forget(key: string): void {
    this.failures.delete(key);
  }

  stats(): WorkQueueStats {
    return { queued: this.queue.length, processing: this.processing.size, delayed: this.delayed.size };
  }

  /**
   * Resolve once nothing is queued or in flight. Delayed keys are not waited for.
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting work, drop delayed keys and wait for in-flight passes
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    for (const entry of this.delayed.values()) {
      clearTimeout(entry.timer);
    }
    this.delayed.clear();
    this.queue.splice(0);
    this.queued.clear();
    this.dirty.clear();
    await this.drain();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.processing.size === 0;
  }

  private pump(): void {
    while (this.processing.size < this.config.concurrency && this.queue.length > 0) {
      const key = this.queue.shift();
      if (key === undefined) break;
      this.queued.delete(key);
      this.processing.add(key);
      this.process(key).catch((error: unknown) => {
        this.logger.error(error instanceof Error ? error : new Error(String(error)), 'Work queue failure', {
          component: 'work-queue',
          key
        });
      });
    }
  }

  private async process(key: string): Promise<void> {
    try {
      const result = await this.handler(key);
      if (result?.rateLimited) {
        this.addRateLimited(key);
      } else {
        this.forget(key);
        if (result?.requeueAfterMs !== undefined) {
          this.addAfter(key, result.requeueAfterMs);
        }
      }
    } catch (error) {
      this.logger.warn(error instanceof Error ? error : new Error(String(error)), 'Reconcile failed', {
        component: 'work-queue',
        key
      });
      this.addRateLimited(key);
    } finally {
      this.processing.delete(key);
      if (this.dirty.delete(key)) {
        this.add(key);
      }
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
