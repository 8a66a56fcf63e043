/**
 * @fileoverview Test fixtures for controller tests: fake workloads, a settable clock and factories
 */

import { ControllerConfigSchema, LoggerFactory } from '@mcpfleet/shared';
import type { ControllerConfigType } from '@mcpfleet/shared';
import type { Clock, Server, ServerTemplate, WorkloadState } from '@mcpfleet/core';
import { ServerController } from '../controller/server-controller';
import { InMemoryResourceStore } from '../store/memory-store';
import type { WorkloadBinding, WorkloadInspection, WorkloadManager } from '../workload/types';

export const START_TIME = '2025-05-01T10:00:00.000Z';

export class FakeClock {
  current = new Date(START_TIME);

  readonly clock: Clock = () => this.current;

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  iso(): string {
    return this.current.toISOString();
  }
}

interface FakeWorkload {
  state: WorkloadState;
  message?: string;
  template: ServerTemplate;
}

/**
 * In-memory WorkloadManager. Workloads become ready as soon as they are
 * ensured unless `autoReady` is off; errors queued in `ensureErrors` are
 * thrown by successive `ensure` calls. `teardownError` and `inspectError`
 * fail every call while set.
 */
export class FakeWorkloadManager implements WorkloadManager {
  readonly workloads = new Map<string, FakeWorkload>();
  readonly ensureCalls: string[] = [];
  readonly teardownCalls: string[] = [];
  ensureErrors: Error[] = [];
  teardownError?: Error;
  inspectError?: Error;
  autoReady = true;

  async ensure(server: Server, template: ServerTemplate): Promise<WorkloadBinding> {
    const name = server.metadata.name;
    this.ensureCalls.push(name);

    const error = this.ensureErrors.shift();
    if (error) throw error;

    const existing = this.workloads.get(name);
    if (!existing) {
      this.workloads.set(name, { state: this.autoReady ? 'ready' : 'pending', template });
    }
    return this.binding(name, this.workloads.get(name)?.state === 'ready');
  }

  async teardown(name: string): Promise<void> {
    this.teardownCalls.push(name);
    if (this.teardownError) throw this.teardownError;
    this.workloads.delete(name);
  }

  async inspect(name: string): Promise<WorkloadInspection> {
    if (this.inspectError) throw this.inspectError;
    const workload = this.workloads.get(name);
    if (!workload) return { state: 'absent' };
    return {
      state: workload.state,
      binding: this.binding(name, workload.state === 'ready'),
      message: workload.message
    };
  }

  setState(name: string, state: WorkloadState, message?: string): void {
    const workload = this.workloads.get(name);
    if (state === 'absent') {
      this.workloads.delete(name);
    } else if (workload) {
      workload.state = state;
      workload.message = message;
    }
  }

  private binding(serverName: string, ready: boolean): WorkloadBinding {
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
}

export function testControllerConfig(overrides: Partial<ControllerConfigType> = {}): ControllerConfigType {
  return ControllerConfigSchema.parse({
    environment: 'test',
    logLevel: 'silent',
    retryAttempts: 2,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 1,
    requeueBaseDelayMs: 1000,
    readyPollMs: 1000,
    failedRequeueMs: 300000,
    resyncIntervalMs: 0,
    ...overrides
  });
}

export function poolSpec(maxServers = 2, idleTimeout = 60): Record<string, unknown> {
  return {
    maxServers,
    idleTimeout,
    template: { image: 'example/mcp-echo:1.0' }
  };
}

export interface ControllerHarness {
  readonly clock: FakeClock;
  readonly store: InMemoryResourceStore;
  readonly workloads: FakeWorkloadManager;
  readonly controller: ServerController;
}

export function createHarness(config: Partial<ControllerConfigType> = {}): ControllerHarness {
  const clock = new FakeClock();
  const store = new InMemoryResourceStore('default', clock.clock);
  const workloads = new FakeWorkloadManager();
  const controller = new ServerController({
    store,
    workloads,
    config: testControllerConfig(config),
    logger: LoggerFactory.silent(),
    clock: clock.clock
  });
  return { clock, store, workloads, controller };
}

/**
 * Create a server and wait for the controller to settle
 */
export async function createSettledServer(harness: ControllerHarness, name: string, pool: string): Promise<Server> {
  await harness.controller.createServer(name, { pool });
  await harness.controller.drain();
  return harness.controller.getServer(name);
}
