/**
 * @fileoverview Server lifecycle rules
 *
 * Everything here is pure: the controller gathers the current record, the
 * observed workload state and the clock, asks `decide` what to do next, and
 * performs the returned action. One decision moves a server at most one
 * phase; the controller loops until it gets `none` or `wait`.
 */

import type { Pool, Server, ServerStatus } from '../types/resources';
import {
  ConditionReason,
  ConditionType,
  DEFAULT_IDLE_TIMEOUT_SECONDS,
  ServerPhase
} from '../types/resources';
import { elapsedMs } from '../types/common';
import { getCondition } from './conditions';

/**
 * Workload state as reported by the substrate
 */
export type WorkloadState = 'absent' | 'pending' | 'ready' | 'failed' | 'terminating';

/**
 * Phases during which a workload is bound to the server
 */
const WORKLOAD_PHASES: ReadonlySet<ServerPhase> = new Set([
  ServerPhase.STARTING,
  ServerPhase.RUNNING,
  ServerPhase.IDLE,
  ServerPhase.STOPPING
]);

/**
 * Phases that occupy a slot in the pool
 */
const CAPACITY_PHASES: ReadonlySet<ServerPhase> = new Set([
  ServerPhase.STARTING,
  ServerPhase.RUNNING,
  ServerPhase.IDLE
]);

/**
 * Failure reasons; the first two only clear when the server spec changes
 */
const FAILURE_REASONS: ReadonlySet<ConditionReason> = new Set([
  ConditionReason.POOL_NOT_FOUND,
  ConditionReason.INVALID_SPEC,
  ConditionReason.RETRIES_EXHAUSTED,
  ConditionReason.WORKLOAD_FAILED
]);

const TERMINAL_REASONS: ReadonlySet<ConditionReason> = new Set([
  ConditionReason.POOL_NOT_FOUND,
  ConditionReason.INVALID_SPEC
]);

export function holdsWorkload(phase: ServerPhase): boolean {
  return WORKLOAD_PHASES.has(phase);
}

export function countsTowardCapacity(phase: ServerPhase): boolean {
  return CAPACITY_PHASES.has(phase);
}

export function isFailureReason(reason: ConditionReason): boolean {
  return FAILURE_REASONS.has(reason);
}

export function isTerminalReason(reason: ConditionReason): boolean {
  return TERMINAL_REASONS.has(reason);
}

/**
 * Most recent sign of life: last request, else start, else creation
 */
export function lastActivityAt(status: ServerStatus): string {
  return status.lastRequestAt ?? status.startedAt ?? status.createdAt;
}

export function resolveIdleTimeoutMs(server: Server, pool: Pool | null): number {
  const seconds = server.spec.idleTimeout && server.spec.idleTimeout > 0
    ? server.spec.idleTimeout
    : pool?.spec.idleTimeout ?? DEFAULT_IDLE_TIMEOUT_SECONDS;
  return seconds * 1000;
}

export function isIdle(status: ServerStatus, idleTimeoutMs: number, now: Date): boolean {
  return elapsedMs(lastActivityAt(status), now) >= idleTimeoutMs;
}

export function msUntilIdle(status: ServerStatus, idleTimeoutMs: number, now: Date): number {
  return Math.max(0, idleTimeoutMs - elapsedMs(lastActivityAt(status), now));
}

/**
 * Servers run unless someone or something asked them to stay down
 */
export function isDesiredRunning(status: ServerStatus): boolean {
  return getCondition(status.conditions, ConditionType.REQUESTED)?.status !== 'False';
}

/**
 * Longest-idle server first; ties broken by name so the choice is stable
 */
export function pickEvictionCandidate<T extends { readonly name: string; readonly status: ServerStatus }>(
  candidates: readonly T[]
): T | undefined {
  return [...candidates].sort((a, b) => {
    const diff = Date.parse(lastActivityAt(a.status)) - Date.parse(lastActivityAt(b.status));
    return diff !== 0 ? diff : a.name.localeCompare(b.name);
  })[0];
}

export interface LifecycleTiming {
  readonly readyPollMs: number;
  readonly failedRequeueMs: number;
  /** 0 disables deletion of long-stopped servers */
  readonly terminalIdleMs: number;
}

export interface LifecycleInput {
  readonly generation?: number;
  readonly status: ServerStatus;
  readonly poolExists: boolean;
  readonly workload: WorkloadState;
  readonly workloadMessage?: string;
  readonly idleTimeoutMs: number;
  readonly now: Date;
  readonly timing: LifecycleTiming;
}

export type LifecycleDecision =
  | { readonly action: 'none'; readonly requeueAfterMs?: number }
  | {
      readonly action: 'transition';
      readonly phase: ServerPhase;
      readonly reason: ConditionReason;
      readonly message?: string;
    }
  | { readonly action: 'admit' }
  | { readonly action: 'ensure' }
  | { readonly action: 'teardown'; readonly reason: ConditionReason; readonly message?: string }
  | { readonly action: 'wait'; readonly requeueAfterMs: number }
  | { readonly action: 'delete' };

const NONE: LifecycleDecision = { action: 'none' };

function transition(phase: ServerPhase, reason: ConditionReason, message?: string): LifecycleDecision {
  return message === undefined
    ? { action: 'transition', phase, reason }
    : { action: 'transition', phase, reason, message };
}

function teardown(reason: ConditionReason, message?: string): LifecycleDecision {
  return message === undefined ? { action: 'teardown', reason } : { action: 'teardown', reason, message };
}

/**
 * Reason recorded on the Ready condition, if any
 */
export function readyReason(status: ServerStatus): ConditionReason | undefined {
  return getCondition(status.conditions, ConditionType.READY)?.reason;
}

/**
 * Whether a Failed server may go back to Pending: always after a spec change,
 * otherwise only for failures outside the pool and spec once
 * `failedRequeueMs` has passed
 */
export function canRecover(
  status: ServerStatus,
  generation: number | undefined,
  failedRequeueMs: number,
  now: Date
): boolean {
  if (generation !== undefined && generation !== status.observedGeneration) return true;
  const reason = readyReason(status) ?? ConditionReason.RETRIES_EXHAUSTED;
  if (isTerminalReason(reason) || !isDesiredRunning(status)) return false;
  return elapsedMs(status.failedAt ?? status.createdAt, now) >= failedRequeueMs;
}

/**
 * Next step for one server
 */
export function decide(input: LifecycleInput): LifecycleDecision {
  const { status, workload, now, timing } = input;
  const desired = isDesiredRunning(status);
  const poll: LifecycleDecision = { action: 'wait', requeueAfterMs: timing.readyPollMs };

  switch (status.phase) {
    case ServerPhase.FAILED:
      return decideFailed(input, desired);

    case ServerPhase.STOPPING: {
      if (workload === 'absent') {
        const reason = readyReason(status);
        return reason && isFailureReason(reason)
          ? transition(ServerPhase.FAILED, reason, status.failureReason)
          : transition(ServerPhase.STOPPED, ConditionReason.STOPPED);
      }
      return workload === 'terminating' ? poll : teardown(readyReason(status) ?? ConditionReason.STOPPED, status.failureReason);
    }

    case ServerPhase.STOPPED: {
      if (workload !== 'absent') return teardown(ConditionReason.STOPPED);
      if (desired) return transition(ServerPhase.PENDING, ConditionReason.WORKLOAD_PENDING);
      if (timing.terminalIdleMs > 0 && status.stoppedAt) {
        const remaining = timing.terminalIdleMs - elapsedMs(status.stoppedAt, now);
        return remaining <= 0 ? { action: 'delete' } : { action: 'none', requeueAfterMs: remaining };
      }
      return NONE;
    }

    default:
      break;
  }

  // Pending, Starting, Running and Idle all need the pool.
  if (!input.poolExists) {
    return workload === 'absent'
      ? transition(ServerPhase.FAILED, ConditionReason.POOL_NOT_FOUND, 'pool not found')
      : teardown(ConditionReason.POOL_NOT_FOUND, 'pool not found');
  }

  switch (status.phase) {
    case ServerPhase.PENDING:
      if (!desired) {
        return workload === 'absent'
          ? transition(ServerPhase.STOPPED, ConditionReason.STOPPED)
          : teardown(ConditionReason.STOPPED);
      }
      if (workload === 'failed' || workload === 'terminating') {
        return teardown(ConditionReason.WORKLOAD_LOST, input.workloadMessage);
      }
      return { action: 'admit' };

    case ServerPhase.STARTING:
      if (!desired) return transition(ServerPhase.STOPPING, ConditionReason.STOPPED);
      switch (workload) {
        case 'ready':
          return transition(ServerPhase.RUNNING, ConditionReason.WORKLOAD_READY);
        case 'absent':
          return { action: 'ensure' };
        case 'failed':
          return teardown(ConditionReason.WORKLOAD_FAILED, input.workloadMessage ?? 'workload failed');
        default:
          return poll;
      }

    case ServerPhase.RUNNING:
    case ServerPhase.IDLE: {
      if (!desired) return transition(ServerPhase.STOPPING, ConditionReason.STOPPED);
      if (workload !== 'ready') {
        return transition(
          ServerPhase.STARTING,
          workload === 'pending' ? ConditionReason.WORKLOAD_PENDING : ConditionReason.WORKLOAD_LOST,
          input.workloadMessage
        );
      }
      const idle = isIdle(status, input.idleTimeoutMs, now);
      if (status.phase === ServerPhase.RUNNING && idle) {
        return transition(ServerPhase.IDLE, ConditionReason.WORKLOAD_READY);
      }
      if (status.phase === ServerPhase.IDLE && !idle) {
        return transition(ServerPhase.RUNNING, ConditionReason.WORKLOAD_READY);
      }
      return status.phase === ServerPhase.RUNNING
        ? { action: 'none', requeueAfterMs: msUntilIdle(status, input.idleTimeoutMs, now) }
        : NONE;
    }

    default:
      return NONE;
  }
}

function decideFailed(input: LifecycleInput, desired: boolean): LifecycleDecision {
  const { status, workload, now, timing } = input;
  const reason = readyReason(status) ?? ConditionReason.RETRIES_EXHAUSTED;

  if (workload === 'terminating') return { action: 'wait', requeueAfterMs: timing.readyPollMs };
  if (workload !== 'absent') return teardown(reason, status.failureReason);

  if (canRecover(status, input.generation, timing.failedRequeueMs, now)) {
    return transition(ServerPhase.PENDING, ConditionReason.WORKLOAD_PENDING);
  }
  if (isTerminalReason(reason) || !desired) return NONE;

  return { action: 'none', requeueAfterMs: timing.failedRequeueMs - elapsedMs(status.failedAt ?? status.createdAt, now) };
}
