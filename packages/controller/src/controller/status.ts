/**
 * @fileoverview Pure helpers that derive the next stored server status
 */

import {
  ConditionType,
  ServerPhase,
  isFailureReason,
  setCondition
} from '@mcpfleet/core';
import type { ConditionReason, ServerStatus } from '@mcpfleet/core';
import type { ActivitySnapshot } from '../activity/activity-tracker';
import { isRecord } from '../kube/errors';

export interface PhaseChange {
  readonly phase: ServerPhase;
  readonly reason: ConditionReason;
  readonly message?: string;
}

/**
 * Status after moving to `change.phase`. The Ready condition carries the
 * reason; timestamps and flags follow the phase.
 */
export function transitionStatus(
  status: ServerStatus,
  change: PhaseChange,
  now: Date,
  generation?: number
): ServerStatus {
  const { phase, reason, message } = change;
  const at = now.toISOString();
  const serving = phase === ServerPhase.RUNNING || phase === ServerPhase.IDLE;

  const base: ServerStatus = {
    ...status,
    phase,
    conditions: setCondition(status.conditions, ConditionType.READY, serving ? 'True' : 'False', reason, now, message),
    observedGeneration: generation ?? status.observedGeneration,
    running: serving,
    idle: phase === ServerPhase.IDLE
  };

  switch (phase) {
    case ServerPhase.PENDING:
      return { ...base, endpoint: undefined, failedAt: undefined, failureReason: undefined, stoppedAt: undefined };
    case ServerPhase.STARTING:
      return base;
    case ServerPhase.RUNNING:
      return {
        ...base,
        startedAt: status.phase === ServerPhase.STARTING || !status.startedAt ? at : status.startedAt
      };
    case ServerPhase.IDLE:
      return base;
    case ServerPhase.STOPPING:
      return isFailureReason(reason) ? { ...base, failureReason: message ?? reason } : base;
    case ServerPhase.STOPPED:
      return { ...base, endpoint: undefined, stoppedAt: at };
    case ServerPhase.FAILED:
      return { ...base, endpoint: undefined, failedAt: at, failureReason: message ?? status.failureReason ?? reason };
  }
}

function later(a: string | undefined, b: string | undefined): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Date.parse(b) > Date.parse(a) ? b : a;
}

/**
 * Fold uncommitted activity into a status
 */
export function foldActivity(status: ServerStatus, snapshot: ActivitySnapshot): ServerStatus {
  if (
    snapshot.requests === 0 &&
    snapshot.lastActivityAt === undefined &&
    snapshot.connections === status.currentConnections
  ) {
    return status;
  }
  return {
    ...status,
    totalRequests: status.totalRequests + snapshot.requests,
    lastRequestAt: later(status.lastRequestAt, snapshot.lastActivityAt),
    currentConnections: snapshot.connections
  };
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .filter(key => value[key] !== undefined)
        .map(key => [key, canonicalize(value[key])])
    );
  }
  return value;
}

/**
 * Structural equality ignoring key order and undefined fields
 */
export function statusEquals(a: ServerStatus, b: ServerStatus): boolean {
  return JSON.stringify(canonicalize(a)) === JSON.stringify(canonicalize(b));
}
