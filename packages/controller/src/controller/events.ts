/**
 * @fileoverview Events the controller publishes on its EventManager
 */

import { ServerPhase } from '@mcpfleet/core';
import { isRecord } from '../kube/errors';

export const SERVER_PHASE_EVENT = 'server.phase';
export const SERVER_DELETED_EVENT = 'server.deleted';

export interface ServerPhaseEvent {
  readonly name: string;
  readonly phase: ServerPhase;
  readonly previous: ServerPhase;
}

export interface ServerDeletedEvent {
  readonly name: string;
}

const PHASES: ReadonlySet<string> = new Set(Object.values(ServerPhase));

function isPhase(value: unknown): value is ServerPhase {
  return typeof value === 'string' && PHASES.has(value);
}

export function isServerPhaseEvent(data: unknown): data is ServerPhaseEvent {
  return isRecord(data) && typeof data.name === 'string' && isPhase(data.phase) && isPhase(data.previous);
}

export function isServerDeletedEvent(data: unknown): data is ServerDeletedEvent {
  return isRecord(data) && typeof data.name === 'string';
}
