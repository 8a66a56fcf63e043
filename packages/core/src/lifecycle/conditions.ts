import type { Condition, ConditionReason, ConditionStatus } from '../types/resources';
import { ConditionType } from '../types/resources';

export function getCondition(
  conditions: readonly Condition[],
  type: ConditionType
): Condition | undefined {
  return conditions.find(condition => condition.type === type);
}

/**
 * Upsert a condition. `lastTransitionTime` only moves when the status flips,
 * so re-applying the same condition yields an identical list.
 */
export function setCondition(
  conditions: readonly Condition[],
  type: ConditionType,
  status: ConditionStatus,
  reason: ConditionReason,
  now: Date,
  message?: string
): Condition[] {
  const existing = getCondition(conditions, type);
  const lastTransitionTime = existing && existing.status === status
    ? existing.lastTransitionTime
    : now.toISOString();

  const next: Condition = message === undefined
    ? { type, status, reason, lastTransitionTime }
    : { type, status, reason, message, lastTransitionTime };

  const others = conditions.filter(condition => condition.type !== type);
  return [...others, next].sort((a, b) => a.type.localeCompare(b.type));
}

export function removeCondition(conditions: readonly Condition[], type: ConditionType): Condition[] {
  return conditions.filter(condition => condition.type !== type);
}

export function isConditionTrue(conditions: readonly Condition[], type: ConditionType): boolean {
  return getCondition(conditions, type)?.status === 'True';
}
