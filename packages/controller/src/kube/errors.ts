/**
 * @fileoverview Translation of Kubernetes API failures into the mcpfleet error taxonomy
 */

import {
  ConflictError,
  InvalidSpecError,
  NotFoundError,
  SubstrateError,
  isFleetError
} from '@mcpfleet/core';
import type { FleetError, ResourceKind } from '@mcpfleet/core';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP status carried by a client-node HttpError, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (isRecord(error) || error instanceof Error) {
    const candidate: unknown = Reflect.get(error, 'statusCode');
    if (typeof candidate === 'number') return candidate;
    const response: unknown = Reflect.get(error, 'response');
    if (isRecord(response) && typeof response.statusCode === 'number') return response.statusCode;
  }
  return undefined;
}

/**
 * Message from the Kubernetes Status object in the error body, falling back to the error itself
 */
export function messageOf(error: unknown): string {
  if (isRecord(error) || error instanceof Error) {
    const body: unknown = Reflect.get(error, 'body');
    if (isRecord(body) && typeof body.message === 'string') return body.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface KubeErrorTarget {
  readonly operation: string;
  readonly kind: ResourceKind;
  readonly name: string;
}

/**
 * 404 -> NotFoundError, 409 -> ConflictError, 400/422 -> InvalidSpecError,
 * everything else -> SubstrateError
 */
export function toFleetError(error: unknown, target: KubeErrorTarget): FleetError {
  if (isFleetError(error)) return error;

  const statusCode = statusCodeOf(error);
  switch (statusCode) {
    case 404:
      return new NotFoundError(target.kind, target.name);
    case 409:
      return new ConflictError(target.kind, target.name);
    case 400:
    case 422:
      return new InvalidSpecError(`${target.operation} rejected`, [messageOf(error)]);
    default: {
      const cause = error instanceof Error ? error : new Error(messageOf(error));
      return new SubstrateError(target.operation, cause, statusCode);
    }
  }
}
