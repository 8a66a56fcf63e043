/**
 * @fileoverview Zod schemas for resource specs, Kubernetes envelopes and API requests
 */

import { z } from 'zod';
import {
  ConditionReason,
  ConditionType,
  DEFAULT_IDLE_TIMEOUT_SECONDS,
  DEFAULT_MAX_SERVERS,
  DEFAULT_POOL_NAME,
  DEFAULT_SSE_PORT,
  ServerPhase
} from '../types/resources';
import type { Pool, PoolSpec, Server, ServerSpec } from '../types/resources';
import { InvalidSpecError } from '../types/errors';

// RFC 1123 label, the constraint Kubernetes puts on pod and service names
const NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const ResourceNameSchema = z.string()
  .min(1)
  .max(50, 'Name must be at most 50 characters')
  .regex(NAME_PATTERN, 'Name must be lowercase alphanumeric or "-"');

export const EnvVarSchema = z.object({
  name: z.string().min(1),
  value: z.string().default('')
});

export const ServerTransportSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('stdio') }),
  z.object({ type: z.literal('sse'), port: z.number().int().min(1).max(65535).default(DEFAULT_SSE_PORT) })
]);

export const ResourceRequirementsSchema = z.object({
  limits: z.record(z.string()).optional(),
  requests: z.record(z.string()).optional()
});

export const ServerTemplateSchema = z.object({
  image: z.string().min(1, 'Image is required'),
  command: z.array(z.string()).optional(),
  args: z.array(z.string()).optional(),
  env: z.array(EnvVarSchema).optional(),
  resources: ResourceRequirementsSchema.optional(),
  transport: ServerTransportSchema.default({ type: 'stdio' })
});

export const PoolSpecSchema = z.object({
  maxServers: z.number().int().positive().default(DEFAULT_MAX_SERVERS),
  idleTimeout: z.number().int().positive().default(DEFAULT_IDLE_TIMEOUT_SECONDS),
  template: ServerTemplateSchema
});

export const ServerSpecSchema = z.object({
  pool: ResourceNameSchema.default(DEFAULT_POOL_NAME),
  image: z.string().min(1).optional(),
  transport: ServerTransportSchema.optional(),
  env: z.array(EnvVarSchema).optional(),
  idleTimeout: z.number().int().nonnegative().optional()
});

export const ConditionSchema = z.object({
  type: z.nativeEnum(ConditionType),
  status: z.enum(['True', 'False', 'Unknown']),
  reason: z.nativeEnum(ConditionReason),
  message: z.string().optional(),
  lastTransitionTime: z.string()
});

export const ServerStatusSchema = z.object({
  phase: z.nativeEnum(ServerPhase),
  conditions: z.array(ConditionSchema).default([]),
  observedGeneration: z.number().int().optional(),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  stoppedAt: z.string().optional(),
  failedAt: z.string().optional(),
  lastRequestAt: z.string().optional(),
  running: z.boolean().default(false),
  idle: z.boolean().default(false),
  totalRequests: z.number().int().nonnegative().default(0),
  currentConnections: z.number().int().nonnegative().default(0),
  failureReason: z.string().optional(),
  endpoint: z.string().optional()
});

export const PoolStatusSchema = z.object({
  activeServers: z.number().int().nonnegative().default(0),
  pendingServers: z.number().int().nonnegative().default(0),
  totalServers: z.number().int().nonnegative().default(0),
  lastReconciledAt: z.string().optional(),
  observedGeneration: z.number().int().optional()
});

export const ObjectMetaSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  uid: z.string().optional(),
  resourceVersion: z.string().optional(),
  generation: z.number().int().optional(),
  creationTimestamp: z.string().optional(),
  deletionTimestamp: z.string().optional(),
  labels: z.record(z.string()).optional()
});

/**
 * Custom objects as they come back from the API server
 */
export const PoolResourceSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: PoolSpecSchema,
  status: PoolStatusSchema.optional()
});

export const ServerResourceSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: ServerSpecSchema,
  status: ServerStatusSchema.optional()
});

/**
 * HTTP API request bodies
 */
export const CreatePoolRequestSchema = z.object({
  name: ResourceNameSchema,
  spec: PoolSpecSchema
});

export const UpdatePoolRequestSchema = z.object({
  spec: PoolSpecSchema
});

export const CreateServerRequestSchema = z.object({
  name: ResourceNameSchema,
  spec: ServerSpecSchema.default({})
});

export const UpdateServerRequestSchema = z.object({
  spec: ServerSpecSchema
});

export type CreatePoolRequest = z.infer<typeof CreatePoolRequestSchema>;
export type UpdatePoolRequest = z.infer<typeof UpdatePoolRequestSchema>;
export type CreateServerRequest = z.infer<typeof CreateServerRequestSchema>;
export type UpdateServerRequest = z.infer<typeof UpdateServerRequestSchema>;

/**
 * Validate a value, turning zod issues into an InvalidSpecError
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map(err =>
      err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
    );
    throw new InvalidSpecError(`Invalid ${what}`, issues);
  }
  return result.data;
}

export function parsePool(value: unknown): Pool {
  return parseOrThrow(PoolResourceSchema, value, 'pool resource');
}

export function parseServer(value: unknown): Server {
  return parseOrThrow(ServerResourceSchema, value, 'server resource');
}

export function parsePoolSpec(value: unknown): PoolSpec {
  return parseOrThrow(PoolSpecSchema, value, 'pool spec');
}

export function parseServerSpec(value: unknown): ServerSpec {
  return parseOrThrow(ServerSpecSchema, value, 'server spec');
}
