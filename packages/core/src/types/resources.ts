/**
 * @fileoverview Pool and Server resource model for mcpfleet
 */

/**
 * Custom resource coordinates
 */
export const API_GROUP = 'mcpfleet.dev';
export const API_VERSION = 'v1';
export const POOL_KIND = 'MCPPool';
export const POOL_PLURAL = 'mcppools';
export const SERVER_KIND = 'MCPServer';
export const SERVER_PLURAL = 'mcpservers';

export const DEFAULT_POOL_NAME = 'default';
export const DEFAULT_MAX_SERVERS = 100;
export const DEFAULT_IDLE_TIMEOUT_SECONDS = 60;
export const DEFAULT_SSE_PORT = 3000;

/**
 * Server lifecycle phase
 */
export enum ServerPhase {
  PENDING = 'Pending',
  STARTING = 'Starting',
  RUNNING = 'Running',
  IDLE = 'Idle',
  STOPPING = 'Stopping',
  STOPPED = 'Stopped',
  FAILED = 'Failed'
}

/**
 * How the gateway talks to the process inside the workload
 */
export type ServerTransport =
  | { readonly type: 'stdio' }
  | { readonly type: 'sse'; readonly port: number };

export interface EnvVar {
  readonly name: string;
  readonly value: string;
}

export interface ResourceRequirements {
  readonly limits?: Readonly<Record<string, string>>;
  readonly requests?: Readonly<Record<string, string>>;
}

/**
 * Object metadata, the subset of Kubernetes ObjectMeta the controller relies on
 */
export interface ObjectMeta {
  readonly name: string;
  readonly namespace?: string;
  readonly uid?: string;
  readonly resourceVersion?: string;
  readonly generation?: number;
  readonly creationTimestamp?: string;
  readonly deletionTimestamp?: string;
  readonly labels?: Readonly<Record<string, string>>;
}

export interface ServerTemplate {
  readonly image: string;
  readonly command?: readonly string[];
  readonly args?: readonly string[];
  readonly env?: readonly EnvVar[];
  readonly resources?: ResourceRequirements;
  readonly transport: ServerTransport;
}

export interface PoolSpec {
  readonly maxServers: number;
  /** Seconds */
  readonly idleTimeout: number;
  readonly template: ServerTemplate;
}

export interface PoolStatus {
  readonly activeServers: number;
  readonly pendingServers: number;
  readonly totalServers: number;
  readonly lastReconciledAt?: string;
  readonly observedGeneration?: number;
}

export interface Pool {
  readonly metadata: ObjectMeta;
  readonly spec: PoolSpec;
  readonly status?: PoolStatus;
}

export interface ServerSpec {
  readonly pool: string;
  readonly image?: string;
  readonly transport?: ServerTransport;
  readonly env?: readonly EnvVar[];
  /** Seconds; 0 or absent falls back to the pool default */
  readonly idleTimeout?: number;
}

export type ConditionStatus = 'True' | 'False' | 'Unknown';

export enum ConditionType {
  REQUESTED = 'Requested',
  CAPACITY_EXCEEDED = 'CapacityExceeded',
  READY = 'Ready'
}

export enum ConditionReason {
  CREATED = 'Created',
  MANUAL_START = 'ManualStart',
  MANUAL_STOP = 'ManualStop',
  CONNECTION = 'Connection',
  EVICTION = 'Eviction',
  POOL_AT_CAPACITY = 'PoolAtCapacity',
  ADMITTED = 'Admitted',
  WORKLOAD_READY = 'WorkloadReady',
  WORKLOAD_PENDING = 'WorkloadPending',
  WORKLOAD_LOST = 'WorkloadLost',
  WORKLOAD_FAILED = 'WorkloadFailed',
  POOL_NOT_FOUND = 'PoolNotFound',
  INVALID_SPEC = 'InvalidSpec',
  RETRIES_EXHAUSTED = 'RetriesExhausted',
  STOPPED = 'Stopped'
}

export interface Condition {
  readonly type: ConditionType;
  readonly status: ConditionStatus;
  readonly reason: ConditionReason;
  readonly message?: string;
  readonly lastTransitionTime: string;
}

/**
 * Observed server state. All timestamps are ISO-8601 strings.
 */
export interface ServerStatus {
  readonly phase: ServerPhase;
  readonly conditions: readonly Condition[];
  readonly observedGeneration?: number;
  readonly createdAt: string;
  readonly startedAt?: string;
  readonly stoppedAt?: string;
  readonly failedAt?: string;
  readonly lastRequestAt?: string;
  readonly running: boolean;
  readonly idle: boolean;
  readonly totalRequests: number;
  readonly currentConnections: number;
  readonly failureReason?: string;
  readonly endpoint?: string;
}

export interface Server {
  readonly metadata: ObjectMeta;
  readonly spec: ServerSpec;
  readonly status?: ServerStatus;
}

/**
 * Status a server is given before the controller has written anything
 */
export function initialServerStatus(server: Pick<Server, 'metadata'>, now: Date = new Date()): ServerStatus {
  return {
    phase: ServerPhase.PENDING,
    conditions: [],
    createdAt: server.metadata.creationTimestamp ?? now.toISOString(),
    running: false,
    idle: false,
    totalRequests: 0,
    currentConnections: 0
  };
}

export function statusOf(server: Server, now: Date = new Date()): ServerStatus {
  return server.status ?? initialServerStatus(server, now);
}

/**
 * Effective workload template for a server: pool template with server overrides
 */
export function resolveTemplate(server: Server, pool: Pool): ServerTemplate {
  const base = pool.spec.template;
  const overrides = server.spec.env ?? [];
  const env = [
    ...(base.env ?? []).filter(entry => !overrides.some(o => o.name === entry.name)),
    ...overrides
  ];
  return {
    ...base,
    image: server.spec.image ?? base.image,
    transport: server.spec.transport ?? base.transport,
    env
  };
}
