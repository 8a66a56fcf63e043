/**
 * @fileoverview Error taxonomy for mcpfleet
 */

/**
 * Error category enumeration
 */
export enum ErrorCategory {
  NOT_FOUND = 'not_found',
  CAPACITY = 'capacity',
  SUBSTRATE = 'substrate',
  VALIDATION = 'validation',
  TRANSPORT = 'transport',
  CONFLICT = 'conflict',
  CANCELLED = 'cancelled'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Serializable error information
 */
export interface ErrorInfo {
  readonly code: string;
  readonly message: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown> | undefined;
  readonly stackTrace?: string | undefined;
  readonly retryable: boolean;
  readonly statusCode: number;
}

/**
 * Base mcpfleet error class
 */
export abstract class FleetError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown> | undefined;
  public readonly retryable: boolean;
  /** HTTP status the API layer answers with */
  public readonly statusCode: number;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    retryable: boolean,
    statusCode: number,
    context?: Record<string, unknown> | undefined
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.timestamp = new Date();
    this.context = context;
    this.retryable = retryable;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to serializable object
   */
  toJSON(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      stackTrace: this.stack,
      retryable: this.retryable,
      statusCode: this.statusCode
    };
  }
}

export type ResourceKind = 'Pool' | 'Server' | 'Workload' | 'Session';

/**
 * A pool, server, workload or session does not exist
 */
export class NotFoundError extends FleetError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly resourceName: string
  ) {
    super(
      `${kind.toUpperCase()}_NOT_FOUND`,
      `${kind} ${resourceName} not found`,
      ErrorCategory.NOT_FOUND,
      ErrorSeverity.LOW,
      false,
      404,
      { kind, name: resourceName }
    );
  }
}

/**
 * Pool is at its maximum number of active servers
 */
export class CapacityExceededError extends FleetError {
  constructor(pool: string, maxServers: number) {
    super(
      'CAPACITY_EXCEEDED',
      `Pool ${pool} is at capacity (${maxServers} active servers)`,
      ErrorCategory.CAPACITY,
      ErrorSeverity.MEDIUM,
      true,
      429,
      { pool, maxServers }
    );
  }
}

/**
 * Transient failure talking to the orchestration substrate
 */
export class SubstrateError extends FleetError {
  constructor(operation: string, cause: unknown, statusCode?: number) {
    super(
      'SUBSTRATE_ERROR',
      `${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCategory.SUBSTRATE,
      ErrorSeverity.HIGH,
      true,
      502,
      { operation, upstreamStatus: statusCode }
    );
    if (cause instanceof Error) {
      this.cause = cause;
    }
  }
}

/**
 * Spec or template rejected as malformed; needs external correction
 */
export class InvalidSpecError extends FleetError {
  constructor(message: string, issues: readonly string[] = []) {
    super(
      'INVALID_SPEC',
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      false,
      400,
      issues.length > 0 ? { issues } : undefined
    );
  }
}

export type TransportErrorReason =
  | 'server not ready'
  | 'server unavailable'
  | 'session not found'
  | 'channel closed'
  | 'request timeout';

const TRANSPORT_STATUS: Record<TransportErrorReason, number> = {
  'server not ready': 503,
  'server unavailable': 503,
  'session not found': 404,
  'channel closed': 502,
  'request timeout': 504
};

/**
 * Session-level failure; never changes a server's stored phase
 */
export class TransportError extends FleetError {
  constructor(
    public readonly reason: TransportErrorReason,
    public readonly serverName: string,
    detail?: string
  ) {
    super(
      `TRANSPORT_${reason.toUpperCase().replace(/ /g, '_')}`,
      detail ? `${reason}: ${detail}` : reason,
      ErrorCategory.TRANSPORT,
      ErrorSeverity.LOW,
      false,
      TRANSPORT_STATUS[reason],
      { server: serverName }
    );
  }
}

/**
 * Optimistic concurrency rejection: the record changed since it was read
 */
export class ConflictError extends FleetError {
  constructor(kind: ResourceKind, name: string) {
    super(
      'CONFLICT',
      `${kind} ${name} was modified concurrently`,
      ErrorCategory.CONFLICT,
      ErrorSeverity.LOW,
      true,
      409,
      { kind, name }
    );
  }
}

/**
 * An in-flight operation was aborted, for instance by deletion of its server
 */
export class OperationCancelledError extends FleetError {
  constructor(operation: string) {
    super(
      'CANCELLED',
      `${operation} was cancelled`,
      ErrorCategory.CANCELLED,
      ErrorSeverity.LOW,
      false,
      499,
      { operation }
    );
  }
}

export function isFleetError(error: unknown): error is FleetError {
  return error instanceof FleetError;
}

/**
 * Errors outside the taxonomy are treated as retryable
 */
export function isRetryable(error: unknown): boolean {
  return isFleetError(error) ? error.retryable : true;
}
