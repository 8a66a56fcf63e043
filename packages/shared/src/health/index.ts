/**
 * @fileoverview Health checks backing the operator's /health endpoint
 */

import { Logger } from '../logger';

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy'
}

export interface HealthCheckResult {
  readonly name: string;
  readonly status: HealthStatus;
  readonly message?: string;
  readonly duration: number; // milliseconds
  readonly details?: Record<string, unknown>;
}

/**
 * A check resolves with its status and optional details, or throws to report unhealthy
 */
export type HealthCheckFunction = () => Promise<Omit<HealthCheckResult, 'name' | 'duration'>>;

export interface HealthCheckConfig {
  readonly name: string;
  readonly timeout: number; // milliseconds
  readonly critical: boolean; // affects overall health status
}

export interface HealthReport {
  readonly status: HealthStatus;
  readonly service: string;
  readonly uptime: number; // seconds
  readonly checks: HealthCheckResult[];
}

export class HealthMonitor {
  private checks = new Map<string, HealthCheckConfig & { fn: HealthCheckFunction }>();
  private readonly startedAt = Date.now();

  constructor(
    private readonly serviceName: string,
    private readonly logger?: Logger
  ) {}

  registerCheck(config: HealthCheckConfig, fn: HealthCheckFunction): void {
    this.checks.set(config.name, { ...config, fn });
    this.logger?.debug('Health check registered', {
      component: 'health-monitor',
      checkName: config.name,
      critical: config.critical
    });
  }

  async executeCheck(name: string): Promise<HealthCheckResult> {
    const check = this.checks.get(name);
    if (!check) {
      throw new Error(`Health check not found: ${name}`);
    }

    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      const result = await Promise.race([
        check.fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Health check timeout')), check.timeout);
        })
      ]);
      return { ...result, name, duration: Date.now() - startTime };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Health check failed', { component: 'health-monitor', checkName: name, error: message });
      return { name, status: HealthStatus.UNHEALTHY, message, duration: Date.now() - startTime };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  /**
   * Run every check. A failing critical check makes the report unhealthy; any
   * other non-healthy result degrades it.
   */
  async report(): Promise<HealthReport> {
    const names = [...this.checks.keys()];
    const checks = await Promise.all(names.map(name => this.executeCheck(name)));

    let status = HealthStatus.HEALTHY;
    for (const result of checks) {
      if (result.status === HealthStatus.HEALTHY) continue;
      const critical = this.checks.get(result.name)?.critical ?? false;
      if (critical && result.status === HealthStatus.UNHEALTHY) {
        status = HealthStatus.UNHEALTHY;
        break;
      }
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      service: this.serviceName,
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      checks
    };
  }
}
