/**
 * @fileoverview Configuration management for mcpfleet
 */

import { config as dotenvConfig } from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { LogLevel } from '@mcpfleet/core';
import { toCamelCase } from '../utils';

/**
 * Environment enumeration
 */
export enum Environment {
  DEVELOPMENT = 'development',
  STAGING = 'staging',
  PRODUCTION = 'production',
  TEST = 'test'
}

// Load environment variables from .env files
dotenvConfig();

export const ENV_PREFIX = 'MCPFLEET_';

/**
 * Base configuration schema with common fields
 */
export const BaseConfigSchema = z.object({
  environment: z.nativeEnum(Environment).default(Environment.PRODUCTION),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  version: z.string().default('0.1.0')
});

/**
 * Reconciliation controller configuration
 */
export const ControllerConfigSchema = BaseConfigSchema.extend({
  namespace: z.string().min(1).default('default'),
  concurrency: z.number().int().positive().default(4),
  retryAttempts: z.number().int().positive().default(5),
  retryBaseDelayMs: z.number().int().nonnegative().default(500),
  retryMaxDelayMs: z.number().int().positive().default(30000),
  requeueBaseDelayMs: z.number().int().positive().default(1000),
  requeueMaxDelayMs: z.number().int().positive().default(60000),
  readyPollMs: z.number().int().positive().default(2000),
  failedRequeueMs: z.number().int().positive().default(300000), // 5 minutes
  resyncIntervalMs: z.number().int().nonnegative().default(60000),
  terminalIdleMs: z.number().int().nonnegative().default(0)
});

/**
 * Gateway (HTTP + transport bridge) configuration
 */
export const GatewayConfigSchema = BaseConfigSchema.extend({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8080),
  readyTimeoutMs: z.number().int().nonnegative().default(30000),
  requestTimeoutMs: z.number().int().positive().default(30000),
  keepaliveMs: z.number().int().positive().default(15000)
});

export type BaseConfigType = z.infer<typeof BaseConfigSchema>;
export type ControllerConfigType = z.infer<typeof ControllerConfigSchema>;
export type GatewayConfigType = z.infer<typeof GatewayConfigSchema>;

type AnySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function formatIssues(error: z.ZodError): string {
  return error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join('\n');
}

/**
 * Configuration manager class
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private configCache = new Map<string, unknown>();

  private constructor() {}

  /**
   * Get singleton instance
   */
  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Load configuration from environment variables.
   * `MCPFLEET_READY_POLL_MS` becomes `readyPollMs`.
   */
  loadFromEnv<T>(schema: AnySchema<T>, prefix = '', env: NodeJS.ProcessEnv = process.env): T {
    const scoped = Object.entries(env)
      .filter(([key]) => !prefix || key.startsWith(prefix))
      .map(([key, value]): [string, string | undefined] => [toCamelCase(key.slice(prefix.length)), value]);

    // Convert environment strings to appropriate types
    const processedEnv = Object.fromEntries(
      scoped.map(([key, value]): [string, unknown] => {
        if (value === 'true') return [key, true];
        if (value === 'false') return [key, false];
        if (value !== undefined && value.trim() !== '' && !isNaN(Number(value))) return [key, Number(value)];
        return [key, value];
      })
    );

    const result = schema.safeParse(processedEnv);
    if (!result.success) {
      throw new Error(`Configuration validation failed:\n${formatIssues(result.error)}`);
    }

    return result.data;
  }

  /**
   * Load configuration from a JSON or YAML file
   */
  loadFromFile<T>(schema: AnySchema<T>, filePath: string): T {
    const cacheKey = `file:${filePath}`;
    const cached = this.configCache.get(cacheKey);
    if (cached !== undefined) {
      return schema.parse(cached);
    }

    let data: unknown;
    try {
      const content = readFileSync(resolve(filePath), 'utf-8');
      data = /\.ya?ml$/i.test(filePath) ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to load configuration from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(`Configuration validation failed for ${filePath}:\n${formatIssues(result.error)}`);
    }

    this.configCache.set(cacheKey, data);
    return result.data;
  }

  /**
   * Load configuration with fallbacks: file values, overridden by environment variables
   */
  load<T>(
    schema: AnySchema<T>,
    options: { envPrefix?: string; file?: string; env?: NodeJS.ProcessEnv } = {}
  ): T {
    const rawSchema = z.record(z.unknown());
    const fromFile = options.file ? this.loadFromFile(rawSchema, options.file) : {};
    const fromEnv = this.loadFromEnv(rawSchema, options.envPrefix ?? ENV_PREFIX, options.env);

    const result = schema.safeParse({ ...fromFile, ...fromEnv });
    if (!result.success) {
      throw new Error(`Configuration validation failed:\n${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /**
   * Clear configuration cache
   */
  clearCache(): void {
    this.configCache.clear();
  }
}

/**
 * Default configuration manager instance
 */
export const configManager = ConfigManager.getInstance();

export interface LoadOptions {
  readonly file?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: Record<string, unknown>;
}

export function loadControllerConfig(options: LoadOptions = {}): ControllerConfigType {
  const loaded = configManager.load(ControllerConfigSchema, { envPrefix: ENV_PREFIX, file: options.file, env: options.env });
  return options.overrides ? ControllerConfigSchema.parse({ ...loaded, ...options.overrides }) : loaded;
}

export function loadGatewayConfig(options: LoadOptions = {}): GatewayConfigType {
  const loaded = configManager.load(GatewayConfigSchema, { envPrefix: ENV_PREFIX, file: options.file, env: options.env });
  return options.overrides ? GatewayConfigSchema.parse({ ...loaded, ...options.overrides }) : loaded;
}
