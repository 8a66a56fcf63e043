/**
 * @fileoverview CLI utility functions
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { homedir } from 'os';
import axios from 'axios';
import chalk from 'chalk';
import boxen from 'boxen';
import { table } from 'table';
import { stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { statusOf } from '@mcpfleet/core';
import type { EnvVar, Pool, Server } from '@mcpfleet/core';
import { OUTPUT_FORMATS } from '../types';
import type { ApiErrorBody, CLIConfig, CommandResult, ConfigValidation, OutputFormat } from '../types';

/**
 * Default CLI configuration
 */
export const DEFAULT_CLI_CONFIG: CLIConfig = {
  defaultGatewayUrl: 'http://localhost:8080',
  defaultOutputFormat: 'table',
  defaultTimeout: 30000,
  enableColors: true
};

const StoredConfigSchema = z.object({
  defaultGatewayUrl: z.string().url().optional(),
  defaultOutputFormat: z.enum(['json', 'yaml', 'table', 'text']).optional(),
  defaultTimeout: z.number().int().positive().optional(),
  enableColors: z.boolean().optional()
});

const TABLE_BORDER = {
  topBody: '─',
  topJoin: '┬',
  topLeft: '┌',
  topRight: '┐',
  bottomBody: '─',
  bottomJoin: '┴',
  bottomLeft: '└',
  bottomRight: '┘',
  bodyLeft: '│',
  bodyRight: '│',
  bodyJoin: '│',
  joinBody: '─',
  joinLeft: '├',
  joinRight: '┤',
  joinJoin: '┼'
};

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Format output based on specified format
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);

    case 'yaml':
      return stringifyYaml(data);

    case 'table':
      return formatAsTable(data);

    case 'text':
      return formatAsText(data);
  }
}

/**
 * Format data as table
 */
function formatAsTable(data: unknown): string {
  if (Array.isArray(data)) {
    const rows = data.filter(isRow);
    if (rows.length === 0) return 'No resources found';

    const headers = Object.keys(rows[0]);
    return table([headers, ...rows.map(row => headers.map(header => cell(row[header])))], { border: TABLE_BORDER });
  }

  if (isRow(data)) {
    const rows = Object.entries(data).map(([key, value]) => [key, cell(value)]);
    return table([['Property', 'Value'], ...rows], { border: TABLE_BORDER });
  }

  return cell(data);
}

/**
 * Format data as human-readable text
 */
function formatAsText(data: unknown): string {
  if (Array.isArray(data)) {
    return data
      .map((item, index) => {
        if (isRow(item)) {
          const lines = Object.entries(item).map(([key, value]) => `  ${key}: ${cell(value)}`);
          return `${index + 1}.\n${lines.join('\n')}`;
        }
        return `${index + 1}. ${cell(item)}`;
      })
      .join('\n\n');
  }

  if (isRow(data)) {
    return Object.entries(data)
      .map(([key, value]) => `${key}: ${cell(value)}`)
      .join('\n');
  }

  return cell(data);
}

/**
 * One table row per pool
 */
export function poolRow(pool: Pool): Row {
  const { spec, status } = pool;
  return {
    name: pool.metadata.name,
    maxServers: spec.maxServers,
    idleTimeout: `${spec.idleTimeout}s`,
    image: spec.template.image,
    transport: spec.template.transport.type,
    active: status?.activeServers ?? 0,
    pending: status?.pendingServers ?? 0,
    total: status?.totalServers ?? 0
  };
}

/**
 * One table row per server
 */
export function serverRow(server: Server): Row {
  const status = statusOf(server);
  return {
    name: server.metadata.name,
    pool: server.spec.pool,
    phase: status.phase,
    connections: status.currentConnections,
    requests: status.totalRequests,
    lastRequest: status.lastRequestAt ?? '',
    reason: status.failureReason ?? ''
  };
}

/**
 * Parse `KEY=VALUE` pairs given on the command line
 */
export function parseEnvPairs(pairs: readonly string[]): EnvVar[] {
  return pairs.map(pair => {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid environment variable "${pair}", expected KEY=VALUE`);
    }
    return { name: pair.slice(0, separator), value: pair.slice(separator + 1) };
  });
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return isRow(value) && typeof value.error === 'string' && typeof value.message === 'string';
}

/**
 * Human-readable message for a failed gateway call
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (!response) {
      return `Gateway unreachable: ${error.message}`;
    }
    const body: unknown = response.data;
    return isApiErrorBody(body)
      ? `${body.message} (${body.error}, HTTP ${response.status})`
      : `HTTP ${response.status}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print success message
 */
export function printSuccess(message: string, details?: string): void {
  const content = details ? `${message}\n\n${details}` : message;
  console.log(boxen(chalk.green(content), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'green'
  }));
}

/**
 * Print error message
 */
export function printError(message: string, details?: string): void {
  const content = details ? `${message}\n\n${details}` : message;
  console.error(boxen(chalk.red(content), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'red'
  }));
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(chalk.yellow(`Warning: ${message}`));
}

/**
 * Print info message
 */
export function printInfo(message: string, details?: string): void {
  const content = details ? `${message}\n\n${details}` : message;
  console.log(boxen(chalk.blue(content), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'blue'
  }));
}

/**
 * Get configuration file path
 */
export function getConfigPath(): string {
  return join(homedir(), '.mcpfleet', 'cli-config.json');
}

/**
 * Load CLI configuration. A missing file means defaults; a malformed one is an error.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<CLIConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isRow(error) && error.code === 'ENOENT') {
      return DEFAULT_CLI_CONFIG;
    }
    throw error;
  }

  const parsed = StoredConfigSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid CLI configuration in ${configPath}: ${parsed.error.errors.map(err => err.message).join(', ')}`);
  }
  return { ...DEFAULT_CLI_CONFIG, ...parsed.data, configFile: configPath };
}

/**
 * Save CLI configuration
 */
export async function saveConfig(config: Partial<CLIConfig>, configPath: string = getConfigPath()): Promise<CLIConfig> {
  const current = await loadConfig(configPath);
  const { configFile: _configFile, ...stored } = { ...current, ...config };

  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(stored, null, 2));
  return { ...stored, configFile: configPath };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Partial<CLIConfig>): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.defaultGatewayUrl !== undefined && !isValidUrl(config.defaultGatewayUrl)) {
    errors.push('Invalid gateway URL format');
  }

  if (config.defaultTimeout !== undefined) {
    if (!Number.isInteger(config.defaultTimeout) || config.defaultTimeout <= 0) {
      errors.push('Timeout must be a positive number of milliseconds');
    } else if (config.defaultTimeout < 1000) {
      warnings.push('Timeout is very low (< 1 second)');
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Validate URL format
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a command result
 */
export function createResult<T>(success: boolean, data?: T, error?: string, warnings?: string[]): CommandResult<T> {
  return { success, data, error, warnings };
}

/**
 * Handle promise with error catching
 */
export async function handleAsync<T>(
  promise: Promise<T>,
  errorMessage: string = 'Operation failed'
): Promise<CommandResult<T>> {
  try {
    const data = await promise;
    return createResult(true, data);
  } catch (error) {
    return createResult<T>(false, undefined, `${errorMessage}: ${describeError(error)}`);
  }
}
