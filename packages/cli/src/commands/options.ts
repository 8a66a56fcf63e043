/**
 * @fileoverview Turning command line flags into resource specs
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_SSE_PORT } from '@mcpfleet/core';
import { parseEnvPairs } from '../utils';

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

export interface TransportOptions {
  readonly transport?: string;
  readonly port?: string;
}

export function buildTransport(options: TransportOptions): Record<string, unknown> | undefined {
  switch (options.transport) {
    case undefined:
      return options.port === undefined ? undefined : { type: 'sse', port: parseInteger(options.port, '--port') };
    case 'stdio':
      return { type: 'stdio' };
    case 'sse':
      return { type: 'sse', port: options.port === undefined ? DEFAULT_SSE_PORT : parseInteger(options.port, '--port') };
    default:
      throw new Error(`--transport must be stdio or sse, got "${options.transport}"`);
  }
}

export interface PoolSpecOptions extends TransportOptions {
  readonly maxServers?: string;
  readonly idleTimeout?: string;
  readonly image?: string;
  readonly command?: string[];
  readonly arg?: string[];
  readonly env?: string[];
}

/**
 * Pool spec from flags. The gateway validates it and fills in defaults.
 */
export function buildPoolSpec(options: PoolSpecOptions): Record<string, unknown> {
  if (!options.image) {
    throw new Error('--image is required unless --file is given');
  }

  const template: Record<string, unknown> = { image: options.image };
  if (options.command && options.command.length > 0) template.command = options.command;
  if (options.arg && options.arg.length > 0) template.args = options.arg;
  if (options.env && options.env.length > 0) template.env = parseEnvPairs(options.env);
  const transport = buildTransport(options);
  if (transport) template.transport = transport;

  const spec: Record<string, unknown> = { template };
  if (options.maxServers !== undefined) spec.maxServers = parseInteger(options.maxServers, '--max-servers');
  if (options.idleTimeout !== undefined) spec.idleTimeout = parseInteger(options.idleTimeout, '--idle-timeout');
  return spec;
}

export interface ServerSpecOptions extends TransportOptions {
  readonly pool?: string;
  readonly image?: string;
  readonly idleTimeout?: string;
  readonly env?: string[];
}

export function buildServerSpec(options: ServerSpecOptions): Record<string, unknown> {
  const spec: Record<string, unknown> = {};
  if (options.pool) spec.pool = options.pool;
  if (options.image) spec.image = options.image;
  if (options.idleTimeout !== undefined) spec.idleTimeout = parseInteger(options.idleTimeout, '--idle-timeout');
  if (options.env && options.env.length > 0) spec.env = parseEnvPairs(options.env);
  const transport = buildTransport(options);
  if (transport) spec.transport = transport;
  return spec;
}

/**
 * Read a spec from a YAML or JSON file
 */
export async function readSpecFile(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  const parsed: unknown = parseYaml(content);
  return parsed;
}
