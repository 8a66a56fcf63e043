/**
 * @fileoverview Operator command: controller and gateway in one process
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { startOperator } from '@mcpfleet/gateway';
import type { Operator, StoreKind } from '@mcpfleet/gateway';
import { LoggerFactory, loadControllerConfig, loadGatewayConfig } from '@mcpfleet/shared';
import type { ControllerConfigType, GatewayConfigType } from '@mcpfleet/shared';
import { printError, printInfo } from '../utils';
import { parseInteger } from './options';

export interface OperatorCommandOptions {
  readonly store?: string;
  readonly port?: string;
  readonly host?: string;
  readonly namespace?: string;
  readonly configFile?: string;
}

export interface OperatorSettings {
  readonly store: StoreKind;
  readonly controller: ControllerConfigType;
  readonly gateway: GatewayConfigType;
}

function isStoreKind(value: string): value is StoreKind {
  return value === 'kubernetes' || value === 'memory';
}

/**
 * Configuration from file and environment, with command line flags on top
 */
export function resolveOperatorSettings(
  options: OperatorCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): OperatorSettings {
  const store = options.store ?? 'kubernetes';
  if (!isStoreKind(store)) {
    throw new Error(`--store must be kubernetes or memory, got "${store}"`);
  }

  const controllerOverrides: Record<string, unknown> = {};
  if (options.namespace) controllerOverrides.namespace = options.namespace;

  const gatewayOverrides: Record<string, unknown> = {};
  if (options.port !== undefined) gatewayOverrides.port = parseInteger(options.port, '--port');
  if (options.host) gatewayOverrides.host = options.host;

  return {
    store,
    controller: loadControllerConfig({ file: options.configFile, env, overrides: controllerOverrides }),
    gateway: loadGatewayConfig({ file: options.configFile, env, overrides: gatewayOverrides })
  };
}

async function runOperator(options: OperatorCommandOptions): Promise<void> {
  const settings = resolveOperatorSettings(options);
  const logger = LoggerFactory.createLogger('mcpfleet-operator', {
    level: settings.controller.logLevel,
    environment: settings.controller.environment
  });

  const operator: Operator = await startOperator({
    controller: settings.controller,
    gateway: settings.gateway,
    store: settings.store,
    logger
  });

  printInfo(
    `mcpfleet operator listening on ${chalk.bold(operator.address)}`,
    `namespace: ${settings.controller.namespace}\nstore: ${settings.store}`
  );

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    operator.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        printError('Shutdown failed', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Add the operator command to program
 */
export function addOperatorCommands(program: Command): void {
  program
    .command('operator')
    .description('Run the reconciliation controller and the SSE gateway')
    .option('--store <kind>', 'Where pool and server records live (kubernetes|memory)', 'kubernetes')
    .option('--port <port>', 'Gateway port')
    .option('--host <host>', 'Gateway bind address')
    .option('-n, --namespace <namespace>', 'Namespace to manage')
    .option('--config-file <path>', 'Operator configuration file (YAML or JSON)')
    .action(async (options: OperatorCommandOptions) => {
      try {
        await runOperator(options);
      } catch (error) {
        printError('Failed to start operator', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });
}
