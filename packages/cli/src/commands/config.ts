/**
 * @fileoverview CLI configuration commands
 */

import { Command } from 'commander';
import type { CLIConfig, CommandResult, CommonOptions } from '../types';
import {
  DEFAULT_CLI_CONFIG,
  createResult,
  getConfigPath,
  isOutputFormat,
  loadConfig,
  saveConfig,
  validateConfig
} from '../utils';
import { BaseCommand, addCommonOptions, runCommand } from './base';

/**
 * Flag-style aliases accepted by `config set` and `config reset`
 */
const KEY_ALIASES: Readonly<Record<string, keyof Omit<CLIConfig, 'configFile'>>> = {
  'gateway-url': 'defaultGatewayUrl',
  defaultGatewayUrl: 'defaultGatewayUrl',
  'output-format': 'defaultOutputFormat',
  defaultOutputFormat: 'defaultOutputFormat',
  timeout: 'defaultTimeout',
  defaultTimeout: 'defaultTimeout',
  colors: 'enableColors',
  enableColors: 'enableColors'
};

function describeConfig(config: CLIConfig): Record<string, unknown> {
  return {
    defaultGatewayUrl: config.defaultGatewayUrl,
    defaultOutputFormat: config.defaultOutputFormat,
    defaultTimeout: `${config.defaultTimeout}ms`,
    enableColors: config.enableColors,
    configFile: config.configFile ?? `${getConfigPath()} (not created yet)`
  };
}

/**
 * Turn a `key value` pair into a config update
 */
export function parseConfigUpdate(key: string, value: string): Partial<CLIConfig> {
  const field = KEY_ALIASES[key];
  switch (field) {
    case 'defaultGatewayUrl':
      return { defaultGatewayUrl: value };
    case 'defaultOutputFormat':
      if (!isOutputFormat(value)) {
        throw new Error('Invalid output format. Must be: json, yaml, table, or text');
      }
      return { defaultOutputFormat: value };
    case 'defaultTimeout':
      return { defaultTimeout: Number(value) };
    case 'enableColors':
      return { enableColors: value.toLowerCase() === 'true' };
    default:
      throw new Error(`Unknown configuration key: ${key}`);
  }
}

/**
 * Configuration view command
 */
export class ConfigViewCommand extends BaseCommand {
  async execute(file?: string): Promise<CommandResult> {
    try {
      return createResult(true, describeConfig(await loadConfig(file)));
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Configuration set command
 */
export class ConfigSetCommand extends BaseCommand {
  async execute(key: string, value: string, file?: string): Promise<CommandResult> {
    try {
      const update = parseConfigUpdate(key, value);
      const validation = validateConfig(update);
      if (!validation.valid) {
        return createResult(false, undefined, `Configuration invalid: ${validation.errors.join(', ')}`);
      }

      const saved = await saveConfig(update, file);
      return createResult(true, describeConfig(saved), undefined, validation.warnings);
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Configuration reset command; without a key every setting goes back to its default
 */
export class ConfigResetCommand extends BaseCommand {
  async execute(key?: string, file?: string): Promise<CommandResult> {
    try {
      let update: Partial<CLIConfig> = DEFAULT_CLI_CONFIG;
      if (key) {
        const field = KEY_ALIASES[key];
        if (!field) {
          return createResult(false, undefined, `Unknown configuration key: ${key}`);
        }
        update = parseConfigUpdate(field, String(DEFAULT_CLI_CONFIG[field]));
      }

      const saved = await saveConfig(update, file);
      return createResult(true, describeConfig(saved));
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Add config commands to program
 */
export function addConfigCommands(program: Command): void {
  const configCommand = program.command('config').description('Manage CLI configuration');

  addCommonOptions(
    configCommand
      .command('view')
      .description('Show the CLI configuration')
      .action((options: CommonOptions) =>
        runCommand(options, context => new ConfigViewCommand(context), command => command.execute(options.config))
      )
  );

  addCommonOptions(
    configCommand
      .command('set <key> <value>')
      .description('Set a configuration value (gateway-url, output-format, timeout, colors)')
      .action((key: string, value: string, options: CommonOptions) =>
        runCommand(options, context => new ConfigSetCommand(context), command => command.execute(key, value, options.config))
      )
  );

  addCommonOptions(
    configCommand
      .command('reset [key]')
      .description('Reset one configuration value, or all of them')
      .action((key: string | undefined, options: CommonOptions) =>
        runCommand(options, context => new ConfigResetCommand(context), command => command.execute(key, options.config))
      )
  );
}
