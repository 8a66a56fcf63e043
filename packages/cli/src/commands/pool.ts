/**
 * @fileoverview Pool management commands
 */

import { Command } from 'commander';
import type { Pool } from '@mcpfleet/core';
import type { CommandResult, CommonOptions } from '../types';
import { createResult, handleAsync, poolRow } from '../utils';
import { BaseCommand, addCommonOptions, runCommand } from './base';
import { buildPoolSpec, collect, readSpecFile } from './options';
import type { PoolSpecOptions } from './options';

interface PoolList {
  readonly pools: Pool[];
}

abstract class PoolCommand extends BaseCommand {
  /**
   * Raw resources for json and yaml, summary rows otherwise
   */
  protected present(pools: Pool[]): unknown {
    const format = this.context.outputFormat;
    return format === 'json' || format === 'yaml' ? pools : pools.map(poolRow);
  }

  protected presentOne(pool: Pool): unknown {
    const format = this.context.outputFormat;
    return format === 'json' || format === 'yaml' ? pool : poolRow(pool);
  }
}

/**
 * Pool list command
 */
export class PoolListCommand extends PoolCommand {
  async execute(): Promise<CommandResult> {
    const result = await handleAsync(this.makeRequest<PoolList>('GET', '/api/v1/pools'), 'Failed to list pools');
    if (!result.success || !result.data) return result;
    return createResult(true, this.present(result.data.pools));
  }
}

/**
 * Pool get command
 */
export class PoolGetCommand extends PoolCommand {
  async execute(name: string): Promise<CommandResult> {
    const result = await handleAsync(
      this.makeRequest<Pool>('GET', `/api/v1/pools/${encodeURIComponent(name)}`),
      `Failed to get pool ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

export interface PoolCreateOptions extends PoolSpecOptions {
  readonly file?: string;
}

/**
 * Pool create command
 */
export class PoolCreateCommand extends PoolCommand {
  async execute(name: string, options: PoolCreateOptions): Promise<CommandResult> {
    let spec: unknown;
    try {
      spec = options.file ? await readSpecFile(options.file) : buildPoolSpec(options);
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }

    const result = await handleAsync(
      this.makeRequest<Pool>('POST', '/api/v1/pools', { name, spec }),
      `Failed to create pool ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Pool update command; replaces the whole spec
 */
export class PoolUpdateCommand extends PoolCommand {
  async execute(name: string, options: PoolCreateOptions): Promise<CommandResult> {
    let spec: unknown;
    try {
      spec = options.file ? await readSpecFile(options.file) : buildPoolSpec(options);
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }

    const result = await handleAsync(
      this.makeRequest<Pool>('PUT', `/api/v1/pools/${encodeURIComponent(name)}`, { spec }),
      `Failed to update pool ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Pool delete command
 */
export class PoolDeleteCommand extends PoolCommand {
  async execute(name: string): Promise<CommandResult> {
    const result = await handleAsync(
      this.makeRequest<unknown>('DELETE', `/api/v1/pools/${encodeURIComponent(name)}`),
      `Failed to delete pool ${name}`
    );
    if (!result.success) return result;
    return createResult(true, { pool: name, deleted: true });
  }
}

function addSpecOptions(command: Command): Command {
  return command
    .option('-f, --file <path>', 'Read the pool spec from a YAML or JSON file')
    .option('--image <image>', 'Container image of the pool template')
    .option('--max-servers <count>', 'Maximum number of active servers')
    .option('--idle-timeout <seconds>', 'Seconds without activity before a server counts as idle')
    .option('--transport <type>', 'Server transport (stdio|sse)')
    .option('--port <port>', 'Container port for the sse transport')
    .option('--command <part>', 'Container command; repeat for each part', collect, [])
    .option('--arg <arg>', 'Container argument; repeatable', collect, [])
    .option('--env <KEY=VALUE>', 'Environment variable; repeatable', collect, []);
}

/**
 * Add pool commands to program
 */
export function addPoolCommands(program: Command): void {
  const poolCommand = program.command('pool').description('Manage MCP server pools');

  addCommonOptions(
    poolCommand
      .command('list')
      .description('List pools')
      .action((options: CommonOptions) => runCommand(options, context => new PoolListCommand(context), command => command.execute()))
  );

  addCommonOptions(
    poolCommand
      .command('get <name>')
      .description('Show one pool')
      .action((name: string, options: CommonOptions) =>
        runCommand(options, context => new PoolGetCommand(context), command => command.execute(name))
      )
  );

  addCommonOptions(
    addSpecOptions(
      poolCommand
        .command('create <name>')
        .description('Create a pool')
        .action((name: string, options: CommonOptions & PoolCreateOptions) =>
          runCommand(options, context => new PoolCreateCommand(context), command => command.execute(name, options))
        )
    )
  );

  addCommonOptions(
    addSpecOptions(
      poolCommand
        .command('update <name>')
        .description('Replace the spec of a pool')
        .action((name: string, options: CommonOptions & PoolCreateOptions) =>
          runCommand(options, context => new PoolUpdateCommand(context), command => command.execute(name, options))
        )
    )
  );

  addCommonOptions(
    poolCommand
      .command('delete <name>')
      .description('Delete a pool')
      .action((name: string, options: CommonOptions) =>
        runCommand(options, context => new PoolDeleteCommand(context), command => command.execute(name))
      )
  );
}
