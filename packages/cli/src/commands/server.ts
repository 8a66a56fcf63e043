/**
 * @fileoverview Server management commands
 */

import { Command } from 'commander';
import type { Server } from '@mcpfleet/core';
import type { CommandResult, CommonOptions } from '../types';
import { createResult, handleAsync, serverRow } from '../utils';
import { BaseCommand, addCommonOptions, runCommand } from './base';
import { buildServerSpec, collect, readSpecFile } from './options';
import type { ServerSpecOptions } from './options';

interface ServerUpdateOptions extends ServerSpecOptions {
  readonly file?: string;
}

interface ServerList {
  readonly servers: Server[];
}

abstract class ServerCommand extends BaseCommand {
  protected present(servers: Server[]): unknown {
    const format = this.context.outputFormat;
    return format === 'json' || format === 'yaml' ? servers : servers.map(serverRow);
  }

  protected presentOne(server: Server): unknown {
    const format = this.context.outputFormat;
    return format === 'json' || format === 'yaml' ? server : serverRow(server);
  }

  protected serverPath(name: string, action?: 'start' | 'stop'): string {
    const base = `/api/v1/servers/${encodeURIComponent(name)}`;
    return action ? `${base}/${action}` : base;
  }
}

/**
 * Server list command
 */
export class ServerListCommand extends ServerCommand {
  async execute(pool?: string): Promise<CommandResult> {
    const result = await handleAsync(
      this.makeRequest<ServerList>('GET', '/api/v1/servers', undefined, pool ? { pool } : undefined),
      'Failed to list servers'
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.present(result.data.servers));
  }
}

/**
 * Server get command
 */
export class ServerGetCommand extends ServerCommand {
  async execute(name: string): Promise<CommandResult> {
    const result = await handleAsync(this.makeRequest<Server>('GET', this.serverPath(name)), `Failed to get server ${name}`);
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Server create command
 */
export class ServerCreateCommand extends ServerCommand {
  async execute(name: string, options: ServerSpecOptions): Promise<CommandResult> {
    let spec: Record<string, unknown>;
    try {
      spec = buildServerSpec(options);
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }

    const result = await handleAsync(
      this.makeRequest<Server>('POST', '/api/v1/servers', { name, spec }),
      `Failed to create server ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Server update command; replaces the whole spec
 */
export class ServerUpdateCommand extends ServerCommand {
  async execute(name: string, options: ServerUpdateOptions): Promise<CommandResult> {
    let spec: unknown;
    try {
      spec = options.file ? await readSpecFile(options.file) : buildServerSpec(options);
    } catch (error) {
      return createResult(false, undefined, error instanceof Error ? error.message : String(error));
    }

    const result = await handleAsync(
      this.makeRequest<Server>('PUT', this.serverPath(name), { spec }),
      `Failed to update server ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Server start and stop commands
 */
export class ServerActionCommand extends ServerCommand {
  async execute(name: string, action: 'start' | 'stop'): Promise<CommandResult> {
    const result = await handleAsync(
      this.makeRequest<Server>('POST', this.serverPath(name, action)),
      `Failed to ${action} server ${name}`
    );
    if (!result.success || !result.data) return result;
    return createResult(true, this.presentOne(result.data));
  }
}

/**
 * Server delete command
 */
export class ServerDeleteCommand extends ServerCommand {
  async execute(name: string): Promise<CommandResult> {
    const result = await handleAsync(this.makeRequest<unknown>('DELETE', this.serverPath(name)), `Failed to delete server ${name}`);
    if (!result.success) return result;
    return createResult(true, { server: name, deleted: true });
  }
}

/**
 * Add server commands to program
 */
export function addServerCommands(program: Command): void {
  const serverCommand = program.command('server').description('Manage MCP servers');

  addCommonOptions(
    serverCommand
      .command('list')
      .description('List servers')
      .option('-p, --pool <pool>', 'Only servers of this pool')
      .action((options: CommonOptions & { pool?: string }) =>
        runCommand(options, context => new ServerListCommand(context), command => command.execute(options.pool))
      )
  );

  addCommonOptions(
    serverCommand
      .command('get <name>')
      .description('Show one server')
      .action((name: string, options: CommonOptions) =>
        runCommand(options, context => new ServerGetCommand(context), command => command.execute(name))
      )
  );

  addCommonOptions(
    serverCommand
      .command('create <name>')
      .description('Create a server in a pool')
      .option('-p, --pool <pool>', 'Pool the server belongs to')
      .option('--image <image>', 'Override the pool template image')
      .option('--idle-timeout <seconds>', 'Override the pool idle timeout')
      .option('--transport <type>', 'Override the pool transport (stdio|sse)')
      .option('--port <port>', 'Container port for the sse transport')
      .option('--env <KEY=VALUE>', 'Extra environment variable; repeatable', collect, [])
      .action((name: string, options: CommonOptions & ServerSpecOptions) =>
        runCommand(options, context => new ServerCreateCommand(context), command => command.execute(name, options))
      )
  );

  addCommonOptions(
    serverCommand
      .command('update <name>')
      .description('Replace the spec of a server')
      .option('-p, --pool <pool>', 'Pool the server belongs to')
      .option('--image <image>', 'Override the pool template image')
      .option('--idle-timeout <seconds>', 'Override the pool idle timeout')
      .option('--transport <type>', 'Override the pool transport (stdio|sse)')
      .option('--port <port>', 'Container port for the sse transport')
      .option('--env <KEY=VALUE>', 'Extra environment variable; repeatable', collect, [])
      .option('-f, --file <path>', 'Read the spec from a YAML or JSON file')
      .action((name: string, options: CommonOptions & ServerUpdateOptions) =>
        runCommand(options, context => new ServerUpdateCommand(context), command => command.execute(name, options))
      )
  );

  for (const action of ['start', 'stop'] as const) {
    addCommonOptions(
      serverCommand
        .command(`${action} <name>`)
        .description(action === 'start' ? 'Ask for a server to run' : 'Ask for a server to stay down')
        .action((name: string, options: CommonOptions) =>
          runCommand(options, context => new ServerActionCommand(context), command => command.execute(name, action))
        )
    );
  }

  addCommonOptions(
    serverCommand
      .command('delete <name>')
      .description('Delete a server')
      .action((name: string, options: CommonOptions) =>
        runCommand(options, context => new ServerDeleteCommand(context), command => command.execute(name))
      )
  );
}
