#!/usr/bin/env node

/**
 * Main CLI entry point for mcpfleet
 */

import { Command } from 'commander';
import { addConfigCommands, addCrdCommand, addOperatorCommands, addPoolCommands, addServerCommands } from './commands';
import { printError } from './utils';

const program = new Command();

program
  .name('mcpfleet')
  .description('Run and manage pools of ephemeral MCP servers on Kubernetes')
  .version('0.1.0');

addOperatorCommands(program);
addCrdCommand(program);
addPoolCommands(program);
addServerCommands(program);
addConfigCommands(program);

program.parseAsync().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
