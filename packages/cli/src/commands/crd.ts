/**
 * @fileoverview Print the CustomResourceDefinitions the operator needs
 */

import { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';
import { customResourceDefinitions } from '@mcpfleet/controller';

/**
 * All definitions as one multi-document YAML stream, ready for `kubectl apply -f -`
 */
export function renderCrds(): string {
  return customResourceDefinitions()
    .map(definition => stringifyYaml(definition))
    .join('---\n');
}

export function addCrdCommand(program: Command): void {
  program
    .command('crd')
    .description('Print the MCPPool and MCPServer CustomResourceDefinitions as YAML')
    .action(() => {
      process.stdout.write(renderCrds());
    });
}
