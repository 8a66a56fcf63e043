/**
 * @fileoverview CLI commands export
 */

export { BaseCommand, createContext, addCommonOptions, runCommand } from './base';
export { addOperatorCommands, resolveOperatorSettings } from './operator';
export type { OperatorCommandOptions, OperatorSettings } from './operator';
export { addCrdCommand, renderCrds } from './crd';
export { addPoolCommands } from './pool';
export { addServerCommands } from './server';
export { addConfigCommands, parseConfigUpdate } from './config';
export { buildPoolSpec, buildServerSpec, buildTransport } from './options';
