/**
 * @fileoverview Programmatic entry to the mcpfleet CLI building blocks
 */

export * from './commands';
export * from './utils';
export * from './types';
