/**
 * @fileoverview Common types shared across mcpfleet packages
 */

/**
 * Log level enumeration
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent'
}

/**
 * Source of the current time; injected so lifecycle decisions can be tested
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Milliseconds between an ISO timestamp and `now`
 */
export function elapsedMs(since: string, now: Date): number {
  return now.getTime() - Date.parse(since);
}
