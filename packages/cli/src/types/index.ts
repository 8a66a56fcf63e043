/**
 * @fileoverview CLI types and interfaces
 */

/**
 * CLI configuration
 */
export interface CLIConfig {
  defaultGatewayUrl: string;
  defaultOutputFormat: OutputFormat;
  defaultTimeout: number;
  enableColors: boolean;
  configFile?: string;
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'yaml' | 'table' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'table', 'text'];

/**
 * Command context
 */
export interface CommandContext {
  readonly config: CLIConfig;
  readonly gatewayUrl: string;
  readonly outputFormat: OutputFormat;
  readonly verbose: boolean;
  readonly quiet: boolean;
}

/**
 * Options every resource command accepts
 */
export interface CommonOptions {
  readonly gatewayUrl?: string;
  readonly output?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly config?: string;
}

/**
 * CLI command result
 */
export interface CommandResult<T = unknown> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: string;
  readonly warnings?: string[];
}

/**
 * Error body returned by the gateway
 */
export interface ApiErrorBody {
  readonly error: string;
  readonly message: string;
  readonly timestamp?: string;
}

/**
 * Configuration validation result
 */
export interface ConfigValidation {
  readonly valid: boolean;
  readonly errors: string[];
  readonly warnings: string[];
}
