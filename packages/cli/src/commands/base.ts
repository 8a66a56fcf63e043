/**
 * @fileoverview Base command class and common functionality
 */

import { Command } from 'commander';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import chalk from 'chalk';
import { retry } from '@mcpfleet/shared';
import type { CommandContext, CommandResult, CommonOptions } from '../types';
import { formatOutput, isOutputFormat, loadConfig, printError, printWarning } from '../utils';

const USER_AGENT = 'mcpfleet-cli/0.1.0';

/**
 * Base command class
 */
export abstract class BaseCommand {
  protected readonly context: CommandContext;
  protected readonly httpClient: AxiosInstance;

  constructor(context: CommandContext, httpClient?: AxiosInstance) {
    this.context = context;

    this.httpClient = httpClient ?? axios.create({
      baseURL: context.gatewayUrl,
      timeout: context.config.defaultTimeout,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT
      }
    });

    this.setupHttpInterceptors();
  }

  /**
   * Execute the command
   */
  abstract execute(...args: never[]): Promise<CommandResult>;

  /**
   * Setup HTTP interceptors
   */
  private setupHttpInterceptors(): void {
    this.httpClient.interceptors.request.use(config => {
      if (this.context.verbose) {
        console.log(chalk.gray(`→ ${config.method?.toUpperCase()} ${config.baseURL ?? ''}${config.url ?? ''}`));
      }
      return config;
    });

    this.httpClient.interceptors.response.use(
      response => {
        if (this.context.verbose) {
          console.log(chalk.gray(`← ${response.status} ${response.statusText}`));
        }
        return response;
      },
      (error: unknown) => {
        if (this.context.verbose && axios.isAxiosError(error)) {
          console.error(chalk.gray(`← ${error.response?.status ?? 'no response'} ${error.message}`));
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Make HTTP request; only failures to reach the gateway are retried
   */
  protected async makeRequest<T>(
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    url: string,
    data?: unknown,
    params?: Record<string, string>
  ): Promise<T> {
    return retry(
      async () => {
        const response = await this.httpClient.request<T>({ method, url, data, params });
        return response.data;
      },
      {
        attempts: 3,
        delay: 500,
        shouldRetry: error => axios.isAxiosError(error) && error.response === undefined
      }
    );
  }

  /**
   * Output result based on format
   */
  public outputResult(result: CommandResult): void {
    if (!result.success) {
      printError(result.error ?? 'Command failed');
      process.exitCode = 1;
      return;
    }

    for (const warning of result.warnings ?? []) {
      printWarning(warning);
    }

    if (result.data !== undefined && !this.context.quiet) {
      console.log(formatOutput(result.data, this.context.outputFormat));
    }
  }
}

/**
 * Create command context from CLI options
 */
export async function createContext(options: CommonOptions): Promise<CommandContext> {
  const config = await loadConfig(options.config);

  const format = options.output ?? config.defaultOutputFormat;
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid output format "${format}". Must be one of: json, yaml, table, text`);
  }
  if (!config.enableColors) {
    chalk.level = 0;
  }

  return {
    config,
    gatewayUrl: options.gatewayUrl ?? process.env.MCPFLEET_GATEWAY_URL ?? config.defaultGatewayUrl,
    outputFormat: format,
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false
  };
}

/**
 * Add common options to command
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('-g, --gateway-url <url>', 'Gateway URL')
    .option('-o, --output <format>', 'Output format (json|yaml|table|text)')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output (minimal)')
    .option('-c, --config <file>', 'CLI configuration file path');
}

/**
 * Run a command built from the parsed options and print its result
 */
export async function runCommand<C extends BaseCommand>(
  options: CommonOptions,
  create: (context: CommandContext) => C,
  run: (command: C) => Promise<CommandResult>
): Promise<void> {
  const context = await createContext(options);
  const command = create(context);
  command.outputResult(await run(command));
}
