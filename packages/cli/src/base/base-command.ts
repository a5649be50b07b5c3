/**
 * Base Command Class for the taskpool CLI
 *
 * Provides common output and error handling across all commands.
 */

import { Command } from 'commander';
import { Logger } from '@taskpool/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService: DependencyInjectionService;

  constructor(dependencyService: DependencyInjectionService = DependencyInjectionService.getInstance()) {
    this.dependencyService = dependencyService;
  }

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Log level for the run's loggers, derived from the output flags.
   * JSON output must stay parseable, so it silences logging.
   */
  protected logLevelFor(options: TOptions): Logger.LogLevel | undefined {
    if (options.json) return 'silent';
    if (options.quiet) return 'error';
    if (options.verbose) return 'debug';
    return undefined;
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(
    message: string,
    options: TOptions,
    error?: Error,
    exitCode: number = 1,
    data?: unknown
  ): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode,
        ...(data !== undefined && { data })
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }

  /**
   * Prints a detail line unless the output is JSON or quiet.
   */
  protected print(line: string, options: TOptions): void {
    if (!options.json && !options.quiet) {
      console.log(line);
    }
  }

  /**
   * Errors raised by Node's own modules can come from another realm and fail
   * `instanceof Error`.
   */
  protected errorMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return String(error);
  }
}
