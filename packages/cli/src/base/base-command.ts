/**
 * Base Command Class for Roster CLI
 *
 * Provides common functionality and enforces standards across all commands.
 * Dependencies arrive through the constructor; there is no global container.
 */

import type { Command } from 'commander';
import type { Logger } from '@roster/core';
import type { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand, IExecutableCommand<TOptions> {

  constructor(protected readonly dependencyService: DependencyInjectionService) { }

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Execute the main command action
   */
  abstract execute(options: TOptions): Promise<void>;

  /**
   * Applies --verbose / --quiet to the shared logger.
   * --verbose wins when both are given.
   */
  protected async applyLogLevel(options: TOptions): Promise<Logger.Logger> {
    const logger = await this.dependencyService.getLogger();
    if (options.verbose) {
      logger.setLevel('debug');
    } else if (options.quiet) {
      logger.setLevel('error');
    }
    return logger;
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
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
}
