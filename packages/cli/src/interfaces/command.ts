/**
 * Standard Command Interface for Roster CLI
 *
 * All commands implement these interfaces so they can be registered,
 * injected and tested the same way.
 */

import type { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute the command with given options
   * @param options - Command-specific options
   */
  execute(options: TOptions): Promise<void>;
}
