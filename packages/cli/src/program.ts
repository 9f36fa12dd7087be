import { Command } from 'commander';
import { registerMenuCommands } from './commands/menu/menu';
import type { MenuIOFactory } from './commands/menu/menu-command.types';
import type { DependencyInjectionService } from './services/dependency-injection';

export const CLI_VERSION = '1.0.0';

/**
 * Builds the roster commander program around one dependency service.
 */
export function createProgram(
  dependencyService: DependencyInjectionService,
  createIO?: MenuIOFactory
): Command {
  const program = new Command();

  program
    .name('roster')
    .description('In-memory student roster with an interactive menu')
    .version(CLI_VERSION);

  registerMenuCommands(program, dependencyService, createIO);

  return program;
}
