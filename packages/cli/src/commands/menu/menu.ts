import type { Command } from 'commander';
import { MenuCommand } from './menu-command';
import type { MenuIOFactory } from './menu-command.types';
import type { DependencyInjectionService } from '../../services/dependency-injection';

/**
 * Register the menu command following the Roster CLI standard
 */
export function registerMenuCommands(
  program: Command,
  dependencyService: DependencyInjectionService,
  createIO?: MenuIOFactory
): MenuCommand {
  const menuCommand = createIO
    ? new MenuCommand(dependencyService, createIO)
    : new MenuCommand(dependencyService);

  menuCommand.register(program);
  return menuCommand;
}
