export { MenuCommand } from './menu-command';
export { registerMenuCommands } from './menu';
export { MENU_LINES, MENU_PROMPTS, MENU_MESSAGES } from './menu-command.types';
export type { MenuCommandOptions, MenuIOFactory } from './menu-command.types';
