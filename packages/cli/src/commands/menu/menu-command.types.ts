import type { BaseCommandOptions } from '../../interfaces/command';
import type { MenuIO } from '../../services/menu-io';

export type MenuCommandOptions = BaseCommandOptions;

/**
 * Builds the terminal port for one menu session.
 */
export type MenuIOFactory = () => MenuIO;

export const MENU_LINES: readonly string[] = [
  '=== Student Manager ===',
  '1. Add student',
  '2. Delete student',
  '3. Update student',
  '4. List students',
  '5. Exit',
];

export const MENU_PROMPTS = {
  choice: 'Choose an option: ',
  id: 'Student ID: ',
  name: 'Name: ',
  age: 'Age: ',
  major: 'Major: ',
  newName: 'New name (blank to keep): ',
  newAge: 'New age (blank to keep): ',
  newMajor: 'New major (blank to keep): ',
} as const;

export const MENU_MESSAGES = {
  invalidOption: 'Invalid option. Choose 1-5.',
  invalidInteger: 'Please enter a whole number.',
  goodbye: 'Goodbye.',
} as const;
