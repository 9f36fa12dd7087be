import { Memory } from '@roster/core';
import type { Config } from '@roster/core';
import type { MenuIO } from '../../services/menu-io';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { MENU_LINES } from './menu-command.types';

/**
 * MenuIO that replays scripted answers and records everything shown.
 * Returns null once the script runs out, like a closed stdin.
 */
export class ScriptedMenuIO implements MenuIO {
  readonly prompts: string[] = [];
  readonly written: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  write(line: string): void {
    this.written.push(line);
  }

  close(): void {
    this.closed = true;
  }

  /** Written lines without the repeated menu banner */
  messages(): string[] {
    return this.written.filter(line => !MENU_LINES.includes(line));
  }
}

/**
 * Builds an isolated dependency service over an in-memory config.
 */
export function createTestDependencies(config: Config.RosterConfig = { logLevel: 'silent' }): DependencyInjectionService {
  const configStore = new Memory.MemoryConfigStore();
  configStore.setConfig(config);
  return new DependencyInjectionService({ configStore });
}
