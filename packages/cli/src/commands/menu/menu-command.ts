import type { Command } from 'commander';
import { Adapters } from '@roster/core';
import type { Logger, Records } from '@roster/core';
import { BaseCommand } from '../../base/base-command';
import { ReadlineMenuIO } from '../../services/menu-io';
import type { MenuIO } from '../../services/menu-io';
import type { DependencyInjectionService } from '../../services/dependency-injection';
import { parseInteger } from '../../utils/input-parser';
import { MENU_LINES, MENU_MESSAGES, MENU_PROMPTS } from './menu-command.types';
import type { MenuCommandOptions, MenuIOFactory } from './menu-command.types';

/**
 * Per-session state handed to every menu action.
 */
type MenuSession = {
  io: MenuIO;
  adapter: Adapters.IStudentAdapter;
  logger: Logger.Logger;
  options: MenuCommandOptions;
};

/**
 * An optional answer: `value` is undefined when the user left it blank.
 * The whole answer is null when input ended.
 */
type OptionalAnswer<T> = { value: T | undefined } | null;

/**
 * MenuCommand - Interactive student menu
 *
 * Collects field values from the terminal, validates their shape and hands
 * them to StudentAdapter. Malformed numbers are re-prompted here and never
 * reach the facade. End of input closes the menu quietly.
 */
export class MenuCommand extends BaseCommand<MenuCommandOptions> {

  constructor(
    dependencyService: DependencyInjectionService,
    private readonly createIO: MenuIOFactory = () => new ReadlineMenuIO()
  ) {
    super(dependencyService);
  }

  register(program: Command): void {
    program
      .command('menu', { isDefault: true })
      .description('Open the interactive student menu (default)')
      .option('--json', 'Print outcomes as JSON')
      .option('-v, --verbose', 'Enable debug logging')
      .option('-q, --quiet', 'Only log errors')
      .action(async (options: MenuCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: MenuCommandOptions): Promise<void> {
    const io = this.createIO();

    try {
      const logger = await this.applyLogLevel(options);
      const adapter = await this.dependencyService.getStudentAdapter();

      await this.runLoop({ io, adapter, logger, options });
    } catch (error) {
      this.handleError(
        `Menu failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    } finally {
      io.close();
    }
  }

  private async runLoop(session: MenuSession): Promise<void> {
    const { io, logger } = session;

    for (;;) {
      for (const line of MENU_LINES) {
        io.write(line);
      }

      const choice = await io.ask(MENU_PROMPTS.choice);
      if (choice === null) {
        logger.debug('input ended, leaving menu');
        return;
      }

      const option = choice.trim();
      logger.debug(`menu choice "${option}"`);

      let keepGoing: boolean;
      switch (option) {
        case '1':
          keepGoing = await this.addStudent(session);
          break;
        case '2':
          keepGoing = await this.deleteStudent(session);
          break;
        case '3':
          keepGoing = await this.updateStudent(session);
          break;
        case '4':
          this.listStudents(session);
          keepGoing = true;
          break;
        case '5':
          io.write(MENU_MESSAGES.goodbye);
          return;
        default:
          io.write(MENU_MESSAGES.invalidOption);
          keepGoing = true;
      }

      if (!keepGoing) {
        logger.debug('input ended, leaving menu');
        return;
      }
    }
  }

  // ===== MENU ACTIONS =====
  // Each returns false when input ended part way through.

  private async addStudent(session: MenuSession): Promise<boolean> {
    const { io } = session;

    const id = await this.askInteger(io, MENU_PROMPTS.id);
    if (id === null) return false;
    const name = await this.askText(io, MENU_PROMPTS.name);
    if (name === null) return false;
    const age = await this.askInteger(io, MENU_PROMPTS.age);
    if (age === null) return false;
    const major = await this.askText(io, MENU_PROMPTS.major);
    if (major === null) return false;

    this.report(session, session.adapter.addStudent({ id, name, age, major }));
    return true;
  }

  private async deleteStudent(session: MenuSession): Promise<boolean> {
    const id = await this.askInteger(session.io, MENU_PROMPTS.id);
    if (id === null) return false;

    this.report(session, session.adapter.deleteStudent(id));
    return true;
  }

  private async updateStudent(session: MenuSession): Promise<boolean> {
    const { io } = session;

    const id = await this.askInteger(io, MENU_PROMPTS.id);
    if (id === null) return false;
    const name = await this.askText(io, MENU_PROMPTS.newName);
    if (name === null) return false;
    const age = await this.askOptionalInteger(io, MENU_PROMPTS.newAge);
    if (age === null) return false;
    const major = await this.askText(io, MENU_PROMPTS.newMajor);
    if (major === null) return false;

    const changes: Records.StudentUpdate = {};
    if (name !== '') changes.name = name;
    if (age.value !== undefined) changes.age = age.value;
    if (major !== '') changes.major = major;

    this.report(session, session.adapter.updateStudent(id, changes));
    return true;
  }

  private listStudents(session: MenuSession): void {
    const listing = session.adapter.listStudents();

    if (session.options.json) {
      session.io.write(JSON.stringify(listing));
      return;
    }
    for (const line of Adapters.describeListing(listing)) {
      session.io.write(line);
    }
  }

  // ===== PRIVATE HELPER METHODS =====

  private report(session: MenuSession, outcome: Adapters.StudentOutcome): void {
    session.io.write(
      session.options.json ? JSON.stringify(outcome) : Adapters.describeOutcome(outcome)
    );
  }

  private async askText(io: MenuIO, prompt: string): Promise<string | null> {
    const answer = await io.ask(prompt);
    return answer === null ? null : answer.trim();
  }

  private async askInteger(io: MenuIO, prompt: string): Promise<number | null> {
    for (;;) {
      const answer = await io.ask(prompt);
      if (answer === null) return null;

      const value = parseInteger(answer);
      if (value !== null) return value;

      io.write(MENU_MESSAGES.invalidInteger);
    }
  }

  private async askOptionalInteger(io: MenuIO, prompt: string): Promise<OptionalAnswer<number>> {
    for (;;) {
      const answer = await io.ask(prompt);
      if (answer === null) return null;
      if (answer.trim() === '') return { value: undefined };

      const value = parseInteger(answer);
      if (value !== null) return { value };

      io.write(MENU_MESSAGES.invalidInteger);
    }
  }
}
