import { MenuCommand } from './menu-command';
import { MENU_LINES, MENU_MESSAGES, MENU_PROMPTS } from './menu-command.types';
import type { MenuCommandOptions } from './menu-command.types';
import { ScriptedMenuIO, createTestDependencies } from './menu-test-helpers';
import { DependencyInjectionService } from '../../services/dependency-injection';

describe('MenuCommand', () => {
  let dependencies: DependencyInjectionService;

  beforeEach(() => {
    dependencies = createTestDependencies();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function runMenu(answers: string[], options: MenuCommandOptions = {}): Promise<ScriptedMenuIO> {
    const io = new ScriptedMenuIO(answers);
    const command = new MenuCommand(dependencies, () => io);
    await command.execute(options);
    return io;
  }

  describe('menu loop', () => {
    it('should print the menu before every choice and say goodbye on exit', async () => {
      const io = await runMenu(['5']);

      expect(io.written).toEqual([...MENU_LINES, 'Goodbye.']);
      expect(io.prompts).toEqual([MENU_PROMPTS.choice]);
      expect(io.closed).toBe(true);
    });

    it('should reject unknown options and keep going', async () => {
      const io = await runMenu(['7', 'add', '5']);

      expect(io.messages()).toEqual([
        MENU_MESSAGES.invalidOption,
        MENU_MESSAGES.invalidOption,
        MENU_MESSAGES.goodbye,
      ]);
    });

    it('should accept a choice surrounded by whitespace', async () => {
      const io = await runMenu([' 4 ', '5']);

      expect(io.messages()).toEqual(['No students found.', 'Goodbye.']);
    });

    it('should end quietly when input ends at the choice prompt', async () => {
      const io = await runMenu([]);

      expect(io.written).toEqual([...MENU_LINES]);
      expect(io.closed).toBe(true);
    });

    it('should end quietly when input ends part way through an add', async () => {
      const io = await runMenu(['1', '1', 'Alice']);

      expect(io.prompts).toEqual([
        MENU_PROMPTS.choice,
        MENU_PROMPTS.id,
        MENU_PROMPTS.name,
        MENU_PROMPTS.age,
      ]);
      expect(io.messages()).toEqual([]);

      const adapter = await dependencies.getStudentAdapter();
      expect(adapter.getStudent(1)).toBeNull();
    });
  });

  describe('add', () => {
    it('should add a student and list it', async () => {
      const io = await runMenu(['1', '1', 'Alice', '20', 'CS', '4', '5']);

      expect(io.prompts).toEqual([
        MENU_PROMPTS.choice,
        MENU_PROMPTS.id,
        MENU_PROMPTS.name,
        MENU_PROMPTS.age,
        MENU_PROMPTS.major,
        MENU_PROMPTS.choice,
        MENU_PROMPTS.choice,
      ]);
      expect(io.messages()).toEqual([
        'Student 1 added.',
        'ID: 1, Name: Alice, Age: 20, Major: CS',
        'Goodbye.',
      ]);
    });

    it('should keep the first record when the id is added twice', async () => {
      const io = await runMenu([
        '1', '1', 'Alice', '20', 'CS',
        '1', '1', 'Bob', '30', 'Math',
        '4', '5',
      ]);

      expect(io.messages()).toEqual([
        'Student 1 added.',
        'Student with ID 1 already exists.',
        'ID: 1, Name: Alice, Age: 20, Major: CS',
        'Goodbye.',
      ]);
    });

    it('should re-prompt until integer answers parse', async () => {
      const io = await runMenu(['1', 'abc', '1', 'Alice', '20.5', '20', 'CS', '5']);

      expect(io.prompts).toEqual([
        MENU_PROMPTS.choice,
        MENU_PROMPTS.id,
        MENU_PROMPTS.id,
        MENU_PROMPTS.name,
        MENU_PROMPTS.age,
        MENU_PROMPTS.age,
        MENU_PROMPTS.major,
        MENU_PROMPTS.choice,
      ]);
      expect(io.messages()).toEqual([
        MENU_MESSAGES.invalidInteger,
        MENU_MESSAGES.invalidInteger,
        'Student 1 added.',
        'Goodbye.',
      ]);
    });

    it('should trim text answers', async () => {
      await runMenu(['1', '3', '  Carol ', '22', ' Physics', '5']);

      const adapter = await dependencies.getStudentAdapter();
      expect(adapter.getStudent(3)).toEqual({ id: 3, name: 'Carol', age: 22, major: 'Physics' });
    });
  });

  describe('delete', () => {
    it('should report a missing id', async () => {
      const io = await runMenu(['2', '9', '5']);

      expect(io.messages()).toEqual(['Student with ID 9 not found.', 'Goodbye.']);
    });

    it('should remove an existing student', async () => {
      const io = await runMenu(['1', '1', 'Alice', '20', 'CS', '2', '1', '4', '5']);

      expect(io.messages()).toEqual([
        'Student 1 added.',
        'Student 1 removed.',
        'No students found.',
        'Goodbye.',
      ]);
    });
  });

  describe('update', () => {
    it('should leave fields alone when answers are blank', async () => {
      const io = await runMenu([
        '1', '1', 'Alice', '20', 'CS',
        '3', '1', '', '21', '',
        '4', '5',
      ]);

      expect(io.prompts.slice(6, 10)).toEqual([
        MENU_PROMPTS.id,
        MENU_PROMPTS.newName,
        MENU_PROMPTS.newAge,
        MENU_PROMPTS.newMajor,
      ]);
      expect(io.messages()).toEqual([
        'Student 1 added.',
        'Student 1 updated.',
        'ID: 1, Name: Alice, Age: 21, Major: CS',
        'Goodbye.',
      ]);
    });

    it('should overwrite every answered field', async () => {
      await runMenu([
        '1', '1', 'Alice', '20', 'CS',
        '3', '1', 'Bob', '0', 'Math',
        '5',
      ]);

      const adapter = await dependencies.getStudentAdapter();
      expect(adapter.getStudent(1)).toEqual({ id: 1, name: 'Bob', age: 0, major: 'Math' });
    });

    it('should re-prompt for a malformed new age', async () => {
      const io = await runMenu([
        '1', '1', 'Alice', '20', 'CS',
        '3', '1', '', 'old', '', '',
        '5',
      ]);

      expect(io.messages()).toEqual([
        'Student 1 added.',
        MENU_MESSAGES.invalidInteger,
        'Student 1 updated.',
        'Goodbye.',
      ]);
    });

    it('should report a missing id after collecting the answers', async () => {
      const io = await runMenu(['3', '4', 'Bob', '', '', '5']);

      expect(io.messages()).toEqual(['Student with ID 4 not found.', 'Goodbye.']);
    });
  });

  describe('--json', () => {
    it('should print outcomes and listings as JSON', async () => {
      const io = await runMenu(['1', '1', 'Alice', '20', 'CS', '4', '2', '5', '5'], { json: true });

      const [added, listing, missing, goodbye] = io.messages();

      expect(goodbye).toBe('Goodbye.');
      expect(JSON.parse(added ?? '')).toEqual({
        status: 'added',
        student: { id: 1, name: 'Alice', age: 20, major: 'CS' },
      });
      expect(JSON.parse(listing ?? '')).toEqual({
        status: 'listed',
        students: [{ id: 1, name: 'Alice', age: 20, major: 'CS' }],
        lines: ['ID: 1, Name: Alice, Age: 20, Major: CS'],
      });
      expect(JSON.parse(missing ?? '')).toEqual({ status: 'not_found', id: 5 });
    });
  });

  describe('log level flags', () => {
    it('should switch the shared logger to debug under --verbose', async () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      await runMenu(['5'], { verbose: true });

      expect(logSpy).toHaveBeenCalledWith('[roster] menu choice "5"');
    });

    it('should stay silent without --verbose', async () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      await runMenu(['5']);

      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('error handling', () => {
    function failingDependencies(): DependencyInjectionService {
      return new DependencyInjectionService({
        configStore: { loadConfig: jest.fn().mockRejectedValue(new Error('config unavailable')) },
      });
    }

    function mockExit(): jest.SpyInstance {
      return jest.spyOn(process, 'exit').mockImplementation((): never => {
        throw new Error('process.exit called');
      });
    }

    it('should print a ❌ message and exit with code 1', async () => {
      const exitSpy = mockExit();
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const io = new ScriptedMenuIO(['5']);
      const command = new MenuCommand(failingDependencies(), () => io);

      await expect(command.execute({})).rejects.toThrow('process.exit called');

      expect(errorSpy).toHaveBeenCalledWith('❌ Menu failed: config unavailable');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(io.closed).toBe(true);
    });

    it('should print a JSON error document under --json', async () => {
      mockExit();
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const command = new MenuCommand(failingDependencies(), () => new ScriptedMenuIO([]));

      await expect(command.execute({ json: true })).rejects.toThrow('process.exit called');

      expect(logSpy).toHaveBeenCalledWith(JSON.stringify({
        success: false,
        error: 'Menu failed: config unavailable',
        exitCode: 1,
      }, null, 2));
    });
  });
});
