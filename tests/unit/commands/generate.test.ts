import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  cancel: vi.fn(),
  text: vi.fn(),
  isCancel: vi.fn(() => false),
  spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn(), message: vi.fn() })),
  log: { warn: vi.fn() }
}));

vi.mock('../../../src/utils/filesystem.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/filesystem.js')>();
  return {
    ...actual,
    FileSystemManager: vi.fn(function () {
      return new actual.FileSystemManager();
    })
  };
});

import * as clack from '@clack/prompts';
import { join } from 'path';
import { generateCommand, EXIT_FAILURE, EXIT_SUCCESS } from '../../../src/commands/generate.js';
import { VersionControlWarning } from '../../../src/errors.js';
import { FileSystemManager } from '../../../src/utils/filesystem.js';
import type { IConfigManager, IProjectCreator } from '../../../src/interfaces.js';
import type { GenerationResult, ScaffoldDefaults } from '../../../src/types.js';

const CWD = '/work';

function createMockCreator(result: Partial<GenerationResult> = {}) {
  const generate = vi.fn<IProjectCreator['generate']>(async (config) => ({
    rootPath: config.rootPath,
    directories: [],
    files: ['README.md'],
    snapshot: 'created',
    warnings: [],
    ...result
  }));
  const creator: IProjectCreator = { generate };
  return { creator, generate };
}

const configManagerWith = (defaults: ScaffoldDefaults = {}): IConfigManager => ({
  load: () => defaults,
  getConfigPath: () => '/home/tester/.fastapi-scaffold/defaults.toml'
});

describe('generateCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.mocked(clack.isCancel).mockReturnValue(false);
  });

  it('generates the project and exits with 0', async () => {
    const { creator, generate } = createMockCreator();

    const code = await generateCommand('My API', {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(code).toBe(EXIT_SUCCESS);
    const [config, options] = generate.mock.calls[0] ?? [];
    expect(config?.slug).toBe('my-api');
    expect(config?.rootPath).toBe(join(CWD, 'my-api'));
    expect(config?.features).toEqual({ database: true, cache: true, containerize: true, backgroundTasks: false });
    expect(options?.git).toBe(true);
  });

  it('builds no file system of its own when both collaborators are given', async () => {
    const { creator } = createMockCreator();

    await generateCommand('demo', {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(FileSystemManager).not.toHaveBeenCalled();
  });

  it('fails with 1 on an empty name without touching the disk', async () => {
    const { creator, generate } = createMockCreator();

    const code = await generateCommand(undefined, {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(generate).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Project name must not be empty'));
  });

  it('asks for the name on an interactive terminal', async () => {
    vi.mocked(clack.text).mockResolvedValue('Prompted API');
    const { creator, generate } = createMockCreator();

    await generateCommand(undefined, {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: true
    });

    expect(generate.mock.calls[0]?.[0].name).toBe('Prompted API');
  });

  it('stops when the prompt is cancelled', async () => {
    vi.mocked(clack.text).mockResolvedValue(Symbol('cancel'));
    vi.mocked(clack.isCancel).mockReturnValue(true);
    const { creator, generate } = createMockCreator();

    const code = await generateCommand(undefined, {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: true
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(clack.cancel).toHaveBeenCalledWith('Project creation cancelled.');
    expect(generate).not.toHaveBeenCalled();
  });

  it('applies defaults.toml below the command line', async () => {
    const { creator, generate } = createMockCreator();

    await generateCommand('demo', { author: 'Grace' }, {
      cwd: CWD,
      creator,
      configManager: configManagerWith({ author: 'Ada', email: 'ada@example.com', git: false }),
      interactive: false
    });

    const [config, options] = generate.mock.calls[0] ?? [];
    expect(config?.author).toBe('Grace');
    expect(config?.email).toBe('ada@example.com');
    expect(options?.git).toBe(false);
  });

  it('leaves background tasks off when --celery is omitted and a defaults file exists', async () => {
    const { creator, generate } = createMockCreator();

    await generateCommand('demo', {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith({ author: 'Ada', git: false }),
      interactive: false
    });

    expect(generate.mock.calls[0]?.[0].features).toEqual({
      database: true,
      cache: true,
      containerize: true,
      backgroundTasks: false
    });
  });

  it.each(['..', '.', 'a/b'])('refuses %s as a positional name without touching the disk', async (name) => {
    const { creator, generate } = createMockCreator();

    const code = await generateCommand(name, {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(generate).not.toHaveBeenCalled();
  });

  it('lets --no-git win', async () => {
    const { creator, generate } = createMockCreator();

    await generateCommand('demo', { git: false }, {
      cwd: CWD,
      creator,
      configManager: configManagerWith({ git: true }),
      interactive: false
    });

    expect(generate.mock.calls[0]?.[1]?.git).toBe(false);
  });

  it('prints snapshot warnings and still succeeds', async () => {
    const warning = new VersionControlWarning('git executable not found in PATH', 'git');
    const { creator } = createMockCreator({ snapshot: 'failed', warnings: [warning] });

    const code = await generateCommand('demo', {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(code).toBe(EXIT_SUCCESS);
    expect(clack.log.warn).toHaveBeenCalledWith(expect.stringContaining('git executable not found in PATH'));
  });

  it('exits with 1 when generation fails', async () => {
    const { creator, generate } = createMockCreator();
    generate.mockRejectedValueOnce(new Error('Failed to write file: /work/demo/README.md'));

    const code = await generateCommand('demo', {}, {
      cwd: CWD,
      creator,
      configManager: configManagerWith(),
      interactive: false
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Failed to create project: Failed to write file: /work/demo/README.md')
    );
  });
});
