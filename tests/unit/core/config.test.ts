/**
 * Unit tests for ConfigManager (defaults.toml)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { homedir } from 'os';
import { ConfigManager, getDefaultConfigDir } from '../../../src/core/config.js';
import { MemoryFileSystem } from '../../setup.js';

const CONFIG_DIR = '/home/tester/.fastapi-scaffold';
const CONFIG_PATH = join(CONFIG_DIR, 'defaults.toml');

describe('getDefaultConfigDir', () => {
  it('honours FASTAPI_SCAFFOLD_HOME', () => {
    expect(getDefaultConfigDir({ FASTAPI_SCAFFOLD_HOME: '/opt/scaffold' })).toBe('/opt/scaffold');
  });

  it('falls back to ~/.fastapi-scaffold', () => {
    expect(getDefaultConfigDir({})).toBe(join(homedir(), '.fastapi-scaffold'));
  });
});

describe('ConfigManager', () => {
  let fileSystem: MemoryFileSystem;
  let configManager: ConfigManager;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem();
    configManager = new ConfigManager(CONFIG_DIR, fileSystem);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('points at defaults.toml inside the config directory', () => {
    expect(configManager.getConfigPath()).toBe(CONFIG_PATH);
  });

  it('returns empty defaults when the file is missing', () => {
    expect(configManager.load()).toEqual({});
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('loads every supported key', () => {
    fileSystem.writeFile(CONFIG_PATH, [
      'config_version = 1',
      'author = "Ada Lovelace"',
      'email = "ada@example.com"',
      'description = "Analytical services"',
      'git = false',
      ''
    ].join('\n'));

    expect(configManager.load()).toEqual({
      author: 'Ada Lovelace',
      email: 'ada@example.com',
      description: 'Analytical services',
      git: false
    });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('leaves unset keys out', () => {
    fileSystem.writeFile(CONFIG_PATH, 'git = true\n');

    expect(configManager.load()).toEqual({ git: true });
  });

  it('ignores a [features] table and says so', () => {
    fileSystem.writeFile(CONFIG_PATH, 'author = "Ada"\n\n[features]\nbackground_tasks = true\n');

    expect(configManager.load()).toEqual({ author: 'Ada' });
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Ignoring [features] in ${CONFIG_PATH}`));
  });

  it('warns and ignores a file that is not valid TOML', () => {
    fileSystem.writeFile(CONFIG_PATH, 'author = "unterminated\n');

    expect(configManager.load()).toEqual({});
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Could not parse ${CONFIG_PATH}`));
  });

  it('warns and ignores a value of the wrong type', () => {
    fileSystem.writeFile(CONFIG_PATH, 'git = "yes"\n');

    expect(configManager.load()).toEqual({});
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('invalid value for git'));
  });

  it('warns about a file written by a newer version but still uses it', () => {
    fileSystem.writeFile(CONFIG_PATH, 'config_version = 2\nauthor = "Ada"\n');

    expect(configManager.load()).toEqual({ author: 'Ada' });
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('was written by a newer version'));
  });

  it('warns when the file cannot be read', () => {
    fileSystem.isFile = () => true;

    expect(configManager.load()).toEqual({});
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Could not read ${CONFIG_PATH}`));
  });
});
