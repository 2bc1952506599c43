/**
 * User defaults management with smol-toml library
 * Loads defaults.toml so that author, email, description and the git choice
 * need not be repeated on every invocation. Feature toggles are command-line only.
 */

import { join } from 'path';
import { homedir } from 'os';
import { parse } from 'smol-toml';
import { z } from 'zod';
import type { IConfigManager, IFileSystemManager } from '../interfaces.js';
import type { ScaffoldDefaults } from '../types.js';
import { CONFIG_DIR_ENV, CONFIG_DIR_NAME, CONFIG_FILE_NAME, CONFIG_VERSION } from '../constants.js';
import { colors } from '../utils/colors.js';
import process from "node:process";

const defaultsFileSchema = z.object({
  config_version: z.number().int().optional(),
  author: z.string().optional(),
  email: z.string().optional(),
  description: z.string().optional(),
  git: z.boolean().optional(),
  features: z.unknown().optional()
});

/**
 * Resolve the directory holding defaults.toml: $FASTAPI_SCAFFOLD_HOME, else ~/.fastapi-scaffold
 */
export function getDefaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env[CONFIG_DIR_ENV];
  if (envDir) {
    return envDir;
  }
  return join(homedir(), CONFIG_DIR_NAME);
}

export class ConfigManager implements IConfigManager {
  private configPath: string;
  private fileSystemManager: IFileSystemManager;

  constructor(configDir: string, fileSystemManager: IFileSystemManager) {
    this.configPath = join(configDir, CONFIG_FILE_NAME);
    this.fileSystemManager = fileSystemManager;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load defaults.toml. A missing file yields empty defaults; an unreadable or
   * malformed one is reported and ignored.
   */
  public load(): ScaffoldDefaults {
    if (!this.fileSystemManager.isFile(this.configPath)) {
      return {};
    }

    let content: string;
    try {
      content = this.fileSystemManager.readFile(this.configPath);
    } catch (error) {
      console.warn(colors.yellow(`⚠ Could not read ${this.configPath}, using built-in defaults`));
      console.warn(colors.gray(`  ${error instanceof Error ? error.message : String(error)}`));
      return {};
    }

    let data: unknown;
    try {
      data = parse(content);
    } catch (error) {
      console.warn(colors.yellow(`⚠ Could not parse ${this.configPath}, using built-in defaults`));
      console.warn(colors.gray(`  ${error instanceof Error ? error.message : String(error)}`));
      return {};
    }

    const result = defaultsFileSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join('.') : 'file';
      console.warn(colors.yellow(`⚠ Ignoring ${this.configPath}: invalid value for ${where}`));
      return {};
    }

    const file = result.data;
    if (file.config_version !== undefined && file.config_version > CONFIG_VERSION) {
      console.warn(colors.yellow(`⚠ ${this.configPath} was written by a newer version; unknown keys are ignored`));
    }

    if (file.features !== undefined) {
      console.warn(colors.yellow(`⚠ Ignoring [features] in ${this.configPath}: toggles are set with --no-postgres, --no-redis, --no-docker and --celery`));
    }

    return this.transformDefaults(file);
  }

  private transformDefaults(file: z.infer<typeof defaultsFileSchema>): ScaffoldDefaults {
    const defaults: ScaffoldDefaults = {};

    if (file.author !== undefined) defaults.author = file.author;
    if (file.email !== undefined) defaults.email = file.email;
    if (file.description !== undefined) defaults.description = file.description;
    if (file.git !== undefined) defaults.git = file.git;

    return defaults;
  }
}
