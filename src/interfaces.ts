/**
 * Core interfaces for the scaffolder
 * These interfaces define the contracts between the CLI, the generation engine
 * and the outside world (file system, version control).
 */

import type {
  GenerationOptions,
  GenerationResult,
  ProjectConfig,
  ScaffoldDefaults,
  SnapshotResult
} from './types.js';

// File system operations interface
export interface IFileSystemManager {
  createDirectory(path: string, recursive?: boolean): void;
  writeFile(path: string, content: string): void;
  readFile(path: string): string;
  isDirectory(path: string): boolean;
  isFile(path: string): boolean;
}

// User defaults (defaults.toml) interface
export interface IConfigManager {
  load(): ScaffoldDefaults;
  getConfigPath(): string;
}

// Version-control snapshot interface
export interface IVersionControl {
  /**
   * Initialise a repository in `projectPath` and commit everything in it.
   * Never rejects: failures come back as a warning on the result.
   */
  snapshot(projectPath: string, onProgress?: (message: string) => void): Promise<SnapshotResult>;
}

// Project generation interface
export interface IProjectCreator {
  generate(config: ProjectConfig, options?: GenerationOptions): Promise<GenerationResult>;
}
