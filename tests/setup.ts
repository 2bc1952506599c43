/**
 * Shared helpers for the test suite
 */

import { dirname } from 'path';
import type { IFileSystemManager } from '../src/interfaces.js';
import type { ProjectConfig, RawProjectArgs } from '../src/types.js';
import { resolveProjectConfig } from '../src/core/project-config.js';

export const TEST_SECRET = 'test-secret';
export const TEST_CWD = '/work';

/**
 * Build a config the way the CLI does, with a fixed secret and working directory.
 */
export function makeConfig(args: Partial<RawProjectArgs> = {}): ProjectConfig {
  return resolveProjectConfig(
    { name: 'My API', ...args },
    { cwd: TEST_CWD, defaults: {}, generateSecret: () => TEST_SECRET }
  );
}

/**
 * In-memory IFileSystemManager. Records every mutating call in `operations`.
 */
export class MemoryFileSystem implements IFileSystemManager {
  public files = new Map<string, string>();
  public directories = new Set<string>();
  public operations: string[] = [];

  createDirectory(path: string): void {
    this.operations.push(`mkdir ${path}`);
    this.directories.add(path);
  }

  writeFile(path: string, content: string): void {
    this.operations.push(`write ${path}`);
    this.directories.add(dirname(path));
    this.files.set(path, content);
  }

  readFile(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`File not found: ${path}`);
    }
    return content;
  }

  isDirectory(path: string): boolean {
    return this.directories.has(path);
  }

  isFile(path: string): boolean {
    return this.files.has(path);
  }
}
