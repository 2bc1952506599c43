/**
 * File System Manager
 *
 * Handles the file system operations of the scaffolder: directory creation
 * and file writes and reads.
 */

import { existsSync, mkdirSync, statSync, writeFileSync, readFileSync } from 'fs';
import { dirname } from 'path';
import type { IFileSystemManager } from '../interfaces.js';

/**
 * Custom error types for file system operations
 */
export class FileSystemError extends Error {
  public operation: string;
  public path: string;
  public override cause?: Error;

  constructor(message: string, operation: string, path: string, cause?: Error) {
    super(message);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = path;
    this.cause = cause;
  }
}

export class DirectoryError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'directory', path, cause);
    this.name = 'DirectoryError';
  }
}

export class FileError extends FileSystemError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, 'file', path, cause);
    this.name = 'FileError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class FileSystemManager implements IFileSystemManager {

  /**
   * Creates a directory at the specified path. Existing directories are left alone.
   * @param recursive - Whether to create parent directories (default: true)
   */
  createDirectory(path: string, recursive: boolean = true): void {
    try {
      if (!existsSync(path)) {
        mkdirSync(path, { recursive });
      } else if (!statSync(path).isDirectory()) {
        throw new Error(`Path exists and is not a directory: ${path}`);
      }
    } catch (error) {
      throw new DirectoryError(`Failed to create directory: ${path}`, path, toError(error));
    }
  }

  /**
   * Writes content to a file, truncating whatever was there before.
   * The parent directory is created when missing.
   */
  writeFile(path: string, content: string): void {
    try {
      this.createDirectory(dirname(path));
      writeFileSync(path, content, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to write file: ${path}`, path, toError(error));
    }
  }

  readFile(path: string): string {
    try {
      if (!existsSync(path)) {
        throw new Error(`File does not exist: ${path}`);
      }
      return readFileSync(path, 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to read file: ${path}`, path, toError(error));
    }
  }

  isDirectory(path: string): boolean {
    try {
      return existsSync(path) && statSync(path).isDirectory();
    } catch {
      return false;
    }
  }

  isFile(path: string): boolean {
    try {
      return existsSync(path) && statSync(path).isFile();
    } catch {
      return false;
    }
  }
}
