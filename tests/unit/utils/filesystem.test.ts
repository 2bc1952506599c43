/**
 * Unit tests for FileSystemManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { FileSystemManager, FileSystemError, DirectoryError, FileError } from '../../../src/utils/filesystem.js';

describe('FileSystemManager', () => {
  let fsManager: FileSystemManager;
  let testDir: string;

  beforeEach(() => {
    fsManager = new FileSystemManager();
    testDir = mkdtempSync(join(tmpdir(), 'fs-manager-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('createDirectory', () => {
    it('creates nested directories', () => {
      const nestedPath = join(testDir, 'level1', 'level2');

      fsManager.createDirectory(nestedPath);

      expect(fsManager.isDirectory(nestedPath)).toBe(true);
    });

    it('is idempotent', () => {
      const dirPath = join(testDir, 'app');
      fsManager.createDirectory(dirPath);

      expect(() => fsManager.createDirectory(dirPath)).not.toThrow();
    });

    it('refuses a path occupied by a file', () => {
      const filePath = join(testDir, 'taken');
      writeFileSync(filePath, 'x');

      expect(() => fsManager.createDirectory(filePath)).toThrow(DirectoryError);
    });
  });

  describe('writeFile', () => {
    it('creates missing parents and writes utf-8 text', () => {
      const filePath = join(testDir, 'app', 'core', 'config.py');

      fsManager.writeFile(filePath, 'name = "café"\n');

      expect(readFileSync(filePath, 'utf-8')).toBe('name = "café"\n');
    });

    it('truncates existing content', () => {
      const filePath = join(testDir, 'README.md');
      writeFileSync(filePath, 'a much longer previous body');

      fsManager.writeFile(filePath, 'short');

      expect(readFileSync(filePath, 'utf-8')).toBe('short');
    });

    it('writes empty placeholders', () => {
      const filePath = join(testDir, 'logs', '.gitkeep');

      fsManager.writeFile(filePath, '');

      expect(fsManager.isFile(filePath)).toBe(true);
      expect(readFileSync(filePath, 'utf-8')).toBe('');
    });

    it('wraps failures in a FileError carrying the path and cause', () => {
      const blocker = join(testDir, 'blocker');
      writeFileSync(blocker, 'x');
      const filePath = join(blocker, 'child.txt');

      try {
        fsManager.writeFile(filePath, 'content');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(FileError);
        expect(error).toBeInstanceOf(FileSystemError);
        if (error instanceof FileError) {
          expect(error.path).toBe(filePath);
          expect(error.operation).toBe('file');
          expect(error.message).toBe(`Failed to write file: ${filePath}`);
          expect(error.cause).toBeInstanceOf(DirectoryError);
        }
      }
    });
  });

  describe('readFile', () => {
    it('reads what was written', () => {
      const filePath = join(testDir, 'a.txt');
      fsManager.writeFile(filePath, 'hello');

      expect(fsManager.readFile(filePath)).toBe('hello');
    });

    it('throws FileError for a missing file', () => {
      expect(() => fsManager.readFile(join(testDir, 'missing.txt'))).toThrow(FileError);
    });
  });

  it('tells files and directories apart', () => {
    const filePath = join(testDir, 'f');
    fsManager.writeFile(filePath, '');

    expect(fsManager.isFile(filePath)).toBe(true);
    expect(fsManager.isDirectory(filePath)).toBe(false);
    expect(fsManager.isDirectory(testDir)).toBe(true);
    expect(fsManager.isFile(join(testDir, 'nope'))).toBe(false);
    expect(fsManager.isDirectory(join(testDir, 'nope'))).toBe(false);
  });
});
