/**
 * Git Handler - records the generated tree as the first commit of a new repository
 */

import { spawn } from 'child_process';
import which from 'which';
import type { IVersionControl } from '../interfaces.js';
import type { SnapshotResult } from '../types.js';
import { VersionControlWarning } from '../errors.js';
import { GIT_COMMAND_TIMEOUT_MS, GIT_COMMIT_MESSAGE } from '../constants.js';

export interface CommandResult {
  success: boolean;
  output?: string;
  error?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  cwd: string,
  timeoutMs: number
) => Promise<CommandResult>;

export type ExecutableLocator = () => string | null;

export const findGitExecutable: ExecutableLocator = () => which.sync('git', { nothrow: true });

/**
 * Run a command to completion. Resolves with the outcome and never rejects;
 * a command still running after `timeoutMs` is killed.
 */
export function runCommand(
  command: string,
  args: string[],
  cwd: string,
  timeoutMs: number
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let settled = false;
    const finish = (result: CommandResult) => {
      if (!settled) {
        settled = true;
        clearTimeout(timeout);
        resolve(result);
      }
    };

    const child = spawn(command, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        finish({ success: true, output: stdout });
      } else {
        finish({ success: false, error: stderr.trim() || `Command exited with code ${code}` });
      }
    });

    child.on('error', (error) => {
      finish({ success: false, error: `Failed to start command: ${error.message}` });
    });

    const timeout = setTimeout(() => {
      child.kill('SIGTERM');
      finish({ success: false, error: `Command timed out after ${timeoutMs / 1000} seconds` });
    }, timeoutMs);
  });
}

export class GitHandler implements IVersionControl {
  constructor(
    private runner: CommandRunner = runCommand,
    private locateGit: ExecutableLocator = findGitExecutable,
    private timeoutMs: number = GIT_COMMAND_TIMEOUT_MS
  ) {}

  public async snapshot(
    projectPath: string,
    onProgress?: (message: string) => void
  ): Promise<SnapshotResult> {
    onProgress?.('Locating git...');

    const gitPath = this.locateGit();
    if (!gitPath) {
      return {
        success: false,
        warning: new VersionControlWarning('git executable not found in PATH', 'git')
      };
    }

    const steps: string[][] = [
      ['init'],
      ['add', '.'],
      ['commit', '-m', GIT_COMMIT_MESSAGE]
    ];

    for (const args of steps) {
      const command = `git ${args.join(' ')}`;
      onProgress?.(`Running ${command}`);

      const result = await this.runner(gitPath, args, projectPath, this.timeoutMs);
      if (!result.success) {
        return {
          success: false,
          warning: new VersionControlWarning(
            `${command} failed: ${result.error ?? 'unknown error'}`,
            command
          )
        };
      }
    }

    return { success: true };
  }
}
