/**
 * Error types raised outside the file system layer.
 * File system failures use the FileSystemError family in utils/filesystem.
 */

export type ConfigErrorReason = 'EmptyName' | 'InvalidField';

/**
 * Bad or missing generation input. Always raised before anything is written.
 */
export class ConfigError extends Error {
  public readonly reason: ConfigErrorReason;
  public readonly field: string;

  constructor(reason: ConfigErrorReason, field: string, message?: string) {
    super(message ?? (reason === 'EmptyName'
      ? 'Project name must not be empty'
      : `Invalid value for ${field}`));
    this.name = 'ConfigError';
    this.reason = reason;
    this.field = field;
  }
}

/**
 * A version-control step that did not complete. Reported, never fatal:
 * the generated tree is usable without history.
 */
export class VersionControlWarning extends Error {
  public readonly command: string;
  public override cause?: Error;

  constructor(message: string, command: string, cause?: Error) {
    super(message);
    this.name = 'VersionControlWarning';
    this.command = command;
    this.cause = cause;
  }
}
