/**
 * @wp-promote/shared - Error Classes
 *
 * FatalPrecondition  -> aborts before any mutation
 * FatalStage         -> aborts mid-pipeline, restore from backup
 * Recoverable warnings are never thrown; they are logged and collected.
 */

export class PromoteError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PromoteError';
    this.code = code;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigError extends PromoteError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class FatalPreconditionError extends PromoteError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FATAL_PRECONDITION', details);
    this.name = 'FatalPreconditionError';
  }
}

export class FatalStageError extends PromoteError {
  public readonly stage: string;

  constructor(stage: string, message: string, details?: Record<string, unknown>) {
    super(message, 'FATAL_STAGE', { stage, ...details });
    this.name = 'FatalStageError';
    this.stage = stage;
  }
}

export class BackupFailedError extends FatalStageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('backup', message, details);
    this.name = 'BackupFailedError';
  }
}

export class CommandError extends PromoteError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const firstLine = stderr.trim().split('\n')[0] || 'no output';
    super(`${command} exited with code ${exitCode}: ${firstLine}`, 'COMMAND_FAILED', {
      command,
      exitCode,
    });
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class OperationCancelledError extends PromoteError {
  constructor(message: string = 'Operation cancelled by operator') {
    super(message, 'CANCELLED');
    this.name = 'OperationCancelledError';
  }
}

/** True for errors that must halt the pipeline immediately. */
export function isFatal(error: unknown): error is PromoteError {
  return (
    error instanceof FatalPreconditionError ||
    error instanceof FatalStageError ||
    error instanceof ConfigError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
