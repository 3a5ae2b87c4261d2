/**
 * Error codes used throughout the harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'RepositoryNotFound'
  | 'EnvironmentNotFound'
  | 'EnvironmentSetupError'
  | 'InvalidTestSpec'
  | 'RepositoryStateError'
  | 'RevisionSwitchError'
  | 'RevisionRestoreError'
  | 'PatchApplyFailed'
  | 'SessionStateError'
  | 'DatasetError'
  | 'TimeoutError'
  | 'ProcessError'
  | 'Interrupted'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('RevisionSwitchError', 'git reset failed', {
 *   cause: originalError,
 *   details: { revision: 'abc123' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a working tree is missing or is not a directory.
 */
export class RepositoryNotFoundError extends AppError {
  public readonly repoRoot: string;

  constructor(repoRoot: string, options: AppErrorOptions = {}) {
    super('RepositoryNotFound', `Repository directory not found: ${repoRoot}`, options);
    this.repoRoot = repoRoot;
  }
}

/**
 * Error thrown when an execution environment cannot be activated.
 */
export class EnvironmentNotFoundError extends AppError {
  public readonly environmentPath: string;

  constructor(environmentPath: string, options: AppErrorOptions = {}) {
    super(
      'EnvironmentNotFound',
      `Execution environment not found or not activatable: ${environmentPath}`,
      options,
    );
    this.environmentPath = environmentPath;
  }
}

/**
 * Error thrown when provisioning an execution environment fails.
 */
export class EnvironmentSetupError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('EnvironmentSetupError', message, options);
  }
}

/**
 * Error thrown when a test-identifier collection is neither a list of strings
 * nor a delimited string.
 */
export class InvalidTestSpecError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidTestSpec', message, options);
  }
}

/**
 * Error thrown when the current revision of a repository cannot be read.
 */
export class RepositoryStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('RepositoryStateError', message, options);
  }
}

/**
 * Error thrown when a mandatory step of a revision switch fails.
 * The working tree is in an indeterminate state afterwards.
 */
export class RevisionSwitchError extends AppError {
  public readonly revision: string;

  constructor(revision: string, message: string, options: AppErrorOptions = {}) {
    super('RevisionSwitchError', message, options);
    this.revision = revision;
  }
}

/**
 * Error thrown when the repository cannot be restored to its captured revision.
 */
export class RevisionRestoreError extends AppError {
  public readonly revision: string;

  constructor(revision: string, message: string, options: AppErrorOptions = {}) {
    super('RevisionRestoreError', message, options);
    this.revision = revision;
  }
}

/**
 * Error thrown by the orchestrator when every patch strategy was exhausted
 * for a patch the session cannot continue without.
 */
export class PatchApplyFailedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PatchApplyFailed', message, options);
  }
}

/**
 * Error thrown on an illegal session state transition.
 */
export class SessionStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SessionStateError', message, options);
  }
}

/**
 * Error thrown when a dataset file or record cannot be read.
 */
export class DatasetError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('DatasetError', message, options);
  }
}

/**
 * Error thrown when an external invocation exceeds its time limit.
 */
export class TimeoutError extends AppError {
  /** Output captured before the process was killed */
  public readonly partialStdout: string;
  public readonly partialStderr: string;

  constructor(
    message: string,
    options: AppErrorOptions & { partialStdout?: string; partialStderr?: string } = {},
  ) {
    super('TimeoutError', message, options);
    this.partialStdout = options.partialStdout ?? '';
    this.partialStderr = options.partialStderr ?? '';
  }
}

/**
 * Error thrown when a subprocess cannot be started.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when a session is stopped by a termination signal.
 */
export class InterruptedError extends AppError {
  public readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals, options: AppErrorOptions = {}) {
    super('Interrupted', `Session interrupted by ${signal}`, options);
    this.signal = signal;
  }
}

/**
 * Returns a readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
