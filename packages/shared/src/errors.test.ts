import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  RepositoryNotFoundError,
  EnvironmentNotFoundError,
  InvalidTestSpecError,
  RevisionSwitchError,
  RevisionRestoreError,
  TimeoutError,
  ProcessError,
  InterruptedError,
  errorMessage,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProcessError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('DatasetError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('user-correctable errors', () => {
  it('creates ConfigError and UsageError with their codes', () => {
    expect(new ConfigError('bad').code).toBe('ConfigError');
    expect(new UsageError('bad').name).toBe('UsageError');
  });
});

describe('precondition errors', () => {
  it('names the missing repository', () => {
    const error = new RepositoryNotFoundError('/repos/missing');
    expect(error.code).toBe('RepositoryNotFound');
    expect(error.repoRoot).toBe('/repos/missing');
    expect(error.message).toBe('Repository directory not found: /repos/missing');
  });

  it('names the missing environment', () => {
    const error = new EnvironmentNotFoundError('/envs/py');
    expect(error.code).toBe('EnvironmentNotFound');
    expect(error.environmentPath).toBe('/envs/py');
  });

  it('creates InvalidTestSpecError', () => {
    const error = new InvalidTestSpecError('nope');
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('InvalidTestSpec');
  });
});

describe('revision errors', () => {
  it('keeps the revision on switch and restore errors', () => {
    expect(new RevisionSwitchError('abc', 'failed').revision).toBe('abc');
    expect(new RevisionRestoreError('def', 'failed').revision).toBe('def');
  });
});

describe('InterruptedError', () => {
  it('names the signal', () => {
    const error = new InterruptedError('SIGTERM');
    expect(error.code).toBe('Interrupted');
    expect(error.signal).toBe('SIGTERM');
    expect(error.message).toBe('Session interrupted by SIGTERM');
  });
});

describe('process errors', () => {
  it('keeps partial output on TimeoutError', () => {
    const error = new TimeoutError('too slow', { partialStdout: 'out', partialStderr: 'err' });
    expect(error.partialStdout).toBe('out');
    expect(error.partialStderr).toBe('err');
  });

  it('defaults partial output to empty strings', () => {
    const error = new TimeoutError('too slow');
    expect(error.partialStdout).toBe('');
    expect(error.partialStderr).toBe('');
  });

  it('keeps the exit code on ProcessError', () => {
    expect(new ProcessError('spawn failed', { exitCode: 127 }).exitCode).toBe(127);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
