import { randomUUID } from 'node:crypto';
import fs from 'fs-extra';
import { withFile } from 'tmp-promise';
import { activateEnvironment, ProcessRunner, type CommandRunner } from '@faultline/exec';
import {
  assertRepository,
  errorMessage,
  eventMeta,
  logger as defaultLogger,
  TimeoutError,
  type EnvironmentHandle,
  type Logger,
  type PatchPayload,
  type PatchStrategy,
} from '@faultline/shared';
import { buildInvocation, defaultPatchStrategies } from './strategies';

export interface PatchAttempt {
  strategy: string;
  /** `null` when the strategy never produced an exit status */
  exitCode: number | null;
  succeeded: boolean;
  durationMs: number;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

export type PatchOutcome =
  | { status: 'applied'; strategy: string; attempts: PatchAttempt[]; filesChanged: string[] }
  | { status: 'exhausted'; attempts: PatchAttempt[] };

export interface PatchApplierOptions {
  runner?: CommandRunner;
  /** Tried in order; defaults to {@link defaultPatchStrategies} */
  strategies?: PatchStrategy[];
  timeoutMs?: number;
  logger?: Logger;
  runId?: string;
}

export interface PatchCallOptions {
  runId?: string;
}

export class PatchApplier {
  private readonly runner: CommandRunner;
  private readonly strategies: PatchStrategy[];
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(options: PatchApplierOptions = {}) {
    this.runner = options.runner ?? new ProcessRunner();
    this.strategies = options.strategies ?? defaultPatchStrategies();
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
    this.runId = options.runId ?? randomUUID();
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  /**
   * Applies (or, with `payload.reverse`, undoes) a unified diff in `repoRoot`.
   *
   * Strategies run in order inside the activated environment until one exits 0.
   * Running out of strategies is a normal `exhausted` outcome.
   *
   * @throws RepositoryNotFoundError when `repoRoot` is not a directory
   * @throws EnvironmentNotFoundError when the environment cannot be activated
   */
  async apply(
    repoRoot: string,
    payload: PatchPayload,
    environment: EnvironmentHandle,
    options: PatchCallOptions = {},
  ): Promise<PatchOutcome> {
    await assertRepository(repoRoot);
    const env = await activateEnvironment(environment);
    const runId = options.runId ?? this.runId;

    const outcome = await withFile(
      async ({ path: patchPath }) => {
        await fs.writeFile(patchPath, withTrailingNewline(payload.text));
        return this.tryStrategies(repoRoot, patchPath, payload, env, runId);
      },
      { prefix: 'faultline-', postfix: '.diff' },
    );

    if (outcome.status === 'applied') {
      await this.logger.trace(
        {
          ...eventMeta(runId),
          type: 'PatchApplied',
          payload: {
            strategy: outcome.strategy,
            reverse: payload.reverse,
            attempts: outcome.attempts.length,
            filePaths: outcome.filesChanged,
          },
        },
        `${payload.reverse ? 'Reverted' : 'Applied'} patch with ${outcome.strategy}`,
      );
    } else {
      await this.logger.trace(
        {
          ...eventMeta(runId),
          type: 'PatchExhausted',
          payload: { reverse: payload.reverse, strategies: this.strategyNames },
        },
        `No patch strategy succeeded (${this.strategyNames.join(', ')})`,
      );
    }

    return outcome;
  }

  private async tryStrategies(
    repoRoot: string,
    patchPath: string,
    payload: PatchPayload,
    env: Record<string, string>,
    runId: string,
  ): Promise<PatchOutcome> {
    const attempts: PatchAttempt[] = [];

    for (const strategy of this.strategies) {
      const attempt = await this.attempt(strategy, repoRoot, patchPath, payload.reverse, env);
      attempts.push(attempt);

      await this.logger.log({
        ...eventMeta(runId),
        type: 'PatchStrategyAttempted',
        payload: {
          strategy: attempt.strategy,
          reverse: payload.reverse,
          exitCode: attempt.exitCode,
          succeeded: attempt.succeeded,
          durationMs: attempt.durationMs,
          error: attempt.error,
        },
      });

      if (attempt.succeeded) {
        return {
          status: 'applied',
          strategy: strategy.name,
          attempts,
          filesChanged: extractAffectedFiles(payload.text),
        };
      }
      await this.logger.debug(
        `Patch strategy ${strategy.name} failed: ${attempt.error ?? attempt.stderr.trim()}`,
      );
    }

    return { status: 'exhausted', attempts };
  }

  private async attempt(
    strategy: PatchStrategy,
    repoRoot: string,
    patchPath: string,
    reverse: boolean,
    env: Record<string, string>,
  ): Promise<PatchAttempt> {
    const { bin, args } = buildInvocation(strategy, patchPath, reverse);
    const start = Date.now();

    try {
      const result = await this.runner.run({
        bin,
        args,
        cwd: repoRoot,
        env,
        timeoutMs: this.timeoutMs,
      });
      return {
        strategy: strategy.name,
        exitCode: result.exitCode,
        succeeded: result.exitCode === 0,
        durationMs: result.durationMs,
        timedOut: false,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (error) {
      const failed: PatchAttempt = {
        strategy: strategy.name,
        exitCode: null,
        succeeded: false,
        durationMs: Date.now() - start,
        timedOut: false,
        stdout: '',
        stderr: '',
        error: errorMessage(error),
      };
      if (error instanceof TimeoutError) {
        return {
          ...failed,
          timedOut: true,
          stdout: error.partialStdout,
          stderr: error.partialStderr,
        };
      }
      return failed;
    }
  }
}

/** Paths named by `+++ b/` headers. */
export function extractAffectedFiles(diffText: string): string[] {
  const files: string[] = [];
  for (const line of diffText.split('\n')) {
    if (line.startsWith('+++ b/')) {
      files.push(line.substring(6).trim());
    }
  }
  return files;
}

// git apply rejects a final hunk line without a newline terminator.
function withTrailingNewline(text: string): string {
  return text.length === 0 || text.endsWith('\n') ? text : `${text}\n`;
}
