import { randomUUID } from 'crypto';
import { ProcessRunner, type CommandRunner } from '@faultline/exec';
import {
  defaultPatchStrategies,
  PatchApplier,
  RevisionController,
  type PatchOutcome,
} from '@faultline/repo';
import {
  allMatched,
  AppError,
  assertRepository,
  ConfigError,
  DatasetError,
  EnvironmentNotFoundError,
  EnvironmentSetupError,
  errorMessage,
  eventMeta,
  InterruptedError,
  InvalidTestSpecError,
  logger as defaultLogger,
  normalizeTestIds,
  PatchApplyFailedError,
  ProcessError,
  RepositoryNotFoundError,
  RepositoryStateError,
  RevisionRestoreError,
  RevisionSwitchError,
  TimeoutError,
  verdictToRecord,
  type EnvironmentHandle,
  type HarnessConfig,
  type Logger,
  type RevisionSnapshot,
  type SessionSummary,
} from '@faultline/shared';
import { UvEnvironmentProvider, type EnvironmentProvider } from './environment/provider';
import { SessionStateMachine, type SessionState } from './state/session';
import { TestVerificationEngine } from './verify/runner';

export type RevisionControl = Pick<
  RevisionController,
  'captureRevision' | 'switchToRevision' | 'restoreRevision'
>;
export type PatchApplication = Pick<PatchApplier, 'apply'>;
export type TestVerification = Pick<TestVerificationEngine, 'verify'>;

export interface OrchestratorDeps {
  environments: EnvironmentProvider;
  revisions: RevisionControl;
  patches: PatchApplication;
  verifier: TestVerification;
  logger?: Logger;
  /** Stops child processes still running when the session is interrupted */
  terminate?: (signal: NodeJS.Signals) => void;
  /** Ends the process once an interrupted session has been restored; defaults to `process.exit` */
  exit?: (code: number) => void;
  /** Where SIGINT and SIGTERM are listened for; defaults to `process` */
  signals?: SignalSource;
}

/** Signals that interrupt a session, with the exit status used for each. */
export const INTERRUPT_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

export type InterruptSignal = keyof typeof INTERRUPT_EXIT_CODES;

export interface SignalSource {
  once(signal: InterruptSignal, listener: () => void): unknown;
  removeListener(signal: InterruptSignal, listener: () => void): unknown;
}

/** Everything one verification session needs to know about its task. */
export interface RunTask {
  repoRoot: string;
  environmentName: string;
  /** Revision the defect patch was written against; the current one is used when absent */
  baseRevision?: string;
  defectPatch: string;
  /** Tests the defect should break (list or delimited string) */
  failTests: unknown;
  /** Tests the defect should leave passing */
  passTests: unknown;
  /** Applied after the defect; the fail tests are then expected to pass */
  fixPatch?: string;
  instanceId?: string;
}

export type FailureCategory =
  | 'precondition'
  | 'mutation'
  | 'verification'
  | 'cleanup'
  | 'interrupted'
  | 'internal';

export interface SessionFailure {
  category: FailureCategory;
  code: string;
  message: string;
}

export interface SessionReport {
  runId: string;
  success: boolean;
  exitCode: 0 | 1;
  summary: SessionSummary;
  finalState: SessionState;
  primaryError?: SessionFailure;
  cleanupError?: SessionFailure;
}

export interface RunOptions {
  runId?: string;
}

export interface OrchestratorFactoryOptions {
  runner?: CommandRunner;
  logger?: Logger;
  /** Base for relative paths in the config */
  cwd?: string;
}

export function categorizeFailure(error: unknown): SessionFailure {
  const code = error instanceof AppError ? error.code : 'UnknownError';
  const message = errorMessage(error);

  let category: FailureCategory = 'internal';
  if (
    error instanceof InvalidTestSpecError ||
    error instanceof RepositoryNotFoundError ||
    error instanceof EnvironmentNotFoundError ||
    error instanceof EnvironmentSetupError ||
    error instanceof RepositoryStateError ||
    error instanceof ConfigError ||
    error instanceof DatasetError
  ) {
    category = 'precondition';
  } else if (error instanceof RevisionSwitchError || error instanceof PatchApplyFailedError) {
    category = 'mutation';
  } else if (error instanceof TimeoutError || error instanceof ProcessError) {
    category = 'verification';
  } else if (error instanceof RevisionRestoreError) {
    category = 'cleanup';
  } else if (error instanceof InterruptedError) {
    category = 'interrupted';
  }

  return { category, code, message };
}

/**
 * Drives one verification session end to end and always puts the repository
 * back on the revision it started from.
 */
export class RunOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly config: HarnessConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    this.logger = deps.logger ?? defaultLogger;
  }

  /** Wires the process-backed collaborators described by `config`. */
  static fromConfig(config: HarnessConfig, options: OrchestratorFactoryOptions = {}): RunOrchestrator {
    const runner = options.runner ?? new ProcessRunner();
    const logger = options.logger ?? defaultLogger;
    const timeoutMs = config.execution.timeoutMs;

    return new RunOrchestrator(config, {
      environments: new UvEnvironmentProvider({
        config: config.environments,
        runner,
        logger,
        timeoutMs,
        cwd: options.cwd,
      }),
      revisions: new RevisionController({ runner, logger, timeoutMs }),
      patches: new PatchApplier({
        runner,
        logger,
        timeoutMs,
        strategies: config.patch.strategies ?? defaultPatchStrategies(config.patch.fuzz),
      }),
      verifier: new TestVerificationEngine({
        runner,
        logger,
        timeoutMs,
        command: config.tests.command,
        logDir: config.tests.logDir,
      }),
      logger,
      terminate: (signal) => {
        runner.terminateAll?.(signal);
      },
    });
  }

  /**
   * Runs one session. While it runs, SIGINT and SIGTERM stop the running child
   * processes, restore the captured revision and exit with 128 + signal number.
   */
  async run(task: RunTask, options: RunOptions = {}): Promise<SessionReport> {
    const runId = options.runId ?? randomUUID();
    const { repoRoot } = task;
    const { revisions, verifier } = this.deps;
    const session = new SessionStateMachine();
    const summary: SessionSummary = { instanceId: task.instanceId, defect: {}, baseline: {} };
    const failures: { primary?: SessionFailure; cleanup?: SessionFailure } = {};
    const interruption: { signal?: InterruptSignal } = {};

    let snapshot: RevisionSnapshot | undefined;
    let restoring: Promise<void> | undefined;

    // Shared by the normal exit path and the signal handlers; restores at most once.
    const restore = (): Promise<void> => {
      if (restoring) return restoring;
      const captured = snapshot;
      if (!captured || !session.needsRestore) return Promise.resolve();
      restoring = (async () => {
        try {
          await revisions.restoreRevision(repoRoot, captured, { runId });
        } catch (error) {
          failures.cleanup = { ...categorizeFailure(error), category: 'cleanup' };
          await this.logger.error(asError(error), 'Repository restore failed');
        }
        session.transition('RESTORED');
      })();
      return restoring;
    };

    const checkpoint = () => {
      if (interruption.signal) throw new InterruptedError(interruption.signal);
    };

    const exit = this.deps.exit ?? ((code: number) => process.exit(code));
    const onSignal = async (signal: InterruptSignal): Promise<void> => {
      interruption.signal = signal;
      this.deps.terminate?.(signal);
      try {
        await this.logger.warn(`Received ${signal}; restoring ${repoRoot} before exiting`);
        await restore();
      } finally {
        exit(INTERRUPT_EXIT_CODES[signal]);
      }
    };
    const onSigint = () => onSignal('SIGINT');
    const onSigterm = () => onSignal('SIGTERM');
    const signals: SignalSource = this.deps.signals ?? process;
    signals.once('SIGINT', onSigint);
    signals.once('SIGTERM', onSigterm);

    await this.logger.trace(
      {
        ...eventMeta(runId),
        type: 'SessionStarted',
        payload: { repoRoot, instanceId: task.instanceId, environment: task.environmentName },
      },
      `Starting session${task.instanceId ? ` for ${task.instanceId}` : ''} in ${repoRoot}`,
    );

    try {
      const failTests = normalizeTestIds(task.failTests);
      const maxPassTests = this.config.tests.maxPassTests;
      const allPassTests = normalizeTestIds(task.passTests);
      const passTests = maxPassTests === undefined ? allPassTests : allPassTests.slice(0, maxPassTests);
      if (passTests.length < allPassTests.length) {
        await this.logger.info(`Running the first ${passTests.length} of ${allPassTests.length} pass tests`);
      }

      await assertRepository(repoRoot);
      const environment = await this.deps.environments.provide(task.environmentName);
      checkpoint();

      snapshot = await revisions.captureRevision(repoRoot, { runId });
      session.transition('SNAPSHOTTED');
      checkpoint();

      if (task.baseRevision) {
        await revisions.switchToRevision(repoRoot, task.baseRevision, { runId });
        session.transition('SWITCHED');
        checkpoint();
      }

      await this.applyOrFail(repoRoot, task.defectPatch, 'Defect', environment, runId);
      session.transition('PATCHED');
      checkpoint();

      const defect = await verifier.verify(repoRoot, failTests, 'expect-fail', environment, { runId });
      checkpoint();
      summary.defect = verdictToRecord(defect);
      const baseline = await verifier.verify(repoRoot, passTests, 'expect-pass', environment, { runId });
      checkpoint();
      summary.baseline = verdictToRecord(baseline);

      if (task.fixPatch !== undefined) {
        await this.applyOrFail(repoRoot, task.fixPatch, 'Fix', environment, runId);
        checkpoint();
        const repair = await verifier.verify(repoRoot, failTests, 'expect-pass', environment, { runId });
        checkpoint();
        summary.repair = verdictToRecord(repair);
      }
      session.transition('VERIFIED');
    } catch (error) {
      failures.primary = categorizeFailure(error);
      await this.logger.error(asError(error), `Session failed (${failures.primary.category})`);
    } finally {
      signals.removeListener('SIGINT', onSigint);
      signals.removeListener('SIGTERM', onSigterm);
      await restore();
    }

    const { primary: primaryError, cleanup: cleanupError } = failures;
    const success =
      primaryError === undefined &&
      cleanupError === undefined &&
      allMatched(summary.defect) &&
      allMatched(summary.baseline) &&
      (summary.repair === undefined || allMatched(summary.repair));
    const exitCode = success ? 0 : 1;

    await this.logger.trace(
      {
        ...eventMeta(runId),
        type: 'SessionFinished',
        payload: {
          success,
          exitCode,
          primaryError: primaryError?.message,
          cleanupError: cleanupError?.message,
        },
      },
      `Session ${success ? 'succeeded' : 'failed'}`,
    );

    return {
      runId,
      success,
      exitCode,
      summary,
      finalState: session.state,
      primaryError,
      cleanupError,
    };
  }

  private async applyOrFail(
    repoRoot: string,
    text: string,
    label: 'Defect' | 'Fix',
    environment: EnvironmentHandle,
    runId: string,
  ): Promise<void> {
    const outcome: PatchOutcome = await this.deps.patches.apply(
      repoRoot,
      { text, reverse: false },
      environment,
      { runId },
    );
    if (outcome.status === 'exhausted') {
      throw new PatchApplyFailedError(
        `${label} patch could not be applied (tried ${outcome.attempts.map((a) => a.strategy).join(', ')})`,
        {
          details: {
            attempts: outcome.attempts.map((a) => ({
              strategy: a.strategy,
              exitCode: a.exitCode,
              stderr: a.stderr.trim(),
              error: a.error,
            })),
          },
        },
      );
    }
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
