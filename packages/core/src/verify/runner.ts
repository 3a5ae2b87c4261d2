import path from 'path';
import { randomUUID } from 'crypto';
import {
  activateEnvironment,
  formatCommand,
  ProcessRunner,
  type CommandRunner,
} from '@faultline/exec';
import {
  assertRepository,
  atomicWrite,
  createHarnessConfig,
  encodeTestIdForLog,
  errorMessage,
  eventMeta,
  logger as defaultLogger,
  normalizeTestIds,
  TEST_ID_TOKEN,
  TimeoutError,
  uniqueTestIds,
  type EnvironmentHandle,
  type ExpectationPolicy,
  type Logger,
  type TestIdentifier,
  type TestRunArtifact,
  type TestVerdict,
} from '@faultline/shared';

export interface VerificationEngineOptions {
  runner?: CommandRunner;
  /** Argument vector; `{test}` is replaced by the identifier */
  command?: string[];
  /** Relative to the repository root */
  logDir?: string;
  timeoutMs?: number;
  logger?: Logger;
  runId?: string;
}

export interface VerifyCallOptions {
  runId?: string;
}

/** Whether an observed exit code is what the policy expects. */
export function matchesPolicy(policy: ExpectationPolicy, exitCode: number | null): boolean {
  if (exitCode === null) return false;
  return policy === 'expect-fail' ? exitCode !== 0 : exitCode === 0;
}

export function renderTestLog(artifact: TestRunArtifact): string {
  const [bin = '', ...args] = artifact.command;
  const sections = [
    '=== COMMAND ===',
    formatCommand(bin, args),
    '=== STDOUT ===',
    artifact.stdout,
    '=== STDERR ===',
    artifact.stderr,
  ];
  if (artifact.error !== undefined) {
    sections.push('=== ERROR ===', artifact.error);
  }
  return sections.join('\n') + '\n';
}

/**
 * Runs tests one identifier at a time and classifies each against an expectation.
 */
export class TestVerificationEngine {
  private readonly runner: CommandRunner;
  private readonly command: string[];
  private readonly logDir: string;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(options: VerificationEngineOptions = {}) {
    const defaults = createHarnessConfig().tests;
    this.runner = options.runner ?? new ProcessRunner();
    this.command = options.command ?? defaults.command;
    this.logDir = options.logDir ?? defaults.logDir;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? defaultLogger;
    this.runId = options.runId ?? randomUUID();
  }

  /**
   * Verifies every distinct identifier in `testIds` under `policy`.
   *
   * A test that cannot be run (spawn failure, timeout) counts as not matching;
   * the remaining tests still run.
   *
   * @throws InvalidTestSpecError when `testIds` is neither a list nor a delimited string
   * @throws RepositoryNotFoundError when `repoRoot` is not a directory
   * @throws EnvironmentNotFoundError when the environment cannot be activated
   */
  async verify(
    repoRoot: string,
    testIds: unknown,
    policy: ExpectationPolicy,
    environment: EnvironmentHandle,
    options: VerifyCallOptions = {},
  ): Promise<TestVerdict> {
    const ids = uniqueTestIds(normalizeTestIds(testIds));
    await assertRepository(repoRoot);
    const env = await activateEnvironment(environment);
    const runId = options.runId ?? this.runId;

    const results = new Map<TestIdentifier, boolean>();
    const artifacts = new Map<TestIdentifier, TestRunArtifact>();

    for (const testId of ids) {
      const artifact = await this.runOne(repoRoot, testId, env);
      const matched = artifact.error === undefined && matchesPolicy(policy, artifact.exitCode);
      results.set(testId, matched);
      artifacts.set(testId, artifact);

      await this.writeLog(artifact);
      await this.logger.trace(
        {
          ...eventMeta(runId),
          type: 'TestVerified',
          payload: {
            testId,
            policy,
            exitCode: artifact.exitCode,
            matched,
            durationMs: artifact.durationMs,
            logPath: artifact.logPath,
            error: artifact.error,
          },
        },
        `${matched ? 'MATCH' : 'MISMATCH'} [${policy}] ${testId}`,
      );
    }

    const mismatched = ids.filter((id) => results.get(id) !== true);
    await this.logger.log({
      ...eventMeta(runId),
      type: 'VerificationFinished',
      payload: { policy, total: ids.length, matched: ids.length - mismatched.length, mismatched },
    });

    return { policy, results, artifacts };
  }

  private async runOne(
    repoRoot: string,
    testId: TestIdentifier,
    env: Record<string, string>,
  ): Promise<TestRunArtifact> {
    const command = this.command.map((arg) => (arg === TEST_ID_TOKEN ? testId : arg));
    const [bin, ...args] = command;
    const logPath = path.join(repoRoot, this.logDir, `${encodeTestIdForLog(testId)}.log`);
    const start = Date.now();

    try {
      const result = await this.runner.run({ bin, args, cwd: repoRoot, env, timeoutMs: this.timeoutMs });
      return {
        testId,
        command,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        durationMs: result.durationMs,
        timedOut: false,
        logPath,
      };
    } catch (error) {
      const crashed: TestRunArtifact = {
        testId,
        command,
        exitCode: null,
        stdout: '',
        stderr: '',
        durationMs: Date.now() - start,
        timedOut: false,
        error: errorMessage(error),
        logPath,
      };
      if (error instanceof TimeoutError) {
        return { ...crashed, timedOut: true, stdout: error.partialStdout, stderr: error.partialStderr };
      }
      return crashed;
    }
  }

  private async writeLog(artifact: TestRunArtifact): Promise<void> {
    try {
      await atomicWrite(artifact.logPath, renderTestLog(artifact));
    } catch (error) {
      await this.logger.warn(`Could not write test log ${artifact.logPath}: ${errorMessage(error)}`);
    }
  }
}
