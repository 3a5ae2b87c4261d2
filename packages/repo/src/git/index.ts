import { randomUUID } from 'node:crypto';
import { ProcessRunner, type CommandRunner } from '@faultline/exec';
import {
  assertRepository,
  errorMessage,
  eventMeta,
  logger as defaultLogger,
  ProcessError,
  RepositoryStateError,
  RevisionRestoreError,
  RevisionSwitchError,
  type Logger,
  type RevisionSnapshot,
} from '@faultline/shared';

export interface RevisionControllerOptions {
  runner?: CommandRunner;
  logger?: Logger;
  /** Upper bound for each git invocation */
  timeoutMs?: number;
  /** Run id stamped on events when a call does not pass its own */
  runId?: string;
}

export interface RevisionCallOptions {
  runId?: string;
}

export interface SwitchResult {
  revision: string;
  stashed: boolean;
  /** undefined when nothing was stashed */
  stashRestored?: boolean;
}

/**
 * Captures, switches and restores the checked-out revision of a git working tree.
 * Every git call is an argument vector run through the command runner.
 */
export class RevisionController {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly timeoutMs?: number;
  private readonly runId: string;

  constructor(options: RevisionControllerOptions = {}) {
    this.runner = options.runner ?? new ProcessRunner();
    this.logger = options.logger ?? defaultLogger;
    this.timeoutMs = options.timeoutMs;
    this.runId = options.runId ?? randomUUID();
  }

  private async exec(repoRoot: string, args: string[]): Promise<string> {
    const result = await this.runner.run({
      bin: 'git',
      args,
      cwd: repoRoot,
      timeoutMs: this.timeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr.trim()}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout.trim();
  }

  async statusPorcelain(repoRoot: string): Promise<string> {
    await assertRepository(repoRoot);
    return this.exec(repoRoot, ['status', '--porcelain']);
  }

  async currentBranch(repoRoot: string): Promise<string> {
    await assertRepository(repoRoot);
    return this.exec(repoRoot, ['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  /**
   * Records the revision currently checked out.
   *
   * @throws RepositoryStateError when HEAD cannot be resolved
   */
  async captureRevision(repoRoot: string, options: RevisionCallOptions = {}): Promise<RevisionSnapshot> {
    await assertRepository(repoRoot);

    let revision: string;
    try {
      revision = await this.exec(repoRoot, ['rev-parse', 'HEAD']);
    } catch (error) {
      throw new RepositoryStateError(`Could not read the current revision of ${repoRoot}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!revision) {
      throw new RepositoryStateError(`git rev-parse HEAD printed nothing in ${repoRoot}`);
    }

    const snapshot: RevisionSnapshot = Object.freeze({
      revision,
      capturedAt: new Date().toISOString(),
    });
    await this.logger.trace(
      { ...eventMeta(options.runId ?? this.runId), type: 'RevisionCaptured', payload: { revision } },
      `Captured revision ${revision}`,
    );
    return snapshot;
  }

  /**
   * Moves the working tree to `target`.
   *
   * Local changes are stashed first and re-applied afterwards; neither step can
   * fail the switch. The reset and the checkout are mandatory.
   *
   * @throws RevisionSwitchError when the reset or the checkout fails
   */
  async switchToRevision(
    repoRoot: string,
    target: string,
    options: RevisionCallOptions = {},
  ): Promise<SwitchResult> {
    await assertRepository(repoRoot);

    const stashed = await this.stashLocalChanges(repoRoot);

    try {
      await this.exec(repoRoot, ['reset', '--hard', target]);
    } catch (error) {
      throw new RevisionSwitchError(target, `git reset --hard ${target} failed: ${errorMessage(error)}`, {
        cause: error,
        details: { step: 'reset', stashed },
      });
    }

    try {
      await this.exec(repoRoot, ['checkout', target]);
    } catch (error) {
      throw new RevisionSwitchError(target, `git checkout ${target} failed: ${errorMessage(error)}`, {
        cause: error,
        details: { step: 'checkout', stashed },
      });
    }

    let stashRestored: boolean | undefined;
    if (stashed) {
      try {
        await this.exec(repoRoot, ['stash', 'pop']);
        stashRestored = true;
      } catch (error) {
        stashRestored = false;
        await this.logger.warn(`Could not re-apply stashed changes in ${repoRoot}: ${errorMessage(error)}`);
      }
    }

    const result: SwitchResult = { revision: target, stashed, stashRestored };
    await this.logger.trace(
      { ...eventMeta(options.runId ?? this.runId), type: 'RevisionSwitched', payload: result },
      `Switched to revision ${target}`,
    );
    return result;
  }

  /**
   * Hard-resets the working tree and checks out the captured revision.
   *
   * @throws RevisionRestoreError when either step fails
   */
  async restoreRevision(
    repoRoot: string,
    snapshot: RevisionSnapshot,
    options: RevisionCallOptions = {},
  ): Promise<void> {
    const { revision } = snapshot;
    const runId = options.runId ?? this.runId;

    try {
      await assertRepository(repoRoot);
      await this.exec(repoRoot, ['reset', '--hard', revision]);
      await this.exec(repoRoot, ['checkout', revision]);
    } catch (error) {
      const message = `Could not restore ${repoRoot} to ${revision}: ${errorMessage(error)}`;
      await this.logger.trace(
        {
          ...eventMeta(runId),
          type: 'RevisionRestored',
          payload: { revision, succeeded: false, error: errorMessage(error) },
        },
        message,
      );
      throw new RevisionRestoreError(revision, message, { cause: error });
    }

    await this.logger.trace(
      { ...eventMeta(runId), type: 'RevisionRestored', payload: { revision, succeeded: true } },
      `Restored revision ${revision}`,
    );
  }

  /** Returns whether anything was stashed. */
  private async stashLocalChanges(repoRoot: string): Promise<boolean> {
    let dirty = true;
    try {
      dirty = (await this.exec(repoRoot, ['status', '--porcelain'])).length > 0;
    } catch (error) {
      await this.logger.warn(`Could not read working tree status of ${repoRoot}: ${errorMessage(error)}`);
    }
    if (!dirty) return false;

    try {
      await this.exec(repoRoot, ['stash', 'push', '--include-untracked']);
      return true;
    } catch (error) {
      await this.logger.warn(`Could not stash local changes in ${repoRoot}: ${errorMessage(error)}`);
      return false;
    }
  }
}
