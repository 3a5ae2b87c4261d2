import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FakeCommandRunner, type CommandRequest } from '@faultline/exec';
import {
  RepositoryNotFoundError,
  RepositoryStateError,
  RevisionRestoreError,
  RevisionSwitchError,
  type Logger,
} from '@faultline/shared';
import { RevisionController } from './index';

type Script = Record<string, { exitCode?: number; stdout?: string; stderr?: string }>;

const scripted = (script: Script = {}) =>
  new FakeCommandRunner((req: CommandRequest) => script[req.args.join(' ')] ?? {});

describe('RevisionController', () => {
  let tmpDir: string;
  let logger: MockProxy<Logger>;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'revision-test-'));
    logger = mock<Logger>();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('captureRevision', () => {
    it('records HEAD as a frozen snapshot', async () => {
      const runner = scripted({ 'rev-parse HEAD': { stdout: 'abc123\n' } });
      const controller = new RevisionController({ runner, logger, runId: 'run-1' });

      const snapshot = await controller.captureRevision(tmpDir);

      expect(snapshot.revision).toBe('abc123');
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(runner.commandLines()).toEqual(['git rev-parse HEAD']);
      expect(runner.calls[0].cwd).toBe(tmpDir);
      expect(logger.trace).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'RevisionCaptured', runId: 'run-1', payload: { revision: 'abc123' } }),
        'Captured revision abc123',
      );
    });

    it('raises RepositoryStateError when HEAD cannot be read', async () => {
      const runner = scripted({ 'rev-parse HEAD': { exitCode: 128, stderr: 'fatal: not a git repository' } });
      const controller = new RevisionController({ runner, logger });

      await expect(controller.captureRevision(tmpDir)).rejects.toBeInstanceOf(RepositoryStateError);
    });

    it('checks the repository before running git', async () => {
      const runner = scripted();
      const controller = new RevisionController({ runner, logger });

      await expect(controller.captureRevision(path.join(tmpDir, 'missing'))).rejects.toBeInstanceOf(
        RepositoryNotFoundError,
      );
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('switchToRevision', () => {
    it('resets and checks out without stashing a clean tree', async () => {
      const runner = scripted();
      const controller = new RevisionController({ runner, logger });

      const result = await controller.switchToRevision(tmpDir, 'base1');

      expect(result).toEqual({ revision: 'base1', stashed: false, stashRestored: undefined });
      expect(runner.commandLines()).toEqual([
        'git status --porcelain',
        'git reset --hard base1',
        'git checkout base1',
      ]);
    });

    it('stashes local changes and re-applies them after the switch', async () => {
      const runner = scripted({ 'status --porcelain': { stdout: ' M src/a.py\n?? notes.txt\n' } });
      const controller = new RevisionController({ runner, logger });

      const result = await controller.switchToRevision(tmpDir, 'base1');

      expect(result).toEqual({ revision: 'base1', stashed: true, stashRestored: true });
      expect(runner.commandLines()).toEqual([
        'git status --porcelain',
        'git stash push --include-untracked',
        'git reset --hard base1',
        'git checkout base1',
        'git stash pop',
      ]);
    });

    it('tolerates a failed stash and skips the pop', async () => {
      const runner = scripted({
        'status --porcelain': { stdout: ' M src/a.py' },
        'stash push --include-untracked': { exitCode: 1, stderr: 'cannot stash' },
      });
      const controller = new RevisionController({ runner, logger });

      const result = await controller.switchToRevision(tmpDir, 'base1');

      expect(result.stashed).toBe(false);
      expect(runner.commandLines()).not.toContain('git stash pop');
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('tolerates a conflicting stash pop', async () => {
      const runner = scripted({
        'status --porcelain': { stdout: ' M src/a.py' },
        'stash pop': { exitCode: 1, stderr: 'CONFLICT (content)' },
      });
      const controller = new RevisionController({ runner, logger });

      const result = await controller.switchToRevision(tmpDir, 'base1');

      expect(result).toEqual({ revision: 'base1', stashed: true, stashRestored: false });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('raises RevisionSwitchError when the reset fails', async () => {
      const runner = scripted({ 'reset --hard nope': { exitCode: 128, stderr: 'unknown revision' } });
      const controller = new RevisionController({ runner, logger });

      const error = await controller.switchToRevision(tmpDir, 'nope').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RevisionSwitchError);
      if (error instanceof RevisionSwitchError) {
        expect(error.revision).toBe('nope');
        expect(error.details).toEqual({ step: 'reset', stashed: false });
      }
      expect(runner.commandLines()).not.toContain('git checkout nope');
    });

    it('raises RevisionSwitchError when the checkout fails', async () => {
      const runner = scripted({ 'checkout base1': { exitCode: 1 } });
      const controller = new RevisionController({ runner, logger });

      const error = await controller.switchToRevision(tmpDir, 'base1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RevisionSwitchError);
      if (error instanceof RevisionSwitchError) {
        expect(error.details).toEqual({ step: 'checkout', stashed: false });
      }
    });
  });

  describe('restoreRevision', () => {
    const snapshot = Object.freeze({ revision: 'orig42', capturedAt: '2026-01-01T00:00:00.000Z' });

    it('resets and checks out the captured revision', async () => {
      const runner = scripted();
      const controller = new RevisionController({ runner, logger });

      await controller.restoreRevision(tmpDir, snapshot);

      expect(runner.commandLines()).toEqual(['git reset --hard orig42', 'git checkout orig42']);
      expect(logger.trace).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'RevisionRestored', payload: { revision: 'orig42', succeeded: true } }),
        'Restored revision orig42',
      );
    });

    it('raises RevisionRestoreError and records the failure', async () => {
      const runner = scripted({ 'checkout orig42': { exitCode: 1, stderr: 'error: pathspec' } });
      const controller = new RevisionController({ runner, logger });

      await expect(controller.restoreRevision(tmpDir, snapshot)).rejects.toBeInstanceOf(RevisionRestoreError);
      expect(logger.trace).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'RevisionRestored',
          payload: expect.objectContaining({ revision: 'orig42', succeeded: false }),
        }),
        expect.stringContaining('Could not restore'),
      );
    });
  });

  describe('helpers', () => {
    it('reads the current branch and status', async () => {
      const runner = scripted({
        'rev-parse --abbrev-ref HEAD': { stdout: 'main\n' },
        'status --porcelain': { stdout: '?? dirty.txt\n' },
      });
      const controller = new RevisionController({ runner, logger });

      expect(await controller.currentBranch(tmpDir)).toBe('main');
      expect(await controller.statusPorcelain(tmpDir)).toBe('?? dirty.txt');
    });
  });
});
