import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import path from 'path';
import { ProcessError, TimeoutError } from '@faultline/shared';
import { ProcessRunner, formatCommand } from './runner';

const node = process.execPath;

describe('ProcessRunner Integration', () => {
  const runner = new ProcessRunner();
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'faultline-runner-test-')));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('captures stdout, stderr and a zero exit code', async () => {
    const result = await runner.run({
      bin: node,
      args: ['-e', 'process.stdout.write("OUT_123"); process.stderr.write("ERR_456")'],
      cwd: tmpDir,
    });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('OUT_123');
    expect(result.stderr).toBe('ERR_456');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('reports a non-zero exit as a normal result', async () => {
    const result = await runner.run({ bin: node, args: ['-e', 'process.exit(3)'], cwd: tmpDir });
    expect(result.exitCode).toBe(3);
  });

  it('runs in the requested working directory', async () => {
    const result = await runner.run({
      bin: node,
      args: ['-e', 'process.stdout.write(process.cwd())'],
      cwd: tmpDir,
    });
    expect(result.stdout).toBe(tmpDir);
  });

  it('layers request variables over the parent environment', async () => {
    const result = await runner.run({
      bin: node,
      args: ['-e', 'process.stdout.write(process.env.FAULTLINE_PROBE ?? "unset")'],
      cwd: tmpDir,
      env: { FAULTLINE_PROBE: 'probe-value' },
    });
    expect(result.stdout).toBe('probe-value');
  });

  it('passes arguments without shell interpretation', async () => {
    const result = await runner.run({
      bin: node,
      args: ['-e', 'process.stdout.write(process.argv[1])', '$(echo injected); ls'],
      cwd: tmpDir,
    });
    expect(result.stdout).toBe('$(echo injected); ls');
  });

  it('rejects with ProcessError when the binary does not exist', async () => {
    await expect(
      runner.run({ bin: 'faultline-definitely-missing-binary', args: [], cwd: tmpDir }),
    ).rejects.toBeInstanceOf(ProcessError);
  });

  it('rejects with TimeoutError and kills the process', async () => {
    const pending = runner.run({
      bin: node,
      args: ['-e', 'process.stdout.write("started"); setTimeout(() => {}, 30000)'],
      cwd: tmpDir,
      timeoutMs: 500,
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
  });

  it('terminates the processes still running', async () => {
    const local = new ProcessRunner();
    const pending = local.run({
      bin: node,
      args: ['-e', 'setTimeout(() => {}, 30000)'],
      cwd: tmpDir,
    });

    expect(local.terminateAll()).toBe(1);
    const result = await pending;
    expect(result.exitCode).toBe(128);
    expect(local.terminateAll()).toBe(0);
  });
});

describe('formatCommand', () => {
  it('quotes arguments that need it', () => {
    expect(formatCommand('git', ['apply', '--verbose', '/tmp/a b.diff'])).toBe(
      "git apply --verbose '/tmp/a b.diff'",
    );
    expect(formatCommand('pytest', ['tests/t.py::test_x[1]'])).toBe(
      "pytest 'tests/t.py::test_x[1]'",
    );
    expect(formatCommand('echo', [''])).toBe("echo ''");
  });
});
