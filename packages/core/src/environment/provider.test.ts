import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mock } from 'vitest-mock-extended';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FakeCommandRunner, type CommandRequest } from '@faultline/exec';
import { createHarnessConfig, EnvironmentSetupError, type Logger } from '@faultline/shared';
import { UvEnvironmentProvider } from './provider';

describe('UvEnvironmentProvider', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provider-test-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  /** Emulates `uv venv` by laying down an activation script. */
  const uvRunner = (overrides: (req: CommandRequest) => { exitCode?: number } | undefined = () => undefined) =>
    new FakeCommandRunner(async (req) => {
      const override = overrides(req);
      if (override) return override;
      if (req.bin === 'uv') {
        const envPath = req.args[1];
        await fs.mkdir(path.join(envPath, 'bin'), { recursive: true });
        await fs.writeFile(path.join(envPath, 'bin', 'activate'), '');
      }
      return {};
    });

  const provider = (runner: FakeCommandRunner, environments = {}) =>
    new UvEnvironmentProvider({
      runner,
      logger: mock<Logger>(),
      cwd: workDir,
      config: createHarnessConfig({ environments }).environments,
    });

  it('reuses an environment that already exists', async () => {
    const envPath = path.join(workDir, 'env', 'py39');
    await fs.mkdir(path.join(envPath, 'bin'), { recursive: true });
    await fs.writeFile(path.join(envPath, 'bin', 'activate'), '');
    const runner = uvRunner();

    const handle = await provider(runner).provide('py39');

    expect(handle).toEqual({ name: 'py39', path: envPath });
    expect(runner.calls).toHaveLength(0);
  });

  it('creates the environment, bootstraps pip and installs the base packages', async () => {
    const runner = uvRunner((req) => (req.args.join(' ') === '-m pip --version' ? { exitCode: 1 } : undefined));

    const handle = await provider(runner).provide('py39');

    const envPath = path.join(workDir, 'env', 'py39');
    const python = path.join(envPath, 'bin', 'python');
    expect(handle.path).toBe(envPath);
    expect(runner.commandLines()).toEqual([
      `uv venv ${envPath}`,
      `${python} -m pip --version`,
      `${python} -m ensurepip --upgrade`,
      `${python} -m pip install pytest`,
    ]);
    expect(runner.calls[3].env?.VIRTUAL_ENV).toBe(envPath);
  });

  it('installs the requirements file when present', async () => {
    await fs.writeFile(path.join(workDir, 'requirements.txt'), 'requests\n');
    const runner = uvRunner();

    await provider(runner, { packages: ['pytest', 'hypothesis'] }).provide('py311');

    const python = path.join(workDir, 'env', 'py311', 'bin', 'python');
    expect(runner.commandLines().slice(1)).toEqual([
      `${python} -m pip --version`,
      `${python} -m pip install pytest hypothesis`,
      `${python} -m pip install -r ${path.join(workDir, 'requirements.txt')}`,
    ]);
  });

  it('is idempotent', async () => {
    const runner = uvRunner();
    const envs = provider(runner);

    const first = await envs.provide('py39');
    const callsAfterFirst = runner.calls.length;
    const second = await envs.provide('py39');

    expect(second).toEqual(first);
    expect(runner.calls).toHaveLength(callsAfterFirst);
  });

  it('fails when uv cannot create the environment', async () => {
    const runner = uvRunner((req) => (req.bin === 'uv' ? { exitCode: 2 } : undefined));

    await expect(provider(runner).provide('py39')).rejects.toThrow(
      `uv venv ${path.join(workDir, 'env', 'py39')} exited with 2`,
    );
  });

  it('fails when creation leaves no activation script', async () => {
    const runner = uvRunner((req) => (req.bin === 'uv' ? { exitCode: 0 } : undefined));

    await expect(provider(runner).provide('py39')).rejects.toBeInstanceOf(EnvironmentSetupError);
    expect(runner.calls).toHaveLength(1);
  });

  it('fails when a package install fails', async () => {
    const runner = uvRunner((req) => (req.args.includes('install') ? { exitCode: 1 } : undefined));

    await expect(provider(runner).provide('py39')).rejects.toBeInstanceOf(EnvironmentSetupError);
  });

  it('rejects names that would escape the base directory', async () => {
    const runner = uvRunner();

    for (const name of ['', '..', 'a/b']) {
      await expect(provider(runner).provide(name)).rejects.toBeInstanceOf(EnvironmentSetupError);
    }
    expect(runner.calls).toHaveLength(0);
  });
});
