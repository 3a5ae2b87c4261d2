import path from 'path';
import fse from 'fs-extra';
import {
  activateEnvironment,
  environmentPython,
  formatCommand,
  isActivatable,
  ProcessRunner,
  type CommandRunner,
} from '@faultline/exec';
import {
  createHarnessConfig,
  EnvironmentSetupError,
  errorMessage,
  logger as defaultLogger,
  type EnvironmentHandle,
  type EnvironmentsConfig,
  type Logger,
} from '@faultline/shared';

/** Resolves a named execution environment, creating it when needed. */
export interface EnvironmentProvider {
  provide(name: string): Promise<EnvironmentHandle>;
}

export interface UvEnvironmentProviderOptions {
  config?: EnvironmentsConfig;
  runner?: CommandRunner;
  logger?: Logger;
  timeoutMs?: number;
  /** Base for relative `baseDir` and `requirementsFile` paths */
  cwd?: string;
}

/**
 * Python virtual environments under `<baseDir>/<name>`, created with `uv venv`.
 * An environment that already has an activation script is reused untouched.
 */
export class UvEnvironmentProvider implements EnvironmentProvider {
  private readonly config: EnvironmentsConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly timeoutMs?: number;
  private readonly cwd: string;

  constructor(options: UvEnvironmentProviderOptions = {}) {
    this.config = options.config ?? createHarnessConfig().environments;
    this.runner = options.runner ?? new ProcessRunner();
    this.logger = options.logger ?? defaultLogger;
    this.timeoutMs = options.timeoutMs;
    this.cwd = options.cwd ?? process.cwd();
  }

  environmentPath(name: string): string {
    return path.resolve(this.cwd, this.config.baseDir, name);
  }

  async provide(name: string): Promise<EnvironmentHandle> {
    if (!name || name.includes('/') || name.includes('\\') || name === '.' || name === '..') {
      throw new EnvironmentSetupError(`Invalid environment name: "${name}"`);
    }

    const handle: EnvironmentHandle = { name, path: this.environmentPath(name) };
    if (await isActivatable(handle)) {
      await this.logger.debug(`Reusing environment ${name} at ${handle.path}`);
      return handle;
    }

    await this.logger.info(`Creating environment ${name} at ${handle.path}`);
    await this.step(this.config.uvCommand, ['venv', handle.path], {});

    const env = await activateEnvironment(handle).catch((error: unknown) => {
      throw new EnvironmentSetupError(`Environment ${name} has no activation script after creation`, {
        cause: error,
      });
    });
    const python = environmentPython(handle);

    const pip = await this.runner
      .run({ bin: python, args: ['-m', 'pip', '--version'], cwd: this.cwd, env, timeoutMs: this.timeoutMs })
      .catch((error: unknown) => {
        throw new EnvironmentSetupError(`Could not run the interpreter of ${name}: ${errorMessage(error)}`, {
          cause: error,
        });
      });
    if (pip.exitCode !== 0) {
      await this.logger.debug(`pip missing in ${name}, bootstrapping it with ensurepip`);
      await this.step(python, ['-m', 'ensurepip', '--upgrade'], env);
    }

    if (this.config.packages.length > 0) {
      await this.step(python, ['-m', 'pip', 'install', ...this.config.packages], env);
    }

    const requirements = path.resolve(this.cwd, this.config.requirementsFile);
    if (await fse.pathExists(requirements)) {
      await this.step(python, ['-m', 'pip', 'install', '-r', requirements], env);
    } else {
      await this.logger.debug(`No ${this.config.requirementsFile}, skipping dependency install`);
    }

    return handle;
  }

  private async step(bin: string, args: string[], env: Record<string, string>): Promise<void> {
    const command = formatCommand(bin, args);
    let exitCode: number;
    let stderr: string;
    try {
      ({ exitCode, stderr } = await this.runner.run({
        bin,
        args,
        cwd: this.cwd,
        env,
        timeoutMs: this.timeoutMs,
      }));
    } catch (error) {
      throw new EnvironmentSetupError(`${command} failed: ${errorMessage(error)}`, { cause: error });
    }
    if (exitCode !== 0) {
      throw new EnvironmentSetupError(`${command} exited with ${exitCode}`, {
        details: { stderr: stderr.trim() },
      });
    }
  }
}
