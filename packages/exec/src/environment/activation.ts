import path from 'node:path';
import fse from 'fs-extra';
import { EnvironmentNotFoundError, isWindows, type EnvironmentHandle } from '@faultline/shared';

/**
 * Directory holding the environment's executables (`bin`, or `Scripts` on Windows).
 */
export function environmentBinDir(env: Pick<EnvironmentHandle, 'path'>): string {
  return path.join(env.path, isWindows() ? 'Scripts' : 'bin');
}

export function environmentPython(env: Pick<EnvironmentHandle, 'path'>): string {
  return path.join(environmentBinDir(env), isWindows() ? 'python.exe' : 'python');
}

export function activationScript(env: Pick<EnvironmentHandle, 'path'>): string {
  return path.join(environmentBinDir(env), 'activate');
}

export async function isActivatable(env: Pick<EnvironmentHandle, 'path'>): Promise<boolean> {
  return fse.pathExists(activationScript(env));
}

/**
 * Returns the variables a virtual environment's `activate` script would set:
 * `VIRTUAL_ENV`, and `PATH` with the environment's executables first.
 *
 * @throws EnvironmentNotFoundError when the environment has no activation script
 */
export async function activateEnvironment(
  env: EnvironmentHandle,
  baseEnv: NodeJS.ProcessEnv = process.env,
): Promise<Record<string, string>> {
  if (!(await isActivatable(env))) {
    throw new EnvironmentNotFoundError(env.path, {
      details: { name: env.name, activationScript: activationScript(env) },
    });
  }

  const currentPath = baseEnv.PATH ?? baseEnv.Path ?? '';
  const binDir = environmentBinDir(env);
  return {
    VIRTUAL_ENV: env.path,
    PATH: currentPath ? `${binDir}${path.delimiter}${currentPath}` : binDir,
  };
}
