import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import fse from 'fs-extra';
import { RepositoryNotFoundError } from '../errors';

export async function ensureDir(path: string): Promise<void> {
  await fse.ensureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

export async function isDirectory(path: string): Promise<boolean> {
  if (!(await fse.pathExists(path))) return false;
  const stat = await fs.stat(path);
  return stat.isDirectory();
}

/**
 * Throws RepositoryNotFoundError unless `repoRoot` is an existing directory.
 */
export async function assertRepository(repoRoot: string): Promise<void> {
  if (!(await isDirectory(repoRoot))) {
    throw new RepositoryNotFoundError(repoRoot);
  }
}
