import path from 'path';
import fs from 'fs-extra';
import { InvalidArgumentError } from 'commander';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  type HarnessConfig,
  type Logger,
} from '@faultline/shared';
import type { GlobalOptions } from '../program';

/**
 * Human-readable messages go to stderr in JSON mode; structured events go to
 * the configured trace file when there is one.
 */
export function createCommandLogger(options: GlobalOptions, config: HarnessConfig): Logger {
  const stderr = Boolean(options.json);
  if (config.logging.traceFile) {
    return new JsonlLogger(path.resolve(config.logging.traceFile), {}, { stderr });
  }
  return new ConsoleLogger({ debug: Boolean(options.verbose), stderr });
}

export async function readPatchFile(filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new UsageError(`Patch file not found: ${filePath}`);
  }
  return fs.readFile(resolved, 'utf8');
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}
