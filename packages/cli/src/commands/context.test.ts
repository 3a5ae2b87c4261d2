import { describe, it, expect, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import * as fs from 'fs/promises';
import * as os from 'os';
import path from 'path';
import { ConsoleLogger, createHarnessConfig, JsonlLogger, UsageError } from '@faultline/shared';
import { createCommandLogger, parseNonNegativeInt, readPatchFile } from './context';

describe('command context', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('parses non-negative integers and rejects anything else', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt('25')).toBe(25);
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('2.5')).toThrow('Expected a non-negative integer.');
    expect(() => parseNonNegativeInt('')).toThrow(InvalidArgumentError);
  });

  it('reads a patch file and reports a missing one as a usage error', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'faultline-cli-context-'));
    const patchPath = path.join(tmpDir, 'fix.diff');
    await fs.writeFile(patchPath, '+++ b/a.py\n');

    expect(await readPatchFile(patchPath)).toBe('+++ b/a.py\n');
    await expect(readPatchFile(path.join(tmpDir, 'nope.diff'))).rejects.toBeInstanceOf(UsageError);
  });

  it('logs to the trace file when one is configured', () => {
    const traced = createCommandLogger({}, createHarnessConfig({ logging: { traceFile: 'trace.jsonl' } }));
    const plain = createCommandLogger({ verbose: true }, createHarnessConfig());

    expect(traced).toBeInstanceOf(JsonlLogger);
    expect(plain).toBeInstanceOf(ConsoleLogger);
  });
});
