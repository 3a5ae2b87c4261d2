import { PATCH_FILE_TOKEN, type PatchStrategy } from '@faultline/shared';

/**
 * Built-in fallback chain, strictest first:
 * exact `git apply`, `git apply --reject` (keeps the hunks that fit and writes `.rej`
 * files for the rest), then GNU `patch` with line fuzz. `--forward` stops `patch`
 * from reversing a diff that is already in the tree.
 */
export function defaultPatchStrategies(fuzz = 5): PatchStrategy[] {
  return [
    {
      name: 'git-apply',
      bin: 'git',
      args: ['apply', '--verbose', PATCH_FILE_TOKEN],
      reverseArgs: ['--reverse'],
    },
    {
      name: 'git-apply-reject',
      bin: 'git',
      args: ['apply', '--verbose', '--reject', PATCH_FILE_TOKEN],
      reverseArgs: ['--reverse'],
    },
    {
      name: 'patch-fuzzy',
      bin: 'patch',
      args: ['--batch', '--forward', `--fuzz=${fuzz}`, '-p1', '-i', PATCH_FILE_TOKEN],
      reverseArgs: ['--reverse'],
    },
  ];
}

/**
 * Argument vector for one attempt: the patch placeholder replaced by `patchPath`,
 * and the reverse arguments appended when undoing the patch.
 */
export function buildInvocation(
  strategy: PatchStrategy,
  patchPath: string,
  reverse: boolean,
): { bin: string; args: string[] } {
  const args = strategy.args.map((arg) => (arg === PATCH_FILE_TOKEN ? patchPath : arg));
  return {
    bin: strategy.bin,
    args: reverse ? [...args, ...strategy.reverseArgs] : args,
  };
}
