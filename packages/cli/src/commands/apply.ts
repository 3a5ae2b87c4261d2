import path from 'path';
import { Command } from 'commander';
import { ConfigLoader, UvEnvironmentProvider } from '@faultline/core';
import { defaultPatchStrategies, PatchApplier } from '@faultline/repo';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../program';
import { createCommandLogger, readPatchFile } from './context';

export interface ApplyCommandOptions {
  env: string;
  reverse?: boolean;
}

export function registerApplyCommand(program: Command) {
  program
    .command('apply')
    .argument('<repo>', 'Repository working tree')
    .argument('<patchFile>', 'Unified diff to apply')
    .description('Apply a patch with the fallback strategy chain')
    .requiredOption('--env <name>', 'Environment the patch tools run in')
    .option('--reverse', 'Undo the patch instead of applying it')
    .action(async (repo: string, patchFile: string, options: ApplyCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const config = ConfigLoader.load({ configPath: globalOpts.config });
      const logger = createCommandLogger(globalOpts, config);
      const timeoutMs = config.execution.timeoutMs;

      const text = await readPatchFile(patchFile);
      const environment = await new UvEnvironmentProvider({
        config: config.environments,
        logger,
        timeoutMs,
      }).provide(options.env);

      const applier = new PatchApplier({
        logger,
        timeoutMs,
        strategies: config.patch.strategies ?? defaultPatchStrategies(config.patch.fuzz),
      });
      const outcome = await applier.apply(
        path.resolve(repo),
        { text, reverse: Boolean(options.reverse) },
        environment,
      );

      renderer.renderPatch(outcome);
      process.exitCode = outcome.status === 'applied' ? 0 : 1;
    });
}
