import { Command } from 'commander';
import { ConfigLoader, UvEnvironmentProvider } from '@faultline/core';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../program';
import { createCommandLogger } from './context';

export function registerEnvCommand(program: Command) {
  program
    .command('env')
    .argument('<name>', 'Environment name')
    .description('Create the named environment, or reuse it when it already exists')
    .action(async (name: string) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const config = ConfigLoader.load({ configPath: globalOpts.config });

      const provider = new UvEnvironmentProvider({
        config: config.environments,
        logger: createCommandLogger(globalOpts, config),
        timeoutMs: config.execution.timeoutMs,
      });
      renderer.renderEnvironment(await provider.provide(name));
    });
}
