import path from 'path';
import { Command } from 'commander';
import { ConfigLoader, TestVerificationEngine, UvEnvironmentProvider } from '@faultline/core';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../program';
import { createCommandLogger } from './context';

export interface VerifyCommandOptions {
  env: string;
  expectFail?: boolean;
}

export function registerVerifyCommand(program: Command) {
  program
    .command('verify')
    .argument('<repo>', 'Repository working tree')
    .argument('<tests>', 'Comma-separated test identifiers, optionally in brackets, or a JSON list')
    .description('Run tests one by one and check each against the expected outcome')
    .requiredOption('--env <name>', 'Environment the tests run in')
    .option('--expect-fail', 'Count a failing test as a match')
    .action(async (repo: string, tests: string, options: VerifyCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const config = ConfigLoader.load({ configPath: globalOpts.config });
      const logger = createCommandLogger(globalOpts, config);
      const timeoutMs = config.execution.timeoutMs;

      const environment = await new UvEnvironmentProvider({
        config: config.environments,
        logger,
        timeoutMs,
      }).provide(options.env);

      const engine = new TestVerificationEngine({
        logger,
        timeoutMs,
        command: config.tests.command,
        logDir: config.tests.logDir,
      });
      const verdict = await engine.verify(
        path.resolve(repo),
        tests,
        options.expectFail ? 'expect-fail' : 'expect-pass',
        environment,
      );

      renderer.renderVerdict(verdict);
      process.exitCode = [...verdict.results.values()].every(Boolean) ? 0 : 1;
    });
}
