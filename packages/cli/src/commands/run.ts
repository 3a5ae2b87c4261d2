import path from 'path';
import { Command } from 'commander';
import {
  ConfigLoader,
  instanceRepoDir,
  loadInstance,
  parseInstanceId,
  RunOrchestrator,
} from '@faultline/core';
import { UsageError } from '@faultline/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../program';
import { createCommandLogger, parseNonNegativeInt, readPatchFile } from './context';

export interface RunCommandOptions {
  instance: string;
  dataset?: string;
  repo?: string;
  env?: string;
  fix?: string;
  base?: string;
  maxPassTests?: number;
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Inject the defect of a dataset instance, verify its tests and restore the repository')
    .requiredOption('--instance <id>', 'Instance id (owner__repo.<commit>.<kind>)')
    .option('--dataset <file>', 'JSONL dataset holding the instance')
    .option('--repo <dir>', 'Repository checkout (default: <dataset.reposRoot>/<repo>)')
    .option('--env <name>', 'Environment name (default: the repository name)')
    .option('--fix <file>', 'Patch expected to repair the defect')
    .option('--base <rev>', 'Revision to check out before injecting the defect (default: the commit in the instance id)')
    .option('--max-pass-tests <n>', 'Run only the first n expected-pass tests', parseNonNegativeInt)
    .action(async (options: RunCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(Boolean(globalOpts.json));

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: {
          dataset: { path: options.dataset },
          tests: { maxPassTests: options.maxPassTests },
        },
      });

      const datasetPath = config.dataset.path;
      if (!datasetPath) {
        throw new UsageError('No dataset given: pass --dataset or set dataset.path in the config');
      }

      const record = await loadInstance(datasetPath, options.instance);
      const coordinates = parseInstanceId(record.instance_id);
      const repoRoot = options.repo
        ? path.resolve(options.repo)
        : instanceRepoDir(config.dataset.reposRoot, record.instance_id);
      const fixPatch = options.fix ? await readPatchFile(options.fix) : undefined;

      if (globalOpts.verbose) {
        renderer.log(`Running ${record.instance_id} in ${repoRoot}`);
      }

      const logger = createCommandLogger(globalOpts, config).child({ instance: record.instance_id });
      const orchestrator = RunOrchestrator.fromConfig(config, { logger });
      const report = await orchestrator.run({
        repoRoot,
        environmentName: options.env ?? coordinates.repo,
        baseRevision: options.base ?? coordinates.baseCommit,
        defectPatch: record.patch,
        failTests: record.FAIL_TO_PASS,
        passTests: record.PASS_TO_PASS,
        fixPatch,
        instanceId: record.instance_id,
      });

      renderer.renderSession(report);
      process.exitCode = report.exitCode;
    });
}
