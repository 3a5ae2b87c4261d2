import path from 'path';
import { Command } from 'commander';
import fse from 'fs-extra';
import which from 'which';
import chalk from 'chalk';
import { formatCommand } from '@faultline/exec';
import { ConfigLoader } from '@faultline/core';
import { RevisionController } from '@faultline/repo';
import { errorMessage, isWindows, type HarnessConfig } from '@faultline/shared';
import type { GlobalOptions } from '../program';

export type CheckStatus = 'OK' | 'WARN' | 'FAIL';
export type CheckResult = [CheckStatus, string];

const CHECKS: Record<CheckStatus, string> = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

export async function checkExecutable(name: string): Promise<CheckResult> {
  try {
    const resolved = await which(name);
    return ['OK', `${name} found at: ${resolved}`];
  } catch {
    return ['FAIL', `${name} not found in PATH.`];
  }
}

function checkPlatform(): CheckResult {
  if (isWindows()) {
    return ['WARN', 'Running on native Windows. Environments are expected to use a POSIX bin/ layout.'];
  }
  return ['OK', `Running on ${process.platform}.`];
}

async function checkEnvironmentsDir(config: HarnessConfig): Promise<CheckResult> {
  const baseDir = path.resolve(config.environments.baseDir);
  if (await fse.pathExists(baseDir)) {
    return ['OK', `Environment directory: ${baseDir}`];
  }
  return ['WARN', `Environment directory ${baseDir} does not exist yet. Run \`faultline env <name>\`.`];
}

async function checkDataset(config: HarnessConfig): Promise<CheckResult> {
  const datasetPath = config.dataset.path;
  if (!datasetPath) {
    return ['WARN', 'No dataset configured. Pass --dataset to `faultline run`.'];
  }
  if (await fse.pathExists(path.resolve(datasetPath))) {
    return ['OK', `Dataset found: ${datasetPath}`];
  }
  return ['FAIL', `Dataset not found: ${datasetPath}`];
}

export async function checkRepository(repoRoot: string): Promise<CheckResult> {
  const resolved = path.resolve(repoRoot);
  const git = new RevisionController();
  try {
    const branch = await git.currentBranch(resolved);
    const status = await git.statusPorcelain(resolved);
    if (status) {
      return ['WARN', `${resolved} is on ${branch} with local changes; they are stashed while switching revisions.`];
    }
    return ['OK', `${resolved} is on ${branch} with a clean working tree.`];
  } catch (error: unknown) {
    return ['FAIL', `${resolved} is not a usable git working tree: ${errorMessage(error)}`];
  }
}

export async function runDoctorChecks(configPath?: string, repoRoot?: string): Promise<CheckResult[]> {
  const results: CheckResult[] = [checkPlatform()];
  results.push(await checkExecutable('git'));
  results.push(await checkExecutable('patch'));
  if (repoRoot) {
    results.push(await checkRepository(repoRoot));
  }

  let config: HarnessConfig;
  try {
    config = ConfigLoader.load({ configPath });
  } catch (error: unknown) {
    results.push(await checkExecutable('uv'));
    results.push(['FAIL', `Failed to load configuration: ${errorMessage(error)}`]);
    return results;
  }

  results.push(await checkExecutable(config.environments.uvCommand));
  const [bin = '', ...args] = config.tests.command;
  results.push(['OK', `Configuration loaded. Test command: ${formatCommand(bin, args)}`]);
  results.push(await checkEnvironmentsDir(config));
  results.push(await checkDataset(config));
  return results;
}

export const registerDoctorCommand = (program: Command) => {
  const command = new Command('doctor');

  command
    .description('Check that the tools the harness shells out to are available.')
    .option('--repo <dir>', 'Also check a repository working tree')
    .action(async (options: { repo?: string }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const results = await runDoctorChecks(globalOpts.config, options.repo);
      const hasFailures = results.some(([status]) => status === 'FAIL');
      process.exitCode = hasFailures ? 1 : 0;

      if (globalOpts.json) {
        console.log(
          JSON.stringify(
            { ok: !hasFailures, checks: results.map(([status, message]) => ({ status, message })) },
            null,
            2,
          ),
        );
        return;
      }

      console.log(chalk.bold('Harness Environment Checkup'));
      console.log('---------------------------------');
      results.forEach(([status, message]) => {
        console.log(`${CHECKS[status]} ${message}`);
      });
      console.log('---------------------------------');

      if (hasFailures) {
        console.log(
          chalk.red.bold('Doctor checks failed.') + ' Please resolve the issues marked with ' + CHECKS.FAIL,
        );
      } else {
        console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
      }
    });

  program.addCommand(command);
};
