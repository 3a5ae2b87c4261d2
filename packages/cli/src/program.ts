import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { AppError, ConfigError, errorMessage, UsageError } from '@faultline/shared';
import { registerRunCommand } from './commands/run';
import { registerApplyCommand } from './commands/apply';
import { registerVerifyCommand } from './commands/verify';
import { registerEnvCommand } from './commands/env';
import { registerDoctorCommand } from './commands/doctor';

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

const PackageManifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  const manifest = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageManifestSchema.parse(JSON.parse(manifest)).version;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('faultline')
    .description('Inject defects into a repository, run its tests and put it back')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRunCommand(program);
  registerApplyCommand(program);
  registerVerifyCommand(program);
  registerEnvCommand(program);
  registerDoctorCommand(program);

  return program;
}

/** Exit status for an error that escaped a command. */
export function exitCodeFor(error: unknown): 1 | 2 {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

export function reportError(error: unknown, options: GlobalOptions): void {
  if (options.json) {
    if (error instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: error.code,
            message: error.message,
            details: error.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: errorMessage(error),
          },
        }),
      );
    }
    return;
  }

  console.error(`❌ Error: ${errorMessage(error)}`);
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (options.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (e) {
    reportError(e, program.opts<GlobalOptions>());
    process.exit(exitCodeFor(e));
  }
}
