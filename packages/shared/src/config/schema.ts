import { z } from 'zod';

/** Placeholder replaced by the path of the transient patch file. */
export const PATCH_FILE_TOKEN = '{patch}';

/** Placeholder replaced by the test identifier in the test command. */
export const TEST_ID_TOKEN = '{test}';

export const PatchStrategySchema = z
  .object({
    name: z.string().min(1),
    bin: z.string().min(1),
    args: z.array(z.string()),
    /** Appended to `args` when the patch is undone instead of applied */
    reverseArgs: z.array(z.string()).default(['--reverse']),
  })
  .refine((s) => s.args.includes(PATCH_FILE_TOKEN), {
    message: `strategy args must contain the ${PATCH_FILE_TOKEN} placeholder`,
    path: ['args'],
  });

export type PatchStrategy = z.infer<typeof PatchStrategySchema>;

export const EnvironmentsConfigSchema = z.object({
  /** Directory that holds one sub-directory per named environment */
  baseDir: z.string().default('env'),
  /** Dependency manifest installed when an environment is first created */
  requirementsFile: z.string().default('requirements.txt'),
  /** Packages every environment needs, installed before the manifest */
  packages: z.array(z.string()).default(['pytest']),
  uvCommand: z.string().default('uv'),
});

export const PatchConfigSchema = z.object({
  /** Line fuzz tolerated by the textual `patch` fallback */
  fuzz: z.number().int().min(0).default(5),
  /** Replaces the built-in strategy chain when set; tried in order */
  strategies: z.array(PatchStrategySchema).min(1).optional(),
});

export const TestsConfigSchema = z
  .object({
    /** Test command as an argument vector; `{test}` marks where the identifier goes */
    command: z
      .array(z.string())
      .min(1)
      .default(['pytest', '-q', '--disable-warnings', '--maxfail=1', TEST_ID_TOKEN]),
    /** Per-test diagnostic logs, relative to the repository root */
    logDir: z.string().default('.test_logs'),
    /** Only the first N expect-pass tests are run when set */
    maxPassTests: z.number().int().min(0).optional(),
  })
  .refine((t) => t.command.includes(TEST_ID_TOKEN), {
    message: `tests.command must contain the ${TEST_ID_TOKEN} placeholder`,
    path: ['command'],
  });

export const ExecutionConfigSchema = z.object({
  /** Upper bound for every external invocation */
  timeoutMs: z.number().int().min(1000).default(30 * 60 * 1000),
});

export const DatasetConfigSchema = z.object({
  path: z.string().optional(),
  reposRoot: z.string().default('repo'),
});

export const LoggingConfigSchema = z.object({
  /** JSONL file that receives structured session events */
  traceFile: z.string().optional(),
});

export const HarnessConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  environments: EnvironmentsConfigSchema.default({}),
  patch: PatchConfigSchema.default({}),
  tests: TestsConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  dataset: DatasetConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
export type EnvironmentsConfig = z.infer<typeof EnvironmentsConfigSchema>;
export type PatchConfig = z.infer<typeof PatchConfigSchema>;
export type TestsConfig = z.infer<typeof TestsConfigSchema>;

/**
 * Parses `input` with every default applied.
 * Throws a ZodError on invalid input; the config loader turns that into a ConfigError.
 */
export function createHarnessConfig(input: HarnessConfigInput = {}): HarnessConfig {
  return HarnessConfigSchema.parse(input);
}
