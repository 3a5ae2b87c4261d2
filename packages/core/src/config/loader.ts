import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError, HarnessConfigSchema, type HarnessConfig } from '@faultline/shared';

/** Repository-level config file, looked up in the working directory. */
export const REPO_CONFIG_FILE = '.faultline.yaml';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: Record<string, unknown>; // CLI flags, already shaped like the config
  cwd?: string;
}

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping at the top level: ${filePath}`);
    }
    return parsed;
  }

  /** Nested objects merge key by key; arrays and primitives replace. */
  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Layers, lowest precedence first: built-in defaults, `<cwd>/.faultline.yaml`,
   * the `--config` file, CLI flags.
   */
  static load(options: ConfigOptions = {}): HarnessConfig {
    const cwd = options.cwd || process.cwd();

    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      const configPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(configPath);
    }

    let merged = this.mergeConfigs({}, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = HarnessConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}
