import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { ArenaConfigSchema, ConfigError, type ArenaConfig, type ArenaConfigInput } from '@arena/shared';

export const USER_CONFIG_PATH = path.join('.arena', 'config.yaml');
export const PROJECT_CONFIG_FILE = 'arena.yaml';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ArenaConfigInput; // CLI flags
  cwd?: string; // where arena.yaml is looked up
  env?: NodeJS.ProcessEnv;
}

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigTree {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Objects merge key by key; arrays and primitives replace. */
  static mergeConfigs(target: ConfigTree, source: ConfigTree): ConfigTree {
    const output: ConfigTree = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): ArenaConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.arena/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_PATH));

    // 2. Project config: ./arena.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: ConfigTree = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Precedence: flags > explicit > project > user > schema defaults
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = ArenaConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    if (!config.provider.api_key) {
      const key = env[config.provider.api_key_env];
      if (key) {
        config.provider.api_key = key;
      }
    }
    return config;
  }
}
