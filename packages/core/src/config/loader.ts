import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config } from '@synthloop/shared';

/** Per-section overrides, e.g. from CLI flags */
export type ConfigOverrides = {
  [K in keyof Config]?: Config[K] extends object ? Partial<Config[K]> : Config[K];
};

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigOverrides; // CLI flags
  cwd?: string; // Current working directory (for project config)
  env?: NodeJS.ProcessEnv; // Environment variables
  homeDir?: string; // Location of the user config directory
}

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];

      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.synthloop/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, '.synthloop', 'config.yaml'));

    // 2. Project config: <cwd>/.synthloop.yaml
    const projectConfig = this.loadYaml(path.join(cwd, '.synthloop.yaml'));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: ConfigRecord = { ...options.flags };

    // Merge in order of precedence: flags > explicit > project > user
    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, projectConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    const result = ConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const finalConfig = result.data;

    // Handle `api_key_env` resolution
    const provider = finalConfig.provider;
    if (provider.api_key_env && !provider.api_key) {
      const value = env[provider.api_key_env];
      if (value) {
        provider.api_key = value;
      }
    }

    return finalConfig;
  }
}
