import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@starsift/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Current working directory (for repo config)
  homeDir?: string; // Defaults to os.homedir()
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_DIR = '.starsift';
export const REPO_CONFIG_FILE = '.starsift.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    // An empty document loads as undefined.
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord | undefined): ConfigRecord {
    const output = { ...target };
    if (!source || Object.keys(source).length === 0) {
      return output;
    }

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
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

    // 1. User config: ~/.starsift/config.yaml
    const userConfigPath = path.join(
      options.homeDir || os.homedir(),
      USER_CONFIG_DIR,
      'config.yaml',
    );
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Repo config: <cwd>/.starsift.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // Merge in order of precedence: flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags);

    // Defaults come from the schema
    const result = ConfigSchema.safeParse(merged);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues },
      });
    }

    return result.data;
  }
}
