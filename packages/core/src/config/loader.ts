import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, expandHome, join, type Config, type ConfigInput } from '@rebisect/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Repository root (for repo config)
}

type ConfigTree = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_PATH = path.join('.rebisect', 'config.yaml');
export const REPO_CONFIG_FILE = '.rebisect.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigTree {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
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

  static mergeConfigs(target: ConfigTree, source: ConfigTree): ConfigTree {
    const output = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
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

    // 1. User config: ~/.rebisect/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_PATH));

    // 2. Repo config: <repoRoot>/.rebisect.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigTree = {};
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
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = ConfigSchema.safeParse(merged);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}

/**
 * Directory of the cost store: `$REBISECT_CACHE_DIR`, then `cache.dir`,
 * then `$XDG_CACHE_HOME/rebisect`, then `~/.cache/rebisect`.
 */
export function resolveCacheDir(
  config: Pick<Config, 'cache'>,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  if (env.REBISECT_CACHE_DIR) {
    return expandHome(env.REBISECT_CACHE_DIR, home);
  }
  if (config.cache.dir) {
    return expandHome(config.cache.dir, home);
  }
  const base = env.XDG_CACHE_HOME || join(home, '.cache');
  return join(base, 'rebisect');
}

export function resolveCacheFile(
  config: Pick<Config, 'cache'>,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  return join(resolveCacheDir(config, env, home), config.cache.file);
}
