/**
 * Loads phasegate.toml from disk and applies environment overrides.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { safeReadFileIfExists } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config, PathConfig } from './types.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit config file. When given, the file must exist. */
  configPath?: string | undefined;
  /** Directory used to find the default config file. Defaults to process.cwd(). */
  cwd?: string | undefined;
  /** Environment to read PHASEGATE_* overrides from. Defaults to process.env. */
  env?: EnvRecord | undefined;
}

/**
 * A loaded configuration and where it came from.
 */
export interface LoadedConfig {
  config: Config;
  /** Absolute path of the file that was read, or undefined when defaults were used. */
  source: string | undefined;
}

/**
 * Resolves every relative path in the configuration against a base directory.
 */
export function resolveConfigPaths(paths: PathConfig, baseDir: string): PathConfig {
  return {
    state: path.resolve(baseDir, paths.state),
    audit_log: path.resolve(baseDir, paths.audit_log),
    agent_map: path.resolve(baseDir, paths.agent_map),
  };
}

/**
 * Reads and parses the configuration file, then applies env overrides.
 *
 * A missing default file yields the default configuration; a missing
 * explicit file is an error. Relative paths from the file, from env vars or
 * from the defaults are resolved against the directory holding the config
 * file, or `cwd` when no file was read.
 *
 * @throws ConfigParseError if the file is missing, unreadable or invalid.
 * @throws EnvCoercionError if an override cannot be coerced.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let content: string | undefined;
  try {
    content = await safeReadFileIfExists(configPath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read config file ${configPath}: ${cause.message}`, cause);
  }

  if (content === undefined && explicit) {
    throw new ConfigParseError(`Config file not found: ${configPath}`);
  }

  const base = content === undefined ? getDefaultConfig() : parseConfig(content);
  const withEnv = applyEnvOverrides(base, options.env ?? process.env);
  const baseDir = content === undefined ? cwd : path.dirname(configPath);

  return {
    config: { ...withEnv, paths: resolveConfigPaths(withEnv.paths, baseDir) },
    source: content === undefined ? undefined : configPath,
  };
}
