/**
 * Configuration module for phasegate.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type { Config, LoggingConfig, PathConfig, PhaseConfig } from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_PHASES,
} from './defaults.js';
export {
  ENV_VARIABLES,
  EnvCoercionError,
  applyEnvOverrides,
  formatEnvHelp,
  parseEnvBoolean,
} from './env.js';
export type { EnvRecord, EnvVariable } from './env.js';
export { loadConfig, resolveConfigPaths } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
