/**
 * Default configuration values for phasegate.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, PathConfig, PhaseConfig } from './types.js';

/**
 * Default config file name, looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'phasegate.toml';

/**
 * Default path configuration relative to the project root.
 */
export const DEFAULT_PATHS: PathConfig = {
  state: '.phasegate/state.json',
  audit_log: '.phasegate/audit_trail.json',
  agent_map: '.phasegate/phase_agent_map.json',
};

/**
 * Default logging configuration (debug off).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Default phase configuration (generic labels).
 */
export const DEFAULT_PHASES: PhaseConfig = {
  names: {},
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  logging: DEFAULT_LOGGING,
  phases: DEFAULT_PHASES,
};
