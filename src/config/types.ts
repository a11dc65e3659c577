/**
 * Configuration types for phasegate.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Locations of the workflow's durable files.
 */
export interface PathConfig {
  /** File path for workflow state persistence. */
  state: string;
  /** File path for the append-only audit trail. */
  audit_log: string;
  /** File path for the phase-agent map. */
  agent_map: string;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * Phase display configuration.
 */
export interface PhaseConfig {
  /** Display labels keyed by phase number ("0".."13"). Unlisted phases use "Phase <n>". */
  names: Record<string, string>;
}

/**
 * Complete configuration for phasegate.
 */
export interface Config {
  paths: PathConfig;
  logging: LoggingConfig;
  phases: PhaseConfig;
}
