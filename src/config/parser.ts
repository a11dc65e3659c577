/**
 * TOML configuration parser for phasegate.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_PATHS, DEFAULT_PHASES } from './defaults.js';
import type { Config, LoggingConfig, PathConfig, PhaseConfig } from './types.js';
import { FIRST_PHASE, LAST_PHASE } from '../workflow/types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a non-empty string.
 */
function validatePathString(value: unknown, fieldPath: string): string {
  const path = validateString(value, fieldPath);
  if (path.trim() === '') {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': path cannot be empty`);
  }
  return path;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a TOML table, if present.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value !== 'object' || Array.isArray(value) || value instanceof Date) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table`);
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parses path configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for paths section.
 * @returns Validated path configuration merged with defaults.
 */
function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('state' in raw) {
    result.state = validatePathString(raw.state, 'paths.state');
  }
  if ('audit_log' in raw) {
    result.audit_log = validatePathString(raw.audit_log, 'paths.audit_log');
  }
  if ('agent_map' in raw) {
    result.agent_map = validatePathString(raw.agent_map, 'paths.agent_map');
  }

  return result;
}

/**
 * Parses logging configuration from raw TOML data.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses phase labels. Keys must name a gated phase.
 */
function parsePhases(raw: Record<string, unknown> | undefined): PhaseConfig {
  if (raw === undefined) {
    return { names: { ...DEFAULT_PHASES.names } };
  }

  const table = validateTable(raw.names, 'phases.names');
  const names: Record<string, string> = {};

  for (const [key, value] of Object.entries(table ?? {})) {
    const phase = /^\d+$/.test(key) ? Number(key) : Number.NaN;
    if (!Number.isInteger(phase) || phase < FIRST_PHASE || phase > LAST_PHASE) {
      throw new ConfigParseError(
        `Invalid key 'phases.names.${key}': expected a phase number between ${String(FIRST_PHASE)} and ${String(LAST_PHASE)}`
      );
    }
    names[String(phase)] = validateString(value, `phases.names.${key}`);
  }

  return { names };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * Unknown sections and keys are ignored; known keys with the wrong type are
 * rejected.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [paths]
 * state = "run/state.json"
 *
 * [phases.names]
 * 0 = "Intake"
 * `);
 * console.log(config.paths.state); // "run/state.json"
 * console.log(config.phases.names['0']); // "Intake"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    paths: parsePaths(validateTable(parsed.paths, 'paths')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
    phases: parsePhases(validateTable(parsed.phases, 'phases')),
  };
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    logging: { ...DEFAULT_CONFIG.logging },
    phases: { names: { ...DEFAULT_CONFIG.phases.names } },
  };
}
