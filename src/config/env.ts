/**
 * PHASEGATE_* environment overrides.
 *
 * A wrapper script or CI job can point a run at different files without
 * editing phasegate.toml. Precedence: env > config file > defaults.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, PathConfig } from './types.js';

/**
 * Environment record (same shape as process.env).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Thrown when an environment variable holds a value of the wrong type.
 */
export class EnvCoercionError extends Error {
  public readonly envVar: string;
  public readonly rawValue: string;

  constructor(envVar: string, rawValue: string, message: string) {
    super(message);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
  }
}

type EnvTarget =
  | { readonly section: 'paths'; readonly field: keyof PathConfig }
  | { readonly section: 'logging'; readonly field: 'debug' };

/**
 * A supported override and the config field it sets.
 */
export interface EnvVariable {
  readonly name: string;
  readonly target: EnvTarget;
  readonly description: string;
}

/**
 * Supported variables, applied in order: a later entry wins over an earlier
 * one for the same field.
 */
export const ENV_VARIABLES: readonly EnvVariable[] = [
  {
    name: 'PHASEGATE_PATHS_STATE',
    target: { section: 'paths', field: 'state' },
    description: 'Workflow state file',
  },
  {
    name: 'PHASEGATE_PATHS_AUDIT_LOG',
    target: { section: 'paths', field: 'audit_log' },
    description: 'Audit trail file',
  },
  {
    name: 'PHASEGATE_PATHS_AGENT_MAP',
    target: { section: 'paths', field: 'agent_map' },
    description: 'Phase-agent map file',
  },
  {
    name: 'PHASEGATE_DEBUG',
    target: { section: 'logging', field: 'debug' },
    description: 'Shortcut for PHASEGATE_LOGGING_DEBUG',
  },
  {
    name: 'PHASEGATE_LOGGING_DEBUG',
    target: { section: 'logging', field: 'debug' },
    description: 'Debug logging (true/false, 1/0, yes/no, on/off)',
  },
];

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Reads a boolean override. Case-insensitive; surrounding whitespace is ignored.
 *
 * @throws EnvCoercionError for any other spelling.
 */
export function parseEnvBoolean(envVar: string, value: string): boolean {
  const word = value.trim().toLowerCase();
  if (TRUTHY.includes(word)) {
    return true;
  }
  if (FALSY.includes(word)) {
    return false;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Returns a copy of `config` with every set, non-empty PHASEGATE_* variable applied.
 *
 * @throws EnvCoercionError if a boolean variable cannot be read.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const paths: PathConfig = { ...config.paths };
  const logging: LoggingConfig = { ...config.logging };

  for (const { name, target } of ENV_VARIABLES) {
    // eslint-disable-next-line security/detect-object-injection -- name comes from the fixed table above
    const value = env[name];
    if (value === undefined || value === '') {
      continue;
    }

    if (target.section === 'paths') {
      // eslint-disable-next-line security/detect-object-injection -- field is a PathConfig key
      paths[target.field] = value;
    } else {
      logging.debug = parseEnvBoolean(name, value);
    }
  }

  return { ...config, paths, logging };
}

/**
 * Help lines listing each variable, aligned on the description column.
 */
export function formatEnvHelp(): string {
  const width = Math.max(...ENV_VARIABLES.map((variable) => variable.name.length)) + 2;
  return ENV_VARIABLES.map(
    (variable) => `  ${variable.name.padEnd(width)}${variable.description}`
  ).join('\n');
}
