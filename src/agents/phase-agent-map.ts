/**
 * Phase-to-agent assignments.
 *
 * The map is a JSON object whose keys are phase numbers (as strings) and whose
 * values are agent names:
 *
 * ```json
 * { "0": "Planner", "1": "Market Intelligence", "2": "Finance" }
 * ```
 *
 * Assignments are informational: they label audit entries and the operator
 * prompt, and a phase without an assignment still advances. Keys that are
 * not phase numbers (notes such as `"_comment"`, or `"14"`) are skipped with
 * a warning.
 *
 * @packageDocumentation
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import { safeReadFileIfExists } from '../utils/safe-fs.js';
import { FIRST_PHASE, LAST_PHASE } from '../workflow/types.js';

/**
 * Agent name recorded when a phase has no assignment.
 */
export const UNKNOWN_AGENT = 'Unknown Agent';

/**
 * Agent name recorded for the completion step.
 */
export const ORCHESTRATOR_AGENT = 'Orchestrator';

/**
 * Read-only lookup from phase number to agent name.
 */
export type PhaseAgentMap = ReadonlyMap<number, string>;

/**
 * Error type for phase-agent map loading.
 */
export type PhaseAgentMapErrorType = 'parse_error' | 'schema_error' | 'file_error';

/**
 * Error thrown when the phase-agent map cannot be read or is malformed.
 */
export class PhaseAgentMapError extends Error {
  public readonly errorType: PhaseAgentMapErrorType;
  public override readonly cause: Error | undefined;

  constructor(message: string, errorType: PhaseAgentMapErrorType, cause?: Error) {
    super(message);
    this.name = 'PhaseAgentMapError';
    this.errorType = errorType;
    this.cause = cause;
  }
}

/**
 * Parses the JSON text of a phase-agent map.
 *
 * @param json - JSON text.
 * @param logger - Receives an `agent_map_key_ignored` warning per skipped key.
 * @returns The parsed map.
 * @throws PhaseAgentMapError for invalid JSON, a non-object document, or a
 * non-string agent name for a phase.
 */
export function parsePhaseAgentMap(json: string, logger: Logger = silentLogger): PhaseAgentMap {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new PhaseAgentMapError(
      `Failed to parse phase-agent map JSON: ${parseError.message}`,
      'parse_error',
      parseError
    );
  }

  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new PhaseAgentMapError('Invalid phase-agent map: expected an object', 'schema_error');
  }

  const map = new Map<number, string>();
  for (const [key, value] of Object.entries(data)) {
    const phase = /^\d+$/.test(key) ? Number(key) : Number.NaN;
    if (!Number.isInteger(phase) || phase < FIRST_PHASE || phase > LAST_PHASE) {
      logger.warn('agent_map_key_ignored', {
        key,
        reason: `not a phase between ${String(FIRST_PHASE)} and ${String(LAST_PHASE)}`,
      });
      continue;
    }
    if (typeof value !== 'string') {
      throw new PhaseAgentMapError(
        `Invalid phase-agent map: agent for phase ${key} must be a string`,
        'schema_error'
      );
    }
    map.set(phase, value);
  }

  return map;
}

/**
 * Loads a phase-agent map from disk. A missing file yields an empty map.
 *
 * @param filePath - Path to the map JSON file.
 * @throws PhaseAgentMapError if the file cannot be read or is malformed.
 */
export async function loadPhaseAgentMap(
  filePath: string,
  logger: Logger = silentLogger
): Promise<PhaseAgentMap> {
  let content: string | undefined;
  try {
    content = await safeReadFileIfExists(filePath);
  } catch (error) {
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new PhaseAgentMapError(
      `Failed to read phase-agent map "${filePath}": ${fileError.message}`,
      'file_error',
      fileError
    );
  }

  if (content === undefined) {
    return new Map();
  }

  try {
    return parsePhaseAgentMap(content, logger.child('PhaseAgentMap'));
  } catch (error) {
    if (error instanceof PhaseAgentMapError) {
      throw new PhaseAgentMapError(
        `Error loading phase-agent map from "${filePath}": ${error.message}`,
        error.errorType,
        error.cause
      );
    }
    throw error;
  }
}

/**
 * Resolves the agent responsible for a phase.
 *
 * @param map - Phase-agent map.
 * @param phase - Phase number.
 * @returns The mapped agent, or {@link UNKNOWN_AGENT}.
 */
export function resolveAgent(map: PhaseAgentMap, phase: number): string {
  return map.get(phase) ?? UNKNOWN_AGENT;
}
