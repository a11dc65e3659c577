/**
 * Append-only audit trail.
 *
 * The trail is stored as a JSON array of {@link AuditEntry} records in
 * chronological order. Every append rewrites the whole array atomically, so a
 * reader sees either the trail before the append or the trail after it.
 *
 * @packageDocumentation
 */

import { atomicWriteFile, safeReadFileIfExists } from '../utils/safe-fs.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { AUDIT_ACTIONS, isAuditAction, type AuditEntry } from './types.js';

/**
 * Error type for audit trail operations.
 */
export type AuditTrailErrorType = 'parse_error' | 'schema_error' | 'file_error';

/**
 * Error thrown when the audit trail cannot be read, parsed or written.
 */
export class AuditTrailError extends Error {
  /** The type of audit trail error. */
  public readonly errorType: AuditTrailErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    errorType: AuditTrailErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'AuditTrailError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Durable, append-only record of gate decisions.
 */
export interface AuditTrail {
  /**
   * Appends one entry. Resolves only once the entry is durable.
   */
  append(entry: AuditEntry): Promise<void>;

  /**
   * Reads every entry in insertion order.
   */
  read(): Promise<readonly AuditEntry[]>;
}

/**
 * Validates one parsed audit entry.
 *
 * @param value - Parsed JSON value.
 * @param index - Position in the trail, for error messages.
 * @returns The validated entry.
 * @throws AuditTrailError if the entry is malformed.
 */
export function validateAuditEntry(value: unknown, index: number): AuditEntry {
  const position = `entry ${String(index)}`;

  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new AuditTrailError(`Invalid audit trail: ${position} must be an object`, 'schema_error');
  }

  const obj = value as Record<string, unknown>;
  const { timestamp, agent, phase, action, comment } = obj;

  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) {
    throw new AuditTrailError(
      `Invalid audit trail: ${position} must have an ISO 8601 "timestamp"`,
      'schema_error'
    );
  }
  if (typeof agent !== 'string') {
    throw new AuditTrailError(
      `Invalid audit trail: ${position} must have an "agent" string`,
      'schema_error'
    );
  }
  if (typeof phase !== 'number' || !Number.isInteger(phase)) {
    throw new AuditTrailError(
      `Invalid audit trail: ${position} must have an integer "phase"`,
      'schema_error'
    );
  }
  if (!isAuditAction(action)) {
    throw new AuditTrailError(
      `Invalid audit trail: ${position} has unknown action ${JSON.stringify(action)}`,
      'schema_error',
      { details: `Valid actions: ${AUDIT_ACTIONS.join(', ')}` }
    );
  }
  if (typeof comment !== 'string') {
    throw new AuditTrailError(
      `Invalid audit trail: ${position} must have a "comment" string`,
      'schema_error'
    );
  }

  return { timestamp, agent, phase, action, comment };
}

/**
 * Parses the JSON text of an audit trail.
 *
 * @param json - JSON text.
 * @returns Entries in file order.
 * @throws AuditTrailError if the JSON is invalid or any entry is malformed.
 */
export function parseAuditTrail(json: string): AuditEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new AuditTrailError(
      `Failed to parse audit trail JSON: ${parseError.message}`,
      'parse_error',
      { cause: parseError, details: 'The file does not contain valid JSON' }
    );
  }

  if (!Array.isArray(data)) {
    throw new AuditTrailError('Invalid audit trail: expected an array', 'schema_error');
  }

  return data.map((value: unknown, index) => validateAuditEntry(value, index));
}

/**
 * Serializes entries as a pretty-printed JSON array with a trailing newline.
 *
 * @param entries - Entries in chronological order.
 */
export function serializeAuditTrail(entries: readonly AuditEntry[]): string {
  const ordered = entries.map((entry) => ({
    timestamp: entry.timestamp,
    agent: entry.agent,
    phase: entry.phase,
    action: entry.action,
    comment: entry.comment,
  }));
  return JSON.stringify(ordered, null, 2) + '\n';
}

/**
 * Options for {@link FileAuditTrail}.
 */
export interface FileAuditTrailOptions {
  /** Path to the audit trail JSON file. */
  readonly filePath: string;
  readonly logger?: Logger;
}

/**
 * Audit trail backed by a JSON array file.
 */
export class FileAuditTrail implements AuditTrail {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: FileAuditTrailOptions) {
    this.filePath = options.filePath;
    this.logger = (options.logger ?? silentLogger).child('AuditTrail');
  }

  /**
   * Reads the trail. A missing file is an empty trail.
   *
   * @throws AuditTrailError if the file cannot be read or is malformed.
   */
  async read(): Promise<readonly AuditEntry[]> {
    let content: string | undefined;
    try {
      content = await safeReadFileIfExists(this.filePath);
    } catch (error) {
      const fileError = error instanceof Error ? error : new Error(String(error));
      throw new AuditTrailError(
        `Failed to read audit trail "${this.filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError }
      );
    }

    if (content === undefined) {
      return [];
    }

    try {
      return parseAuditTrail(content);
    } catch (error) {
      if (error instanceof AuditTrailError) {
        throw new AuditTrailError(
          `Error loading audit trail from "${this.filePath}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      throw error;
    }
  }

  /**
   * Appends an entry after the existing ones and persists immediately.
   *
   * @throws AuditTrailError if the existing trail is malformed or the write fails.
   */
  async append(entry: AuditEntry): Promise<void> {
    const existing = await this.read();
    const next = [...existing, validateAuditEntry(entry, existing.length)];

    try {
      await atomicWriteFile(this.filePath, serializeAuditTrail(next));
    } catch (error) {
      const fileError = error instanceof Error ? error : new Error(String(error));
      throw new AuditTrailError(
        `Failed to append to audit trail "${this.filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError }
      );
    }

    this.logger.debug('audit_entry_appended', {
      filePath: this.filePath,
      action: entry.action,
      phase: entry.phase,
      length: next.length,
    });
  }
}
