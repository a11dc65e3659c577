/**
 * Workflow state persistence.
 *
 * Serializes {@link WorkflowState} to a JSON document and back. Writes are
 * atomic (temp file + rename) and reads are strictly validated: a state file
 * that cannot be trusted stops the workflow instead of being reset.
 *
 * @packageDocumentation
 */

import { atomicWriteFile, safeReadFileIfExists } from '../utils/safe-fs.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { createPhaseNames, getPhaseName, type PhaseNames } from './phases.js';
import {
  COMPLETED_PHASE,
  FIRST_PHASE,
  WORKFLOW_STATUSES,
  isWorkflowStatus,
  type WorkflowState,
} from './types.js';

/**
 * Error type for state persistence operations.
 */
export type StatePersistenceErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'file_error'
  | 'validation_error'
  | 'corruption_error';

/**
 * Error class for workflow state serialization/deserialization errors.
 */
export class StatePersistenceError extends Error {
  /** The type of persistence error. */
  public readonly errorType: StatePersistenceErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new StatePersistenceError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of persistence error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: StatePersistenceErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'StatePersistenceError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Durable store for the workflow state.
 */
export interface StateStore {
  /** Loads the persisted state, or the initial state if none exists yet. */
  load(): Promise<WorkflowState>;
  /** Replaces the persisted state. */
  save(state: WorkflowState): Promise<void>;
}

const STATE_KEYS = [
  'current_phase',
  'next_phase',
  'status',
  'phase_name',
  'last_action',
] as const satisfies readonly (keyof WorkflowState)[];

/**
 * Creates the state used before any phase has been confirmed.
 *
 * @param phaseNames - Label lookup for phase 0.
 */
export function createInitialWorkflowState(
  phaseNames: PhaseNames = createPhaseNames()
): WorkflowState {
  return {
    current_phase: FIRST_PHASE,
    next_phase: FIRST_PHASE + 1,
    status: 'not_started',
    phase_name: getPhaseName(phaseNames, FIRST_PHASE),
    last_action: '',
  };
}

/**
 * Serializes a workflow state to JSON.
 *
 * Keys are always emitted in the same order with two-space indentation and a
 * trailing newline, so serializing a loaded state reproduces the file exactly.
 *
 * @param state - The state to serialize.
 * @returns JSON document text.
 */
export function serializeState(state: WorkflowState): string {
  const ordered = {
    current_phase: state.current_phase,
    next_phase: state.next_phase,
    status: state.status,
    phase_name: state.phase_name,
    last_action: state.last_action,
  };
  return JSON.stringify(ordered, null, 2) + '\n';
}

/**
 * Checks a parsed document against the workflow state shape.
 *
 * @param data - Parsed JSON value.
 * @returns The validated state.
 * @throws StatePersistenceError if the shape or any invariant is violated.
 */
export function validateState(data: unknown): WorkflowState {
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new StatePersistenceError('Invalid state format: expected an object', 'schema_error', {
      details: `Received ${describeValue(data)} instead of object`,
    });
  }

  const obj = data as Record<string, unknown>;

  for (const field of STATE_KEYS) {
    if (!(field in obj)) {
      throw new StatePersistenceError(
        `Invalid state format: missing required field "${field}"`,
        'schema_error',
        { details: `State file must contain: ${STATE_KEYS.join(', ')}` }
      );
    }
  }

  const unknownKeys = Object.keys(obj).filter(
    (key) => !STATE_KEYS.some((field) => field === key)
  );
  if (unknownKeys.length > 0) {
    throw new StatePersistenceError(
      `Invalid state format: unknown field "${unknownKeys.join('", "')}"`,
      'schema_error',
      { details: `State file may only contain: ${STATE_KEYS.join(', ')}` }
    );
  }

  const currentPhase = obj.current_phase;
  if (typeof currentPhase !== 'number' || !Number.isInteger(currentPhase)) {
    throw new StatePersistenceError(
      'Invalid state format: current_phase must be an integer',
      'schema_error'
    );
  }
  if (currentPhase < FIRST_PHASE || currentPhase > COMPLETED_PHASE) {
    throw new StatePersistenceError(
      `Invalid state: current_phase ${String(currentPhase)} is out of range`,
      'validation_error',
      { details: `current_phase must be between ${String(FIRST_PHASE)} and ${String(COMPLETED_PHASE)}` }
    );
  }

  if (obj.next_phase !== currentPhase + 1) {
    throw new StatePersistenceError(
      `Invalid state: next_phase must equal current_phase + 1 (${String(currentPhase + 1)})`,
      'validation_error',
      { details: `Found next_phase ${JSON.stringify(obj.next_phase)}` }
    );
  }

  const status = obj.status;
  if (!isWorkflowStatus(status)) {
    throw new StatePersistenceError(
      `Invalid state: status ${JSON.stringify(status)} is not valid`,
      'validation_error',
      { details: `Valid statuses: ${WORKFLOW_STATUSES.join(', ')}` }
    );
  }

  if (status === 'completed' && currentPhase !== COMPLETED_PHASE) {
    throw new StatePersistenceError(
      `Invalid state: status "completed" requires current_phase ${String(COMPLETED_PHASE)}`,
      'validation_error'
    );
  }

  const phaseName = obj.phase_name;
  if (typeof phaseName !== 'string') {
    throw new StatePersistenceError(
      'Invalid state format: phase_name must be a string',
      'schema_error'
    );
  }

  const lastAction = obj.last_action;
  if (typeof lastAction !== 'string') {
    throw new StatePersistenceError(
      'Invalid state format: last_action must be a string',
      'schema_error'
    );
  }

  return {
    current_phase: currentPhase,
    next_phase: currentPhase + 1,
    status,
    phase_name: phaseName,
    last_action: lastAction,
  };
}

/**
 * Parses and validates a JSON state document.
 *
 * @param json - JSON text.
 * @returns The validated state.
 * @throws StatePersistenceError if the JSON is invalid or malformed.
 */
export function deserializeState(json: string): WorkflowState {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new StatePersistenceError(
      `Failed to parse state JSON: ${parseError.message}`,
      'parse_error',
      { cause: parseError, details: 'The file does not contain valid JSON' }
    );
  }

  return validateState(data);
}

/**
 * Options for {@link FileStateStore}.
 */
export interface FileStateStoreOptions {
  /** Path to the state JSON file. */
  readonly filePath: string;
  /** Labels used for the initial state. */
  readonly phaseNames?: PhaseNames;
  readonly logger?: Logger;
}

/**
 * State store backed by a single JSON file.
 *
 * @example
 * ```typescript
 * const store = new FileStateStore({ filePath: '.phasegate/state.json' });
 * const state = await store.load();
 * await store.save({ ...state, last_action: 'noted' });
 * ```
 */
export class FileStateStore implements StateStore {
  readonly filePath: string;
  private readonly phaseNames: PhaseNames;
  private readonly logger: Logger;

  constructor(options: FileStateStoreOptions) {
    this.filePath = options.filePath;
    this.phaseNames = options.phaseNames ?? createPhaseNames();
    this.logger = (options.logger ?? silentLogger).child('StateStore');
  }

  /**
   * Loads the workflow state.
   *
   * A missing file yields the initial state; it is not created here.
   *
   * @throws StatePersistenceError if the file cannot be read or is malformed.
   */
  async load(): Promise<WorkflowState> {
    let content: string | undefined;
    try {
      content = await safeReadFileIfExists(this.filePath);
    } catch (error) {
      const fileError = error instanceof Error ? error : new Error(String(error));
      throw new StatePersistenceError(
        `Failed to read state file "${this.filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError }
      );
    }

    if (content === undefined) {
      this.logger.debug('state_initialized', { filePath: this.filePath });
      return createInitialWorkflowState(this.phaseNames);
    }

    if (content.trim() === '') {
      throw new StatePersistenceError(
        `State file "${this.filePath}" is empty`,
        'corruption_error',
        { details: 'The file exists but contains no data' }
      );
    }

    try {
      const state = deserializeState(content);
      this.logger.debug('state_loaded', {
        filePath: this.filePath,
        currentPhase: state.current_phase,
        status: state.status,
      });
      return state;
    } catch (error) {
      if (error instanceof StatePersistenceError) {
        throw new StatePersistenceError(
          `Error loading state from "${this.filePath}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      throw error;
    }
  }

  /**
   * Atomically replaces the state file, creating its directory if needed.
   *
   * @throws StatePersistenceError if the state is invalid or cannot be written.
   */
  async save(state: WorkflowState): Promise<void> {
    const json = serializeState(validateState(state));

    try {
      await atomicWriteFile(this.filePath, json);
    } catch (error) {
      const fileError = error instanceof Error ? error : new Error(String(error));
      throw new StatePersistenceError(
        `Failed to save state to "${this.filePath}": ${fileError.message}`,
        'file_error',
        { cause: fileError, details: 'Check that the directory is writable' }
      );
    }

    this.logger.debug('state_saved', {
      filePath: this.filePath,
      currentPhase: state.current_phase,
      status: state.status,
    });
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
