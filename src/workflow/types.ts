/**
 * Workflow state types.
 *
 * The persisted state uses snake_case keys so that the JSON document written
 * to disk matches the field names external tooling reads.
 *
 * @packageDocumentation
 */

/**
 * First gated phase.
 */
export const FIRST_PHASE = 0;

/**
 * Last gated phase. Approving it completes the workflow.
 */
export const LAST_PHASE = 13;

/**
 * Value of `current_phase` once every phase has been approved.
 */
export const COMPLETED_PHASE = LAST_PHASE + 1;

/**
 * Lifecycle status of a workflow.
 */
export type WorkflowStatus = 'not_started' | 'in_progress' | 'paused' | 'completed';

/**
 * Every valid status, in lifecycle order.
 */
export const WORKFLOW_STATUSES: readonly WorkflowStatus[] = [
  'not_started',
  'in_progress',
  'paused',
  'completed',
] as const;

/**
 * Durable progress of the single workflow governed by a state file.
 */
export interface WorkflowState {
  /** Phase awaiting confirmation, or {@link COMPLETED_PHASE}. Never decreases. */
  readonly current_phase: number;
  /** Always `current_phase + 1`. */
  readonly next_phase: number;
  readonly status: WorkflowStatus;
  /** Display label for `current_phase`. */
  readonly phase_name: string;
  /** Description of the most recent transition. */
  readonly last_action: string;
}

/**
 * Type guard for {@link WorkflowStatus}.
 *
 * @param value - Value to check.
 */
export function isWorkflowStatus(value: unknown): value is WorkflowStatus {
  return WORKFLOW_STATUSES.some((status) => status === value);
}

/**
 * Tells whether a phase number is one of the gated phases (0..13).
 *
 * @param phase - Phase number to check.
 */
export function isGatedPhase(phase: number): boolean {
  return Number.isInteger(phase) && phase >= FIRST_PHASE && phase <= LAST_PHASE;
}

/**
 * Tells whether the workflow has reached its terminal state.
 *
 * @param state - Workflow state.
 */
export function isCompleted(state: WorkflowState): boolean {
  return state.status === 'completed';
}

/**
 * Tells whether every phase has been approved but the completion step has not
 * yet been recorded. This happens when the process stops between saving the
 * last approval and writing the completion entry.
 *
 * @param state - Workflow state.
 */
export function isAwaitingCompletion(state: WorkflowState): boolean {
  return state.current_phase > LAST_PHASE && state.status !== 'completed';
}
