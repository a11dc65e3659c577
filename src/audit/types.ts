/**
 * Audit trail types.
 *
 * @packageDocumentation
 */

/**
 * Kind of action recorded in the audit trail.
 */
export type AuditAction = 'approved' | 'paused' | 'completed';

/**
 * Every valid audit action.
 */
export const AUDIT_ACTIONS: readonly AuditAction[] = ['approved', 'paused', 'completed'] as const;

/**
 * One recorded gate decision. Entries are never mutated once written.
 */
export interface AuditEntry {
  /** UTC instant of the action (ISO 8601). */
  readonly timestamp: string;
  /** Agent assigned to the phase, or a sentinel name. */
  readonly agent: string;
  /** Phase active when the action occurred. */
  readonly phase: number;
  readonly action: AuditAction;
  readonly comment: string;
}

/**
 * Comment recorded for an approval given without a comment.
 */
export const DEFAULT_APPROVAL_COMMENT = 'Phase approved.';

/**
 * Comment recorded for every pause.
 */
export const PAUSE_COMMENT = 'User chose to pause.';

/**
 * Comment recorded for the completion step.
 */
export const COMPLETION_COMMENT = 'Workflow finished.';

/**
 * Type guard for {@link AuditAction}.
 *
 * @param value - Value to check.
 */
export function isAuditAction(value: unknown): value is AuditAction {
  return AUDIT_ACTIONS.some((action) => action === value);
}
