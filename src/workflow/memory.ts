/**
 * In-memory state store and audit trail.
 *
 * For embedding the gate controller where durability is handled elsewhere,
 * and for tests. Both copy on the way in so that callers cannot mutate
 * committed records.
 *
 * @packageDocumentation
 */

import type { AuditTrail } from '../audit/trail.js';
import type { AuditEntry } from '../audit/types.js';
import { createInitialWorkflowState, validateState, type StateStore } from './persistence.js';
import { createPhaseNames, type PhaseNames } from './phases.js';
import type { WorkflowState } from './types.js';

export class InMemoryStateStore implements StateStore {
  private state: WorkflowState | undefined;
  private readonly phaseNames: PhaseNames;
  /** Number of successful saves. */
  saveCount = 0;

  constructor(initial?: WorkflowState, phaseNames: PhaseNames = createPhaseNames()) {
    this.state = initial === undefined ? undefined : validateState({ ...initial });
    this.phaseNames = phaseNames;
  }

  load(): Promise<WorkflowState> {
    return Promise.resolve(this.state ?? createInitialWorkflowState(this.phaseNames));
  }

  save(state: WorkflowState): Promise<void> {
    this.state = validateState({ ...state });
    this.saveCount++;
    return Promise.resolve();
  }

  /** Last saved state, if any. */
  peek(): WorkflowState | undefined {
    return this.state;
  }
}

export class InMemoryAuditTrail implements AuditTrail {
  private readonly entries: AuditEntry[];

  constructor(initial: readonly AuditEntry[] = []) {
    this.entries = initial.map((entry) => ({ ...entry }));
  }

  append(entry: AuditEntry): Promise<void> {
    this.entries.push({ ...entry });
    return Promise.resolve();
  }

  read(): Promise<readonly AuditEntry[]> {
    return Promise.resolve([...this.entries]);
  }
}
