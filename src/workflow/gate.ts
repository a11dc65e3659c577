/**
 * Gate controller: the workflow state machine.
 *
 * The controller owns the only write path to the state store and the audit
 * trail. Each decision is committed as "append audit entry, then save state",
 * so the trail is never behind the state. If a write fails the error
 * propagates and the controller keeps its last committed state.
 *
 * Callers drive it through {@link GateController.submitDecision}; the
 * interactive loop is one such caller.
 *
 * @packageDocumentation
 */

import type { AuditTrail } from '../audit/trail.js';
import {
  COMPLETION_COMMENT,
  DEFAULT_APPROVAL_COMMENT,
  PAUSE_COMMENT,
  type AuditAction,
  type AuditEntry,
} from '../audit/types.js';
import {
  ORCHESTRATOR_AGENT,
  UNKNOWN_AGENT,
  resolveAgent,
  type PhaseAgentMap,
} from '../agents/phase-agent-map.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { createPhaseNames, getPhaseName, type PhaseNames } from './phases.js';
import type { StateStore } from './persistence.js';
import {
  LAST_PHASE,
  isAwaitingCompletion,
  isCompleted,
  isGatedPhase,
  type WorkflowState,
} from './types.js';

/**
 * Instructions shown with every gate.
 */
export const GATE_INSTRUCTIONS =
  'Please complete the artifact for this phase before continuing.';

/**
 * What the operator is asked to confirm.
 */
export interface GatePrompt {
  readonly phase: number;
  readonly phaseName: string;
  /** Assigned agent, or {@link UNKNOWN_AGENT}. */
  readonly agent: string;
  readonly instructions: string;
}

/**
 * The operator's answer to a gate.
 */
export interface GateDecision {
  readonly approved: boolean;
  /** Free text; blank means "use the canned comment". */
  readonly comment?: string | undefined;
}

/**
 * Outcome of a committed transition.
 */
export type TransitionKind = 'approved' | 'paused' | 'completed';

/**
 * Result of {@link GateController.submitDecision}.
 */
export interface TransitionResult {
  readonly kind: TransitionKind;
  /** Phase the decision applied to. */
  readonly phase: number;
  /** Audit entries written for this transition, in order. */
  readonly entries: readonly AuditEntry[];
  /** Committed state after the transition. */
  readonly state: WorkflowState;
}

/**
 * Thrown when a decision is submitted to a completed workflow.
 */
export class WorkflowCompletedError extends Error {
  constructor() {
    super('Workflow is already completed; no further transitions are possible');
    this.name = 'WorkflowCompletedError';
  }
}

/**
 * Dependencies of a {@link GateController}.
 */
export interface GateControllerOptions {
  readonly stateStore: StateStore;
  readonly auditTrail: AuditTrail;
  readonly agentMap: PhaseAgentMap;
  readonly phaseNames?: PhaseNames;
  /** Source of audit timestamps. */
  readonly clock?: () => Date;
  readonly logger?: Logger;
}

/**
 * State machine over phases 0..13 with audit-logged, human-gated transitions.
 *
 * @example
 * ```typescript
 * const gate = await GateController.open({ stateStore, auditTrail, agentMap });
 * const prompt = gate.currentGate();
 * if (prompt !== undefined) {
 *   await gate.submitDecision({ approved: true, comment: 'Reviewed with finance' });
 * }
 * ```
 */
export class GateController {
  private readonly stateStore: StateStore;
  private readonly auditTrail: AuditTrail;
  private readonly agentMap: PhaseAgentMap;
  private readonly phaseNames: PhaseNames;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private state: WorkflowState;

  private constructor(options: GateControllerOptions, state: WorkflowState) {
    this.stateStore = options.stateStore;
    this.auditTrail = options.auditTrail;
    this.agentMap = options.agentMap;
    this.phaseNames = options.phaseNames ?? createPhaseNames();
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? silentLogger).child('GateController');
    this.state = state;
  }

  /**
   * Loads the persisted state and returns a controller positioned on it.
   *
   * The audit trail is read once as well, so a malformed trail fails here
   * rather than after the operator has answered a gate.
   *
   * @throws StatePersistenceError if the persisted state is malformed.
   * @throws AuditTrailError if the audit trail is malformed.
   */
  static async open(options: GateControllerOptions): Promise<GateController> {
    const state = await options.stateStore.load();
    const entries = await options.auditTrail.read();
    const controller = new GateController(options, state);
    controller.logger.debug('controller_opened', {
      currentPhase: state.current_phase,
      status: state.status,
      auditEntries: entries.length,
    });
    return controller;
  }

  /** Last committed state. */
  getState(): WorkflowState {
    return this.state;
  }

  /**
   * Describes the gate awaiting confirmation.
   *
   * @returns The prompt, or undefined once every phase has been approved.
   */
  currentGate(): GatePrompt | undefined {
    const phase = this.state.current_phase;
    if (isCompleted(this.state) || !isGatedPhase(phase)) {
      return undefined;
    }

    return {
      phase,
      phaseName: getPhaseName(this.phaseNames, phase),
      agent: resolveAgent(this.agentMap, phase),
      instructions: GATE_INSTRUCTIONS,
    };
  }

  /**
   * Applies the operator's decision to the current gate.
   *
   * Approval records an `approved` entry and advances one phase; approving
   * the last phase also records the `completed` entry. Declining records a
   * `paused` entry and leaves the phase unchanged.
   *
   * @param decision - The operator's answer.
   * @returns The committed transition.
   * @throws WorkflowCompletedError if the workflow is already completed.
   * @throws AuditTrailError or StatePersistenceError if a write fails.
   */
  async submitDecision(decision: GateDecision): Promise<TransitionResult> {
    const pending = await this.finalizeIfComplete();
    if (pending !== undefined || isCompleted(this.state)) {
      throw new WorkflowCompletedError();
    }

    const phase = this.state.current_phase;
    const agent = resolveAgent(this.agentMap, phase);
    if (agent === UNKNOWN_AGENT) {
      this.logger.warn('agent_unmapped', { phase });
    }

    if (!decision.approved) {
      const entry = this.createEntry(agent, phase, 'paused', PAUSE_COMMENT);
      await this.commit(entry, {
        ...this.state,
        status: 'paused',
        last_action: `Phase ${String(phase)} paused`,
      });
      this.logger.info('phase_paused', { phase, agent });
      return { kind: 'paused', phase, entries: [entry], state: this.state };
    }

    const comment = decision.comment?.trim() ?? '';
    const entry = this.createEntry(
      agent,
      phase,
      'approved',
      comment === '' ? DEFAULT_APPROVAL_COMMENT : comment
    );
    const nextPhase = phase + 1;
    await this.commit(entry, {
      current_phase: nextPhase,
      next_phase: nextPhase + 1,
      status: 'in_progress',
      phase_name: getPhaseName(this.phaseNames, nextPhase),
      last_action: `Phase ${String(phase)} approved`,
    });
    this.logger.info('phase_approved', { phase, agent, nextPhase });

    const completion = await this.finalizeIfComplete();
    if (completion !== undefined) {
      return {
        kind: 'completed',
        phase,
        entries: [entry, ...completion.entries],
        state: this.state,
      };
    }

    return { kind: 'approved', phase, entries: [entry], state: this.state };
  }

  /**
   * Records the completion step when every phase has been approved but the
   * workflow is not yet marked completed. Safe to call at any time.
   *
   * @returns The completion transition, or undefined if nothing was pending.
   */
  async finalizeIfComplete(): Promise<TransitionResult | undefined> {
    if (!isAwaitingCompletion(this.state)) {
      return undefined;
    }

    const entry = this.createEntry(ORCHESTRATOR_AGENT, LAST_PHASE, 'completed', COMPLETION_COMMENT);
    await this.commit(entry, {
      ...this.state,
      status: 'completed',
      last_action: 'Workflow completed',
    });
    this.logger.info('workflow_completed', { phase: LAST_PHASE });

    return { kind: 'completed', phase: LAST_PHASE, entries: [entry], state: this.state };
  }

  private createEntry(
    agent: string,
    phase: number,
    action: AuditAction,
    comment: string
  ): AuditEntry {
    return { timestamp: this.clock().toISOString(), agent, phase, action, comment };
  }

  private async commit(entry: AuditEntry, next: WorkflowState): Promise<void> {
    await this.auditTrail.append(entry);
    await this.stateStore.save(next);
    this.state = next;
  }
}
