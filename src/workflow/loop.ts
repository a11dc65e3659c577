/**
 * Orchestration loop.
 *
 * A thin driver: it asks an {@link Operator} about each gate and hands the
 * answer to the {@link GateController} until the operator pauses or the last
 * phase is approved. All transition logic lives in the controller.
 *
 * @packageDocumentation
 */

import { FileAuditTrail } from '../audit/trail.js';
import { loadPhaseAgentMap } from '../agents/phase-agent-map.js';
import type { Config } from '../config/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { GateController, type GateDecision, type GatePrompt, type TransitionResult } from './gate.js';
import { FileStateStore } from './persistence.js';
import { createPhaseNames } from './phases.js';
import type { WorkflowState } from './types.js';

/**
 * The party confirming gates. The CLI's readline prompt is one implementation.
 */
export interface Operator {
  /** Shows the gate and waits for the operator's decision. */
  confirm(prompt: GatePrompt): Promise<GateDecision>;
  /** Called after each committed transition. */
  notify?(result: TransitionResult): void;
}

/**
 * How a loop run ended.
 */
export type WorkflowOutcomeKind = 'paused' | 'completed';

/**
 * Result of {@link runWorkflow}.
 */
export interface WorkflowOutcome {
  readonly outcome: WorkflowOutcomeKind;
  /** Committed state when the loop stopped. */
  readonly state: WorkflowState;
  /** Transitions committed during this run, in order. */
  readonly transitions: readonly TransitionResult[];
}

/**
 * Options for {@link runWorkflow}.
 */
export interface RunWorkflowOptions {
  readonly controller: GateController;
  readonly operator: Operator;
  readonly logger?: Logger;
}

/**
 * Drives the controller until the workflow pauses or completes.
 *
 * Re-running a completed workflow returns immediately without prompting or
 * writing anything. Errors from the controller (malformed files, failed
 * writes) propagate unchanged.
 *
 * @returns The outcome and every transition committed during the run.
 */
export async function runWorkflow(options: RunWorkflowOptions): Promise<WorkflowOutcome> {
  const { controller, operator } = options;
  const logger = (options.logger ?? silentLogger).child('WorkflowLoop');
  const transitions: TransitionResult[] = [];

  const record = (result: TransitionResult): void => {
    transitions.push(result);
    operator.notify?.(result);
  };

  const pending = await controller.finalizeIfComplete();
  if (pending !== undefined) {
    logger.info('completion_recovered', { phase: pending.phase });
    record(pending);
  }

  logger.debug('loop_started', {
    currentPhase: controller.getState().current_phase,
    status: controller.getState().status,
  });

  for (;;) {
    const prompt = controller.currentGate();
    if (prompt === undefined) {
      logger.info('loop_finished', { outcome: 'completed', transitions: transitions.length });
      return { outcome: 'completed', state: controller.getState(), transitions };
    }

    const decision = await operator.confirm(prompt);
    const result = await controller.submitDecision(decision);
    record(result);

    if (result.kind === 'paused') {
      logger.info('loop_finished', { outcome: 'paused', phase: result.phase });
      return { outcome: 'paused', state: result.state, transitions };
    }
  }
}

/**
 * Explicit file locations and labels for a file-backed workflow.
 */
export type WorkflowSettings = Pick<Config, 'paths' | 'phases'>;

/**
 * Builds a controller over the files named in the configuration.
 *
 * @param settings - Paths and phase labels.
 * @param logger - Parent logger for every component.
 * @throws PhaseAgentMapError or StatePersistenceError if a file is malformed.
 */
export async function createWorkflow(
  settings: WorkflowSettings,
  logger: Logger = silentLogger
): Promise<GateController> {
  const phaseNames = createPhaseNames(settings.phases.names);
  const agentMap = await loadPhaseAgentMap(settings.paths.agent_map, logger);

  return GateController.open({
    stateStore: new FileStateStore({ filePath: settings.paths.state, phaseNames, logger }),
    auditTrail: new FileAuditTrail({ filePath: settings.paths.audit_log, logger }),
    agentMap,
    phaseNames,
    logger,
  });
}
