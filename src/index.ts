/**
 * phasegate
 *
 * A human-gated, fourteen-phase workflow with a durable state file and an
 * append-only audit trail.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Workflow state machine
export {
  GATE_INSTRUCTIONS,
  GateController,
  WorkflowCompletedError,
  type GateControllerOptions,
  type GateDecision,
  type GatePrompt,
  type TransitionKind,
  type TransitionResult,
} from './workflow/gate.js';
export {
  createWorkflow,
  runWorkflow,
  type Operator,
  type RunWorkflowOptions,
  type WorkflowOutcome,
  type WorkflowOutcomeKind,
  type WorkflowSettings,
} from './workflow/loop.js';
export {
  FileStateStore,
  StatePersistenceError,
  createInitialWorkflowState,
  deserializeState,
  serializeState,
  validateState,
  type FileStateStoreOptions,
  type StatePersistenceErrorType,
  type StateStore,
} from './workflow/persistence.js';
export { InMemoryAuditTrail, InMemoryStateStore } from './workflow/memory.js';
export {
  COMPLETED_PHASE_NAME,
  createPhaseNames,
  getPhaseName,
  type PhaseNames,
} from './workflow/phases.js';
export {
  COMPLETED_PHASE,
  FIRST_PHASE,
  LAST_PHASE,
  WORKFLOW_STATUSES,
  isAwaitingCompletion,
  isCompleted,
  isGatedPhase,
  isWorkflowStatus,
  type WorkflowState,
  type WorkflowStatus,
} from './workflow/types.js';

// Audit trail
export {
  AuditTrailError,
  FileAuditTrail,
  parseAuditTrail,
  serializeAuditTrail,
  validateAuditEntry,
  type AuditTrail,
  type AuditTrailErrorType,
  type FileAuditTrailOptions,
} from './audit/trail.js';
export {
  AUDIT_ACTIONS,
  COMPLETION_COMMENT,
  DEFAULT_APPROVAL_COMMENT,
  PAUSE_COMMENT,
  isAuditAction,
  type AuditAction,
  type AuditEntry,
} from './audit/types.js';
export {
  AUDIT_CSV_COLUMNS,
  escapeCsvField,
  formatAuditTrail,
  formatAuditTrailCsv,
} from './audit/formatter.js';

// Agents
export {
  ORCHESTRATOR_AGENT,
  PhaseAgentMapError,
  UNKNOWN_AGENT,
  loadPhaseAgentMap,
  parsePhaseAgentMap,
  resolveAgent,
  type PhaseAgentMap,
  type PhaseAgentMapErrorType,
} from './agents/phase-agent-map.js';

// Configuration
export * from './config/index.js';

// Logging
export {
  Logger,
  silentLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './utils/logger.js';
