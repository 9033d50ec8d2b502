export const VERSION = '0.1.0'

// Database
export { createDatabase, durable, isTransientDbError } from './db.js'

// State Machine
export {
  WorkflowState,
  APPROVAL_KINDS,
  DEFAULT_GATE_POLICIES,
  INITIAL_STATE,
  TRANSITION_TABLE,
  WORKFLOW_STATES,
  describeState,
  gateStateFor,
  isApprovalKind,
  isTerminal,
  isWorkflowState,
  requiresAgent,
  requiresApproval,
  stateClass,
  stateSpec,
} from './state-machine.js'
export type { ApprovalKind, GatePolicy, StateClass, StateSpec, TimeoutRouting } from './state-machine.js'

// Workflow Engine
export { advance, checkRoutingHint, createInstance, getValidEvents, replay } from './workflow-engine.js'
export type { RoutingMismatch } from './workflow-engine.js'

// Stores
export { InstanceStore } from './instance-store.js'
export type { InstanceSummary } from './instance-store.js'
export { ExecutionLog } from './execution-log.js'
export type { AgentMetrics, ExecutionOutcome, ExecutionRecord } from './execution-log.js'
export { AuditLog } from './audit.js'
export type { AuditEntry, LogActionInput } from './audit.js'

// Approval Gateway
export { ApprovalGateway } from './approval-gateway.js'
export type {
  ApprovalGatewayConfig,
  ResolveApprovalInput,
  ResolvedApproval,
  TimedOutApproval,
} from './approval-gateway.js'

// Escalation Manager
export { EscalationManager } from './escalation-manager.js'
export type { EscalationManagerConfig, ResolvedEscalation } from './escalation-manager.js'

// Notifier
export { Notifier } from './notifier.js'
export type { NotificationEvent, NotificationEventName, WebhookConfig } from './notifier.js'

// Orchestrator
export { Orchestrator, createOrchestratorContext } from './orchestrator.js'
export type {
  ApprovalAck,
  EscalationAck,
  OrchestratorConfig,
  OrchestratorContext,
  OrchestratorDependencies,
  RecoveryReport,
  RequestStatus,
  ScopeChangeAck,
  TransitionAck,
  WorkItem,
} from './orchestrator.js'
export { RequestLocks } from './locks.js'

// Factory
export { createWorkflowService } from './factory.js'
export type { WorkflowService, WorkflowServiceConfig } from './factory.js'

// API
export { createApiRouter, statusFor } from './api.js'
export type { ApiConfig, ApiDependencies } from './api.js'

// Config
export { ConfigSchema, DEFAULT_CONFIG_FILE, loadConfig, parseConfig, substituteEnvVars } from './config.js'
export type { TollgateConfig } from './config.js'

// CLI
export { buildProgram, generateTemplate, loadAgents } from './cli.js'

// Errors
export {
  ApprovalConflictError,
  ConcurrencyError,
  DuplicateGateError,
  EscalationConflictError,
  NotFoundError,
  PersistenceUnavailableError,
  ScopeChangeConflictError,
  TransitionError,
  ValidationError,
} from './errors.js'

// Ids
export { createId, createRequestId } from './id.js'

// Types
export { ESCALATION_ACTIONS } from './types.js'
export type {
  ApprovalDecision,
  ApprovalEvent,
  ApprovalRecord,
  ApprovalStatus,
  EscalationAction,
  EscalationCause,
  EscalationHold,
  EscalationRecord,
  EscalationSeverity,
  EscalationStatus,
  HistoryEntry,
  JsonObject,
  RoutingHint,
  ScopeBranch,
  WorkflowEvent,
  WorkflowEventType,
  WorkflowInstance,
} from './types.js'
