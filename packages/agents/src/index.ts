export const VERSION = '0.1.0'

// Registry
export { AgentRegistry } from './registry.js'

// Retry Supervisor
export { RetrySupervisor, delayForAttempt } from './retry-supervisor.js'
export type { RetrySupervisorOptions } from './retry-supervisor.js'

// Failure classification
export { classifyFailure } from './utils/classify-failure.js'
export type { FailureCode, FailureClassification } from './utils/classify-failure.js'

// Errors
export { AgentError, AgentTimeoutError, UnknownAgentError } from './errors.js'

// Types
export { AgentRunState, DEFAULT_RETRY_POLICY } from './types.js'
export type {
  Agent,
  AgentResult,
  AgentResultKind,
  AgentInvocation,
  AgentRunStatus,
  AgentFailureReport,
  AttemptOutcome,
  AttemptStart,
  AttemptFinish,
  AttemptRecord,
  AttemptSink,
  EscalationSink,
  Logger,
  RetryPolicy,
  SupervisedInvocation,
  SupervisedOutcome,
} from './types.js'
