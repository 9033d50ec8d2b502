// ── Logging ──

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

// ── Agent contract ──

/**
 * What an agent's result means for the workflow. `proceed` follows the
 * success edge of the current work state; `halt` ends the request as failed
 * (for example, a feasibility check that finds the request cannot be met).
 */
export type AgentResultKind = 'proceed' | 'halt'

export interface AgentResult {
  success: boolean
  result?: Record<string, unknown>
  error?: string
  retryable?: boolean
  kind?: AgentResultKind
  next_agent?: string
  next_task?: string
}

export interface AgentInvocation {
  attempt: number
  signal: AbortSignal
}

/**
 * A pluggable unit of work. Agents are stateless per invocation and must be
 * idempotent for identical context input, since the supervisor may retry them.
 */
export interface Agent {
  id: string
  tasks: string[]
  execute(
    task: string,
    context: Readonly<Record<string, unknown>>,
    invocation: AgentInvocation,
  ): Promise<AgentResult>
}

// ── Run state ──

export enum AgentRunState {
  IDLE = 'idle',
  WORKING = 'working',
  FAILED = 'failed',
  WAITING_FOR_HUMAN = 'waiting_for_human',
}

export interface AgentRunStatus {
  agent_id: string
  request_id: string
  task: string
  state: AgentRunState
  attempt: number
  updated_at: string
}

// ── Attempts ──

export type AttemptOutcome = 'success' | 'failure' | 'retrying' | 'abandoned'

export interface AttemptStart {
  request_id: string
  agent_id: string
  task: string
  dispatch: number
  attempt: number
  started_at: string
}

export interface AttemptFinish {
  outcome: AttemptOutcome
  finished_at: string
  result: Record<string, unknown> | null
  error: string | null
  retryable: boolean | null
}

export interface AttemptRecord extends AttemptStart, AttemptFinish {
  id: string
  duration_ms: number
}

/** Where the supervisor writes one execution record per attempt. */
export interface AttemptSink {
  beginDispatch(request_id: string, agent_id: string, task: string): number
  begin(start: AttemptStart): string
  finish(id: string, finish: AttemptFinish): void
}

export interface AgentFailureReport {
  request_id: string
  agent_id: string
  task: string
  error: string
  retryable: boolean
  attempts: AttemptRecord[]
}

/** Receives terminal agent failures; returns the id of the raised escalation. */
export interface EscalationSink {
  raiseAgentFailure(report: AgentFailureReport): string
}

// ── Retry policy ──

export interface RetryPolicy {
  max_attempts: number
  base_delay_ms: number
  jitter_ms: number
  attempt_timeout_ms?: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 3,
  base_delay_ms: 1000,
  jitter_ms: 250,
}

// ── Supervision ──

export interface SupervisedInvocation {
  request_id: string
  agent_id: string
  task: string
  context: Readonly<Record<string, unknown>>
  signal?: AbortSignal
}

export type SupervisedOutcome =
  | {
    status: 'succeeded'
    result: AgentResult
    dispatch: number
    attempts: AttemptRecord[]
  }
  | {
    status: 'failed'
    error: string
    retryable: boolean
    escalation_id: string
    dispatch: number
    attempts: AttemptRecord[]
  }
  | {
    status: 'abandoned'
    dispatch: number
    attempts: AttemptRecord[]
  }
