import type { AgentResultKind } from '@tollgate/agents'
import type { ApprovalKind, TimeoutRouting, WorkflowState } from './state-machine.js'

export type JsonObject = Record<string, unknown>

// ── Events ──

export interface RoutingHint {
  next_agent: string | null
  next_task: string | null
}

export type EscalationAction = 'retry_from_state' | 'force_fail' | 'force_complete'

export const ESCALATION_ACTIONS: readonly EscalationAction[] = ['retry_from_state', 'force_fail', 'force_complete']

export type WorkflowEvent =
  | { type: 'submitted'; submitted_by: string | null }
  | {
    type: 'agent_succeeded'
    agent_id: string
    task: string
    kind: AgentResultKind
    output: JsonObject
    hint: RoutingHint | null
  }
  | { type: 'agent_failed_terminally'; agent_id: string; task: string; error: string; escalation_id: string }
  | { type: 'approval_approved'; approval_id: string; kind: ApprovalKind }
  | { type: 'approval_modified'; approval_id: string; kind: ApprovalKind; delta: JsonObject }
  | { type: 'approval_rejected'; approval_id: string; kind: ApprovalKind }
  | {
    type: 'approval_timed_out'
    approval_id: string
    kind: ApprovalKind
    routing: TimeoutRouting
    escalation_id: string
  }
  | { type: 'scope_change_requested'; delta: JsonObject; reason: string; requested_by: string | null }
  | { type: 'scope_change_resolved'; approval_id: string; accepted: boolean; delta: JsonObject | null }
  | { type: 'escalation_resolved'; escalation_id: string; action: EscalationAction }
  | { type: 'cancel'; reason: string | null }

export type WorkflowEventType = WorkflowEvent['type']

export type ApprovalEvent = Extract<
  WorkflowEvent,
  { type: 'approval_approved' | 'approval_modified' | 'approval_rejected' }
>

// ── Instance ──

export interface HistoryEntry {
  seq: number
  state: WorkflowState
  at: string
  event: WorkflowEvent
}

/** Side branch opened by a scope change; `snapshot` is the serialized context it restores. */
export interface ScopeBranch {
  resume_state: WorkflowState
  snapshot: string
  delta: JsonObject
  reason: string
}

export interface EscalationHold {
  resume_state: WorkflowState
  escalation_id: string
}

export interface WorkflowInstance {
  request_id: string
  state: WorkflowState
  context: JsonObject
  history: HistoryEntry[]
  branch: ScopeBranch | null
  hold: EscalationHold | null
  version: number
  created_at: string
  updated_at: string
}

// ── Approvals ──

export type ApprovalStatus = 'pending' | 'approved' | 'modified' | 'rejected' | 'timed_out'

export type ApprovalDecision = 'approve' | 'modify' | 'reject'

export interface ApprovalRecord {
  id: string
  request_id: string
  kind: ApprovalKind
  payload: JsonObject
  status: ApprovalStatus
  submitted_at: string
  timeout_at: string
  reviewer: string | null
  notes: string | null
  delta: JsonObject | null
  resolved_at: string | null
  escalation_id: string | null
}

// ── Escalations ──

export type EscalationSeverity = 'low' | 'medium' | 'high' | 'critical'

export type EscalationCause =
  | { type: 'agent_failure'; agent_id: string; task: string; error: string; attempts: number }
  | { type: 'approval_timeout'; approval_id: string; kind: ApprovalKind; routing: TimeoutRouting }
  | { type: 'scope_change_conflict'; reason: string }

export type EscalationStatus = 'open' | 'resolved'

export interface EscalationRecord {
  id: string
  request_id: string
  cause: EscalationCause
  severity: EscalationSeverity
  detail: string
  status: EscalationStatus
  created_at: string
  resolved_at: string | null
  resolution: EscalationAction | null
  resolved_by: string | null
}
