export enum WorkflowState {
  REQUIREMENTS_GATHERING = 'requirements_gathering',
  REQUIREMENTS_REVIEW = 'requirements_review',
  FEASIBILITY_VALIDATION = 'feasibility_validation',
  QUERY_REVIEW = 'query_review',
  KICKOFF_SCHEDULING = 'kickoff_scheduling',
  EXTRACTION_APPROVAL = 'extraction_approval',
  DATA_EXTRACTION = 'data_extraction',
  QA_VALIDATION = 'qa_validation',
  QA_REVIEW = 'qa_review',
  DATA_DELIVERY = 'data_delivery',
  SCOPE_CHANGE_REVIEW = 'scope_change_review',
  ESCALATED = 'escalated',
  COMPLETED = 'completed',
  REJECTED = 'rejected',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export type ApprovalKind =
  | 'requirements_review'
  | 'critical_query_review'
  | 'access_authorization'
  | 'quality_review'
  | 'scope_change'

export const APPROVAL_KINDS: readonly ApprovalKind[] = [
  'requirements_review',
  'critical_query_review',
  'access_authorization',
  'quality_review',
  'scope_change',
]

export type StateClass = 'work' | 'gate' | 'hold' | 'terminal'

export type StateSpec =
  | {
    type: 'work'
    agent_id: string
    task: string
    on_success: WorkflowState
    on_halt: WorkflowState
    description: string
  }
  | {
    type: 'gate'
    kind: Exclude<ApprovalKind, 'scope_change'>
    on_approve: WorkflowState
    on_reject: WorkflowState
    description: string
  }
  | { type: 'scope_review'; kind: 'scope_change'; description: string }
  | { type: 'hold'; description: string }
  | { type: 'terminal'; description: string }

// Every state has exactly one entry; the compiler rejects a missing one.
export const TRANSITION_TABLE: Record<WorkflowState, StateSpec> = {
  [WorkflowState.REQUIREMENTS_GATHERING]: {
    type: 'work',
    agent_id: 'requirements_agent',
    task: 'gather_requirements',
    on_success: WorkflowState.REQUIREMENTS_REVIEW,
    on_halt: WorkflowState.FAILED,
    description: 'Gathering requirements from the requester',
  },
  [WorkflowState.REQUIREMENTS_REVIEW]: {
    type: 'gate',
    kind: 'requirements_review',
    on_approve: WorkflowState.FEASIBILITY_VALIDATION,
    on_reject: WorkflowState.REJECTED,
    description: 'Waiting for a reviewer to approve the gathered requirements',
  },
  [WorkflowState.FEASIBILITY_VALIDATION]: {
    type: 'work',
    agent_id: 'phenotype_agent',
    task: 'validate_feasibility',
    on_success: WorkflowState.QUERY_REVIEW,
    on_halt: WorkflowState.FAILED,
    description: 'Validating feasibility and generating the extraction query',
  },
  [WorkflowState.QUERY_REVIEW]: {
    type: 'gate',
    kind: 'critical_query_review',
    on_approve: WorkflowState.KICKOFF_SCHEDULING,
    on_reject: WorkflowState.REJECTED,
    description: 'Waiting for critical review of the generated query',
  },
  [WorkflowState.KICKOFF_SCHEDULING]: {
    type: 'work',
    agent_id: 'calendar_agent',
    task: 'schedule_kickoff_meeting',
    on_success: WorkflowState.EXTRACTION_APPROVAL,
    on_halt: WorkflowState.FAILED,
    description: 'Scheduling the kickoff meeting',
  },
  [WorkflowState.EXTRACTION_APPROVAL]: {
    type: 'gate',
    kind: 'access_authorization',
    on_approve: WorkflowState.DATA_EXTRACTION,
    on_reject: WorkflowState.REJECTED,
    description: 'Waiting for data access authorization',
  },
  [WorkflowState.DATA_EXTRACTION]: {
    type: 'work',
    agent_id: 'extraction_agent',
    task: 'extract_data',
    on_success: WorkflowState.QA_VALIDATION,
    on_halt: WorkflowState.FAILED,
    description: 'Extracting data',
  },
  [WorkflowState.QA_VALIDATION]: {
    type: 'work',
    agent_id: 'qa_agent',
    task: 'validate_extracted_data',
    on_success: WorkflowState.QA_REVIEW,
    on_halt: WorkflowState.FAILED,
    description: 'Running quality checks on the extracted data',
  },
  [WorkflowState.QA_REVIEW]: {
    type: 'gate',
    kind: 'quality_review',
    on_approve: WorkflowState.DATA_DELIVERY,
    on_reject: WorkflowState.REJECTED,
    description: 'Waiting for a reviewer to sign off the quality report',
  },
  [WorkflowState.DATA_DELIVERY]: {
    type: 'work',
    agent_id: 'delivery_agent',
    task: 'deliver_data',
    on_success: WorkflowState.COMPLETED,
    on_halt: WorkflowState.FAILED,
    description: 'Delivering data to the requester',
  },
  [WorkflowState.SCOPE_CHANGE_REVIEW]: {
    type: 'scope_review',
    kind: 'scope_change',
    description: 'Waiting for a reviewer to accept or reject a scope change',
  },
  [WorkflowState.ESCALATED]: {
    type: 'hold',
    description: 'Held until a human resolves the open escalation',
  },
  [WorkflowState.COMPLETED]: { type: 'terminal', description: 'Request completed' },
  [WorkflowState.REJECTED]: { type: 'terminal', description: 'Request rejected by a reviewer' },
  [WorkflowState.FAILED]: { type: 'terminal', description: 'Request failed' },
  [WorkflowState.CANCELLED]: { type: 'terminal', description: 'Request cancelled' },
}

export const INITIAL_STATE = WorkflowState.REQUIREMENTS_GATHERING

export const WORKFLOW_STATES: readonly WorkflowState[] = Object.values(WorkflowState)

// ── Timeout routing ──

export type TimeoutRouting = 'reject' | 'hold'

export interface GatePolicy {
  timeout_hours: number
  on_timeout: TimeoutRouting
}

export const DEFAULT_GATE_POLICIES: Record<ApprovalKind, GatePolicy> = {
  requirements_review: { timeout_hours: 24, on_timeout: 'hold' },
  critical_query_review: { timeout_hours: 24, on_timeout: 'hold' },
  access_authorization: { timeout_hours: 12, on_timeout: 'reject' },
  quality_review: { timeout_hours: 24, on_timeout: 'hold' },
  scope_change: { timeout_hours: 48, on_timeout: 'reject' },
}

// ── Queries ──

export function stateSpec(state: WorkflowState): StateSpec {
  return TRANSITION_TABLE[state]
}

export function stateClass(state: WorkflowState): StateClass {
  const spec = TRANSITION_TABLE[state]
  return spec.type === 'scope_review' ? 'gate' : spec.type
}

export function isTerminal(state: WorkflowState): boolean {
  return TRANSITION_TABLE[state].type === 'terminal'
}

export function requiresAgent(state: WorkflowState): { agent_id: string; task: string } | null {
  const spec = TRANSITION_TABLE[state]
  if (spec.type !== 'work') return null
  return { agent_id: spec.agent_id, task: spec.task }
}

export function requiresApproval(state: WorkflowState): ApprovalKind | null {
  const spec = TRANSITION_TABLE[state]
  if (spec.type === 'gate' || spec.type === 'scope_review') return spec.kind
  return null
}

export function gateStateFor(kind: ApprovalKind): WorkflowState {
  for (const state of WORKFLOW_STATES) {
    if (requiresApproval(state) === kind) return state
  }
  throw new Error(`No gate state for approval kind ${kind}`)
}

export function describeState(state: WorkflowState): string {
  return TRANSITION_TABLE[state].description
}

export function isWorkflowState(value: unknown): value is WorkflowState {
  return typeof value === 'string' && (WORKFLOW_STATES as readonly string[]).includes(value)
}

export function isApprovalKind(value: unknown): value is ApprovalKind {
  return typeof value === 'string' && (APPROVAL_KINDS as readonly string[]).includes(value)
}
