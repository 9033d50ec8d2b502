import { TransitionError, ScopeChangeConflictError } from './errors.js'
import {
  INITIAL_STATE,
  TRANSITION_TABLE,
  WorkflowState,
  requiresAgent,
  type StateSpec,
} from './state-machine.js'
import type {
  HistoryEntry,
  JsonObject,
  RoutingHint,
  WorkflowEvent,
  WorkflowEventType,
  WorkflowInstance,
} from './types.js'

interface Change {
  state: WorkflowState
  context?: JsonObject
  branch?: WorkflowInstance['branch']
  hold?: WorkflowInstance['hold']
}

const EVENTS_BY_CLASS: Record<StateSpec['type'], WorkflowEventType[]> = {
  work: ['agent_succeeded', 'agent_failed_terminally', 'scope_change_requested', 'cancel'],
  gate: [
    'approval_approved',
    'approval_modified',
    'approval_rejected',
    'approval_timed_out',
    'scope_change_requested',
    'cancel',
  ],
  scope_review: ['scope_change_resolved', 'approval_timed_out', 'scope_change_requested', 'cancel'],
  hold: ['escalation_resolved', 'scope_change_requested', 'cancel'],
  terminal: [],
}

export function getValidEvents(state: WorkflowState): WorkflowEventType[] {
  return [...EVENTS_BY_CLASS[TRANSITION_TABLE[state].type]]
}

export function createInstance(
  requestId: string,
  context: JsonObject,
  at: string = new Date().toISOString(),
  submittedBy: string | null = null,
): WorkflowInstance {
  return {
    request_id: requestId,
    state: INITIAL_STATE,
    context: structuredClone(context),
    history: [{ seq: 0, state: INITIAL_STATE, at, event: { type: 'submitted', submitted_by: submittedBy } }],
    branch: null,
    hold: null,
    version: 1,
    created_at: at,
    updated_at: at,
  }
}

/**
 * Applies one event to an instance and returns the next instance. Pure: the
 * input is never mutated. Any event the current state does not accept throws
 * a TransitionError, so duplicate or out-of-order deliveries never apply.
 */
export function advance(
  instance: WorkflowInstance,
  event: WorkflowEvent,
  at: string = new Date().toISOString(),
): WorkflowInstance {
  const { state } = instance
  const spec = TRANSITION_TABLE[state]

  if (spec.type === 'terminal') {
    throw new TransitionError(state, event.type, 'instance is in a terminal state')
  }

  switch (event.type) {
    case 'submitted':
      throw new TransitionError(state, event.type, 'instance already exists')

    case 'cancel':
      return commit(instance, event, at, { state: WorkflowState.CANCELLED, branch: null, hold: null })

    case 'scope_change_requested':
      // Also covers a held review, which keeps its branch while escalated.
      if (spec.type === 'scope_review' || instance.branch) {
        throw new ScopeChangeConflictError(state, instance.request_id)
      }
      return commit(instance, event, at, {
        state: WorkflowState.SCOPE_CHANGE_REVIEW,
        branch: {
          resume_state: state,
          snapshot: JSON.stringify(instance.context),
          delta: event.delta,
          reason: event.reason,
        },
      })

    default:
      break
  }

  switch (spec.type) {
    case 'work':
      return advanceWork(instance, spec, event, at)
    case 'gate':
      return advanceGate(instance, spec, event, at)
    case 'scope_review':
      return advanceScopeReview(instance, event, at)
    case 'hold':
      return advanceHold(instance, event, at)
  }
}

function advanceWork(
  instance: WorkflowInstance,
  spec: Extract<StateSpec, { type: 'work' }>,
  event: WorkflowEvent,
  at: string,
): WorkflowInstance {
  const { state } = instance

  if (event.type !== 'agent_succeeded' && event.type !== 'agent_failed_terminally') {
    throw new TransitionError(state, event.type, `expected a result from ${spec.agent_id}.${spec.task}`)
  }
  if (event.agent_id !== spec.agent_id || event.task !== spec.task) {
    throw new TransitionError(
      state,
      event.type,
      `result from ${event.agent_id}.${event.task} does not match ${spec.agent_id}.${spec.task}`,
    )
  }

  if (event.type === 'agent_failed_terminally') {
    return commit(instance, event, at, {
      state: WorkflowState.ESCALATED,
      hold: { resume_state: state, escalation_id: event.escalation_id },
    })
  }

  return commit(instance, event, at, {
    state: event.kind === 'halt' ? spec.on_halt : spec.on_success,
    context: { ...instance.context, ...event.output },
  })
}

function advanceGate(
  instance: WorkflowInstance,
  spec: Extract<StateSpec, { type: 'gate' }>,
  event: WorkflowEvent,
  at: string,
): WorkflowInstance {
  const { state } = instance

  if (
    event.type !== 'approval_approved'
    && event.type !== 'approval_modified'
    && event.type !== 'approval_rejected'
    && event.type !== 'approval_timed_out'
  ) {
    throw new TransitionError(state, event.type, `waiting for a ${spec.kind} decision`)
  }
  if (event.kind !== spec.kind) {
    throw new TransitionError(state, event.type, `approval kind ${event.kind} does not match ${spec.kind}`)
  }

  switch (event.type) {
    case 'approval_approved':
      return commit(instance, event, at, { state: spec.on_approve })
    case 'approval_modified':
      return commit(instance, event, at, {
        state: spec.on_approve,
        context: { ...instance.context, ...event.delta },
      })
    case 'approval_rejected':
      return commit(instance, event, at, { state: spec.on_reject })
    case 'approval_timed_out':
      if (event.routing === 'reject') {
        return commit(instance, event, at, { state: spec.on_reject })
      }
      return commit(instance, event, at, {
        state: WorkflowState.ESCALATED,
        hold: { resume_state: state, escalation_id: event.escalation_id },
      })
  }
}

function advanceScopeReview(
  instance: WorkflowInstance,
  event: WorkflowEvent,
  at: string,
): WorkflowInstance {
  const { state, branch } = instance

  if (!branch) {
    throw new TransitionError(state, event.type, 'no scope change branch is open')
  }

  if (event.type === 'scope_change_resolved') {
    if (event.accepted) {
      return commit(instance, event, at, {
        state: branch.resume_state,
        context: { ...instance.context, ...(event.delta ?? branch.delta) },
        branch: null,
      })
    }
    return commit(instance, event, at, {
      state: branch.resume_state,
      context: restoreSnapshot(branch.snapshot),
      branch: null,
    })
  }

  if (event.type === 'approval_timed_out' && event.kind === 'scope_change') {
    if (event.routing === 'reject') {
      return commit(instance, event, at, {
        state: branch.resume_state,
        context: restoreSnapshot(branch.snapshot),
        branch: null,
      })
    }
    // The branch stays open so the review can be reopened after the hold.
    return commit(instance, event, at, {
      state: WorkflowState.ESCALATED,
      hold: { resume_state: state, escalation_id: event.escalation_id },
    })
  }

  throw new TransitionError(state, event.type, 'waiting for a scope_change decision')
}

function advanceHold(
  instance: WorkflowInstance,
  event: WorkflowEvent,
  at: string,
): WorkflowInstance {
  const { state, hold } = instance

  if (event.type !== 'escalation_resolved') {
    throw new TransitionError(state, event.type, 'waiting for an escalation to be resolved')
  }
  if (!hold || hold.escalation_id !== event.escalation_id) {
    throw new TransitionError(state, event.type, `instance is not held by escalation ${event.escalation_id}`)
  }

  switch (event.action) {
    case 'retry_from_state':
      return commit(instance, event, at, { state: hold.resume_state, hold: null })
    case 'force_fail':
      return commit(instance, event, at, { state: WorkflowState.FAILED, hold: null, branch: null })
    case 'force_complete':
      return commit(instance, event, at, { state: WorkflowState.COMPLETED, hold: null, branch: null })
  }
}

function restoreSnapshot(snapshot: string): JsonObject {
  const parsed: unknown = JSON.parse(snapshot)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Scope change snapshot is not a JSON object')
  }
  return { ...parsed }
}

function commit(
  instance: WorkflowInstance,
  event: WorkflowEvent,
  at: string,
  change: Change,
): WorkflowInstance {
  const entry: HistoryEntry = {
    seq: instance.history.length,
    state: change.state,
    at,
    event,
  }
  return {
    ...instance,
    state: change.state,
    context: change.context ?? instance.context,
    branch: change.branch === undefined ? instance.branch : change.branch,
    hold: change.hold === undefined ? instance.hold : change.hold,
    history: [...instance.history, entry],
    version: instance.version + 1,
    updated_at: at,
  }
}

/**
 * Rebuilds an instance from its persisted history. The first entry must be
 * the submission; every later entry is folded through `advance`, and each
 * folded state must match the state that was recorded.
 */
export function replay(
  requestId: string,
  initialContext: JsonObject,
  history: HistoryEntry[],
): WorkflowInstance {
  const [first, ...rest] = history
  if (!first || first.event.type !== 'submitted') {
    throw new Error(`History for ${requestId} does not start with a submission`)
  }

  let instance = createInstance(requestId, initialContext, first.at, first.event.submitted_by)
  for (const entry of rest) {
    instance = advance(instance, entry.event, entry.at)
    if (instance.state !== entry.state) {
      throw new Error(
        `Replay of ${requestId} diverged at seq ${entry.seq}: recorded ${entry.state}, computed ${instance.state}`,
      )
    }
  }
  return instance
}

export interface RoutingMismatch {
  hint: RoutingHint
  expected: { agent_id: string; task: string } | null
}

/**
 * Checks an agent's next-agent hint against the table. The table always
 * decides the next state; a mismatch is only reported.
 */
export function checkRoutingHint(state: WorkflowState, hint: RoutingHint | null): RoutingMismatch | null {
  if (!hint || (hint.next_agent === null && hint.next_task === null)) return null

  const spec = TRANSITION_TABLE[state]
  const expected = spec.type === 'work' ? requiresAgent(spec.on_success) : null

  const agentMatches = hint.next_agent === null || hint.next_agent === expected?.agent_id
  const taskMatches = hint.next_task === null || hint.next_task === expected?.task
  if (expected && agentMatches && taskMatches) return null

  return { hint, expected }
}
