import { describe, it, expect } from 'vitest'
import {
  advance,
  checkRoutingHint,
  createInstance,
  getValidEvents,
  replay,
} from '../src/workflow-engine.js'
import { ScopeChangeConflictError, TransitionError } from '../src/errors.js'
import {
  WORKFLOW_STATES,
  WorkflowState,
  requiresAgent,
  requiresApproval,
} from '../src/state-machine.js'
import type { JsonObject, WorkflowEvent, WorkflowInstance } from '../src/types.js'

const AT = '2026-03-02T10:00:00.000Z'

function fresh(context: JsonObject = { cohort: 'adults', sites: ['north'] }): WorkflowInstance {
  return createInstance('REQ-20260302-TESTTEST', context, AT, 'dana')
}

function succeed(instance: WorkflowInstance, output: JsonObject = {}, kind: 'proceed' | 'halt' = 'proceed'): WorkflowInstance {
  const work = requiresAgent(instance.state)
  if (!work) throw new Error(`${instance.state} is not a work state`)
  return advance(instance, { type: 'agent_succeeded', ...work, kind, output, hint: null }, AT)
}

function approve(instance: WorkflowInstance): WorkflowInstance {
  const kind = requiresApproval(instance.state)
  if (!kind) throw new Error(`${instance.state} is not a gate state`)
  return advance(instance, { type: 'approval_approved', approval_id: 'apr_1', kind }, AT)
}

function toQueryReview(): WorkflowInstance {
  return succeed(approve(succeed(fresh())))
}

describe('createInstance', () => {
  it('starts in requirements gathering with one submission entry', () => {
    const instance = fresh()
    expect(instance.state).toBe(WorkflowState.REQUIREMENTS_GATHERING)
    expect(instance.version).toBe(1)
    expect(instance.history).toEqual([
      { seq: 0, state: WorkflowState.REQUIREMENTS_GATHERING, at: AT, event: { type: 'submitted', submitted_by: 'dana' } },
    ])
  })

  it('copies the initial context', () => {
    const context: JsonObject = { cohort: 'adults' }
    const instance = fresh(context)
    context.cohort = 'children'
    expect(instance.context).toEqual({ cohort: 'adults' })
  })
})

describe('advance', () => {
  it('merges agent output into context and moves to the success state', () => {
    const start = fresh()
    const next = succeed(start, { requirements: { fields: 12 } })

    expect(next.state).toBe(WorkflowState.REQUIREMENTS_REVIEW)
    expect(next.context).toEqual({ cohort: 'adults', sites: ['north'], requirements: { fields: 12 } })
    expect(next.version).toBe(2)
    expect(next.history[1]).toMatchObject({ seq: 1, state: WorkflowState.REQUIREMENTS_REVIEW })
    expect(start.state).toBe(WorkflowState.REQUIREMENTS_GATHERING)
    expect(start.history).toHaveLength(1)
  })

  it('ends the request as failed when the agent halts', () => {
    const next = succeed(approve(succeed(fresh())), { feasible: false }, 'halt')
    expect(next.state).toBe(WorkflowState.FAILED)
  })

  it('rejects a result from an agent the state does not expect', () => {
    expect(() => advance(fresh(), {
      type: 'agent_succeeded',
      agent_id: 'qa_agent',
      task: 'validate_extracted_data',
      kind: 'proceed',
      output: {},
      hint: null,
    }, AT)).toThrow(
      'Invalid event agent_succeeded in state requirements_gathering: result from qa_agent.validate_extracted_data does not match requirements_agent.gather_requirements',
    )
  })

  it('rejects approvals while an agent is working', () => {
    expect(() => advance(fresh(), { type: 'approval_approved', approval_id: 'apr_1', kind: 'requirements_review' }, AT))
      .toThrow(TransitionError)
  })

  it('rejects an approval of the wrong kind', () => {
    const gate = succeed(fresh())
    expect(() => advance(gate, { type: 'approval_approved', approval_id: 'apr_1', kind: 'quality_review' }, AT))
      .toThrow('approval kind quality_review does not match requirements_review')
  })

  it('merges a modified decision into context', () => {
    const gate = succeed(fresh())
    const next = advance(gate, {
      type: 'approval_modified',
      approval_id: 'apr_1',
      kind: 'requirements_review',
      delta: { sites: ['north', 'south'] },
    }, AT)
    expect(next.state).toBe(WorkflowState.FEASIBILITY_VALIDATION)
    expect(next.context.sites).toEqual(['north', 'south'])
  })

  it('routes a rejection to rejected', () => {
    const next = advance(toQueryReview(), { type: 'approval_rejected', approval_id: 'apr_2', kind: 'critical_query_review' }, AT)
    expect(next.state).toBe(WorkflowState.REJECTED)
  })

  it('routes a timeout by its routing rule', () => {
    const gate = succeed(fresh())
    const rejected = advance(gate, {
      type: 'approval_timed_out',
      approval_id: 'apr_1',
      kind: 'requirements_review',
      routing: 'reject',
      escalation_id: 'esc_1',
    }, AT)
    expect(rejected.state).toBe(WorkflowState.REJECTED)

    const held = advance(gate, {
      type: 'approval_timed_out',
      approval_id: 'apr_1',
      kind: 'requirements_review',
      routing: 'hold',
      escalation_id: 'esc_1',
    }, AT)
    expect(held.state).toBe(WorkflowState.ESCALATED)
    expect(held.hold).toEqual({ resume_state: WorkflowState.REQUIREMENTS_REVIEW, escalation_id: 'esc_1' })
  })

  it('holds on a terminal agent failure and resumes on retry_from_state', () => {
    const failed = advance(fresh(), {
      type: 'agent_failed_terminally',
      agent_id: 'requirements_agent',
      task: 'gather_requirements',
      error: 'upstream timed out',
      escalation_id: 'esc_9',
    }, AT)
    expect(failed.state).toBe(WorkflowState.ESCALATED)

    expect(() => advance(failed, { type: 'escalation_resolved', escalation_id: 'esc_other', action: 'retry_from_state' }, AT))
      .toThrow('instance is not held by escalation esc_other')

    const resumed = advance(failed, { type: 'escalation_resolved', escalation_id: 'esc_9', action: 'retry_from_state' }, AT)
    expect(resumed.state).toBe(WorkflowState.REQUIREMENTS_GATHERING)
    expect(resumed.hold).toBeNull()
  })

  it('forces a held request to a terminal state', () => {
    const failed = advance(fresh(), {
      type: 'agent_failed_terminally',
      agent_id: 'requirements_agent',
      task: 'gather_requirements',
      error: 'boom',
      escalation_id: 'esc_9',
    }, AT)
    expect(advance(failed, { type: 'escalation_resolved', escalation_id: 'esc_9', action: 'force_fail' }, AT).state)
      .toBe(WorkflowState.FAILED)
    expect(advance(failed, { type: 'escalation_resolved', escalation_id: 'esc_9', action: 'force_complete' }, AT).state)
      .toBe(WorkflowState.COMPLETED)
  })

  it('accepts no events once terminal', () => {
    const cancelled = advance(fresh(), { type: 'cancel', reason: null }, AT)
    expect(cancelled.state).toBe(WorkflowState.CANCELLED)
    expect(getValidEvents(WorkflowState.CANCELLED)).toEqual([])
    expect(() => advance(cancelled, { type: 'cancel', reason: null }, AT))
      .toThrow('Invalid event cancel in state cancelled: instance is in a terminal state')
  })

  it('never re-applies a submission', () => {
    expect(() => advance(fresh(), { type: 'submitted', submitted_by: null }, AT)).toThrow(TransitionError)
  })
})

describe('scope changes', () => {
  const request: WorkflowEvent = { type: 'scope_change_requested', delta: { sites: ['east'] }, reason: 'new site', requested_by: 'dana' }

  it('opens a branch that remembers where to resume', () => {
    const start = toQueryReview()
    const review = advance(start, request, AT)
    expect(review.state).toBe(WorkflowState.SCOPE_CHANGE_REVIEW)
    expect(review.branch).toEqual({
      resume_state: WorkflowState.QUERY_REVIEW,
      snapshot: JSON.stringify(start.context),
      delta: { sites: ['east'] },
      reason: 'new site',
    })
  })

  it('restores the context byte for byte when rejected', () => {
    const start = toQueryReview()
    const review = advance(start, request, AT)
    const back = advance(review, { type: 'scope_change_resolved', approval_id: 'apr_s', accepted: false, delta: null }, AT)

    expect(back.state).toBe(WorkflowState.QUERY_REVIEW)
    expect(back.branch).toBeNull()
    expect(JSON.stringify(back.context)).toBe(JSON.stringify(start.context))
  })

  it('merges the proposed delta when accepted, or the reviewer delta when modified', () => {
    const review = advance(toQueryReview(), request, AT)

    const accepted = advance(review, { type: 'scope_change_resolved', approval_id: 'apr_s', accepted: true, delta: null }, AT)
    expect(accepted.context.sites).toEqual(['east'])

    const modified = advance(review, {
      type: 'scope_change_resolved',
      approval_id: 'apr_s',
      accepted: true,
      delta: { sites: ['east', 'west'] },
    }, AT)
    expect(modified.context.sites).toEqual(['east', 'west'])
  })

  it('refuses a second scope change while one is under review', () => {
    const review = advance(toQueryReview(), request, AT)
    expect(() => advance(review, request, AT)).toThrow(ScopeChangeConflictError)
  })

  it('keeps the branch open when a held scope review times out', () => {
    const review = advance(toQueryReview(), request, AT)
    const held = advance(review, {
      type: 'approval_timed_out',
      approval_id: 'apr_s',
      kind: 'scope_change',
      routing: 'hold',
      escalation_id: 'esc_s',
    }, AT)
    expect(held.state).toBe(WorkflowState.ESCALATED)
    expect(held.branch?.resume_state).toBe(WorkflowState.QUERY_REVIEW)
    expect(held.hold).toEqual({ resume_state: WorkflowState.SCOPE_CHANGE_REVIEW, escalation_id: 'esc_s' })
  })

  it('refuses a scope change while a held review keeps its branch', () => {
    const review = advance(toQueryReview(), request, AT)
    const held = advance(review, {
      type: 'approval_timed_out',
      approval_id: 'apr_s',
      kind: 'scope_change',
      routing: 'hold',
      escalation_id: 'esc_s',
    }, AT)

    expect(() => advance(held, request, AT)).toThrow(
      'Invalid event scope_change_requested in state escalated: request REQ-20260302-TESTTEST already has a scope change under review',
    )

    const reopened = advance(held, { type: 'escalation_resolved', escalation_id: 'esc_s', action: 'retry_from_state' }, AT)
    expect(reopened.state).toBe(WorkflowState.SCOPE_CHANGE_REVIEW)
    expect(reopened.branch).toEqual(review.branch)
    const resolved = advance(reopened, { type: 'scope_change_resolved', approval_id: 'apr_s2', accepted: true, delta: null }, AT)
    expect(resolved.state).toBe(WorkflowState.QUERY_REVIEW)
    expect(resolved.context.sites).toEqual(['east'])
  })
})

describe('replay', () => {
  it('reproduces every reachable state from stored history', () => {
    const initial: JsonObject = { cohort: 'adults', sites: ['north'] }
    const visited = new Set<WorkflowState>()
    const check = (instance: WorkflowInstance): WorkflowInstance => {
      visited.add(instance.state)
      expect(replay(instance.request_id, initial, instance.history)).toEqual(instance)
      return instance
    }

    // Happy path through every work and gate state
    let instance = check(fresh(initial))
    while (instance.state !== WorkflowState.COMPLETED) {
      instance = check(requiresAgent(instance.state) ? succeed(instance, { [instance.state]: true }) : approve(instance))
    }

    // Scope change, then a terminal failure held and forced to fail
    let branch = check(advance(check(succeed(fresh(initial))), {
      type: 'scope_change_requested',
      delta: { sites: ['east'] },
      reason: 'new site',
      requested_by: null,
    }, AT))
    branch = check(advance(branch, { type: 'scope_change_resolved', approval_id: 'apr_s', accepted: false, delta: null }, AT))
    branch = check(approve(branch))
    branch = check(advance(branch, {
      type: 'agent_failed_terminally',
      agent_id: 'phenotype_agent',
      task: 'validate_feasibility',
      error: 'boom',
      escalation_id: 'esc_1',
    }, AT))
    check(advance(branch, { type: 'escalation_resolved', escalation_id: 'esc_1', action: 'force_fail' }, AT))

    check(advance(succeed(fresh(initial)), { type: 'approval_rejected', approval_id: 'apr_1', kind: 'requirements_review' }, AT))
    check(advance(fresh(initial), { type: 'cancel', reason: 'duplicate' }, AT))

    expect([...visited].sort()).toEqual([...WORKFLOW_STATES].sort())
  })

  it('refuses history whose recorded states diverge', () => {
    const instance = succeed(fresh())
    const tampered = instance.history.map(entry => entry.seq === 1 ? { ...entry, state: WorkflowState.QA_REVIEW } : entry)
    expect(() => replay(instance.request_id, { cohort: 'adults', sites: ['north'] }, tampered))
      .toThrow('Replay of REQ-20260302-TESTTEST diverged at seq 1: recorded qa_review, computed requirements_review')
  })
})

describe('checkRoutingHint', () => {
  it('accepts no hint or a hint that matches the table', () => {
    expect(checkRoutingHint(WorkflowState.DATA_EXTRACTION, null)).toBeNull()
    expect(checkRoutingHint(WorkflowState.DATA_EXTRACTION, { next_agent: 'qa_agent', next_task: null })).toBeNull()
  })

  it('reports a hint that disagrees with the table', () => {
    expect(checkRoutingHint(WorkflowState.DATA_EXTRACTION, { next_agent: 'delivery_agent', next_task: 'deliver_data' }))
      .toEqual({
        hint: { next_agent: 'delivery_agent', next_task: 'deliver_data' },
        expected: { agent_id: 'qa_agent', task: 'validate_extracted_data' },
      })
    expect(checkRoutingHint(WorkflowState.FEASIBILITY_VALIDATION, { next_agent: 'calendar_agent', next_task: null }))
      .toEqual({ hint: { next_agent: 'calendar_agent', next_task: null }, expected: null })
  })
})
