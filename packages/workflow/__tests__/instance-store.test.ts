import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { createDatabase } from '../src/db.js'
import { InstanceStore } from '../src/instance-store.js'
import { ConcurrencyError } from '../src/errors.js'
import { WorkflowState } from '../src/state-machine.js'
import { advance, createInstance } from '../src/workflow-engine.js'

const AT = '2026-03-02T10:00:00.000Z'

describe('InstanceStore', () => {
  let db: Database.Database
  let store: InstanceStore

  beforeEach(() => {
    db = createDatabase(':memory:')
    store = new InstanceStore(db)
  })

  function submitted(id = 'REQ-1') {
    const instance = createInstance(id, { cohort: 'adults' }, AT, 'dana')
    store.insert(instance, 'dana')
    return instance
  }

  function gathered(previous: ReturnType<typeof submitted>) {
    return advance(previous, {
      type: 'agent_succeeded',
      agent_id: 'requirements_agent',
      task: 'gather_requirements',
      kind: 'proceed',
      output: { fields: 3 },
      hint: null,
    }, '2026-03-02T10:05:00.000Z')
  }

  it('stores a submitted instance with its first history entry', () => {
    const instance = submitted()

    expect(store.getSummary('REQ-1')).toEqual({
      request_id: 'REQ-1',
      state: WorkflowState.REQUIREMENTS_GATHERING,
      version: 1,
      submitted_by: 'dana',
      created_at: AT,
      updated_at: AT,
    })
    expect(store.getHistory('REQ-1')).toEqual(instance.history)
    expect(store.getSummary('REQ-missing')).toBeNull()
  })

  it('commits the next version and appends only the new entries', () => {
    const first = submitted()
    const next = gathered(first)
    store.commit(first, next)

    expect(store.getProjection('REQ-1')).toEqual(next)
    expect(store.getHistory('REQ-1')).toHaveLength(2)
  })

  it('rejects a commit from a stale version', () => {
    const first = submitted()
    const next = gathered(first)
    store.commit(first, next)

    expect(() => store.commit(first, gathered(first))).toThrow(ConcurrencyError)
    expect(store.getHistory('REQ-1')).toHaveLength(2)
  })

  it('loads an instance by replaying its history', () => {
    const first = submitted()
    const next = gathered(first)
    store.commit(first, next)

    expect(store.load('REQ-1')).toEqual(next)
    expect(store.load('REQ-missing')).toBeNull()
  })

  it('lists, counts and finds active instances', () => {
    const a = submitted('REQ-A')
    submitted('REQ-B')
    const c = submitted('REQ-C')
    store.commit(c, advance(c, { type: 'cancel', reason: null }, AT))
    store.commit(a, gathered(a))

    expect(store.list().map(s => s.request_id)).toEqual(['REQ-A', 'REQ-B', 'REQ-C'])
    expect(store.list({ state: WorkflowState.REQUIREMENTS_REVIEW }).map(s => s.request_id)).toEqual(['REQ-A'])
    expect(store.list({ offset: 1 }).map(s => s.request_id)).toEqual(['REQ-B', 'REQ-C'])
    expect(store.list({ limit: 1, offset: 1 }).map(s => s.request_id)).toEqual(['REQ-B'])
    expect(store.listActiveIds()).toEqual(['REQ-A', 'REQ-B'])
    expect(store.countByState()).toEqual({
      requirements_review: 1,
      requirements_gathering: 1,
      cancelled: 1,
    })
  })
})
