import { describe, it, expect, beforeEach } from 'vitest'
import { createDatabase } from '../src/db.js'
import { AuditLog } from '../src/audit.js'

describe('AuditLog', () => {
  let audit: AuditLog

  beforeEach(() => {
    audit = new AuditLog(createDatabase(':memory:'))
  })

  it('records an action with defaults for omitted fields', () => {
    const entry = audit.logAction({ request_id: 'REQ-1', action: 'submitted' })
    expect(entry).toMatchObject({
      request_id: 'REQ-1',
      action: 'submitted',
      actor: null,
      before_state: null,
      after_state: null,
      metadata: null,
    })
    expect(audit.getLog()).toEqual([entry])
  })

  it('filters and pages in insertion order', () => {
    audit.logAction({ request_id: 'REQ-1', action: 'submitted' })
    audit.logAction({ request_id: 'REQ-1', action: 'transition', before_state: 'a', after_state: 'b', metadata: { version: 2 } })
    audit.logAction({ request_id: 'REQ-2', action: 'submitted' })
    audit.logAction({ request_id: 'REQ-1', action: 'transition', before_state: 'b', after_state: 'c' })

    expect(audit.getRequestHistory('REQ-1').map(e => e.after_state)).toEqual([null, 'b', 'c'])
    expect(audit.getLog({ action: 'submitted' }).map(e => e.request_id)).toEqual(['REQ-1', 'REQ-2'])
    expect(audit.getLog({ request_id: 'REQ-1', action: 'transition' })[0].metadata).toEqual({ version: 2 })
    expect(audit.getLog({ offset: 2 }).map(e => e.request_id)).toEqual(['REQ-2', 'REQ-1'])
    expect(audit.getLog({ limit: 1, offset: 1 }).map(e => e.action)).toEqual(['transition'])
  })
})
