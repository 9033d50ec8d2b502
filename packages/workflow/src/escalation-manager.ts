import type Database from 'better-sqlite3'
import type { AgentFailureReport, EscalationSink } from '@tollgate/agents'
import { createId } from './id.js'
import { EscalationConflictError, NotFoundError } from './errors.js'
import type {
  EscalationAction,
  EscalationCause,
  EscalationRecord,
  EscalationSeverity,
  EscalationStatus,
  WorkflowEvent,
} from './types.js'
import { parseJsonOr } from './utils/serialize.js'

export interface EscalationManagerConfig {
  /** Runs in the raising transaction and rolls back with it. */
  onRaised?: (record: EscalationRecord) => void
  /** Runs once the raised escalation is committed. */
  onCommitted?: (record: EscalationRecord) => void
}

export interface ResolvedEscalation {
  record: EscalationRecord
  event: Extract<WorkflowEvent, { type: 'escalation_resolved' }>
}

interface EscalationRow {
  id: string
  request_id: string
  cause_type: string
  cause: string
  severity: EscalationSeverity
  detail: string
  status: EscalationStatus
  created_at: string
  resolved_at: string | null
  resolution: EscalationAction | null
  resolved_by: string | null
}

function deserializeRow(row: EscalationRow): EscalationRecord {
  const cause = parseJsonOr<EscalationCause | null>(row.cause, null)
  if (!cause) {
    throw new Error(`Unreadable cause for escalation ${row.id}`)
  }
  return {
    id: row.id,
    request_id: row.request_id,
    cause,
    severity: row.severity,
    detail: row.detail,
    status: row.status,
    created_at: row.created_at,
    resolved_at: row.resolved_at,
    resolution: row.resolution,
    resolved_by: row.resolved_by,
  }
}

/**
 * Bookkeeping for human-visible incidents. It records and resolves
 * escalations and reports new ones; it never decides what happens to a
 * workflow. An escalation raised inside an open transaction is held back
 * from `onCommitted` until the owner of that transaction calls
 * `flushCommitted`.
 */
export class EscalationManager implements EscalationSink {
  private db: Database.Database
  private config: EscalationManagerConfig
  private uncommitted: EscalationRecord[] = []

  constructor(db: Database.Database, config?: EscalationManagerConfig) {
    this.db = db
    this.config = config ?? {}
  }

  raise(
    requestId: string,
    cause: EscalationCause,
    severity: EscalationSeverity,
    detail: string,
  ): EscalationRecord {
    const record: EscalationRecord = {
      id: createId('esc'),
      request_id: requestId,
      cause,
      severity,
      detail,
      status: 'open',
      created_at: new Date().toISOString(),
      resolved_at: null,
      resolution: null,
      resolved_by: null,
    }

    this.db.prepare(`
      INSERT INTO escalations (id, request_id, cause_type, cause, severity, detail, status, created_at)
      VALUES (?, ?, ?, ?, ?, ?, 'open', ?)
    `).run(
      record.id,
      record.request_id,
      cause.type,
      JSON.stringify(cause),
      severity,
      detail,
      record.created_at,
    )

    this.config.onRaised?.(record)
    if (this.db.inTransaction) {
      this.uncommitted.push(record)
    } else {
      this.config.onCommitted?.(record)
    }
    return record
  }

  /** Announces held-back escalations that survived their transaction; rolled-back ones are dropped. */
  flushCommitted(): void {
    const held = this.uncommitted.splice(0)
    for (const record of held) {
      if (this.getById(record.id)) this.config.onCommitted?.(record)
    }
  }

  raiseAgentFailure(report: AgentFailureReport): string {
    const record = this.raise(
      report.request_id,
      {
        type: 'agent_failure',
        agent_id: report.agent_id,
        task: report.task,
        error: report.error,
        attempts: report.attempts.length,
      },
      'high',
      `${report.agent_id}.${report.task} failed after ${report.attempts.length} attempt(s): ${report.error}`,
    )
    return record.id
  }

  resolve(escalationId: string, action: EscalationAction, resolvedBy: string): ResolvedEscalation {
    const current = this.getById(escalationId)
    if (!current) throw new NotFoundError('Escalation', escalationId)
    if (current.status !== 'open') throw new EscalationConflictError(escalationId)

    const result = this.db.prepare(`
      UPDATE escalations SET status = 'resolved', resolution = ?, resolved_by = ?, resolved_at = ?
      WHERE id = ? AND status = 'open'
    `).run(action, resolvedBy, new Date().toISOString(), escalationId)
    if (result.changes === 0) throw new EscalationConflictError(escalationId)

    const record = this.getById(escalationId)
    if (!record) throw new NotFoundError('Escalation', escalationId)

    return {
      record,
      event: { type: 'escalation_resolved', escalation_id: escalationId, action },
    }
  }

  getById(id: string): EscalationRecord | null {
    const row = this.db.prepare<[string], EscalationRow>('SELECT * FROM escalations WHERE id = ?').get(id)
    return row ? deserializeRow(row) : null
  }

  listOpen(): EscalationRecord[] {
    return this.db.prepare<[], EscalationRow>(
      "SELECT * FROM escalations WHERE status = 'open' ORDER BY rowid ASC",
    ).all().map(deserializeRow)
  }

  listForRequest(requestId: string): EscalationRecord[] {
    return this.db.prepare<[string], EscalationRow>(
      'SELECT * FROM escalations WHERE request_id = ? ORDER BY rowid ASC',
    ).all(requestId).map(deserializeRow)
  }
}
