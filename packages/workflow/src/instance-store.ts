import type Database from 'better-sqlite3'
import { ConcurrencyError } from './errors.js'
import { WorkflowState, isWorkflowState } from './state-machine.js'
import { replay } from './workflow-engine.js'
import type {
  EscalationHold,
  HistoryEntry,
  JsonObject,
  ScopeBranch,
  WorkflowEvent,
  WorkflowInstance,
} from './types.js'
import { parseJsonObject, parseJsonOr, serializeJson } from './utils/serialize.js'

export interface InstanceSummary {
  request_id: string
  state: WorkflowState
  version: number
  submitted_by: string | null
  created_at: string
  updated_at: string
}

interface ListFilters {
  state?: WorkflowState
  limit?: number
  offset?: number
}

interface InstanceRow {
  request_id: string
  state: string
  context: string
  initial_context: string
  branch: string | null
  hold: string | null
  version: number
  submitted_by: string | null
  created_at: string
  updated_at: string
}

interface HistoryRow {
  request_id: string
  seq: number
  state: string
  event_type: string
  event: string
  at: string
}

const TERMINAL_STATES = [
  WorkflowState.COMPLETED,
  WorkflowState.REJECTED,
  WorkflowState.FAILED,
  WorkflowState.CANCELLED,
]

function toState(value: string): WorkflowState {
  if (!isWorkflowState(value)) throw new Error(`Unknown workflow state in store: ${value}`)
  return value
}

function toHistoryEntry(row: HistoryRow): HistoryEntry {
  const event = parseJsonOr<WorkflowEvent | null>(row.event, null)
  if (!event) {
    throw new Error(`Unreadable history entry ${row.request_id}#${row.seq}`)
  }
  return {
    seq: row.seq,
    state: toState(row.state),
    at: row.at,
    event,
  }
}

function toSummary(row: InstanceRow): InstanceSummary {
  return {
    request_id: row.request_id,
    state: toState(row.state),
    version: row.version,
    submitted_by: row.submitted_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

/**
 * Durable projection of workflow instances plus their append-only history.
 * Writes are guarded by the instance version, so two writers holding the
 * same version cannot both commit.
 */
export class InstanceStore {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  insert(instance: WorkflowInstance, submittedBy: string | null = null): void {
    const tx = this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO workflow_instances (
          request_id, state, context, initial_context, branch, hold,
          version, submitted_by, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        instance.request_id,
        instance.state,
        JSON.stringify(instance.context),
        JSON.stringify(instance.context),
        serializeJson(instance.branch),
        serializeJson(instance.hold),
        instance.version,
        submittedBy,
        instance.created_at,
        instance.updated_at,
      )
      this.appendHistory(instance.request_id, instance.history)
    })
    tx()
  }

  /** Persists `next`, which must have been derived from `previous` by `advance`. */
  commit(previous: WorkflowInstance, next: WorkflowInstance): void {
    const tx = this.db.transaction(() => {
      const result = this.db.prepare(`
        UPDATE workflow_instances
        SET state = ?, context = ?, branch = ?, hold = ?, version = ?, updated_at = ?
        WHERE request_id = ? AND version = ?
      `).run(
        next.state,
        JSON.stringify(next.context),
        serializeJson(next.branch),
        serializeJson(next.hold),
        next.version,
        next.updated_at,
        next.request_id,
        previous.version,
      )
      if (result.changes === 0) {
        throw new ConcurrencyError(next.request_id, previous.version)
      }
      this.appendHistory(next.request_id, next.history.slice(previous.history.length))
    })
    tx()
  }

  getSummary(requestId: string): InstanceSummary | null {
    const row = this.db.prepare<[string], InstanceRow>(
      'SELECT * FROM workflow_instances WHERE request_id = ?',
    ).get(requestId)
    return row ? toSummary(row) : null
  }

  /** Reads the stored projection without replaying history. */
  getProjection(requestId: string): WorkflowInstance | null {
    const row = this.db.prepare<[string], InstanceRow>(
      'SELECT * FROM workflow_instances WHERE request_id = ?',
    ).get(requestId)
    if (!row) return null
    return {
      request_id: row.request_id,
      state: toState(row.state),
      context: parseJsonObject(row.context) ?? {},
      history: this.getHistory(requestId),
      branch: parseJsonOr<ScopeBranch | null>(row.branch, null),
      hold: parseJsonOr<EscalationHold | null>(row.hold, null),
      version: row.version,
      created_at: row.created_at,
      updated_at: row.updated_at,
    }
  }

  /** Rebuilds an instance by replaying its stored history. */
  load(requestId: string): WorkflowInstance | null {
    const row = this.db.prepare<[string], Pick<InstanceRow, 'initial_context'>>(
      'SELECT initial_context FROM workflow_instances WHERE request_id = ?',
    ).get(requestId)
    if (!row) return null
    const initialContext: JsonObject = parseJsonObject(row.initial_context) ?? {}
    return replay(requestId, initialContext, this.getHistory(requestId))
  }

  getHistory(requestId: string): HistoryEntry[] {
    const rows = this.db.prepare<[string], HistoryRow>(
      'SELECT * FROM workflow_history WHERE request_id = ? ORDER BY seq ASC',
    ).all(requestId)
    return rows.map(toHistoryEntry)
  }

  list(filters?: ListFilters): InstanceSummary[] {
    const conditions: string[] = []
    const params: Array<string | number> = []

    if (filters?.state) {
      conditions.push('state = ?')
      params.push(filters.state)
    }

    let sql = 'SELECT * FROM workflow_instances'
    if (conditions.length) {
      sql += ' WHERE ' + conditions.join(' AND ')
    }
    sql += ' ORDER BY created_at ASC, request_id ASC'

    if (filters?.limit) {
      sql += ' LIMIT ?'
      params.push(filters.limit)
    }
    if (filters?.offset) {
      if (!filters.limit) sql += ' LIMIT -1'
      sql += ' OFFSET ?'
      params.push(filters.offset)
    }

    return this.db.prepare<unknown[], InstanceRow>(sql).all(...params).map(toSummary)
  }

  listActiveIds(): string[] {
    const placeholders = TERMINAL_STATES.map(() => '?').join(', ')
    const rows = this.db.prepare<string[], { request_id: string }>(
      `SELECT request_id FROM workflow_instances WHERE state NOT IN (${placeholders}) ORDER BY created_at ASC, request_id ASC`,
    ).all(...TERMINAL_STATES)
    return rows.map(row => row.request_id)
  }

  countByState(): Partial<Record<WorkflowState, number>> {
    const rows = this.db.prepare<[], { state: string; count: number }>(
      'SELECT state, COUNT(*) AS count FROM workflow_instances GROUP BY state',
    ).all()
    const counts: Partial<Record<WorkflowState, number>> = {}
    for (const row of rows) {
      counts[toState(row.state)] = row.count
    }
    return counts
  }

  private appendHistory(requestId: string, entries: HistoryEntry[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO workflow_history (request_id, seq, state, event_type, event, at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
    for (const entry of entries) {
      stmt.run(requestId, entry.seq, entry.state, entry.event.type, JSON.stringify(entry.event), entry.at)
    }
  }
}
