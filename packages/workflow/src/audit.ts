import type Database from 'better-sqlite3'
import { createId } from './id.js'
import type { JsonObject } from './types.js'
import { parseJsonObject, serializeJson } from './utils/serialize.js'

export interface AuditEntry {
  id: string
  request_id: string
  action: string
  actor: string | null
  before_state: string | null
  after_state: string | null
  metadata: JsonObject | null
  created_at: string
}

export interface LogActionInput {
  request_id: string
  action: string
  actor?: string | null
  before_state?: string | null
  after_state?: string | null
  metadata?: JsonObject
}

interface GetLogOptions {
  request_id?: string
  action?: string
  limit?: number
  offset?: number
}

interface AuditRow {
  id: string
  request_id: string
  action: string
  actor: string | null
  before_state: string | null
  after_state: string | null
  metadata: string | null
  created_at: string
}

function deserializeEntry(row: AuditRow): AuditEntry {
  return {
    ...row,
    metadata: parseJsonObject(row.metadata),
  }
}

export class AuditLog {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  logAction(input: LogActionInput): AuditEntry {
    const entry: AuditEntry = {
      id: createId('aud'),
      request_id: input.request_id,
      action: input.action,
      actor: input.actor ?? null,
      before_state: input.before_state ?? null,
      after_state: input.after_state ?? null,
      metadata: input.metadata ?? null,
      created_at: new Date().toISOString(),
    }

    this.db.prepare(`
      INSERT INTO audit_log (id, request_id, action, actor, before_state, after_state, metadata, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.id,
      entry.request_id,
      entry.action,
      entry.actor,
      entry.before_state,
      entry.after_state,
      serializeJson(entry.metadata),
      entry.created_at,
    )

    return entry
  }

  getLog(opts?: GetLogOptions): AuditEntry[] {
    const conditions: string[] = []
    const params: Array<string | number> = []

    if (opts?.request_id) {
      conditions.push('request_id = ?')
      params.push(opts.request_id)
    }
    if (opts?.action) {
      conditions.push('action = ?')
      params.push(opts.action)
    }

    let sql = 'SELECT * FROM audit_log'
    if (conditions.length) {
      sql += ' WHERE ' + conditions.join(' AND ')
    }
    sql += ' ORDER BY rowid ASC'

    if (opts?.limit) {
      sql += ' LIMIT ?'
      params.push(opts.limit)
    }
    if (opts?.offset) {
      if (!opts.limit) sql += ' LIMIT -1'
      sql += ' OFFSET ?'
      params.push(opts.offset)
    }

    const rows = this.db.prepare<unknown[], AuditRow>(sql).all(...params)
    return rows.map(deserializeEntry)
  }

  getRequestHistory(requestId: string): AuditEntry[] {
    return this.getLog({ request_id: requestId })
  }
}
