import type Database from 'better-sqlite3'
import { createId } from './id.js'
import {
  ApprovalConflictError,
  DuplicateGateError,
  NotFoundError,
  ValidationError,
} from './errors.js'
import {
  DEFAULT_GATE_POLICIES,
  isApprovalKind,
  type ApprovalKind,
  type GatePolicy,
  type TimeoutRouting,
} from './state-machine.js'
import type {
  ApprovalDecision,
  ApprovalEvent,
  ApprovalRecord,
  ApprovalStatus,
  JsonObject,
} from './types.js'
import { parseJsonObject, serializeJson } from './utils/serialize.js'

const HOUR_MS = 60 * 60 * 1000

export interface ApprovalGatewayConfig {
  policies?: Partial<Record<ApprovalKind, Partial<GatePolicy>>>
}

export interface ResolveApprovalInput {
  decision: ApprovalDecision
  reviewer: string
  notes?: string | null
  delta?: JsonObject | null
  now?: Date
}

export interface ResolvedApproval {
  record: ApprovalRecord
  event: ApprovalEvent
}

export interface TimedOutApproval {
  record: ApprovalRecord
  routing: TimeoutRouting
}

interface ListPendingFilters {
  kind?: ApprovalKind
  request_id?: string
}

interface ApprovalRow {
  id: string
  request_id: string
  kind: string
  payload: string
  status: ApprovalStatus
  submitted_at: string
  timeout_at: string
  reviewer: string | null
  notes: string | null
  delta: string | null
  resolved_at: string | null
  escalation_id: string | null
}

function deserializeRow(row: ApprovalRow): ApprovalRecord {
  if (!isApprovalKind(row.kind)) {
    throw new Error(`Unknown approval kind in store: ${row.kind}`)
  }
  return {
    ...row,
    kind: row.kind,
    payload: parseJsonObject(row.payload) ?? {},
    delta: parseJsonObject(row.delta),
  }
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error
    && 'code' in err
    && typeof err.code === 'string'
    && err.code.startsWith('SQLITE_CONSTRAINT')
}

/**
 * Human-review records. Status moves once from `pending` to a terminal
 * status; every move is a conditional UPDATE so a second resolution or a
 * second sweep finds nothing to change.
 */
export class ApprovalGateway {
  private db: Database.Database
  private policies: Record<ApprovalKind, GatePolicy>

  constructor(db: Database.Database, config?: ApprovalGatewayConfig) {
    this.db = db
    this.policies = { ...DEFAULT_GATE_POLICIES }
    for (const [kind, override] of Object.entries(config?.policies ?? {})) {
      if (isApprovalKind(kind) && override) {
        this.policies[kind] = { ...this.policies[kind], ...override }
      }
    }
  }

  policyFor(kind: ApprovalKind): GatePolicy {
    return this.policies[kind]
  }

  open(
    requestId: string,
    kind: ApprovalKind,
    payload: JsonObject,
    timeoutMs?: number,
    now: Date = new Date(),
  ): ApprovalRecord {
    const existing = this.findPending(requestId, kind)
    if (existing) {
      throw new DuplicateGateError(requestId, kind, existing.id)
    }

    const id = createId('apr')
    const window = timeoutMs ?? this.policies[kind].timeout_hours * HOUR_MS
    const timeoutAt = new Date(now.getTime() + window).toISOString()

    try {
      this.db.prepare(`
        INSERT INTO approvals (id, request_id, kind, payload, status, submitted_at, timeout_at)
        VALUES (?, ?, ?, ?, 'pending', ?, ?)
      `).run(id, requestId, kind, JSON.stringify(payload), now.toISOString(), timeoutAt)
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateGateError(requestId, kind, null)
      }
      throw err
    }

    return this.require(id)
  }

  /**
   * Records a reviewer's decision and returns the workflow event it maps to.
   * An `approve` that carries a non-empty delta is recorded as `modified`.
   */
  resolve(approvalId: string, input: ResolveApprovalInput): ResolvedApproval {
    const current = this.require(approvalId)
    if (current.status !== 'pending') {
      throw new ApprovalConflictError(approvalId, current.status)
    }

    const delta = input.delta && Object.keys(input.delta).length > 0 ? input.delta : null
    if (input.decision === 'modify' && !delta) {
      throw new ValidationError('A modify decision requires a non-empty delta')
    }
    if (input.decision === 'reject' && delta) {
      throw new ValidationError('A reject decision cannot carry a delta')
    }

    const status: ApprovalStatus = input.decision === 'reject'
      ? 'rejected'
      : delta ? 'modified' : 'approved'

    const result = this.db.prepare(`
      UPDATE approvals
      SET status = ?, reviewer = ?, notes = ?, delta = ?, resolved_at = ?
      WHERE id = ? AND status = 'pending'
    `).run(
      status,
      input.reviewer,
      input.notes ?? null,
      serializeJson(delta),
      (input.now ?? new Date()).toISOString(),
      approvalId,
    )
    if (result.changes === 0) {
      throw new ApprovalConflictError(approvalId, this.require(approvalId).status)
    }

    const record = this.require(approvalId)
    return { record, event: toEvent(record) }
  }

  /** Pending approvals whose deadline has passed, oldest deadline first. */
  listOverdue(now: Date = new Date()): ApprovalRecord[] {
    return this.db.prepare<[string], ApprovalRow>(`
      SELECT * FROM approvals
      WHERE status = 'pending' AND timeout_at <= ?
      ORDER BY timeout_at ASC, rowid ASC
    `).all(now.toISOString()).map(deserializeRow)
  }

  /**
   * Marks one overdue approval timed out. Returns null when it is no longer
   * pending or not yet due, so a record is timed out at most once.
   */
  markTimedOut(approvalId: string, now: Date = new Date()): TimedOutApproval | null {
    const result = this.db.prepare(`
      UPDATE approvals SET status = 'timed_out', resolved_at = ?
      WHERE id = ? AND status = 'pending' AND timeout_at <= ?
    `).run(now.toISOString(), approvalId, now.toISOString())
    if (result.changes === 0) return null

    const record = this.require(approvalId)
    return { record, routing: this.policies[record.kind].on_timeout }
  }

  /** Timed-out approvals of a request that never had an escalation attached. */
  listUnroutedTimeouts(requestId: string): TimedOutApproval[] {
    return this.db.prepare<[string], ApprovalRow>(`
      SELECT * FROM approvals
      WHERE request_id = ? AND status = 'timed_out' AND escalation_id IS NULL
      ORDER BY rowid ASC
    `).all(requestId).map(row => {
      const record = deserializeRow(row)
      return { record, routing: this.policies[record.kind].on_timeout }
    })
  }

  attachEscalation(approvalId: string, escalationId: string): void {
    this.db.prepare('UPDATE approvals SET escalation_id = ? WHERE id = ?').run(escalationId, approvalId)
  }

  getById(id: string): ApprovalRecord | null {
    const row = this.db.prepare<[string], ApprovalRow>('SELECT * FROM approvals WHERE id = ?').get(id)
    return row ? deserializeRow(row) : null
  }

  findPending(requestId: string, kind: ApprovalKind): ApprovalRecord | null {
    const row = this.db.prepare<[string, string], ApprovalRow>(
      "SELECT * FROM approvals WHERE request_id = ? AND kind = ? AND status = 'pending'",
    ).get(requestId, kind)
    return row ? deserializeRow(row) : null
  }

  latestStatus(requestId: string, kind: ApprovalKind): ApprovalStatus | null {
    const row = this.db.prepare<[string, string], { status: ApprovalStatus }>(
      'SELECT status FROM approvals WHERE request_id = ? AND kind = ? ORDER BY rowid DESC LIMIT 1',
    ).get(requestId, kind)
    return row?.status ?? null
  }

  listPending(filters?: ListPendingFilters): ApprovalRecord[] {
    const conditions = ["status = 'pending'"]
    const params: string[] = []

    if (filters?.kind) {
      conditions.push('kind = ?')
      params.push(filters.kind)
    }
    if (filters?.request_id) {
      conditions.push('request_id = ?')
      params.push(filters.request_id)
    }

    const sql = `SELECT * FROM approvals WHERE ${conditions.join(' AND ')} ORDER BY timeout_at ASC, rowid ASC`
    return this.db.prepare<string[], ApprovalRow>(sql).all(...params).map(deserializeRow)
  }

  listForRequest(requestId: string): ApprovalRecord[] {
    return this.db.prepare<[string], ApprovalRow>(
      'SELECT * FROM approvals WHERE request_id = ? ORDER BY rowid ASC',
    ).all(requestId).map(deserializeRow)
  }

  private require(id: string): ApprovalRecord {
    const record = this.getById(id)
    if (!record) throw new NotFoundError('Approval', id)
    return record
  }
}

function toEvent(record: ApprovalRecord): ApprovalEvent {
  switch (record.status) {
    case 'approved':
      return { type: 'approval_approved', approval_id: record.id, kind: record.kind }
    case 'modified':
      return { type: 'approval_modified', approval_id: record.id, kind: record.kind, delta: record.delta ?? {} }
    case 'rejected':
      return { type: 'approval_rejected', approval_id: record.id, kind: record.kind }
    default:
      throw new Error(`Approval ${record.id} has no decision event for status ${record.status}`)
  }
}
