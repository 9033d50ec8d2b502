import type Database from 'better-sqlite3'
import type {
  AttemptFinish,
  AttemptOutcome,
  AttemptSink,
  AttemptStart,
} from '@tollgate/agents'
import { createId } from './id.js'
import { parseJsonObject, serializeJson } from './utils/serialize.js'

export type ExecutionOutcome = AttemptOutcome | 'running'

export interface ExecutionRecord extends AttemptStart {
  id: string
  outcome: ExecutionOutcome
  result: Record<string, unknown> | null
  error: string | null
  retryable: boolean | null
  finished_at: string | null
  duration_ms: number | null
}

/**
 * Per-agent attempt statistics. Only attempts that ran to a result count:
 * `retrying` and `failure` are failed attempts, while `abandoned` and
 * `running` rows are left out.
 */
export interface AgentMetrics {
  agent_id: string
  total_tasks: number
  successful_tasks: number
  failed_tasks: number
  success_rate: number
  average_duration_ms: number | null
}

interface MetricsRow {
  agent_id: string
  total_tasks: number
  successful_tasks: number
  failed_tasks: number
  average_duration_ms: number | null
}

interface ExecutionRow {
  id: string
  request_id: string
  agent_id: string
  task: string
  dispatch: number
  attempt: number
  outcome: ExecutionOutcome
  result: string | null
  error: string | null
  retryable: number | null
  started_at: string
  finished_at: string | null
  duration_ms: number | null
}

function deserializeRow(row: ExecutionRow): ExecutionRecord {
  return {
    ...row,
    result: parseJsonObject(row.result),
    retryable: row.retryable === null ? null : row.retryable === 1,
  }
}

/**
 * SQLite-backed attempt sink. A row is written before each attempt starts
 * and finished exactly once; rows left `running` by a crash are closed as
 * abandoned on recovery.
 */
export class ExecutionLog implements AttemptSink {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  beginDispatch(requestId: string, agentId: string, task: string): number {
    const row = this.db.prepare<[string, string, string], { last: number | null }>(`
      SELECT MAX(dispatch) AS last FROM execution_records
      WHERE request_id = ? AND agent_id = ? AND task = ?
    `).get(requestId, agentId, task)
    return (row?.last ?? 0) + 1
  }

  begin(start: AttemptStart): string {
    const id = createId('exe')
    this.db.prepare(`
      INSERT INTO execution_records (
        id, request_id, agent_id, task, dispatch, attempt, outcome, started_at
      ) VALUES (?, ?, ?, ?, ?, ?, 'running', ?)
    `).run(id, start.request_id, start.agent_id, start.task, start.dispatch, start.attempt, start.started_at)
    return id
  }

  finish(id: string, finish: AttemptFinish): void {
    const row = this.db.prepare<[string], Pick<ExecutionRow, 'started_at'>>(
      'SELECT started_at FROM execution_records WHERE id = ?',
    ).get(id)
    const durationMs = row
      ? new Date(finish.finished_at).getTime() - new Date(row.started_at).getTime()
      : null

    const result = this.db.prepare(`
      UPDATE execution_records
      SET outcome = ?, result = ?, error = ?, retryable = ?, finished_at = ?, duration_ms = ?
      WHERE id = ? AND outcome = 'running'
    `).run(
      finish.outcome,
      serializeJson(finish.result),
      finish.error,
      finish.retryable === null ? null : Number(finish.retryable),
      finish.finished_at,
      durationMs,
      id,
    )
    if (result.changes === 0) {
      throw new Error(`Execution record ${id} is not running`)
    }
  }

  getById(id: string): ExecutionRecord | null {
    const row = this.db.prepare<[string], ExecutionRow>('SELECT * FROM execution_records WHERE id = ?').get(id)
    return row ? deserializeRow(row) : null
  }

  listForRequest(requestId: string): ExecutionRecord[] {
    return this.db.prepare<[string], ExecutionRow>(`
      SELECT * FROM execution_records
      WHERE request_id = ?
      ORDER BY rowid ASC
    `).all(requestId).map(deserializeRow)
  }

  metrics(agentId?: string): AgentMetrics[] {
    const conditions = ["outcome IN ('success', 'failure', 'retrying')"]
    const params: string[] = []
    if (agentId) {
      conditions.push('agent_id = ?')
      params.push(agentId)
    }

    const rows = this.db.prepare<string[], MetricsRow>(`
      SELECT
        agent_id,
        COUNT(*) AS total_tasks,
        SUM(CASE WHEN outcome = 'success' THEN 1 ELSE 0 END) AS successful_tasks,
        SUM(CASE WHEN outcome = 'success' THEN 0 ELSE 1 END) AS failed_tasks,
        AVG(duration_ms) AS average_duration_ms
      FROM execution_records
      WHERE ${conditions.join(' AND ')}
      GROUP BY agent_id
      ORDER BY agent_id ASC
    `).all(...params)

    return rows.map(row => ({
      ...row,
      success_rate: row.total_tasks > 0 ? row.successful_tasks / row.total_tasks : 0,
    }))
  }

  /** Closes attempts a crashed process left open. Returns how many were closed. */
  abandonRunning(now: Date = new Date()): number {
    const result = this.db.prepare(`
      UPDATE execution_records
      SET outcome = 'abandoned', error = 'abandoned: process stopped during attempt', finished_at = ?
      WHERE outcome = 'running'
    `).run(now.toISOString())
    return result.changes
  }
}
