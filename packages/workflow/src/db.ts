import Database from 'better-sqlite3'
import { PersistenceUnavailableError } from './errors.js'

export function createDatabase(path: string): Database.Database {
  const db = new Database(path)

  // WAL lets status reads proceed while the orchestrator writes
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 5000')

  db.exec(SCHEMA)
  runMigrations(db)

  return db
}

// Columns added after the first release; fresh databases get them from SCHEMA.
const ADDED_COLUMNS = [
  { table: 'approvals', column: 'escalation_id', type: 'TEXT' },
  { table: 'execution_records', column: 'duration_ms', type: 'INTEGER' },
] as const

function runMigrations(db: Database.Database): void {
  for (const { table, column, type } of ADDED_COLUMNS) {
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all()
    if (!columns.some(c => c.name === column)) {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`)
    }
  }
}

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED_SHAREDCACHE'])

export function isTransientDbError(err: unknown): boolean {
  if (!(err instanceof Error)) return false
  const code = 'code' in err && typeof err.code === 'string' ? err.code : ''
  return TRANSIENT_CODES.has(code)
}

/**
 * Runs a write at the persistence boundary. Busy and locked failures are
 * retried; if they persist the caller gets PersistenceUnavailableError and no
 * in-memory state has moved.
 */
export function durable<T>(operation: string, fn: () => T, attempts = 3): T {
  let lastError: unknown
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return fn()
    } catch (err) {
      if (!isTransientDbError(err)) throw err
      lastError = err
    }
  }
  throw new PersistenceUnavailableError(operation, attempts, lastError)
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS workflow_instances (
    request_id      TEXT PRIMARY KEY,
    state           TEXT NOT NULL,
    context         TEXT NOT NULL,
    initial_context TEXT NOT NULL,
    branch          TEXT,
    hold            TEXT,
    version         INTEGER NOT NULL,
    submitted_by    TEXT,
    created_at      TEXT NOT NULL,
    updated_at      TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_instances_state
    ON workflow_instances (state, created_at);

  CREATE TABLE IF NOT EXISTS workflow_history (
    request_id  TEXT NOT NULL REFERENCES workflow_instances (request_id),
    seq         INTEGER NOT NULL,
    state       TEXT NOT NULL,
    event_type  TEXT NOT NULL,
    event       TEXT NOT NULL,
    at          TEXT NOT NULL,
    PRIMARY KEY (request_id, seq)
  );

  CREATE TABLE IF NOT EXISTS execution_records (
    id          TEXT PRIMARY KEY,
    request_id  TEXT NOT NULL,
    agent_id    TEXT NOT NULL,
    task        TEXT NOT NULL,
    dispatch    INTEGER NOT NULL,
    attempt     INTEGER NOT NULL,
    outcome     TEXT NOT NULL DEFAULT 'running',
    result      TEXT,
    error       TEXT,
    retryable   INTEGER,
    started_at  TEXT NOT NULL,
    finished_at TEXT,
    duration_ms INTEGER,
    UNIQUE (request_id, agent_id, task, dispatch, attempt)
  );

  CREATE INDEX IF NOT EXISTS idx_executions_running
    ON execution_records (outcome)
    WHERE outcome = 'running';

  CREATE TABLE IF NOT EXISTS approvals (
    id           TEXT PRIMARY KEY,
    request_id   TEXT NOT NULL,
    kind         TEXT NOT NULL,
    payload      TEXT NOT NULL,
    status       TEXT NOT NULL DEFAULT 'pending',
    submitted_at TEXT NOT NULL,
    timeout_at   TEXT NOT NULL,
    reviewer     TEXT,
    notes        TEXT,
    delta        TEXT,
    resolved_at  TEXT,
    escalation_id TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_approvals_one_pending
    ON approvals (request_id, kind)
    WHERE status = 'pending';

  CREATE INDEX IF NOT EXISTS idx_approvals_deadline
    ON approvals (timeout_at)
    WHERE status = 'pending';

  CREATE TABLE IF NOT EXISTS escalations (
    id          TEXT PRIMARY KEY,
    request_id  TEXT NOT NULL,
    cause_type  TEXT NOT NULL,
    cause       TEXT NOT NULL,
    severity    TEXT NOT NULL,
    detail      TEXT NOT NULL,
    status      TEXT NOT NULL DEFAULT 'open',
    created_at  TEXT NOT NULL,
    resolved_at TEXT,
    resolution  TEXT,
    resolved_by TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_escalations_open
    ON escalations (status, created_at);

  CREATE TABLE IF NOT EXISTS audit_log (
    id           TEXT PRIMARY KEY,
    request_id   TEXT NOT NULL,
    action       TEXT NOT NULL,
    actor        TEXT,
    before_state TEXT,
    after_state  TEXT,
    metadata     TEXT,
    created_at   TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_audit_request
    ON audit_log (request_id, created_at);
`
