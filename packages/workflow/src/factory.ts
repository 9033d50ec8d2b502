import type { Server } from 'node:http'
import type Database from 'better-sqlite3'
import express from 'express'
import {
  AgentRegistry,
  RetrySupervisor,
  type Agent,
  type Logger,
  type RetryPolicy,
} from '@tollgate/agents'
import { createApiRouter, type ApiConfig } from './api.js'
import { ApprovalGateway } from './approval-gateway.js'
import { AuditLog } from './audit.js'
import { createDatabase } from './db.js'
import { EscalationManager } from './escalation-manager.js'
import { ExecutionLog } from './execution-log.js'
import { InstanceStore } from './instance-store.js'
import { Notifier, type WebhookConfig } from './notifier.js'
import {
  Orchestrator,
  createOrchestratorContext,
  type OrchestratorContext,
  type RecoveryReport,
} from './orchestrator.js'
import type { ApprovalKind, GatePolicy } from './state-machine.js'

export interface WorkflowServiceConfig {
  db_path: string
  agents?: Agent[]
  retry?: Partial<RetryPolicy>
  gates?: Partial<Record<ApprovalKind, Partial<GatePolicy>>>
  orchestrator?: {
    poll_interval_ms?: number
    sweep_interval_seconds?: number
    max_concurrent_dispatches?: number
    on_error?: (error: Error) => void
  }
  server?: {
    port?: number
    host?: string
    api_key?: string
  }
  webhooks?: WebhookConfig[]
  logger?: Logger
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface WorkflowService {
  db: Database.Database
  context: OrchestratorContext
  registry: AgentRegistry
  instances: InstanceStore
  executions: ExecutionLog
  approvals: ApprovalGateway
  escalations: EscalationManager
  audit: AuditLog
  notifier: Notifier
  supervisor: RetrySupervisor
  orchestrator: Orchestrator
  /** Recovers persisted instances, then starts the dispatch and sweep timers. */
  start(): Promise<RecoveryReport>
  stop(): void
  listen(): Promise<{ port: number; close: () => void }>
}

export function createWorkflowService(config: WorkflowServiceConfig): WorkflowService {
  const logger = config.logger ?? console
  const db = createDatabase(config.db_path)
  const notifier = new Notifier(config.webhooks ?? [], logger)
  const audit = new AuditLog(db)

  const escalations = new EscalationManager(db, {
    onRaised: (record) => {
      audit.logAction({
        request_id: record.request_id,
        action: 'escalation_raised',
        actor: 'escalation_manager',
        metadata: { escalation_id: record.id, cause: record.cause.type, severity: record.severity },
      })
    },
    onCommitted: (record) => {
      notifier.emit({
        event: 'escalation_raised',
        request_id: record.request_id,
        state: 'escalated',
        timestamp: record.created_at,
        metadata: { escalation_id: record.id, severity: record.severity, detail: record.detail },
      })
    },
  })

  const registry = new AgentRegistry(config.agents ?? [])
  const instances = new InstanceStore(db)
  const executions = new ExecutionLog(db)
  const approvals = new ApprovalGateway(db, { policies: config.gates })
  const supervisor = new RetrySupervisor({
    registry,
    attempts: executions,
    escalations,
    policy: config.retry,
    sleep: config.sleep,
    logger,
  })

  const context = createOrchestratorContext()
  const orchestrator = new Orchestrator(
    { db, context, instances, executions, approvals, escalations, supervisor, audit, notifier, logger },
    {
      poll_interval_ms: config.orchestrator?.poll_interval_ms,
      sweep_interval_ms: (config.orchestrator?.sweep_interval_seconds ?? 60) * 1000,
      max_concurrent_dispatches: config.orchestrator?.max_concurrent_dispatches,
      onError: config.orchestrator?.on_error,
    },
  )

  return {
    db,
    context,
    registry,
    instances,
    executions,
    approvals,
    escalations,
    audit,
    notifier,
    supervisor,
    orchestrator,

    async start() {
      const report = await orchestrator.recover()
      orchestrator.start()
      return report
    },

    stop() {
      orchestrator.stop()
    },

    listen() {
      const app = express()
      app.use(express.json())

      const apiConfig: ApiConfig = {}
      if (config.server?.api_key) {
        apiConfig.api_key = config.server.api_key
      }

      app.use(createApiRouter(
        { orchestrator, approvals, escalations, audit, registry, instances },
        apiConfig,
      ))

      const port = config.server?.port ?? 4820
      const host = config.server?.host ?? '127.0.0.1'

      return new Promise<{ port: number; close: () => void }>((resolve) => {
        const server: Server = app.listen(port, host, () => {
          const address = server.address()
          resolve({
            port: typeof address === 'object' && address ? address.port : port,
            close: () => server.close(),
          })
        })
      })
    },
  }
}
