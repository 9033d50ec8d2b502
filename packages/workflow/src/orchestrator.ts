import type Database from 'better-sqlite3'
import type {
  AgentRunStatus,
  Logger,
  RetrySupervisor,
  SupervisedOutcome,
} from '@tollgate/agents'
import type { ApprovalGateway, ResolveApprovalInput, TimedOutApproval } from './approval-gateway.js'
import type { AuditLog } from './audit.js'
import { durable } from './db.js'
import {
  ApprovalConflictError,
  EscalationConflictError,
  NotFoundError,
  ScopeChangeConflictError,
  TransitionError,
  ValidationError,
} from './errors.js'
import type { EscalationManager } from './escalation-manager.js'
import type { AgentMetrics, ExecutionLog } from './execution-log.js'
import { createRequestId } from './id.js'
import type { InstanceStore, InstanceSummary } from './instance-store.js'
import { RequestLocks } from './locks.js'
import type { Notifier } from './notifier.js'
import {
  WorkflowState,
  describeState,
  gateStateFor,
  isTerminal,
  requiresAgent,
  requiresApproval,
  stateClass,
  type ApprovalKind,
  type StateClass,
} from './state-machine.js'
import {
  ESCALATION_ACTIONS,
  type ApprovalEvent,
  type ApprovalRecord,
  type ApprovalStatus,
  type EscalationAction,
  type EscalationRecord,
  type JsonObject,
  type RoutingHint,
  type WorkflowEvent,
  type WorkflowEventType,
  type WorkflowInstance,
} from './types.js'
import { isJsonObject } from './utils/serialize.js'
import { advance, checkRoutingHint, createInstance, getValidEvents } from './workflow-engine.js'

/** Live instances and the lock that serializes every mutation of one request. */
export interface OrchestratorContext {
  live: Map<string, WorkflowInstance>
  locks: RequestLocks
}

export function createOrchestratorContext(): OrchestratorContext {
  return { live: new Map(), locks: new RequestLocks() }
}

export interface OrchestratorDependencies {
  db: Database.Database
  context: OrchestratorContext
  instances: InstanceStore
  executions: ExecutionLog
  approvals: ApprovalGateway
  escalations: EscalationManager
  supervisor: RetrySupervisor
  audit: AuditLog
  notifier?: Notifier
  logger?: Logger
}

export interface OrchestratorConfig {
  poll_interval_ms?: number
  sweep_interval_ms?: number
  max_concurrent_dispatches?: number
  onError?: (error: Error) => void
}

export interface WorkItem {
  request_id: string
  agent_id: string
  task: string
  version: number
}

interface InFlight {
  item: WorkItem
  controller: AbortController
  promise: Promise<void>
}

export interface TransitionAck {
  request_id: string
  state: WorkflowState
  version: number
}

export interface ApprovalAck extends TransitionAck {
  approval_id: string
  status: ApprovalStatus
}

export interface ScopeChangeAck extends TransitionAck {
  approval_id: string | null
}

export interface EscalationAck {
  escalation_id: string
  request_id: string
  applied: boolean
  state: WorkflowState | null
}

export interface RequestStatus {
  request_id: string
  state: WorkflowState
  class: StateClass
  description: string
  terminal: boolean
  version: number
  context: JsonObject
  branch: WorkflowInstance['branch']
  hold: WorkflowInstance['hold']
  history: Array<{ seq: number; state: WorkflowState; at: string; event: WorkflowEventType }>
  valid_events: WorkflowEventType[]
  pending_approvals: ApprovalRecord[]
  open_escalations: EscalationRecord[]
  created_at: string
  updated_at: string
}

export interface RecoveryReport {
  restored: number
  reopened_gates: number
  routed_timeouts: number
  requeued: number
  abandoned_attempts: number
}

interface CommittedStep {
  next: WorkflowInstance
  opened: ApprovalRecord | null
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Drives many workflow instances. Every mutation of a request runs under
 * that request's lock, is written to SQLite first, and only then replaces
 * the live instance and triggers dispatch, gates and notifications.
 */
export class Orchestrator {
  private db: Database.Database
  private context: OrchestratorContext
  private instances: InstanceStore
  private executions: ExecutionLog
  private approvals: ApprovalGateway
  private escalations: EscalationManager
  private supervisor: RetrySupervisor
  private audit: AuditLog
  private notifier: Notifier | null
  private logger: Logger
  private config: Required<Omit<OrchestratorConfig, 'onError'>> & Pick<OrchestratorConfig, 'onError'>

  private queue: WorkItem[] = []
  private inflight = new Map<string, InFlight>()
  private pollId: ReturnType<typeof setInterval> | null = null
  private sweepId: ReturnType<typeof setInterval> | null = null

  constructor(deps: OrchestratorDependencies, config: OrchestratorConfig = {}) {
    this.db = deps.db
    this.context = deps.context
    this.instances = deps.instances
    this.executions = deps.executions
    this.approvals = deps.approvals
    this.escalations = deps.escalations
    this.supervisor = deps.supervisor
    this.audit = deps.audit
    this.notifier = deps.notifier ?? null
    this.logger = deps.logger ?? console
    this.config = {
      poll_interval_ms: config.poll_interval_ms ?? 1000,
      sweep_interval_ms: config.sweep_interval_ms ?? 60_000,
      max_concurrent_dispatches: Math.max(1, config.max_concurrent_dispatches ?? 4),
      onError: config.onError,
    }
  }

  // ── Control surface ──

  async submit(initialContext: JsonObject, submittedBy: string | null = null): Promise<string> {
    if (!isJsonObject(initialContext)) {
      throw new ValidationError('context must be a JSON object')
    }

    const requestId = createRequestId()
    const instance = createInstance(requestId, initialContext, new Date().toISOString(), submittedBy)

    await this.context.locks.run(requestId, () => {
      durable('submit', () => this.db.transaction(() => {
        this.instances.insert(instance, submittedBy)
        this.audit.logAction({
          request_id: requestId,
          action: 'submitted',
          actor: submittedBy,
          after_state: instance.state,
        })
      }).immediate())
      this.publish(null, instance, null)
    })

    this.logger.info(`[${requestId}] submitted`)
    return requestId
  }

  status(requestId: string): RequestStatus {
    const instance = this.context.live.get(requestId) ?? this.instances.getProjection(requestId)
    if (!instance) throw new NotFoundError('Request', requestId)

    return {
      request_id: instance.request_id,
      state: instance.state,
      class: stateClass(instance.state),
      description: describeState(instance.state),
      terminal: isTerminal(instance.state),
      version: instance.version,
      context: instance.context,
      branch: instance.branch,
      hold: instance.hold,
      history: instance.history.map(entry => ({
        seq: entry.seq,
        state: entry.state,
        at: entry.at,
        event: entry.event.type,
      })),
      valid_events: getValidEvents(instance.state),
      pending_approvals: this.approvals.listPending({ request_id: requestId }),
      open_escalations: this.escalations.listForRequest(requestId).filter(e => e.status === 'open'),
      created_at: instance.created_at,
      updated_at: instance.updated_at,
    }
  }

  async resolveApproval(approvalId: string, input: ResolveApprovalInput): Promise<ApprovalAck> {
    const record = this.approvals.getById(approvalId)
    if (!record) throw new NotFoundError('Approval', approvalId)

    return this.context.locks.run(record.request_id, () => {
      const current = this.approvals.getById(approvalId)
      if (current && current.status !== 'pending') {
        throw new ApprovalConflictError(current.id, current.status)
      }

      const live = this.requireLive(record.request_id, `approval_${input.decision}`)
      const gate = gateStateFor(record.kind)
      if (live.state !== gate) {
        throw new TransitionError(live.state, `approval_${input.decision}`, `instance is not waiting in ${gate}`)
      }

      const { next, detail: resolved } = this.applyEvent(live, input.reviewer, () => {
        const { record: resolved, event } = this.approvals.resolve(approvalId, input)
        this.audit.logAction({
          request_id: resolved.request_id,
          action: 'approval_resolved',
          actor: input.reviewer,
          before_state: live.state,
          metadata: { approval_id: resolved.id, kind: resolved.kind, status: resolved.status, notes: resolved.notes },
        })
        return { event: toWorkflowEvent(resolved, event), detail: resolved }
      })

      this.notifier?.emit({
        event: 'approval_resolved',
        request_id: resolved.request_id,
        state: next.state,
        timestamp: new Date().toISOString(),
        metadata: { approval_id: resolved.id, kind: resolved.kind, status: resolved.status, reviewer: resolved.reviewer },
      })

      return {
        request_id: next.request_id,
        state: next.state,
        version: next.version,
        approval_id: resolved.id,
        status: resolved.status,
      }
    })
  }

  async requestScopeChange(
    requestId: string,
    delta: JsonObject,
    reason: string,
    requestedBy: string | null = null,
  ): Promise<ScopeChangeAck> {
    if (!isJsonObject(delta) || Object.keys(delta).length === 0) {
      throw new ValidationError('delta must be a non-empty object')
    }
    if (!reason.trim()) {
      throw new ValidationError('reason is required')
    }

    return this.context.locks.run(requestId, () => {
      const live = this.requireLive(requestId, 'scope_change_requested')

      if (live.state === WorkflowState.SCOPE_CHANGE_REVIEW || live.branch) {
        const escalation = durable('raise scope change conflict', () => this.escalations.raise(
          requestId,
          { type: 'scope_change_conflict', reason },
          'low',
          `Scope change "${reason}" arrived while another scope change is under review`,
        ))
        this.audit.logAction({
          request_id: requestId,
          action: 'event_rejected',
          actor: requestedBy,
          before_state: live.state,
          metadata: { event: 'scope_change_requested', escalation_id: escalation.id },
        })
        throw new ScopeChangeConflictError(live.state, requestId, escalation.id)
      }

      const { next } = this.applyEvent(live, requestedBy, () => ({
        event: { type: 'scope_change_requested', delta, reason, requested_by: requestedBy },
        detail: null,
      }))
      const pending = this.approvals.findPending(requestId, 'scope_change')

      return {
        request_id: next.request_id,
        state: next.state,
        version: next.version,
        approval_id: pending?.id ?? null,
      }
    })
  }

  async resolveEscalation(
    escalationId: string,
    action: EscalationAction,
    resolvedBy: string,
  ): Promise<EscalationAck> {
    if (!ESCALATION_ACTIONS.includes(action)) {
      throw new ValidationError(`action must be one of ${ESCALATION_ACTIONS.join(', ')}`)
    }
    const record = this.escalations.getById(escalationId)
    if (!record) throw new NotFoundError('Escalation', escalationId)
    if (record.status !== 'open') throw new EscalationConflictError(escalationId)

    return this.context.locks.run(record.request_id, () => {
      const live = this.context.live.get(record.request_id)
      const held = live?.state === WorkflowState.ESCALATED && live.hold?.escalation_id === escalationId

      if (!live || !held) {
        durable('resolve escalation', () => this.db.transaction(() => {
          this.escalations.resolve(escalationId, action, resolvedBy)
          this.audit.logAction({
            request_id: record.request_id,
            action: 'escalation_resolved',
            actor: resolvedBy,
            before_state: live?.state ?? null,
            metadata: { escalation_id: escalationId, resolution: action, applied: false },
          })
        }).immediate())
        return {
          escalation_id: escalationId,
          request_id: record.request_id,
          applied: false,
          state: live?.state ?? this.instances.getSummary(record.request_id)?.state ?? null,
        }
      }

      const { next } = this.applyEvent(live, resolvedBy, () => {
        const { event } = this.escalations.resolve(escalationId, action, resolvedBy)
        this.audit.logAction({
          request_id: record.request_id,
          action: 'escalation_resolved',
          actor: resolvedBy,
          before_state: live.state,
          metadata: { escalation_id: escalationId, resolution: action, applied: true },
        })
        return { event, detail: null }
      })
      this.supervisor.release(record.request_id)

      return {
        escalation_id: escalationId,
        request_id: record.request_id,
        applied: true,
        state: next.state,
      }
    })
  }

  async cancel(requestId: string, reason: string | null = null, actor: string | null = null): Promise<TransitionAck> {
    return this.context.locks.run(requestId, () => {
      const live = this.requireLive(requestId, 'cancel')
      const { next } = this.applyEvent(live, actor, () => ({
        event: { type: 'cancel', reason },
        detail: null,
      }))
      return { request_id: next.request_id, state: next.state, version: next.version }
    })
  }

  listInstances(filters?: { state?: WorkflowState; limit?: number; offset?: number }): InstanceSummary[] {
    return this.instances.list(filters)
  }

  agentRunStates(): AgentRunStatus[] {
    return this.supervisor.listRunStates()
  }

  agentMetrics(agentId?: string): AgentMetrics[] {
    return this.executions.metrics(agentId)
  }

  get queueDepth(): number {
    return this.queue.length
  }

  get inFlightCount(): number {
    return this.inflight.size
  }

  // ── Dispatch loop ──

  /** Starts ready work up to the concurrency limit. Returns how many dispatches began. */
  tick(): number {
    let started = 0
    while (this.inflight.size < this.config.max_concurrent_dispatches) {
      const item = this.queue.shift()
      if (!item) break

      const live = this.context.live.get(item.request_id)
      if (!live || live.version !== item.version || this.inflight.has(item.request_id)) {
        this.audit.logAction({
          request_id: item.request_id,
          action: 'stale_work_discarded',
          actor: 'orchestrator',
          metadata: { agent_id: item.agent_id, task: item.task, version: item.version },
        })
        continue
      }

      this.startDispatch(item, live)
      started++
    }
    return started
  }

  /**
   * Times out overdue approvals and routes each into its instance. Returns
   * how many were timed out; a failure on one record is reported and the
   * sweep moves on.
   */
  async sweep(now: Date = new Date()): Promise<number> {
    let timedOut = 0
    for (const record of this.approvals.listOverdue(now)) {
      try {
        const handled = await this.context.locks.run(record.request_id, () => this.handleTimeout(record, now))
        if (handled) timedOut++
      } catch (err) {
        this.reportError(err)
      }
    }
    return timedOut
  }

  /** Rebuilds live instances from persisted history after a restart. */
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = {
      restored: 0,
      reopened_gates: 0,
      routed_timeouts: 0,
      requeued: 0,
      abandoned_attempts: durable('abandon running attempts', () => this.executions.abandonRunning()),
    }

    for (const requestId of this.instances.listActiveIds()) {
      await this.context.locks.run(requestId, () => {
        const loaded = this.instances.load(requestId)
        if (!loaded) return

        // Timeouts marked by a process that stopped before routing them
        let instance: WorkflowInstance = loaded
        for (const timedOut of this.approvals.listUnroutedTimeouts(requestId)) {
          const current = instance
          const step = this.transact('route approval timeout', () => this.routeTimeout(current, timedOut))
          report.routed_timeouts++
          if (step) instance = step.next
        }
        if (isTerminal(instance.state)) {
          this.publish(loaded, instance, null)
          return
        }

        const restored = instance
        const opened = durable('reopen gate', () => this.db.transaction(
          () => this.ensureGate(restored, 'gate_reopened'),
        ).immediate())

        this.context.live.set(requestId, restored)
        report.restored++
        if (opened) {
          report.reopened_gates++
          this.notifyGateOpened(restored, opened)
        }
        if (this.enqueueIfWork(restored)) report.requeued++
      })
    }

    this.logger.info(
      `Recovered ${report.restored} request(s): ${report.reopened_gates} gate(s) reopened, ${report.routed_timeouts} timeout(s) routed, ${report.requeued} dispatch(es) requeued, ${report.abandoned_attempts} attempt(s) abandoned`,
    )
    return report
  }

  start(): void {
    if (this.pollId) return
    this.pollId = setInterval(() => {
      try {
        this.tick()
      } catch (err) {
        this.reportError(err)
      }
    }, this.config.poll_interval_ms)
    this.sweepId = setInterval(() => {
      this.sweep().catch(err => this.reportError(err))
    }, this.config.sweep_interval_ms)
  }

  stop(): void {
    if (this.pollId) {
      clearInterval(this.pollId)
      this.pollId = null
    }
    if (this.sweepId) {
      clearInterval(this.sweepId)
      this.sweepId = null
    }
  }

  /** Dispatches until no work is queued or running. */
  async drain(): Promise<void> {
    for (;;) {
      this.tick()
      const running = [...this.inflight.values()].map(entry => entry.promise)
      if (running.length === 0) return
      await Promise.allSettled(running)
    }
  }

  // ── Internals ──

  private startDispatch(item: WorkItem, live: WorkflowInstance): void {
    const controller = new AbortController()
    this.audit.logAction({
      request_id: item.request_id,
      action: 'dispatched',
      actor: 'orchestrator',
      before_state: live.state,
      metadata: { agent_id: item.agent_id, task: item.task, version: item.version },
    })
    const promise = this.runDispatch(item, live.context, controller)
    this.inflight.set(item.request_id, { item, controller, promise })
  }

  private async runDispatch(item: WorkItem, context: JsonObject, controller: AbortController): Promise<void> {
    try {
      const outcome = await this.supervisor.supervise({
        request_id: item.request_id,
        agent_id: item.agent_id,
        task: item.task,
        context,
        signal: controller.signal,
      })
      await this.context.locks.run(item.request_id, () => this.settle(item, outcome))
    } catch (err) {
      this.reportError(err)
      this.releaseInFlight(item)
      // The instance has not moved, so the next tick dispatches it again.
      const live = this.context.live.get(item.request_id)
      if (live && live.version === item.version) this.enqueueIfWork(live)
    } finally {
      this.releaseInFlight(item)
    }
  }

  private settle(item: WorkItem, outcome: SupervisedOutcome): void {
    this.releaseInFlight(item)

    if (outcome.status === 'abandoned') {
      this.audit.logAction({
        request_id: item.request_id,
        action: 'dispatch_abandoned',
        actor: 'supervisor',
        metadata: { agent_id: item.agent_id, task: item.task, dispatch: outcome.dispatch },
      })
      return
    }

    const live = this.context.live.get(item.request_id)
    if (!live || live.version !== item.version) {
      this.audit.logAction({
        request_id: item.request_id,
        action: 'stale_outcome_discarded',
        actor: 'supervisor',
        before_state: live?.state ?? null,
        metadata: { agent_id: item.agent_id, task: item.task, outcome: outcome.status, dispatch: outcome.dispatch },
      })
      this.logger.warn(`[${item.request_id}] discarded stale ${outcome.status} result from ${item.agent_id}.${item.task}`)
      return
    }

    if (outcome.status === 'failed') {
      this.tryApply(live, 'supervisor', {
        type: 'agent_failed_terminally',
        agent_id: item.agent_id,
        task: item.task,
        error: outcome.error,
        escalation_id: outcome.escalation_id,
      })
      return
    }

    const { result } = outcome
    const hint: RoutingHint | null = result.next_agent !== undefined || result.next_task !== undefined
      ? { next_agent: result.next_agent ?? null, next_task: result.next_task ?? null }
      : null
    const mismatch = checkRoutingHint(live.state, hint)
    if (mismatch) {
      this.audit.logAction({
        request_id: item.request_id,
        action: 'routing_hint_rejected',
        actor: item.agent_id,
        before_state: live.state,
        metadata: { hint: mismatch.hint, expected: mismatch.expected },
      })
      this.logger.warn(
        `[${item.request_id}] ignored routing hint ${mismatch.hint.next_agent ?? '-'}.${mismatch.hint.next_task ?? '-'} from ${item.agent_id}`,
      )
    }

    this.tryApply(live, item.agent_id, {
      type: 'agent_succeeded',
      agent_id: item.agent_id,
      task: item.task,
      kind: result.kind ?? 'proceed',
      output: result.result ?? {},
      hint,
    })
  }

  /**
   * Marks one overdue approval timed out and routes it, all in one
   * transaction. Returns false when the approval was left pending.
   */
  private handleTimeout(overdue: ApprovalRecord, now: Date): boolean {
    const live = this.context.live.get(overdue.request_id)

    if (!live) {
      const summary = this.instances.getSummary(overdue.request_id)
      // Not loaded yet; recovery routes it once the instance is live.
      if (summary && !isTerminal(summary.state)) return false

      const marked = durable('ignore approval timeout', () => this.db.transaction(() => {
        const timedOut = this.approvals.markTimedOut(overdue.id, now)
        if (timedOut) {
          this.audit.logAction({
            request_id: overdue.request_id,
            action: 'approval_timeout_ignored',
            actor: 'timeout_sweeper',
            before_state: summary?.state ?? null,
            metadata: { approval_id: overdue.id, kind: overdue.kind },
          })
        }
        return timedOut
      }).immediate())
      return marked !== null
    }

    // A gate's deadline waits while its request is off on a scope change branch.
    if (live.branch && overdue.kind !== 'scope_change') return false

    const routed = this.transact('route approval timeout', () => {
      const timedOut = this.approvals.markTimedOut(overdue.id, now)
      return timedOut ? { step: this.routeTimeout(live, timedOut) } : null
    })
    if (!routed) return false
    if (routed.step) this.publish(live, routed.step.next, routed.step.opened)
    return true
  }

  /** Raises the timeout escalation and feeds the timeout to the instance. Runs inside a transaction. */
  private routeTimeout(current: WorkflowInstance, { record, routing }: TimedOutApproval): CommittedStep | null {
    const escalation = this.escalations.raise(
      record.request_id,
      { type: 'approval_timeout', approval_id: record.id, kind: record.kind, routing },
      routing === 'hold' ? 'high' : 'medium',
      `${record.kind} approval ${record.id} timed out at ${record.timeout_at}; ${routing === 'hold' ? 'held for manual override' : 'auto-rejected'}`,
    )
    this.approvals.attachEscalation(record.id, escalation.id)

    const event: WorkflowEvent = {
      type: 'approval_timed_out',
      approval_id: record.id,
      kind: record.kind,
      routing,
      escalation_id: escalation.id,
    }
    try {
      return this.commitEvent(current, 'timeout_sweeper', event)
    } catch (err) {
      if (!(err instanceof TransitionError)) throw err
      this.audit.logAction({
        request_id: current.request_id,
        action: 'event_rejected',
        actor: 'timeout_sweeper',
        before_state: current.state,
        metadata: { event: event.type, reason: err.reason },
      })
      this.logger.warn(`[${current.request_id}] rejected ${event.type}: ${err.reason}`)
      return null
    }
  }

  /** Applies an event produced by the engine's own loop; invalid ones are audited, not thrown. */
  private tryApply(current: WorkflowInstance, actor: string, event: WorkflowEvent): void {
    try {
      this.applyEvent(current, actor, () => ({ event, detail: null }))
    } catch (err) {
      if (!(err instanceof TransitionError)) throw err
      this.audit.logAction({
        request_id: current.request_id,
        action: 'event_rejected',
        actor,
        before_state: current.state,
        metadata: { event: event.type, reason: err.reason },
      })
      this.logger.warn(`[${current.request_id}] rejected ${event.type}: ${err.reason}`)
    }
  }

  /**
   * Produces an event, advances, and persists everything in one transaction.
   * The live instance is replaced only after the commit.
   */
  private applyEvent<T>(
    current: WorkflowInstance,
    actor: string | null,
    produce: () => { event: WorkflowEvent; detail: T },
  ): { next: WorkflowInstance; detail: T } {
    const { step, detail } = this.transact(`advance ${current.request_id}`, () => {
      const { event, detail } = produce()
      return { step: this.commitEvent(current, actor, event), detail }
    })

    this.publish(current, step.next, step.opened)
    return { next: step.next, detail }
  }

  /** Advances, persists and opens the next gate. Runs inside a transaction. */
  private commitEvent(current: WorkflowInstance, actor: string | null, event: WorkflowEvent): CommittedStep {
    const next = advance(current, event)
    this.instances.commit(current, next)
    this.audit.logAction({
      request_id: next.request_id,
      action: 'transition',
      actor,
      before_state: current.state,
      after_state: next.state,
      metadata: { event: event.type, version: next.version },
    })
    return { next, opened: this.ensureGate(next, 'gate_opened') }
  }

  /** Runs `fn` in an immediate transaction, then announces the escalations it committed. */
  private transact<T>(operation: string, fn: () => T): T {
    try {
      return durable(operation, () => this.db.transaction(fn).immediate())
    } finally {
      this.escalations.flushCommitted()
    }
  }

  /** Opens the approval for a gate state unless one is already pending. Runs inside a transaction. */
  private ensureGate(instance: WorkflowInstance, action: 'gate_opened' | 'gate_reopened'): ApprovalRecord | null {
    const kind = requiresApproval(instance.state)
    if (!kind || this.approvals.findPending(instance.request_id, kind)) return null

    const record = this.approvals.open(instance.request_id, kind, gatePayload(instance, kind))
    this.audit.logAction({
      request_id: instance.request_id,
      action,
      actor: 'orchestrator',
      after_state: instance.state,
      metadata: { approval_id: record.id, kind, timeout_at: record.timeout_at },
    })
    return record
  }

  private publish(previous: WorkflowInstance | null, next: WorkflowInstance, opened: ApprovalRecord | null): void {
    const requestId = next.request_id

    const running = this.inflight.get(requestId)
    if (running && running.item.version !== next.version) {
      running.controller.abort()
    }

    if (isTerminal(next.state)) {
      this.context.live.delete(requestId)
      this.supervisor.release(requestId)
      this.notifier?.emit({
        event: 'terminal_reached',
        request_id: requestId,
        state: next.state,
        timestamp: next.updated_at,
        metadata: { previous_state: previous?.state ?? null },
      })
      this.logger.info(`[${requestId}] ${previous?.state ?? 'new'} → ${next.state} (final)`)
      return
    }

    this.context.live.set(requestId, next)
    if (previous) {
      this.logger.info(`[${requestId}] ${previous.state} → ${next.state}`)
    }
    if (opened) this.notifyGateOpened(next, opened)
    this.enqueueIfWork(next)
  }

  private enqueueIfWork(instance: WorkflowInstance): boolean {
    const work = requiresAgent(instance.state)
    if (!work) return false
    const queued = this.queue.some(
      item => item.request_id === instance.request_id && item.version === instance.version,
    )
    if (queued) return false
    this.queue.push({ request_id: instance.request_id, ...work, version: instance.version })
    return true
  }

  private notifyGateOpened(instance: WorkflowInstance, record: ApprovalRecord): void {
    this.notifier?.emit({
      event: 'gate_opened',
      request_id: instance.request_id,
      state: instance.state,
      timestamp: record.submitted_at,
      metadata: { approval_id: record.id, kind: record.kind, timeout_at: record.timeout_at },
    })
  }

  private requireLive(requestId: string, eventName: string): WorkflowInstance {
    const live = this.context.live.get(requestId)
    if (live) return live

    const summary = this.instances.getSummary(requestId)
    if (!summary) throw new NotFoundError('Request', requestId)
    throw new TransitionError(
      summary.state,
      eventName,
      isTerminal(summary.state) ? 'instance is in a terminal state' : 'instance is not loaded; run recovery first',
    )
  }

  private releaseInFlight(item: WorkItem): void {
    if (this.inflight.get(item.request_id)?.item === item) {
      this.inflight.delete(item.request_id)
    }
  }

  private reportError(err: unknown): void {
    const error = toError(err)
    if (this.config.onError) {
      this.config.onError(error)
      return
    }
    this.logger.error(`Orchestrator error: ${error.message}`)
  }
}

function gatePayload(instance: WorkflowInstance, kind: ApprovalKind): JsonObject {
  if (kind === 'scope_change' && instance.branch) {
    return {
      resume_state: instance.branch.resume_state,
      delta: instance.branch.delta,
      reason: instance.branch.reason,
    }
  }
  return {
    state: instance.state,
    description: describeState(instance.state),
    context: instance.context,
  }
}

/** Scope-change reviews resolve the side branch rather than a gate. */
function toWorkflowEvent(record: ApprovalRecord, event: ApprovalEvent): WorkflowEvent {
  if (record.kind !== 'scope_change') return event
  switch (event.type) {
    case 'approval_approved':
      return { type: 'scope_change_resolved', approval_id: record.id, accepted: true, delta: null }
    case 'approval_modified':
      return { type: 'scope_change_resolved', approval_id: record.id, accepted: true, delta: event.delta }
    case 'approval_rejected':
      return { type: 'scope_change_resolved', approval_id: record.id, accepted: false, delta: null }
  }
}
