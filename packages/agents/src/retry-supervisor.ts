import type { AgentRegistry } from './registry.js'
import {
  AgentRunState,
  DEFAULT_RETRY_POLICY,
  type Agent,
  type AgentResult,
  type AgentRunStatus,
  type AttemptFinish,
  type AttemptRecord,
  type AttemptSink,
  type AttemptStart,
  type EscalationSink,
  type Logger,
  type RetryPolicy,
  type SupervisedInvocation,
  type SupervisedOutcome,
} from './types.js'
import { AgentTimeoutError } from './errors.js'
import { classifyFailure, type FailureClassification } from './utils/classify-failure.js'

export interface RetrySupervisorOptions {
  registry: AgentRegistry
  attempts: AttemptSink
  escalations: EscalationSink
  policy?: Partial<RetryPolicy>
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
  logger?: Logger
}

class AttemptInterruptedError extends Error {
  constructor() {
    super('Attempt interrupted by cancellation')
    this.name = 'AttemptInterruptedError'
  }
}

export function delayForAttempt(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const backoff = policy.base_delay_ms * (2 ** (attempt - 1))
  const jitter = policy.jitter_ms > 0 ? Math.floor(random() * policy.jitter_ms) : 0
  return backoff + jitter
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })

    function done(): void {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
  })
}

function runKey(agentId: string, requestId: string): string {
  return `${agentId}:${requestId}`
}

/**
 * Wraps one agent dispatch with bounded retry. Every attempt is written to
 * the attempt sink before it starts and finished exactly once; a terminal
 * failure raises exactly one escalation.
 */
export class RetrySupervisor {
  private registry: AgentRegistry
  private attempts: AttemptSink
  private escalations: EscalationSink
  private policy: RetryPolicy
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private random: () => number
  private logger: Logger
  private runStates = new Map<string, AgentRunStatus>()

  constructor(options: RetrySupervisorOptions) {
    this.registry = options.registry
    this.attempts = options.attempts
    this.escalations = options.escalations
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy }
    this.sleep = options.sleep ?? sleep
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? console
  }

  get maxAttempts(): number {
    return Math.max(1, this.policy.max_attempts)
  }

  async supervise(invocation: SupervisedInvocation): Promise<SupervisedOutcome> {
    const { request_id, agent_id, task, signal } = invocation
    const dispatch = this.attempts.beginDispatch(request_id, agent_id, task)
    const history: AttemptRecord[] = []

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        return this.abandon(invocation, dispatch, history)
      }

      this.setRunState(invocation, AgentRunState.WORKING, attempt)
      const start: AttemptStart = {
        request_id,
        agent_id,
        task,
        dispatch,
        attempt,
        started_at: new Date().toISOString(),
      }
      const attemptId = this.attempts.begin(start)

      let failure: FailureClassification
      try {
        const agent = this.registry.resolve(agent_id, task)
        const result = await this.invoke(agent, task, invocation.context, attempt, signal)

        if (result.success) {
          history.push(this.finish(attemptId, start, {
            outcome: 'success',
            result: result.result ?? {},
            error: null,
            retryable: null,
          }))
          this.runStates.delete(runKey(agent_id, request_id))
          return { status: 'succeeded', result, dispatch, attempts: history }
        }

        failure = {
          code: 'rejected_by_agent',
          retryable: result.retryable ?? true,
          message: result.error ?? `${agent_id}.${task} reported failure`,
        }
      } catch (err) {
        if (signal?.aborted) {
          history.push(this.finish(attemptId, start, {
            outcome: 'abandoned',
            result: null,
            error: 'abandoned: request left the dispatching state',
            retryable: null,
          }))
          return this.abandon(invocation, dispatch, history)
        }
        failure = classifyFailure(err)
      }

      const exhausted = attempt >= this.maxAttempts
      const terminal = exhausted || !failure.retryable

      history.push(this.finish(attemptId, start, {
        outcome: terminal ? 'failure' : 'retrying',
        result: null,
        error: failure.message,
        retryable: failure.retryable,
      }))

      if (terminal) {
        return this.escalate(invocation, dispatch, history, failure)
      }

      const waitMs = delayForAttempt(this.policy, attempt, this.random)
      this.logger.warn(
        `[${request_id}] ${agent_id}.${task} attempt ${attempt}/${this.maxAttempts} failed (${failure.code}): ${failure.message}; retrying in ${waitMs}ms`,
      )
      await this.sleep(waitMs, signal)
    }

    // The loop always returns; this guards against a zero-length policy.
    return this.abandon(invocation, dispatch, history)
  }

  runState(agentId: string, requestId: string): AgentRunState {
    return this.runStates.get(runKey(agentId, requestId))?.state ?? AgentRunState.IDLE
  }

  listRunStates(): AgentRunStatus[] {
    return [...this.runStates.values()].map(status => ({ ...status }))
  }

  /** Clears run state for a request once a human has acted on it. */
  release(requestId: string): void {
    for (const [key, status] of this.runStates) {
      if (status.request_id === requestId) this.runStates.delete(key)
    }
  }

  private async invoke(
    agent: Agent,
    task: string,
    context: Readonly<Record<string, unknown>>,
    attempt: number,
    outer?: AbortSignal,
  ): Promise<AgentResult> {
    const controller = new AbortController()
    const timeoutMs = this.policy.attempt_timeout_ms ?? 0

    let interrupt: (err: Error) => void = () => {}
    const interruption = new Promise<never>((_resolve, reject) => {
      interrupt = reject
    })

    const onOuterAbort = (): void => {
      interrupt(new AttemptInterruptedError())
      controller.abort()
    }
    outer?.addEventListener('abort', onOuterAbort, { once: true })

    const timer = timeoutMs > 0
      ? setTimeout(() => {
        interrupt(new AgentTimeoutError(agent.id, timeoutMs))
        controller.abort()
      }, timeoutMs)
      : null

    try {
      return await Promise.race([
        agent.execute(task, context, { attempt, signal: controller.signal }),
        interruption,
      ])
    } finally {
      if (timer) clearTimeout(timer)
      outer?.removeEventListener('abort', onOuterAbort)
    }
  }

  private finish(id: string, start: AttemptStart, fields: Omit<AttemptFinish, 'finished_at'>): AttemptRecord {
    const finishedAt = new Date()
    const finish: AttemptFinish = { ...fields, finished_at: finishedAt.toISOString() }
    this.attempts.finish(id, finish)
    return {
      id,
      ...start,
      ...finish,
      duration_ms: finishedAt.getTime() - new Date(start.started_at).getTime(),
    }
  }

  private escalate(
    invocation: SupervisedInvocation,
    dispatch: number,
    history: AttemptRecord[],
    failure: FailureClassification,
  ): SupervisedOutcome {
    const { request_id, agent_id, task } = invocation
    const attempt = history.length
    this.setRunState(invocation, AgentRunState.FAILED, attempt)
    this.logger.error(
      `[${request_id}] ${agent_id}.${task} failed terminally after ${attempt} attempt(s) (${failure.code}): ${failure.message}`,
    )

    const escalationId = this.escalations.raiseAgentFailure({
      request_id,
      agent_id,
      task,
      error: failure.message,
      retryable: failure.retryable,
      attempts: history,
    })
    this.setRunState(invocation, AgentRunState.WAITING_FOR_HUMAN, attempt)

    return {
      status: 'failed',
      error: failure.message,
      retryable: failure.retryable,
      escalation_id: escalationId,
      dispatch,
      attempts: history,
    }
  }

  private abandon(
    invocation: SupervisedInvocation,
    dispatch: number,
    history: AttemptRecord[],
  ): SupervisedOutcome {
    this.runStates.delete(runKey(invocation.agent_id, invocation.request_id))
    this.logger.info(`[${invocation.request_id}] ${invocation.agent_id}.${invocation.task} abandoned`)
    return { status: 'abandoned', dispatch, attempts: history }
  }

  private setRunState(invocation: SupervisedInvocation, state: AgentRunState, attempt: number): void {
    this.runStates.set(runKey(invocation.agent_id, invocation.request_id), {
      agent_id: invocation.agent_id,
      request_id: invocation.request_id,
      task: invocation.task,
      state,
      attempt,
      updated_at: new Date().toISOString(),
    })
  }
}
