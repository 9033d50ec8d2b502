import { describe, it, expect, vi, beforeEach } from 'vitest'
import { RetrySupervisor, delayForAttempt } from '../src/retry-supervisor.js'
import { AgentRegistry } from '../src/registry.js'
import { AgentError } from '../src/errors.js'
import { AgentRunState } from '../src/types.js'
import type {
  Agent,
  AgentResult,
  AttemptFinish,
  AttemptSink,
  AttemptStart,
  EscalationSink,
  Logger,
  RetryPolicy,
} from '../src/types.js'

type Row = AttemptStart & Partial<AttemptFinish> & { id: string }

function createMemorySink(): { sink: AttemptSink; rows: Row[] } {
  const rows: Row[] = []
  const dispatches = new Map<string, number>()
  const sink: AttemptSink = {
    beginDispatch(requestId, agentId, task) {
      const key = `${requestId}/${agentId}/${task}`
      const next = (dispatches.get(key) ?? 0) + 1
      dispatches.set(key, next)
      return next
    },
    begin(start) {
      const id = `att-${rows.length + 1}`
      rows.push({ id, ...start })
      return id
    },
    finish(id, finish) {
      const row = rows.find(r => r.id === id)
      if (row) Object.assign(row, finish)
    },
  }
  return { sink, rows }
}

function scriptedAgent(id: string, task: string, steps: Array<() => Promise<AgentResult>>): Agent {
  let call = 0
  return {
    id,
    tasks: [task],
    execute: vi.fn(async () => {
      const step = steps[Math.min(call, steps.length - 1)]
      call++
      return step()
    }),
  }
}

const ok = (result: Record<string, unknown> = { done: true }) => async (): Promise<AgentResult> => ({ success: true, result })
const transient = () => async (): Promise<AgentResult> => {
  throw new AgentError('upstream timed out', { retryable: true })
}

const silentLogger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }

describe('RetrySupervisor', () => {
  let rows: Row[]
  let sink: AttemptSink
  let escalations: EscalationSink
  let raise: ReturnType<typeof vi.fn>
  let sleep: ReturnType<typeof vi.fn>

  beforeEach(() => {
    const memory = createMemorySink()
    rows = memory.rows
    sink = memory.sink
    raise = vi.fn(() => 'esc-1')
    escalations = { raiseAgentFailure: raise }
    sleep = vi.fn(async () => {})
  })

  function supervisorFor(agents: Agent[], policy: Partial<RetryPolicy> = { max_attempts: 3, base_delay_ms: 100, jitter_ms: 0 }) {
    return new RetrySupervisor({
      registry: new AgentRegistry(agents),
      attempts: sink,
      escalations,
      policy,
      sleep,
      logger: silentLogger,
    })
  }

  it('returns the result of a first-try success with one record', async () => {
    const supervisor = supervisorFor([scriptedAgent('qa_agent', 'check', [ok({ passed: true })])])

    const outcome = await supervisor.supervise({ request_id: 'REQ-1', agent_id: 'qa_agent', task: 'check', context: {} })

    expect(outcome.status).toBe('succeeded')
    expect(rows).toHaveLength(1)
    expect(rows[0].outcome).toBe('success')
    expect(rows[0].result).toEqual({ passed: true })
    expect(rows[0].attempt).toBe(1)
    expect(supervisor.runState('qa_agent', 'REQ-1')).toBe(AgentRunState.IDLE)
  })

  it('retries transient failures with exponential backoff until success', async () => {
    const supervisor = supervisorFor([scriptedAgent('extract', 'run', [transient(), transient(), ok()])])

    const outcome = await supervisor.supervise({ request_id: 'REQ-1', agent_id: 'extract', task: 'run', context: {} })

    expect(outcome.status).toBe('succeeded')
    expect(rows.map(r => r.outcome)).toEqual(['retrying', 'retrying', 'success'])
    expect(rows.map(r => r.attempt)).toEqual([1, 2, 3])
    expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 200])
    expect(raise).not.toHaveBeenCalled()
  })

  it('escalates exactly once after the attempt ceiling is reached', async () => {
    const supervisor = supervisorFor([scriptedAgent('extract', 'run', [transient()])])

    const outcome = await supervisor.supervise({ request_id: 'REQ-1', agent_id: 'extract', task: 'run', context: {} })

    expect(outcome.status).toBe('failed')
    if (outcome.status !== 'failed') return
    expect(outcome.escalation_id).toBe('esc-1')
    expect(outcome.error).toBe('upstream timed out')
    expect(rows.map(r => r.outcome)).toEqual(['retrying', 'retrying', 'failure'])
    expect(raise).toHaveBeenCalledTimes(1)
    expect(raise.mock.calls[0][0]).toMatchObject({
      request_id: 'REQ-1',
      agent_id: 'extract',
      task: 'run',
      error: 'upstream timed out',
      retryable: true,
    })
    expect(raise.mock.calls[0][0].attempts).toHaveLength(3)
    expect(supervisor.runState('extract', 'REQ-1')).toBe(AgentRunState.WAITING_FOR_HUMAN)
  })

  it('stops immediately on a failure the agent marks as non-retryable', async () => {
    const agent = scriptedAgent('phenotype', 'validate', [async () => {
      throw new AgentError('criteria reference unknown code', { retryable: false })
    }])
    const supervisor = supervisorFor([agent])

    const outcome = await supervisor.supervise({ request_id: 'REQ-2', agent_id: 'phenotype', task: 'validate', context: {} })

    expect(outcome.status).toBe('failed')
    expect(rows).toHaveLength(1)
    expect(rows[0].outcome).toBe('failure')
    expect(rows[0].retryable).toBe(false)
    expect(sleep).not.toHaveBeenCalled()
    expect(raise).toHaveBeenCalledTimes(1)
  })

  it('treats unrecognised thrown errors as permanent', async () => {
    const supervisor = supervisorFor([scriptedAgent('qa', 'check', [async () => {
      throw new Error('cannot read property of undefined')
    }])])

    await supervisor.supervise({ request_id: 'REQ-3', agent_id: 'qa', task: 'check', context: {} })

    expect(rows).toHaveLength(1)
    expect(rows[0].error).toBe('cannot read property of undefined')
  })

  it('honours retryable: false on a reported failure', async () => {
    const supervisor = supervisorFor([scriptedAgent('qa', 'check', [
      async () => ({ success: false, error: 'schema mismatch', retryable: false }),
    ])])

    const outcome = await supervisor.supervise({ request_id: 'REQ-4', agent_id: 'qa', task: 'check', context: {} })

    expect(outcome.status).toBe('failed')
    expect(rows).toHaveLength(1)
    expect(rows[0].error).toBe('schema mismatch')
  })

  it('records an unknown agent as a single permanent failure', async () => {
    const supervisor = supervisorFor([])

    const outcome = await supervisor.supervise({ request_id: 'REQ-5', agent_id: 'ghost', task: 'haunt', context: {} })

    expect(outcome.status).toBe('failed')
    expect(rows).toHaveLength(1)
    expect(rows[0].error).toBe('Agent ghost is not registered')
    expect(raise).toHaveBeenCalledTimes(1)
  })

  it('numbers dispatches per request, agent and task', async () => {
    const supervisor = supervisorFor([scriptedAgent('qa', 'check', [ok()])])

    const first = await supervisor.supervise({ request_id: 'REQ-6', agent_id: 'qa', task: 'check', context: {} })
    const second = await supervisor.supervise({ request_id: 'REQ-6', agent_id: 'qa', task: 'check', context: {} })

    expect(first.dispatch).toBe(1)
    expect(second.dispatch).toBe(2)
    expect(rows.map(r => [r.dispatch, r.attempt])).toEqual([[1, 1], [2, 1]])
  })

  it('abandons an in-flight attempt when the signal aborts', async () => {
    let markStarted: () => void = () => {}
    const started = new Promise<void>(resolve => {
      markStarted = resolve
    })
    const hanging: Agent = {
      id: 'delivery',
      tasks: ['deliver'],
      execute: () => {
        markStarted()
        return new Promise<AgentResult>(() => {})
      },
    }
    const supervisor = supervisorFor([hanging])
    const controller = new AbortController()

    const pending = supervisor.supervise({
      request_id: 'REQ-7',
      agent_id: 'delivery',
      task: 'deliver',
      context: {},
      signal: controller.signal,
    })
    await started
    controller.abort()
    const outcome = await pending

    expect(outcome.status).toBe('abandoned')
    expect(rows).toHaveLength(1)
    expect(rows[0].outcome).toBe('abandoned')
    expect(raise).not.toHaveBeenCalled()
  })

  it('times out a hanging attempt and counts it as transient', async () => {
    const hanging: Agent = {
      id: 'slow',
      tasks: ['crawl'],
      execute: () => new Promise<AgentResult>(() => {}),
    }
    const supervisor = supervisorFor([hanging], {
      max_attempts: 2,
      base_delay_ms: 0,
      jitter_ms: 0,
      attempt_timeout_ms: 10,
    })

    const outcome = await supervisor.supervise({ request_id: 'REQ-8', agent_id: 'slow', task: 'crawl', context: {} })

    expect(outcome.status).toBe('failed')
    expect(rows.map(r => r.outcome)).toEqual(['retrying', 'failure'])
    expect(rows[1].error).toBe('Agent slow timed out after 10ms')
  })

  it('passes the attempt number and context to the agent', async () => {
    const agent = scriptedAgent('req', 'gather', [transient(), ok()])
    const supervisor = supervisorFor([agent])

    await supervisor.supervise({ request_id: 'REQ-9', agent_id: 'req', task: 'gather', context: { topic: 'sepsis' } })

    expect(agent.execute).toHaveBeenNthCalledWith(
      2,
      'gather',
      { topic: 'sepsis' },
      expect.objectContaining({ attempt: 2 }),
    )
  })
})

describe('delayForAttempt', () => {
  const policy = { max_attempts: 3, base_delay_ms: 1000, jitter_ms: 250 }

  it('doubles the base delay per attempt', () => {
    expect(delayForAttempt({ ...policy, jitter_ms: 0 }, 1)).toBe(1000)
    expect(delayForAttempt({ ...policy, jitter_ms: 0 }, 2)).toBe(2000)
    expect(delayForAttempt({ ...policy, jitter_ms: 0 }, 3)).toBe(4000)
  })

  it('adds jitter below the configured bound', () => {
    expect(delayForAttempt(policy, 1, () => 0.5)).toBe(1125)
    expect(delayForAttempt(policy, 2, () => 0)).toBe(2000)
  })
})
