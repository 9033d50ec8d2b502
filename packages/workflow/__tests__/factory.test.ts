import { describe, it, expect, afterEach, vi } from 'vitest'
import { createWorkflowService, type WorkflowService } from '../src/factory.js'
import { WorkflowState } from '../src/state-machine.js'

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('createWorkflowService', () => {
  let running: WorkflowService | null = null

  afterEach(() => {
    running?.stop()
    running?.db.close()
    running = null
  })

  it('wires the escalation hook into the audit log and notifier', async () => {
    const service = createWorkflowService({ db_path: ':memory:', logger: silentLogger() })
    running = service
    const emit = vi.spyOn(service.notifier, 'emit')

    const id = await service.orchestrator.submit({ cohort: 'adults' })
    await service.orchestrator.drain()

    expect(service.orchestrator.status(id).state).toBe(WorkflowState.ESCALATED)
    const [escalation] = service.escalations.listForRequest(id)
    expect(service.audit.getLog({ request_id: id, action: 'escalation_raised' })[0].metadata).toEqual({
      escalation_id: escalation.id,
      cause: 'agent_failure',
      severity: 'high',
    })
    expect(emit).toHaveBeenCalledWith(expect.objectContaining({
      event: 'escalation_raised',
      request_id: id,
      state: 'escalated',
    }))
  })

  it('recovers on start and serves the API', async () => {
    const service = createWorkflowService({
      db_path: ':memory:',
      server: { port: 0, host: '127.0.0.1' },
      logger: silentLogger(),
    })
    running = service

    const report = await service.start()
    expect(report).toEqual({ restored: 0, reopened_gates: 0, routed_timeouts: 0, requeued: 0, abandoned_attempts: 0 })

    const { port, close } = await service.listen()
    try {
      const res = await fetch(`http://127.0.0.1:${port}/health`)
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ status: 'ok', counts: {}, queue_depth: 0, in_flight: 0 })
    } finally {
      close()
    }
  })
})
