import { Router } from 'express'
import type { Request, Response, NextFunction } from 'express'
import { z } from 'zod'
import type { AgentRegistry } from '@tollgate/agents'
import type { ApprovalGateway } from './approval-gateway.js'
import type { AuditLog } from './audit.js'
import {
  ApprovalConflictError,
  ConcurrencyError,
  DuplicateGateError,
  EscalationConflictError,
  NotFoundError,
  PersistenceUnavailableError,
  ScopeChangeConflictError,
  TransitionError,
  ValidationError,
} from './errors.js'
import type { EscalationManager } from './escalation-manager.js'
import type { InstanceStore } from './instance-store.js'
import type { Orchestrator } from './orchestrator.js'
import { isApprovalKind, isWorkflowState } from './state-machine.js'

export interface ApiConfig {
  api_key?: string
}

export interface ApiDependencies {
  orchestrator: Orchestrator
  approvals: ApprovalGateway
  escalations: EscalationManager
  audit: AuditLog
  registry: AgentRegistry
  instances: InstanceStore
}

const PUBLIC_PATHS = ['/health']

const JsonObjectSchema = z.record(z.string(), z.unknown())

const SubmitBody = z.object({
  context: JsonObjectSchema,
  submitted_by: z.string().min(1).optional(),
})

const ScopeChangeBody = z.object({
  delta: JsonObjectSchema,
  reason: z.string().min(1),
  requested_by: z.string().min(1).optional(),
})

const CancelBody = z.object({
  reason: z.string().optional(),
  actor: z.string().optional(),
})

const ResolveApprovalBody = z.object({
  decision: z.enum(['approve', 'modify', 'reject']),
  reviewer: z.string().min(1),
  notes: z.string().optional(),
  delta: JsonObjectSchema.optional(),
})

const ResolveEscalationBody = z.object({
  action: z.enum(['retry_from_state', 'force_fail', 'force_complete']),
  resolved_by: z.string().min(1),
})

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(issues)
  }
  return parsed.data
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function queryInt(req: Request, name: string): number | undefined {
  const value = queryString(req, name)
  if (value === undefined) return undefined
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`)
  }
  return parsed
}

function paramId(req: Request): string {
  return String(req.params.id)
}

export function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400
  if (err instanceof NotFoundError) return 404
  if (
    err instanceof TransitionError
    || err instanceof ApprovalConflictError
    || err instanceof EscalationConflictError
    || err instanceof DuplicateGateError
    || err instanceof ConcurrencyError
  ) {
    return 409
  }
  if (err instanceof PersistenceUnavailableError) return 503
  return 500
}

function sendError(res: Response, err: unknown): void {
  const status = statusFor(err)
  if (status === 500 || !(err instanceof Error)) {
    res.status(500).json({ error: 'Internal server error' })
    return
  }
  if (err instanceof ScopeChangeConflictError) {
    res.status(status).json({ error: err.message, escalation_id: err.escalationId })
    return
  }
  res.status(status).json({ error: err.message })
}

function authMiddleware(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (PUBLIC_PATHS.some(p => req.path === p)) {
      next()
      return
    }

    const provided = req.headers['x-api-key']
    if (provided !== apiKey) {
      res.status(401).json({ error: 'Unauthorized: invalid or missing API key' })
      return
    }

    next()
  }
}

export function createApiRouter(
  deps: ApiDependencies,
  config?: ApiConfig,
): Router {
  const router = Router()
  const { orchestrator, approvals, escalations, audit, registry, instances } = deps

  if (config?.api_key) {
    router.use(authMiddleware(config.api_key))
  }

  // GET /health
  router.get('/health', (_req: Request, res: Response) => {
    try {
      res.json({
        status: 'ok',
        counts: instances.countByState(),
        queue_depth: orchestrator.queueDepth,
        in_flight: orchestrator.inFlightCount,
      })
    } catch (err) {
      sendError(res, err)
    }
  })

  // POST /requests
  router.post('/requests', async (req: Request, res: Response) => {
    try {
      const body = parseBody(SubmitBody, req.body)
      const requestId = await orchestrator.submit(body.context, body.submitted_by ?? null)
      res.status(201).json(orchestrator.status(requestId))
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /requests
  router.get('/requests', (req: Request, res: Response) => {
    try {
      const state = queryString(req, 'state')
      if (state !== undefined && !isWorkflowState(state)) {
        throw new ValidationError(`Unknown state: ${state}`)
      }
      res.json(orchestrator.listInstances({
        state,
        limit: queryInt(req, 'limit'),
        offset: queryInt(req, 'offset'),
      }))
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /requests/:id
  router.get('/requests/:id', (req: Request, res: Response) => {
    try {
      res.json(orchestrator.status(paramId(req)))
    } catch (err) {
      sendError(res, err)
    }
  })

  // POST /requests/:id/scope-change
  router.post('/requests/:id/scope-change', async (req: Request, res: Response) => {
    try {
      const body = parseBody(ScopeChangeBody, req.body)
      const ack = await orchestrator.requestScopeChange(
        paramId(req),
        body.delta,
        body.reason,
        body.requested_by ?? null,
      )
      res.status(202).json(ack)
    } catch (err) {
      sendError(res, err)
    }
  })

  // POST /requests/:id/cancel
  router.post('/requests/:id/cancel', async (req: Request, res: Response) => {
    try {
      const body = parseBody(CancelBody, req.body)
      const ack = await orchestrator.cancel(paramId(req), body.reason ?? null, body.actor ?? null)
      res.json(ack)
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /approvals
  router.get('/approvals', (req: Request, res: Response) => {
    try {
      const kind = queryString(req, 'kind')
      if (kind !== undefined && !isApprovalKind(kind)) {
        throw new ValidationError(`Unknown approval kind: ${kind}`)
      }
      res.json(approvals.listPending({ kind, request_id: queryString(req, 'request_id') }))
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /approvals/:id
  router.get('/approvals/:id', (req: Request, res: Response) => {
    try {
      const record = approvals.getById(paramId(req))
      if (!record) throw new NotFoundError('Approval', paramId(req))
      res.json(record)
    } catch (err) {
      sendError(res, err)
    }
  })

  // POST /approvals/:id/resolve
  router.post('/approvals/:id/resolve', async (req: Request, res: Response) => {
    try {
      const body = parseBody(ResolveApprovalBody, req.body)
      const ack = await orchestrator.resolveApproval(paramId(req), {
        decision: body.decision,
        reviewer: body.reviewer,
        notes: body.notes ?? null,
        delta: body.delta ?? null,
      })
      res.json(ack)
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /escalations
  router.get('/escalations', (req: Request, res: Response) => {
    try {
      const requestId = queryString(req, 'request_id')
      res.json(requestId ? escalations.listForRequest(requestId) : escalations.listOpen())
    } catch (err) {
      sendError(res, err)
    }
  })

  // POST /escalations/:id/resolve
  router.post('/escalations/:id/resolve', async (req: Request, res: Response) => {
    try {
      const body = parseBody(ResolveEscalationBody, req.body)
      const ack = await orchestrator.resolveEscalation(paramId(req), body.action, body.resolved_by)
      res.json(ack)
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /audit
  router.get('/audit', (req: Request, res: Response) => {
    try {
      res.json(audit.getLog({
        request_id: queryString(req, 'request_id'),
        action: queryString(req, 'action'),
        limit: queryInt(req, 'limit'),
        offset: queryInt(req, 'offset'),
      }))
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /agents
  router.get('/agents', (_req: Request, res: Response) => {
    try {
      res.json({
        agents: registry.list(),
        run_states: orchestrator.agentRunStates(),
        metrics: orchestrator.agentMetrics(),
      })
    } catch (err) {
      sendError(res, err)
    }
  })

  // GET /agents/:id/metrics
  router.get('/agents/:id/metrics', (req: Request, res: Response) => {
    try {
      const agentId = paramId(req)
      if (!registry.has(agentId)) throw new NotFoundError('Agent', agentId)
      const [metrics] = orchestrator.agentMetrics(agentId)
      res.json(metrics ?? {
        agent_id: agentId,
        total_tasks: 0,
        successful_tasks: 0,
        failed_tasks: 0,
        success_rate: 0,
        average_duration_ms: null,
      })
    } catch (err) {
      sendError(res, err)
    }
  })

  return router
}
