export class TransitionError extends Error {
  readonly state: string
  readonly event: string
  readonly reason: string

  constructor(state: string, event: string, reason: string) {
    super(`Invalid event ${event} in state ${state}: ${reason}`)
    this.name = 'TransitionError'
    this.state = state
    this.event = event
    this.reason = reason
  }
}

export class ScopeChangeConflictError extends TransitionError {
  readonly requestId: string
  readonly escalationId: string | null

  constructor(state: string, requestId: string, escalationId: string | null = null) {
    super(state, 'scope_change_requested', `request ${requestId} already has a scope change under review`)
    this.name = 'ScopeChangeConflictError'
    this.requestId = requestId
    this.escalationId = escalationId
  }
}

export class ApprovalConflictError extends Error {
  readonly approvalId: string
  readonly status: string

  constructor(approvalId: string, status: string) {
    super(`Approval ${approvalId} is already ${status}`)
    this.name = 'ApprovalConflictError'
    this.approvalId = approvalId
    this.status = status
  }
}

export class DuplicateGateError extends Error {
  readonly requestId: string
  readonly kind: string
  readonly existingId: string | null

  constructor(requestId: string, kind: string, existingId: string | null) {
    super(`Request ${requestId} already has a pending ${kind} approval${existingId ? ` (${existingId})` : ''}`)
    this.name = 'DuplicateGateError'
    this.requestId = requestId
    this.kind = kind
    this.existingId = existingId
  }
}

export class EscalationConflictError extends Error {
  readonly escalationId: string

  constructor(escalationId: string) {
    super(`Escalation ${escalationId} is already resolved`)
    this.name = 'EscalationConflictError'
    this.escalationId = escalationId
  }
}

export class NotFoundError extends Error {
  readonly entity: string
  readonly id: string

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`)
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

export class ConcurrencyError extends Error {
  readonly requestId: string
  readonly expectedVersion: number

  constructor(requestId: string, expectedVersion: number) {
    super(`Request ${requestId} was modified concurrently (expected version ${expectedVersion})`)
    this.name = 'ConcurrencyError'
    this.requestId = requestId
    this.expectedVersion = expectedVersion
  }
}

export class PersistenceUnavailableError extends Error {
  readonly operation: string
  readonly attempts: number

  constructor(operation: string, attempts: number, cause: unknown) {
    super(`Persistence unavailable during ${operation} after ${attempts} attempt(s)`, { cause })
    this.name = 'PersistenceUnavailableError'
    this.operation = operation
    this.attempts = attempts
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}
