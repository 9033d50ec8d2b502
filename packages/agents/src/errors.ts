export class AgentError extends Error {
  readonly retryable: boolean
  readonly code: string

  constructor(message: string, opts: { retryable?: boolean; code?: string } = {}) {
    super(message)
    this.name = 'AgentError'
    this.retryable = opts.retryable ?? false
    this.code = opts.code ?? 'AGENT_ERROR'
  }
}

export class AgentTimeoutError extends Error {
  readonly agentId: string
  readonly timeoutMs: number

  constructor(agentId: string, timeoutMs: number) {
    super(`Agent ${agentId} timed out after ${timeoutMs}ms`)
    this.name = 'AgentTimeoutError'
    this.agentId = agentId
    this.timeoutMs = timeoutMs
  }
}

export class UnknownAgentError extends Error {
  readonly agentId: string
  readonly task: string | null

  constructor(agentId: string, task?: string) {
    super(task
      ? `Agent ${agentId} is not registered for task ${task}`
      : `Agent ${agentId} is not registered`)
    this.name = 'UnknownAgentError'
    this.agentId = agentId
    this.task = task ?? null
  }
}
