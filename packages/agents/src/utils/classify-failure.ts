import { AgentError, AgentTimeoutError, UnknownAgentError } from '../errors.js'

export type FailureCode =
  | 'timeout'
  | 'rate_limited'
  | 'network_error'
  | 'unavailable'
  | 'agent_missing'
  | 'rejected_by_agent'
  | 'unknown'

export interface FailureClassification {
  code: FailureCode
  retryable: boolean
  message: string
}

interface FailurePattern {
  hints: string[]
  code: FailureCode
}

const TRANSIENT_PATTERNS: FailurePattern[] = [
  {
    hints: ['timed out', 'timeout', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'deadline exceeded', 'TimeoutError'],
    code: 'timeout',
  },
  {
    hints: ['rate limit', 'rate_limit', '429', 'too many requests', 'throttled'],
    code: 'rate_limited',
  },
  {
    hints: ['ECONNREFUSED', 'ECONNRESET', 'ENETUNREACH', 'EAI_AGAIN', 'network error', 'fetch failed', 'ConnectionError'],
    code: 'network_error',
  },
  {
    hints: ['service unavailable', 'ServiceUnavailable', '503', 'TemporaryFailure', 'temporarily unavailable'],
    code: 'unavailable',
  },
]

function describe(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err ?? 'Unknown error')
}

function haystack(err: unknown): string {
  if (!(err instanceof Error)) return String(err ?? '').toLowerCase()
  const code = 'code' in err && typeof err.code === 'string' ? err.code : ''
  return `${err.name} ${code} ${err.message}`.toLowerCase()
}

/**
 * Classify a thrown agent failure as transient (worth retrying) or permanent.
 * Explicit agent errors win over message heuristics; anything unrecognised
 * is permanent so it escalates instead of burning retries.
 */
export function classifyFailure(err: unknown): FailureClassification {
  const message = describe(err)

  if (err instanceof AgentError) {
    return { code: 'rejected_by_agent', retryable: err.retryable, message }
  }
  if (err instanceof AgentTimeoutError) {
    return { code: 'timeout', retryable: true, message }
  }
  if (err instanceof UnknownAgentError) {
    return { code: 'agent_missing', retryable: false, message }
  }

  const lower = haystack(err)
  for (const pattern of TRANSIENT_PATTERNS) {
    for (const hint of pattern.hints) {
      if (lower.includes(hint.toLowerCase())) {
        return { code: pattern.code, retryable: true, message }
      }
    }
  }

  return { code: 'unknown', retryable: false, message }
}
