import type { Logger } from '@tollgate/agents'

export type NotificationEventName =
  | 'gate_opened'
  | 'approval_resolved'
  | 'escalation_raised'
  | 'terminal_reached'

export interface WebhookConfig {
  url: string
  events: Array<NotificationEventName | '*'>
  headers?: Record<string, string>
  method?: 'POST' | 'GET'
  body_template?: 'default' | 'slack'
  timeout_ms?: number
}

export interface NotificationEvent {
  event: NotificationEventName
  request_id: string
  state: string
  timestamp: string
  metadata?: Record<string, unknown>
}

function formatSlack(event: NotificationEvent): string {
  const meta = event.metadata ?? {}
  switch (event.event) {
    case 'gate_opened':
      return `:raised_hand: *Tollgate*: ${event.request_id} is waiting for _${String(meta.kind ?? 'review')}_ (approval ${String(meta.approval_id ?? '?')})`
    case 'approval_resolved':
      return `:memo: *Tollgate*: ${String(meta.kind ?? 'approval')} for ${event.request_id} was ${String(meta.status ?? 'resolved')} by ${String(meta.reviewer ?? 'unknown')}`
    case 'escalation_raised':
      return `:rotating_light: *Tollgate*: [${String(meta.severity ?? 'high')}] escalation on ${event.request_id}: ${String(meta.detail ?? '')}`
    case 'terminal_reached':
      return `:checkered_flag: *Tollgate*: ${event.request_id} finished as _${event.state}_`
  }
}

function buildBody(webhook: WebhookConfig, event: NotificationEvent): string {
  if (webhook.body_template === 'slack') {
    return JSON.stringify({ text: formatSlack(event) })
  }
  return JSON.stringify(event)
}

function matchesEvent(webhook: WebhookConfig, event: NotificationEvent): boolean {
  return webhook.events.includes('*') || webhook.events.includes(event.event)
}

/**
 * Fire-and-forget webhook delivery. Delivery failures are logged and never
 * reach the caller.
 */
export class Notifier {
  private webhooks: WebhookConfig[]
  private logger: Logger

  constructor(webhooks: WebhookConfig[], logger: Logger = console) {
    this.webhooks = webhooks
    this.logger = logger
  }

  emit(event: NotificationEvent): void {
    const matching = this.webhooks.filter(w => matchesEvent(w, event))
    if (matching.length === 0) return

    void Promise.allSettled(
      matching.map(webhook => this.send(webhook, event)),
    )
  }

  private async send(webhook: WebhookConfig, event: NotificationEvent): Promise<void> {
    const method = webhook.method ?? 'POST'
    const timeout = webhook.timeout_ms ?? 5000
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...webhook.headers,
    }

    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeout)

    try {
      const res = await fetch(webhook.url, {
        method,
        headers,
        body: method === 'POST' ? buildBody(webhook, event) : undefined,
        signal: controller.signal,
      })
      if (!res.ok) {
        this.logger.error(`Webhook ${webhook.url} returned ${res.status} for ${event.event}`)
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.logger.error(`Webhook ${webhook.url} failed for ${event.event}: ${message}`)
    } finally {
      clearTimeout(timer)
    }
  }
}
