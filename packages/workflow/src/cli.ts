import * as fs from 'node:fs'
import * as path from 'node:path'
import { pathToFileURL } from 'node:url'
import { Command } from 'commander'
import chalk from 'chalk'
import { z } from 'zod'
import type { Agent } from '@tollgate/agents'
import { DEFAULT_CONFIG_FILE, loadConfig, type TollgateConfig } from './config.js'
import { createWorkflowService } from './factory.js'
import { isJsonObject } from './utils/serialize.js'
import type { JsonObject } from './types.js'

const VERSION = '0.1.0'

export function generateTemplate(): string {
  return `# Tollgate configuration

# SQLite database (required). Relative paths resolve against this file.
db_path: ./tollgate.db

# Module exporting \`agents\` (an array of Agent objects)
agents_module: ./agents.js

# Retry policy for every agent dispatch
retry:
  max_attempts: 3
  base_delay_ms: 1000         # doubles on each retry
  jitter_ms: 250
  # attempt_timeout_ms: 600000

# Review windows per approval kind; on_timeout is reject or hold
gates:
  requirements_review:
    timeout_hours: 24
    on_timeout: hold
  critical_query_review:
    timeout_hours: 24
    on_timeout: hold
  access_authorization:
    timeout_hours: 12
    on_timeout: reject
  quality_review:
    timeout_hours: 24
    on_timeout: hold
  scope_change:
    timeout_hours: 48
    on_timeout: reject

orchestrator:
  poll_interval_ms: 1000
  sweep_interval_seconds: 60
  max_concurrent_dispatches: 4

# REST API server
server:
  port: \${TOLLGATE_PORT:-4820}
  host: \${TOLLGATE_HOST:-127.0.0.1}
  # api_key: \${TOLLGATE_API_KEY}

# webhooks:
#   - url: https://hooks.slack.com/services/XXX
#     events: [gate_opened, escalation_raised]
#     body_template: slack
`
}

export function buildRequestHeaders(apiKey?: string, includeJson = false): Record<string, string> {
  const headers: Record<string, string> = {}
  if (includeJson) headers['Content-Type'] = 'application/json'
  if (apiKey) headers['x-api-key'] = apiKey
  return headers
}

export function parseJsonFlag(name: string, value: string): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch {
    throw new Error(`--${name} must be valid JSON`)
  }
  if (!isJsonObject(parsed)) {
    throw new Error(`--${name} must be a JSON object`)
  }
  return parsed
}

function isAgent(value: unknown): value is Agent {
  if (!isJsonObject(value)) return false
  return typeof value.id === 'string'
    && Array.isArray(value.tasks)
    && value.tasks.every(task => typeof task === 'string')
    && typeof value.execute === 'function'
}

/** Imports a module that exports `agents` (or a default export) as an array of agents. */
export async function loadAgents(modulePath: string): Promise<Agent[]> {
  const mod: unknown = await import(pathToFileURL(modulePath).href)
  if (!isJsonObject(mod)) {
    throw new Error(`Agents module ${modulePath} did not load`)
  }
  const exported = mod.agents ?? mod.default
  if (!Array.isArray(exported) || !exported.every(isAgent)) {
    throw new Error(`Agents module ${modulePath} must export \`agents\` as an array of agents`)
  }
  return exported
}

// ── Output ──

const StatusSchema = z.object({
  request_id: z.string(),
  state: z.string(),
  description: z.string(),
  version: z.number(),
  history: z.array(z.object({ seq: z.number(), state: z.string(), at: z.string(), event: z.string() })),
  pending_approvals: z.array(z.object({ id: z.string(), kind: z.string(), timeout_at: z.string() })),
  open_escalations: z.array(z.object({ id: z.string(), severity: z.string(), detail: z.string() })),
})

const SummaryListSchema = z.array(z.object({
  request_id: z.string(),
  state: z.string(),
  version: z.number(),
  updated_at: z.string(),
}))

const ApprovalListSchema = z.array(z.object({
  id: z.string(),
  request_id: z.string(),
  kind: z.string(),
  timeout_at: z.string(),
}))

const EscalationListSchema = z.array(z.object({
  id: z.string(),
  request_id: z.string(),
  severity: z.string(),
  status: z.string(),
  detail: z.string(),
}))

const TERMINAL_COLOR: Record<string, (text: string) => string> = {
  completed: chalk.green,
  rejected: chalk.red,
  failed: chalk.red,
  cancelled: chalk.gray,
  escalated: chalk.yellow,
}

function colorState(state: string): string {
  return (TERMINAL_COLOR[state] ?? chalk.cyan)(state)
}

export function formatStatus(data: unknown): string {
  const status = StatusSchema.parse(data)
  const lines = [
    `${chalk.bold(status.request_id)}  ${colorState(status.state)}  (v${status.version})`,
    chalk.dim(status.description),
    '',
    chalk.bold('History'),
    ...status.history.map(entry => `  ${String(entry.seq).padStart(3)}  ${entry.at}  ${entry.event.padEnd(24)} → ${entry.state}`),
  ]
  if (status.pending_approvals.length > 0) {
    lines.push('', chalk.bold('Pending approvals'))
    for (const approval of status.pending_approvals) {
      lines.push(`  ${approval.id}  ${approval.kind}  due ${approval.timeout_at}`)
    }
  }
  if (status.open_escalations.length > 0) {
    lines.push('', chalk.bold('Open escalations'))
    for (const escalation of status.open_escalations) {
      lines.push(`  ${escalation.id}  [${escalation.severity}]  ${escalation.detail}`)
    }
  }
  return lines.join('\n')
}

// ── HTTP client ──

interface Client {
  baseUrl: string
  apiKey?: string
}

function clientFor(configPath?: string): Client {
  const config: TollgateConfig = loadConfig(configPath)
  return {
    baseUrl: `http://${config.server.host}:${config.server.port}`,
    apiKey: config.server.api_key,
  }
}

async function call(client: Client, method: 'GET' | 'POST', route: string, body?: JsonObject): Promise<unknown> {
  let res: Response
  try {
    res = await fetch(`${client.baseUrl}${route}`, {
      method,
      headers: buildRequestHeaders(client.apiKey, body !== undefined),
      body: body === undefined ? undefined : JSON.stringify(body),
    })
  } catch {
    throw new Error(`Could not connect to Tollgate at ${client.baseUrl}. Is the server running? Try: tollgate start`)
  }

  const payload: unknown = await res.json().catch(() => null)
  if (!res.ok) {
    const message = isJsonObject(payload) && typeof payload.error === 'string'
      ? payload.error
      : `${res.status} ${res.statusText}`
    throw new Error(message)
  }
  return payload
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

// ── Program ──

interface GlobalOptions {
  config?: string
}

export function buildProgram(): Command {
  const program = new Command()

  program
    .name('tollgate')
    .description(chalk.dim('Workflow orchestration with human approval gates'))
    .version(VERSION)
    .option('-c, --config <path>', `Path to config file (default: ./${DEFAULT_CONFIG_FILE})`)

  const client = (): Client => clientFor(program.opts<GlobalOptions>().config)

  program
    .command('init')
    .description(`Create a ${DEFAULT_CONFIG_FILE} template`)
    .option('--force', 'Overwrite an existing file', false)
    .action((opts: { force: boolean }) => {
      const filePath = path.join(process.cwd(), DEFAULT_CONFIG_FILE)
      if (fs.existsSync(filePath) && !opts.force) {
        console.error(chalk.red(`${DEFAULT_CONFIG_FILE} already exists. Use --force to overwrite.`))
        process.exitCode = 1
        return
      }
      fs.writeFileSync(filePath, generateTemplate())
      console.log(chalk.green(`Created ${DEFAULT_CONFIG_FILE}`))
      console.log('Edit the config, then run: tollgate start')
    })

  program
    .command('start')
    .description('Recover persisted requests and start the orchestrator and API server')
    .action(async () => {
      const config = loadConfig(program.opts<GlobalOptions>().config)
      const agents = config.agents_module ? await loadAgents(config.agents_module) : []
      if (agents.length === 0) {
        console.warn(chalk.yellow('No agents loaded; requests will escalate at their first work state'))
      }

      const service = createWorkflowService({ ...config, agents })
      const report = await service.start()
      const { port, close } = await service.listen()

      console.log(chalk.hex('#0ea5e9')(`Tollgate running on http://${config.server.host}:${port}`))
      console.log(chalk.dim(`Recovered ${report.restored} request(s), reopened ${report.reopened_gates} gate(s), routed ${report.routed_timeouts} timeout(s)`))
      console.log('Press Ctrl+C to stop')

      const shutdown = (): void => {
        console.log('\nShutting down...')
        service.stop()
        close()
        service.db.close()
        process.exit(0)
      }

      process.on('SIGINT', shutdown)
      process.on('SIGTERM', shutdown)
    })

  program
    .command('submit')
    .description('Submit a new request')
    .option('--context <json>', 'Initial context as a JSON object')
    .option('--file <path>', 'Read the initial context from a JSON file')
    .option('--by <name>', 'Submitter')
    .action(async (opts: { context?: string; file?: string; by?: string }) => {
      const raw = opts.file ? fs.readFileSync(opts.file, 'utf-8') : opts.context ?? '{}'
      const context = parseJsonFlag(opts.file ? 'file' : 'context', raw)
      const body: JsonObject = { context }
      if (opts.by) body.submitted_by = opts.by
      const status = await call(client(), 'POST', '/requests', body)
      console.log(formatStatus(status))
    })

  program
    .command('status <requestId>')
    .description('Show a request with its history, pending approvals and open escalations')
    .action(async (requestId: string) => {
      console.log(formatStatus(await call(client(), 'GET', `/requests/${encodeURIComponent(requestId)}`)))
    })

  program
    .command('list')
    .description('List requests')
    .option('--state <state>', 'Filter by state')
    .action(async (opts: { state?: string }) => {
      const query = opts.state ? `?state=${encodeURIComponent(opts.state)}` : ''
      const rows = SummaryListSchema.parse(await call(client(), 'GET', `/requests${query}`))
      if (rows.length === 0) {
        console.log('No requests found.')
        return
      }
      console.log(`${'REQUEST'.padEnd(24)} ${'STATE'.padEnd(24)} ${'VER'.padEnd(4)} UPDATED`)
      for (const row of rows) {
        console.log(`${row.request_id.padEnd(24)} ${colorState(row.state.padEnd(24))} ${String(row.version).padEnd(4)} ${row.updated_at}`)
      }
      console.log(chalk.dim(`\n${rows.length} request(s)`))
    })

  program
    .command('approvals')
    .description('List pending approvals')
    .option('--kind <kind>', 'Filter by approval kind')
    .action(async (opts: { kind?: string }) => {
      const query = opts.kind ? `?kind=${encodeURIComponent(opts.kind)}` : ''
      const rows = ApprovalListSchema.parse(await call(client(), 'GET', `/approvals${query}`))
      if (rows.length === 0) {
        console.log('No pending approvals.')
        return
      }
      for (const row of rows) {
        console.log(`${row.id}  ${row.request_id}  ${chalk.cyan(row.kind)}  due ${row.timeout_at}`)
      }
    })

  const decide = (decision: 'approve' | 'modify' | 'reject') =>
    async (approvalId: string, opts: { reviewer: string; notes?: string; delta?: string }): Promise<void> => {
      const body: JsonObject = { decision, reviewer: opts.reviewer }
      if (opts.notes) body.notes = opts.notes
      if (opts.delta) body.delta = parseJsonFlag('delta', opts.delta)
      printJson(await call(client(), 'POST', `/approvals/${encodeURIComponent(approvalId)}/resolve`, body))
    }

  program
    .command('approve <approvalId>')
    .description('Approve a pending approval')
    .requiredOption('--reviewer <name>', 'Reviewer')
    .option('--notes <text>', 'Notes')
    .option('--delta <json>', 'Context changes to merge (records the decision as modified)')
    .action(decide('approve'))

  program
    .command('modify <approvalId>')
    .description('Approve with context changes')
    .requiredOption('--reviewer <name>', 'Reviewer')
    .requiredOption('--delta <json>', 'Context changes to merge')
    .option('--notes <text>', 'Notes')
    .action(decide('modify'))

  program
    .command('reject <approvalId>')
    .description('Reject a pending approval')
    .requiredOption('--reviewer <name>', 'Reviewer')
    .option('--notes <text>', 'Notes')
    .action(decide('reject'))

  program
    .command('scope-change <requestId>')
    .description('Open a scope change review for a request')
    .requiredOption('--delta <json>', 'Proposed context changes')
    .requiredOption('--reason <text>', 'Why the scope changes')
    .option('--by <name>', 'Requester')
    .action(async (requestId: string, opts: { delta: string; reason: string; by?: string }) => {
      const body: JsonObject = { delta: parseJsonFlag('delta', opts.delta), reason: opts.reason }
      if (opts.by) body.requested_by = opts.by
      printJson(await call(client(), 'POST', `/requests/${encodeURIComponent(requestId)}/scope-change`, body))
    })

  program
    .command('escalations')
    .description('List open escalations')
    .option('--request <requestId>', 'All escalations for one request')
    .action(async (opts: { request?: string }) => {
      const query = opts.request ? `?request_id=${encodeURIComponent(opts.request)}` : ''
      const rows = EscalationListSchema.parse(await call(client(), 'GET', `/escalations${query}`))
      if (rows.length === 0) {
        console.log('No escalations.')
        return
      }
      for (const row of rows) {
        const severity = row.severity === 'high' ? chalk.red(row.severity) : chalk.yellow(row.severity)
        console.log(`${row.id}  ${row.request_id}  [${severity}] ${row.status}  ${row.detail}`)
      }
    })

  program
    .command('resolve-escalation <escalationId>')
    .description('Resolve an escalation: retry_from_state, force_fail or force_complete')
    .requiredOption('--action <action>', 'Resolution action')
    .requiredOption('--by <name>', 'Who resolved it')
    .action(async (escalationId: string, opts: { action: string; by: string }) => {
      printJson(await call(client(), 'POST', `/escalations/${encodeURIComponent(escalationId)}/resolve`, {
        action: opts.action,
        resolved_by: opts.by,
      }))
    })

  program
    .command('cancel <requestId>')
    .description('Cancel a request')
    .option('--reason <text>', 'Reason')
    .option('--by <name>', 'Who cancelled it')
    .action(async (requestId: string, opts: { reason?: string; by?: string }) => {
      const body: JsonObject = {}
      if (opts.reason) body.reason = opts.reason
      if (opts.by) body.actor = opts.by
      printJson(await call(client(), 'POST', `/requests/${encodeURIComponent(requestId)}/cancel`, body))
    })

  return program
}
