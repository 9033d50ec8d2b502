import * as fs from 'node:fs'
import * as path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { ValidationError } from './errors.js'

export const DEFAULT_CONFIG_FILE = 'tollgate.yaml'

const NumberLike = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)])

const GatePolicySchema = z.object({
  timeout_hours: NumberLike.pipe(z.number().positive()).optional(),
  on_timeout: z.enum(['reject', 'hold']).optional(),
})

const WebhookSchema = z.object({
  url: z.string().url(),
  events: z.array(z.enum(['gate_opened', 'approval_resolved', 'escalation_raised', 'terminal_reached', '*'])).min(1),
  headers: z.record(z.string(), z.string()).optional(),
  method: z.enum(['POST', 'GET']).default('POST'),
  body_template: z.enum(['default', 'slack']).default('default'),
  timeout_ms: z.number().int().positive().default(5000),
})

export const ConfigSchema = z.object({
  db_path: z.string().min(1),
  agents_module: z.string().optional(),
  retry: z.object({
    max_attempts: NumberLike.pipe(z.number().int().min(1)).optional(),
    base_delay_ms: NumberLike.pipe(z.number().int().min(0)).optional(),
    jitter_ms: NumberLike.pipe(z.number().int().min(0)).optional(),
    attempt_timeout_ms: NumberLike.pipe(z.number().int().positive()).optional(),
  }).default({}),
  gates: z.object({
    requirements_review: GatePolicySchema.optional(),
    critical_query_review: GatePolicySchema.optional(),
    access_authorization: GatePolicySchema.optional(),
    quality_review: GatePolicySchema.optional(),
    scope_change: GatePolicySchema.optional(),
  }).strict().default({}),
  orchestrator: z.object({
    poll_interval_ms: NumberLike.pipe(z.number().int().positive()).default(1000),
    sweep_interval_seconds: NumberLike.pipe(z.number().int().positive()).default(60),
    max_concurrent_dispatches: NumberLike.pipe(z.number().int().min(1)).default(4),
  }).default({}),
  server: z.object({
    port: NumberLike.pipe(z.number().int().min(0).max(65535)).default(4820),
    host: z.string().default('127.0.0.1'),
    api_key: z.string().min(1).optional(),
  }).default({}),
  webhooks: z.array(WebhookSchema).default([]),
})

export type TollgateConfig = z.infer<typeof ConfigSchema>

function substituteLine(line: string, env: NodeJS.ProcessEnv): string {
  // ${VAR_NAME} and ${VAR_NAME:-default}
  return line.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
    const defaultSep = expr.indexOf(':-')
    if (defaultSep !== -1) {
      const varName = expr.slice(0, defaultSep)
      const defaultValue = expr.slice(defaultSep + 2)
      return env[varName] ?? defaultValue
    }

    const varName = expr.trim()
    const value = env[varName]
    if (value === undefined) {
      throw new ValidationError(`Environment variable ${varName} is not set (referenced in config)`)
    }
    return value
  })
}

export function substituteEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  // Commented-out lines keep their references untouched.
  return text
    .split('\n')
    .map(line => line.trimStart().startsWith('#') ? line : substituteLine(line, env))
    .join('\n')
}

export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): TollgateConfig {
  const raw: unknown = parseYaml(substituteEnvVars(text, env))
  const parsed = ConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Config validation failed: ${issues}`)
  }
  return parsed.data
}

export function loadConfig(configPath?: string): TollgateConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE)

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Config file not found: ${resolvedPath}`)
  }

  const config = parseConfig(fs.readFileSync(resolvedPath, 'utf-8'))

  // Relative paths are resolved against the config file, not the shell.
  const baseDir = path.dirname(resolvedPath)
  if (config.db_path !== ':memory:' && !path.isAbsolute(config.db_path)) {
    config.db_path = path.resolve(baseDir, config.db_path)
  }
  if (config.agents_module && !path.isAbsolute(config.agents_module)) {
    config.agents_module = path.resolve(baseDir, config.agents_module)
  }
  return config
}
