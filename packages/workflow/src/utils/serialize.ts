import type { JsonObject } from '../types.js'

export function serializeJson(value: unknown): string | null {
  if (value === null || value === undefined) return null
  return JSON.stringify(value)
}

export function parseJsonOr<T>(value: string | null, fallback: T): T {
  if (value === null || value === undefined) return fallback
  try {
    return JSON.parse(value) as T
  } catch {
    return fallback
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseJsonObject(value: string | null): JsonObject | null {
  const parsed = parseJsonOr<unknown>(value, null)
  return isJsonObject(parsed) ? parsed : null
}
