import { customAlphabet, nanoid } from 'nanoid'

// Crockford base32: no I, L, O or U
const requestSuffix = customAlphabet('0123456789ABCDEFGHJKMNPQRSTVWXYZ', 8)

export function createRequestId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '')
  return `REQ-${date}-${requestSuffix()}`
}

export function createId(prefix: string): string {
  return `${prefix}_${nanoid(16)}`
}
