/**
 * Internal Helpers
 *
 * Pure utility functions shared across modules.
 */

import type { JsonObject, JsonValue } from '../domain-types'

// ============================================================================
// Type Guards
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue)
      return Object.values(value).every(isJsonValue)
    default:
      return false
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value)
}

export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}

// ============================================================================
// Paths
// ============================================================================

export function keyPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key
}

export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`
}

// ============================================================================
// Hashing
// ============================================================================

export function simpleHash(str: string): number {
  let hash = 0
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0
  }
  return Math.abs(hash)
}

/**
 * Deterministic seeded index in [0, count).
 * Knuth multiplicative hash with golden ratio constant.
 */
export function seededIndex(seed: number, count: number): number {
  // Salt so seed=0 doesn't degenerate
  let h = ((seed + 0x9e3779b9) | 0) >>> 0
  h = (Math.imul(h ^ (h >>> 16), 0x45d9f3b)) >>> 0
  h = (Math.imul(h ^ (h >>> 16), 0x45d9f3b)) >>> 0
  h = (h ^ (h >>> 16)) >>> 0
  return h % count
}

// ============================================================================
// Immutability
// ============================================================================

export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value
  for (const child of Object.values(value)) deepFreeze(child)
  return Object.freeze(value)
}

// ============================================================================
// Nesting
// ============================================================================

/**
 * Path of the first array or object nested `limit` levels below `value`, or
 * null when there is none. Walks with an explicit stack, never recursion.
 */
export function findTooDeep(value: unknown, limit: number): string | null {
  const pending: Array<{ node: unknown; path: string; depth: number }> = [{ node: value, path: '', depth: 0 }]
  for (let item = pending.pop(); item; item = pending.pop()) {
    const { node, path, depth } = item
    if (typeof node !== 'object' || node === null) continue
    if (depth >= limit) return path
    if (Array.isArray(node)) {
      node.forEach((child: unknown, i) => pending.push({ node: child, path: indexPath(path, i), depth: depth + 1 }))
    } else {
      for (const [key, child] of Object.entries(node)) {
        pending.push({ node: child, path: keyPath(path, key), depth: depth + 1 })
      }
    }
  }
  return null
}
