/**
 * Config Diff
 *
 * One-line, human-readable change summaries for the version history.
 */

import type { PlaylistDocument } from './domain-types'
import { isRecord } from './internal/helpers'

/** JSON text with object keys sorted, so key order never counts as a change */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value) ?? 'null'
}

function sameJson(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b)
}

export function summariseDiff(previous: Readonly<PlaylistDocument> | null, next: Readonly<PlaylistDocument>): string {
  if (!previous) return 'Initial version'

  const before = previous.playlists
  const after = next.playlists
  const added = Object.keys(after).filter((id) => !(id in before))
  const removed = Object.keys(before).filter((id) => !(id in after))
  const updated = Object.keys(after).filter((id) => id in before && !sameJson(before[id], after[id]))

  const parts: string[] = []
  if (added.length > 0) parts.push(`Added playlists: ${added.join(', ')}`)
  if (updated.length > 0) parts.push(`Updated playlists: ${updated.join(', ')}`)
  if (removed.length > 0) parts.push(`Removed playlists: ${removed.join(', ')}`)
  if (!sameJson(previous.sequence, next.sequence)) parts.push('Sequence changed')
  if (!sameJson(previous.catalog, next.catalog)) parts.push('Catalog changed')

  return parts.length > 0 ? parts.join('; ') : 'Configuration saved'
}
