/**
 * Behaviour every LedgerAdapter must share. Run from the mock and the
 * SQLite adapter suites.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { LedgerAdapter, NewConfigVersion } from '../../src/adapter'
import { NotFoundError } from '../../src/errors'
import type { PlaylistDocument } from '../../src/domain-types'

export const SAMPLE_DOCUMENT: PlaylistDocument = {
  version: 2,
  catalog: {},
  metadata: {},
  playlists: { main: { id: 'main', label: 'Lobby', steps: ['clock', { cycle: ['news', 'weather'] }] } },
  sequence: [{ playlist: 'main' }],
}

export function newVersion(overrides: Partial<NewConfigVersion> = {}): NewConfigVersion {
  return {
    createdAt: '2025-01-06T10:00:00.000Z',
    actor: 'tester',
    summary: 'Initial version',
    document: SAMPLE_DOCUMENT,
    metadata: {},
    ...overrides,
  }
}

export function adapterContract(name: string, create: () => Promise<LedgerAdapter>): void {
  describe(`${name}: LedgerAdapter contract`, () => {
    let adapter: LedgerAdapter

    beforeEach(async () => {
      adapter = await create()
    })

    afterEach(async () => {
      await adapter.close?.()
    })

    it('assigns increasing ids', async () => {
      const first = await adapter.insertVersion(newVersion())
      const second = await adapter.insertVersion(newVersion({ summary: 'Sequence changed' }))
      expect(first).toBe(1)
      expect(second).toBe(2)
    })

    it('reads a version back', async () => {
      const id = await adapter.insertVersion(newVersion({ metadata: { ticket: 'OPS-1' } }))
      expect(await adapter.getVersion(id)).toEqual({ id, ...newVersion({ metadata: { ticket: 'OPS-1' } }) })
    })

    it('returns null for a missing version', async () => {
      expect(await adapter.getVersion(42)).toBeNull()
      expect(await adapter.getLatestVersion()).toBeNull()
    })

    it('returns the newest version as latest', async () => {
      await adapter.insertVersion(newVersion({ actor: 'a' }))
      await adapter.insertVersion(newVersion({ actor: 'b' }))
      expect((await adapter.getLatestVersion())?.actor).toBe('b')
    })

    it('lists newest first with an optional limit', async () => {
      for (const actor of ['a', 'b', 'c']) await adapter.insertVersion(newVersion({ actor }))
      expect((await adapter.listVersions()).map((v) => v.actor)).toEqual(['c', 'b', 'a'])
      expect(await adapter.listVersions(2)).toEqual([
        { id: 3, createdAt: '2025-01-06T10:00:00.000Z', actor: 'c', summary: 'Initial version' },
        { id: 2, createdAt: '2025-01-06T10:00:00.000Z', actor: 'b', summary: 'Initial version' },
      ])
    })

    it('lists stamps oldest first', async () => {
      await adapter.insertVersion(newVersion({ createdAt: '2025-01-01T00:00:00.000Z' }))
      await adapter.insertVersion(newVersion({ createdAt: '2025-01-02T00:00:00.000Z' }))
      expect(await adapter.listVersionStamps()).toEqual([
        { id: 1, createdAt: '2025-01-01T00:00:00.000Z' },
        { id: 2, createdAt: '2025-01-02T00:00:00.000Z' },
      ])
    })

    it('deletes versions and never reuses their ids', async () => {
      await adapter.insertVersion(newVersion())
      await adapter.insertVersion(newVersion())
      await adapter.deleteVersions([2])
      expect(await adapter.insertVersion(newVersion())).toBe(3)
      expect((await adapter.listVersionStamps()).map((s) => s.id)).toEqual([1, 3])
    })

    it('deletes nothing when an id is missing', async () => {
      await adapter.insertVersion(newVersion())
      await expect(adapter.deleteVersions([1, 9])).rejects.toBeInstanceOf(NotFoundError)
      expect(await adapter.getVersion(1)).not.toBeNull()
    })

    it('rolls back a failed transaction', async () => {
      await adapter.insertVersion(newVersion({ actor: 'kept' }))
      await expect(
        adapter.transaction(async () => {
          await adapter.insertVersion(newVersion({ actor: 'discarded' }))
          throw new Error('abort')
        }),
      ).rejects.toThrow('abort')
      expect((await adapter.listVersions()).map((v) => v.actor)).toEqual(['kept'])
    })

    it('commits a successful transaction', async () => {
      const id = await adapter.transaction(() => adapter.insertVersion(newVersion()))
      expect(await adapter.getVersion(id)).not.toBeNull()
    })

    it('returns copies that callers cannot corrupt', async () => {
      const id = await adapter.insertVersion(newVersion())
      const read = await adapter.getVersion(id)
      if (!read) throw new Error('missing version')
      read.document.sequence.push('tampered')
      expect((await adapter.getVersion(id))?.document.sequence).toEqual([{ playlist: 'main' }])
    })
  })
}
