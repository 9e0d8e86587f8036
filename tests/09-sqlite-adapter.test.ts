/**
 * Segment 09: SQLite Adapter Tests
 *
 * better-sqlite3 ledger store: schema bootstrap, the shared adapter contract,
 * transaction flags and persistence across reopen.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { createSqliteAdapter, SCHEMA_VERSION, type SqliteAdapter } from '../src/sqlite-adapter';
import { ConfigError } from '../src/errors';
import { adapterContract, newVersion } from './helpers/adapter-contract';

adapterContract('sqlite', () => createSqliteAdapter(':memory:'));

describe('SQLite adapter', () => {
  let adapter: SqliteAdapter;

  beforeEach(async () => {
    adapter = await createSqliteAdapter(':memory:');
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('creates its tables', async () => {
    expect(await adapter.listTables()).toEqual(['config_version', 'schema_version']);
  });

  it('records the schema version', async () => {
    expect(await adapter.getSchemaVersion()).toBe(SCHEMA_VERSION);
  });

  it('reports whether a transaction is open', async () => {
    expect(await adapter.inTransaction()).toBe(false);
    const inside = await adapter.transaction(() => adapter.inTransaction());
    expect(inside).toBe(true);
    expect(await adapter.inTransaction()).toBe(false);
  });

  it('runs a nested transaction inside the outer one', async () => {
    await adapter.transaction(async () => {
      await adapter.insertVersion(newVersion({ actor: 'outer' }));
      await adapter.transaction(() => adapter.insertVersion(newVersion({ actor: 'inner' })));
    });
    expect((await adapter.listVersions()).map((v) => v.actor)).toEqual(['inner', 'outer']);
  });
});

describe('SQLite adapter on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'playlist-ledger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps versions across reopen without reseeding the schema version', async () => {
    const file = join(dir, 'ledger.db');
    const first = await createSqliteAdapter(file);
    await first.insertVersion(newVersion({ actor: 'before restart' }));
    await first.close();

    const second = await createSqliteAdapter(file);
    expect((await second.getLatestVersion())?.actor).toBe('before restart');
    expect(await second.getSchemaVersion()).toBe(SCHEMA_VERSION);
    await second.close();

    const raw = new Database(file);
    const row = raw.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM schema_version').get();
    raw.close();
    expect(row?.n).toBe(1);
  });

  it('refuses to return a stored document that no longer validates', async () => {
    const file = join(dir, 'ledger.db');
    const store = await createSqliteAdapter(file);
    const id = await store.insertVersion(newVersion());
    await store.close();

    const raw = new Database(file);
    raw.prepare('UPDATE config_version SET config_json = ? WHERE id = ?').run(
      JSON.stringify({ version: 2, playlists: {}, sequence: [{ playlist: 'gone' }] }),
      id,
    );
    raw.close();

    const reopened = await createSqliteAdapter(file);
    await expect(reopened.getVersion(id)).rejects.toBeInstanceOf(ConfigError);
    await reopened.close();
  });
});
