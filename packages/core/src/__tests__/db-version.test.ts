import { describe, it, expect, vi, beforeAll } from 'vitest';

import { createAdapter, hasAdapterFactory, registerAdapterFactory } from '../adapter-factory';
import { DBVersion } from '../db-version';
import { DatabaseError } from '../errors';
import { FakeVersionDatabase } from './fixtures/fake-version-database';

import type { Logger } from '../types';

describe('adapter factory registry', () => {
  it('should throw for a dialect without a registered factory', () => {
    expect(hasAdapterFactory('oracle')).toBe(false);
    expect(() => createAdapter({ dialect: 'oracle' })).toThrow(DatabaseError);
    expect(() => createAdapter({ dialect: 'oracle' })).toThrow(
      'No adapter factory registered for dialect: oracle.',
    );
  });
});

describe('DBVersion', () => {
  const adapters: FakeVersionDatabase[] = [];
  const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

  beforeAll(() => {
    registerAdapterFactory('tidb', {
      createAdapter: ({ logger: adapterLogger }) => {
        const adapter = new FakeVersionDatabase({ logger: adapterLogger });
        adapters.push(adapter);
        return adapter;
      },
    });
  });

  const create = (): DBVersion =>
    new DBVersion(
      {
        dialect: 'tidb',
        tableName: 'app_versions',
        connection: { host: 'localhost', database: 'app', password: 'test-secret' },
      },
      { logger },
    );

  it('should bind its dialect to the configured table', () => {
    const db = create();

    expect(db.dialect.name).toBe('tidb');
    expect(db.dialect.tableName).toBe('app_versions');
  });

  it('should require connect before history', () => {
    expect(() => create().history).toThrow('Not connected. Call connect() first.');
  });

  it('should track versions through the registered adapter', async () => {
    const db = create();
    await db.connect();

    expect(db.isConnected).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Connected to Fake');

    await expect(db.history.getCurrentVersion()).resolves.toBe(0);
    await db.transaction((transaction) => db.history.recordApplied(1, transaction));
    await expect(db.history.getCurrentVersion()).resolves.toBe(1);
    expect(logger.debug).toHaveBeenCalledWith(
      expect.stringMatching(/^Query took \d+ms: SELECT version_id, is_applied FROM app_versions ORDER BY id DESC$/),
    );

    const adapter = adapters.at(-1);
    expect(adapter?.rows('app_versions').map((row) => row.version_id)).toEqual([0, 1]);

    await db.disconnect();
    expect(db.isConnected).toBe(false);
  });

  it('should roll back a failed transaction and rethrow', async () => {
    const db = create();
    await db.connect();
    await db.history.ensureVersionTable();
    const failure = new Error('migration failed');

    await expect(
      db.transaction(async (transaction) => {
        await db.history.recordApplied(2, transaction);
        throw failure;
      }),
    ).rejects.toBe(failure);

    await expect(db.history.getCurrentVersion()).resolves.toBe(0);
    await db.disconnect();
  });

  it('should keep one adapter across repeated connects', async () => {
    const db = create();
    const before = adapters.length;

    await db.connect();
    const first = adapters.at(-1);
    await db.connect();

    expect(adapters).toHaveLength(before + 1);
    expect(first?.isConnected).toBe(true);

    await db.disconnect();
    expect(first?.isConnected).toBe(false);
  });

  it('should rethrow the callback error when the rollback fails', async () => {
    const db = create();
    await db.connect();
    await db.history.ensureVersionTable();
    const rollbackError = new Error('connection lost');
    adapters.at(-1)?.failNextRollback(rollbackError);
    const failure = new Error('migration failed');

    await expect(
      db.transaction(async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(logger.error).toHaveBeenCalledWith('Rollback failed', rollbackError);
    await db.disconnect();
  });
});
