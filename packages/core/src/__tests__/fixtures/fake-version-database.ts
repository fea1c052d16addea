import { BaseAdapter } from '../../base-adapter';
import { TransactionError } from '../../errors';
import { generateUUID } from '../../utils';

import type { ConnectionConfig, QueryParams, QueryResult, QueryValue, Transaction } from '../../types';

export interface FakeRow {
  id: number | null;
  version_id: QueryValue;
  is_applied: QueryValue;
}

interface FakeTable {
  autoIncrement: boolean;
  primaryKey: boolean;
  trigger?: string;
  nextId: number;
  rows: FakeRow[];
}

interface FakeState {
  tables: Map<string, FakeTable>;
  sequences: Map<string, number>;
}

const CATALOG_PATTERN = /information_schema\.tables|sqlite_master|user_tables/i;

function cloneState(state: FakeState): FakeState {
  return {
    tables: new Map(
      [...state.tables].map(([name, table]) => [
        name,
        { ...table, rows: table.rows.map((row) => ({ ...row })) },
      ]),
    ),
    sequences: new Map(state.sequences),
  };
}

/**
 * In-process stand-in for a database that understands the statements the
 * version dialects emit: CREATE TABLE, ALTER TABLE ... ADD PRIMARY KEY,
 * CREATE SEQUENCE, CREATE OR REPLACE TRIGGER, INSERT, the history query and
 * the catalog lookups.
 */
export class FakeVersionDatabase extends BaseAdapter {
  readonly name = 'Fake';

  readonly statements: string[] = [];
  readonly transactions: FakeTransaction[] = [];
  private state: FakeState = { tables: new Map(), sequences: new Map() };
  private failures: Array<{ pattern: RegExp; error: Error }> = [];
  private rollbackFailure?: Error;

  static async open(): Promise<FakeVersionDatabase> {
    const db = new FakeVersionDatabase();
    await db.connect({ filename: ':memory:' });
    return db;
  }

  /**
   * Make the next statement matching `pattern` throw `error`
   */
  failOn(pattern: RegExp, error: Error): void {
    this.failures.push({ pattern, error });
  }

  /**
   * Make the next rollback throw `error` after discarding the changes
   */
  failNextRollback(error: Error): void {
    this.rollbackFailure = error;
  }

  takeRollbackFailure(): Error | undefined {
    const error = this.rollbackFailure;
    this.rollbackFailure = undefined;
    return error;
  }

  hasTable(name: string): boolean {
    return this.state.tables.has(name.toLowerCase());
  }

  hasSequence(name: string): boolean {
    return this.state.sequences.has(name.toLowerCase());
  }

  rows(table: string): FakeRow[] {
    return this.requireTable(table).rows.map((row) => ({ ...row }));
  }

  override async beginTransaction(): Promise<Transaction> {
    const transaction = new FakeTransaction(this);
    this.transactions.push(transaction);
    return transaction;
  }

  snapshot(): FakeState {
    return cloneState(this.state);
  }

  restore(state: FakeState): void {
    this.state = state;
  }

  protected async doConnect(_config: ConnectionConfig): Promise<void> {}

  protected async doDisconnect(): Promise<void> {}

  protected async doQuery<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    return this.run<T>(sql, Array.isArray(params) ? params : []);
  }

  run<T>(sql: string, params: QueryValue[]): QueryResult<T> {
    this.statements.push(sql);

    const failureIndex = this.failures.findIndex(({ pattern }) => pattern.test(sql));
    const failure = this.failures[failureIndex];
    if (failure) {
      this.failures.splice(failureIndex, 1);
      throw failure.error;
    }

    const text = sql.replaceAll(/\s+/g, ' ').trim();
    let match: RegExpMatchArray | null;

    if ((match = text.match(/^CREATE TABLE (\w+) \((id [^,]+),/i))) {
      const [, table = '', idDefinition = ''] = match;
      if (this.hasTable(table)) {
        throw new Error(`table ${table} already exists`);
      }
      this.state.tables.set(table.toLowerCase(), {
        autoIncrement: /serial|auto_?increment|identity/i.test(idDefinition),
        primaryKey: /primary key/i.test(text),
        nextId: 1,
        rows: [],
      });
      return { rows: [], rowCount: 0 };
    }

    if ((match = text.match(/^ALTER TABLE (\w+) ADD PRIMARY KEY \(id\)$/i))) {
      const entry = this.requireTable(match[1] ?? '');
      if (entry.primaryKey) {
        throw new Error('table can have only one primary key');
      }
      entry.primaryKey = true;
      return { rows: [], rowCount: 0 };
    }

    if ((match = text.match(/^CREATE SEQUENCE (\w+)$/i))) {
      const sequence = (match[1] ?? '').toLowerCase();
      if (this.state.sequences.has(sequence)) {
        throw new Error(`sequence ${sequence} already exists`);
      }
      this.state.sequences.set(sequence, 0);
      return { rows: [], rowCount: 0 };
    }

    if ((match = text.match(/^CREATE OR REPLACE TRIGGER \w+ BEFORE INSERT ON (\w+) .* SELECT (\w+)\.NEXTVAL/i))) {
      const entry = this.requireTable(match[1] ?? '');
      const sequence = (match[2] ?? '').toLowerCase();
      if (!this.state.sequences.has(sequence)) {
        throw new Error(`sequence ${sequence} does not exist`);
      }
      entry.trigger = sequence;
      return { rows: [], rowCount: 0 };
    }

    if ((match = text.match(/^INSERT INTO (\w+) \(version_id, is_applied\) VALUES \((\$1|\?), (\$2|\?)\);?$/i))) {
      const entry = this.requireTable(match[1] ?? '');
      const id = this.nextId(entry);
      if (id === null && entry.primaryKey) {
        throw new Error('cannot insert NULL into id');
      }
      entry.rows.push({ id, version_id: params[0], is_applied: params[1] });
      return { rows: [], rowCount: 1 };
    }

    if ((match = text.match(/^SELECT version_id, is_applied FROM (\w+) ORDER BY id DESC$/i))) {
      const entry = this.requireTable(match[1] ?? '');
      const rows = [...entry.rows]
        .sort((a, b) => (b.id ?? 0) - (a.id ?? 0))
        .map(({ version_id, is_applied }) => ({ version_id, is_applied }) as T);
      return { rows, rowCount: rows.length };
    }

    if (CATALOG_PATTERN.test(text)) {
      const name = String(params[0] ?? '');
      const rows = this.hasTable(name) ? [{ exists: 1 } as T] : [];
      return { rows, rowCount: rows.length };
    }

    throw new Error(`unsupported statement: ${text}`);
  }

  private nextId(table: FakeTable): number | null {
    if (table.autoIncrement) {
      return table.nextId++;
    }
    if (table.trigger) {
      const next = (this.state.sequences.get(table.trigger) ?? 0) + 1;
      this.state.sequences.set(table.trigger, next);
      return next;
    }
    return null;
  }

  private requireTable(name: string): FakeTable {
    const table = this.state.tables.get(name.toLowerCase());
    if (!table) {
      throw new Error(`relation "${name}" does not exist`);
    }
    return table;
  }
}

export class FakeTransaction implements Transaction {
  readonly id = generateUUID();
  private _isActive = true;
  private readonly snapshot: FakeState;

  commits = 0;
  rollbacks = 0;

  constructor(private readonly db: FakeVersionDatabase) {
    this.snapshot = db.snapshot();
  }

  get isActive(): boolean {
    return this._isActive;
  }

  async query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }
    return this.db.run<T>(sql, Array.isArray(params) ? params : []);
  }

  async commit(): Promise<void> {
    this.finish();
    this.commits++;
  }

  async rollback(): Promise<void> {
    this.finish();
    this.rollbacks++;
    this.db.restore(this.snapshot);

    const failure = this.db.takeRollbackFailure();
    if (failure) {
      throw failure;
    }
  }

  private finish(): void {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }
    this._isActive = false;
  }
}
