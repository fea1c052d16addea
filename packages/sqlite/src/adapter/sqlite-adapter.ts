import Database from 'better-sqlite3';
import { BaseAdapter, ConnectionError, TransactionError, toError } from '@dbversion/core';

import { runStatement } from './sqlite-statement';
import { SQLiteTransaction } from './sqlite-transaction';

import type {
  BaseAdapterOptions,
  ConnectionConfig,
  QueryParams,
  QueryResult,
  Transaction,
} from '@dbversion/core';

export interface SQLiteAdapterOptions extends BaseAdapterOptions {
  sqliteOptions?: Database.Options;
}

export class SQLiteAdapter extends BaseAdapter {
  readonly name = 'SQLite';

  private db?: Database.Database;
  private readonly sqliteOptions?: Database.Options;

  constructor(options: SQLiteAdapterOptions = {}) {
    super(options);
    this.sqliteOptions = options.sqliteOptions;
  }

  protected async doConnect(config: ConnectionConfig): Promise<void> {
    const filename = config.filename ?? config.database;
    if (!filename) {
      throw new ConnectionError('SQLite requires a filename');
    }

    this.db = new Database(filename, {
      readonly: config.readonly ?? false,
      timeout: config.connectionTimeout ?? 5000,
      ...this.sqliteOptions,
    });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
    }
  }

  protected async doQuery<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    if (!this.db) {
      throw new ConnectionError('Database not opened');
    }

    return runStatement<T>(this.db, sql, params);
  }

  async beginTransaction(): Promise<Transaction> {
    if (!this.db) {
      throw new ConnectionError('Database not opened');
    }

    const transaction = new SQLiteTransaction(this.db);

    try {
      transaction.begin();
      this.logger?.debug('Transaction started', { id: transaction.id });
      return transaction;
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', transaction.id, toError(error));
    }
  }
}
