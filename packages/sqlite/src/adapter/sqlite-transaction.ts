import { TransactionError, generateUUID, toError } from '@dbversion/core';

import { runStatement } from './sqlite-statement';

import type { QueryParams, QueryResult, Transaction } from '@dbversion/core';
import type Database from 'better-sqlite3';

export class SQLiteTransaction implements Transaction {
  readonly id: string;
  private _isActive = false;

  constructor(private db: Database.Database) {
    this.id = generateUUID();
  }

  get isActive(): boolean {
    return this._isActive;
  }

  begin(): void {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      this.db.exec('BEGIN');
      this._isActive = true;
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
  }

  async commit(): Promise<void> {
    this.finish('COMMIT', 'commit');
  }

  async rollback(): Promise<void> {
    this.finish('ROLLBACK', 'rollback');
  }

  private finish(statement: 'COMMIT' | 'ROLLBACK', action: string): void {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      this.db.exec(statement);
    } catch (error) {
      throw new TransactionError(`Failed to ${action} transaction`, this.id, toError(error));
    } finally {
      this._isActive = this.db.inTransaction;
    }
  }

  async query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      return runStatement<T>(this.db, sql, params);
    } catch (error) {
      const cause = toError(error);
      throw new TransactionError(`Query failed in transaction: ${cause.message}`, this.id, cause);
    }
  }
}
