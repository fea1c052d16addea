import { TransactionError, generateUUID, toError } from '@dbversion/core';

import { runStatement } from './mysql-statement';

import type { QueryParams, QueryResult, Transaction } from '@dbversion/core';
import type * as mysql from 'mysql2/promise';

export class MySQLTransaction implements Transaction {
  readonly id = generateUUID();
  private _isActive = false;

  constructor(private readonly connection: mysql.PoolConnection) {}

  get isActive(): boolean {
    return this._isActive;
  }

  async begin(): Promise<void> {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      await this.connection.beginTransaction();
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
    this._isActive = true;
  }

  async commit(): Promise<void> {
    await this.finish(() => this.connection.commit(), 'commit');
  }

  async rollback(): Promise<void> {
    await this.finish(() => this.connection.rollback(), 'rollback');
  }

  /**
   * End the transaction and hand the connection back to the pool, even when
   * the driver call fails
   */
  private async finish(end: () => Promise<void>, action: string): Promise<void> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      await end();
    } catch (error) {
      throw new TransactionError(`Failed to ${action} transaction`, this.id, toError(error));
    } finally {
      this._isActive = false;
      this.connection.release();
    }
  }

  async query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      return await runStatement<T>(this.connection, sql, params);
    } catch (error) {
      const cause = toError(error);
      throw new TransactionError(`Query failed in transaction: ${cause.message}`, this.id, cause);
    }
  }
}
