import { TransactionError, generateUUID, paramsToArray, toError } from '@dbversion/core';

import type { QueryParams, QueryResult, Transaction } from '@dbversion/core';
import type { PoolClient } from 'pg';

/**
 * A transaction pinned to one pool client. The client goes back to the pool
 * once COMMIT or ROLLBACK has been sent, whether or not it succeeded.
 */
export class PostgreSQLTransaction implements Transaction {
  readonly id = generateUUID();
  private _isActive = false;

  constructor(private readonly client: PoolClient) {}

  get isActive(): boolean {
    return this._isActive;
  }

  async begin(): Promise<void> {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      await this.client.query('BEGIN');
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
    this._isActive = true;
  }

  async commit(): Promise<void> {
    await this.finish('COMMIT', 'commit');
  }

  async rollback(): Promise<void> {
    await this.finish('ROLLBACK', 'rollback');
  }

  private async finish(statement: 'COMMIT' | 'ROLLBACK', action: string): Promise<void> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      await this.client.query(statement);
    } catch (error) {
      throw new TransactionError(`Failed to ${action} transaction`, this.id, toError(error));
    } finally {
      this._isActive = false;
      this.client.release();
    }
  }

  async query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    if (!this._isActive) {
      throw new TransactionError('Transaction not active', this.id);
    }

    try {
      const result = await this.client.query(sql, paramsToArray(params) ?? []);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      const cause = toError(error);
      throw new TransactionError(`Query failed in transaction: ${cause.message}`, this.id, cause);
    }
  }
}
