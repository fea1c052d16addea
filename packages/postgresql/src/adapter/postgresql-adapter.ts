import { types } from 'pg';
import {
  BaseAdapter,
  ConnectionError,
  QueryError,
  TransactionError,
  paramsToArray,
  toError,
} from '@dbversion/core';

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { PostgreSQLTransaction } from './postgresql-transaction';

import type {
  BaseAdapterOptions,
  ConnectionConfig,
  QueryParams,
  QueryResult,
  Transaction,
} from '@dbversion/core';
import type { PoolConfig } from 'pg';

export interface PostgreSQLAdapterOptions extends BaseAdapterOptions {
  pgOptions?: PoolConfig;
  /** Port used when the connection config names none (5439 for Redshift) */
  defaultPort?: number;
}

// bigint columns such as version_id come back as numbers while they fit
types.setTypeParser(types.builtins.INT8, (value: string) => {
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : value;
});

export class PostgreSQLAdapter extends BaseAdapter {
  readonly name = 'PostgreSQL';

  private pool?: PostgreSQLConnectionPool;
  private readonly pgOptions?: PoolConfig;
  private readonly defaultPort: number;

  constructor(options: PostgreSQLAdapterOptions = {}) {
    super(options);
    this.pgOptions = options.pgOptions;
    this.defaultPort = options.defaultPort ?? 5432;
  }

  protected async doConnect(config: ConnectionConfig): Promise<void> {
    const poolConfig: PoolConfig = {
      host: config.host,
      port: config.port ?? this.defaultPort,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionString: config.connectionString,
      max: config.poolSize ?? 10,
      idleTimeoutMillis: config.idleTimeout ?? 30000,
      connectionTimeoutMillis: config.connectionTimeout ?? 10000,
      ...this.pgOptions,
    };

    if (config.ssl) {
      poolConfig.ssl = config.ssl;
    }

    const pool = new PostgreSQLConnectionPool(poolConfig, this.logger);
    await pool.initialize();
    this.pool = pool;
  }

  protected async doDisconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  protected async doQuery<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    const client = await this.requirePool().getClient();

    try {
      const result = await client.query(sql, paramsToArray(params) ?? []);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, paramsToArray(params), cause);
    } finally {
      client.release();
    }
  }

  async beginTransaction(): Promise<Transaction> {
    const client = await this.requirePool().getClient();
    const transaction = new PostgreSQLTransaction(client);

    try {
      await transaction.begin();
    } catch (error) {
      client.release();
      throw new TransactionError('Failed to begin transaction', transaction.id, toError(error));
    }

    this.logger?.debug('Transaction started', { id: transaction.id });
    return transaction;
  }

  private requirePool(): PostgreSQLConnectionPool {
    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }
    return this.pool;
  }
}
