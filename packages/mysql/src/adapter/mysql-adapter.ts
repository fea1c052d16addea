import {
  BaseAdapter,
  ConnectionError,
  QueryError,
  TransactionError,
  paramsToArray,
  toError,
} from '@dbversion/core';

import { runStatement } from './mysql-statement';
import { MySQLTransaction } from './mysql-transaction';
import { MySQLConnectionPool } from '../pool/connection-pool';

import type {
  BaseAdapterOptions,
  ConnectionConfig,
  QueryParams,
  QueryResult,
  Transaction,
} from '@dbversion/core';
import type * as mysql from 'mysql2/promise';

export interface MySQLAdapterOptions extends BaseAdapterOptions {
  mysql2Options?: mysql.PoolOptions;
  /** Port used when the connection config names none (4000 for TiDB) */
  defaultPort?: number;
}

export class MySQLAdapter extends BaseAdapter {
  readonly name = 'MySQL';

  private pool?: MySQLConnectionPool;
  private readonly mysql2Options?: mysql.PoolOptions;
  private readonly defaultPort: number;

  constructor(options: MySQLAdapterOptions = {}) {
    super(options);
    this.mysql2Options = options.mysql2Options;
    this.defaultPort = options.defaultPort ?? 3306;
  }

  protected async doConnect(config: ConnectionConfig): Promise<void> {
    const poolOptions: mysql.PoolOptions = {
      host: config.host,
      port: config.port ?? this.defaultPort,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionLimit: config.poolSize ?? 10,
      connectTimeout: config.connectionTimeout ?? 10000,
      waitForConnections: true,
      ...this.mysql2Options,
    };

    if (config.connectionString) {
      poolOptions.uri = config.connectionString;
    }
    if (config.ssl) {
      poolOptions.ssl = config.ssl === true ? {} : config.ssl;
    }

    const pool = new MySQLConnectionPool(poolOptions);
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
    const connection = await this.requirePool().getConnection();

    try {
      return await runStatement<T>(connection, sql, params);
    } catch (error) {
      const cause = toError(error);
      throw new QueryError(`Query failed: ${cause.message}`, sql, paramsToArray(params), cause);
    } finally {
      connection.release();
    }
  }

  async beginTransaction(): Promise<Transaction> {
    const connection = await this.requirePool().getConnection();
    const transaction = new MySQLTransaction(connection);

    try {
      await transaction.begin();
    } catch (error) {
      connection.release();
      throw new TransactionError('Failed to begin transaction', transaction.id, toError(error));
    }

    this.logger?.debug('Transaction started', { id: transaction.id });
    return transaction;
  }

  private requirePool(): MySQLConnectionPool {
    if (!this.pool) {
      throw new ConnectionError('Database pool not initialized');
    }
    return this.pool;
  }
}
