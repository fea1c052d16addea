import { ConnectionError, toError } from '@dbversion/core';
import * as mysql from 'mysql2/promise';

export class MySQLConnectionPool {
  private pool?: mysql.Pool;

  constructor(private options: mysql.PoolOptions) {}

  async initialize(): Promise<void> {
    try {
      this.pool = mysql.createPool(this.options);

      const connection = await this.pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      throw new ConnectionError('Failed to initialize MySQL connection pool', toError(error));
    }
  }

  async getConnection(): Promise<mysql.PoolConnection> {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }

    try {
      return await this.pool.getConnection();
    } catch (error) {
      throw new ConnectionError('Failed to get connection from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }
}
