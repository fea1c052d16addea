import { Pool } from 'pg';
import { ConnectionError, toError } from '@dbversion/core';

import type { Logger } from '@dbversion/core';
import type { PoolClient, PoolConfig } from 'pg';

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private config: PoolConfig,
    private logger?: Logger,
  ) {}

  async initialize(): Promise<void> {
    try {
      this.pool = new Pool(this.config);

      this.pool.on('error', (err) => {
        this.logger?.error('Unexpected error on idle PostgreSQL client', err);
      });

      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      throw new ConnectionError('Failed to initialize PostgreSQL connection pool', toError(error));
    }
  }

  async getClient(): Promise<PoolClient> {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }

    try {
      return await this.pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }
}
