import { EventEmitter } from 'eventemitter3';

import { ConnectionError, DatabaseError, QueryError, toError } from './errors';
import { retry, validateConnectionConfig, validateSQL } from './utils';

import type { DatabaseAdapter } from './interfaces';
import type { ConnectionConfig, Logger, QueryParams, QueryResult, Transaction } from './types';

export interface BaseAdapterOptions {
  logger?: Logger;
  retryOptions?: {
    maxRetries?: number;
    retryDelay?: number;
  };
}

export interface QueryEvent {
  sql: string;
  params?: QueryParams;
  duration: number;
  rowCount: number;
}

export interface QueryErrorEvent {
  sql: string;
  params?: QueryParams;
  error: Error;
  duration: number;
}

export interface AdapterEvents {
  query: (event: QueryEvent) => void;
  queryError: (event: QueryErrorEvent) => void;
}

/**
 * Connect and query plumbing shared by the driver adapters. `query` and
 * `queryError` fire for statements run on the adapter itself; statements run
 * through a transaction go straight to the driver.
 */
export abstract class BaseAdapter extends EventEmitter<AdapterEvents> implements DatabaseAdapter {
  protected logger?: Logger;
  protected _isConnected = false;
  private readonly maxRetries: number;
  private readonly retryDelay: number;

  abstract readonly name: string;

  get isConnected(): boolean {
    return this._isConnected;
  }

  constructor(options: BaseAdapterOptions = {}) {
    super();
    this.logger = options.logger;
    this.maxRetries = options.retryOptions?.maxRetries ?? 3;
    this.retryDelay = options.retryOptions?.retryDelay ?? 1000;
  }

  async connect(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config);

    try {
      await retry(() => this.doConnect(config), {
        maxRetries: this.maxRetries,
        retryDelay: this.retryDelay,
      });
    } catch (error) {
      this.logger?.error(`${this.name} connection failed`, error);
      throw new ConnectionError('Failed to connect to database', toError(error));
    }

    this._isConnected = true;
    this.logger?.info(`Connected to ${this.name}`);
  }

  async disconnect(): Promise<void> {
    if (!this._isConnected) {
      return;
    }

    try {
      await this.doDisconnect();
    } catch (error) {
      throw new ConnectionError('Failed to disconnect from database', toError(error));
    }

    this._isConnected = false;
    this.logger?.info(`Disconnected from ${this.name}`);
  }

  async query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>> {
    validateSQL(sql);

    if (!this._isConnected) {
      throw new ConnectionError('Not connected to database');
    }

    const startTime = Date.now();

    try {
      const result = await this.doQuery<T>(sql, params);
      result.duration = Date.now() - startTime;
      this.emit('query', { sql, params, duration: result.duration, rowCount: result.rowCount });
      return result;
    } catch (error) {
      const cause = toError(error);
      this.emit('queryError', { sql, params, error: cause, duration: Date.now() - startTime });

      if (cause instanceof DatabaseError) {
        throw cause;
      }
      throw new QueryError(`Query failed: ${cause.message}`, sql, paramsToArray(params), cause);
    }
  }

  abstract beginTransaction(): Promise<Transaction>;

  protected abstract doConnect(config: ConnectionConfig): Promise<void>;
  protected abstract doDisconnect(): Promise<void>;
  protected abstract doQuery<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>>;
}

export function paramsToArray(params?: QueryParams): unknown[] | undefined {
  if (!params) {
    return undefined;
  }
  return Array.isArray(params) ? params : Object.values(params);
}
