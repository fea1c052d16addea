/**
 * Database connection configuration
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'migrator',
 *   password: 'test-secret',
 *   database: 'app',
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  /** SQLite database file (or `:memory:`) */
  filename?: string;
  ssl?: boolean | Record<string, unknown>;

  /** Maximum connections in pool */
  poolSize?: number;

  connectionTimeout?: number;
  idleTimeout?: number;
  readonly?: boolean;
}

export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
  /** Milliseconds, set by the adapter */
  duration?: number;
}

/**
 * Anything that can run a statement: a connected adapter or an open transaction.
 */
export interface Queryable {
  query<T = unknown>(sql: string, params?: QueryParams): Promise<QueryResult<T>>;
}

export interface Transaction extends Queryable {
  id: string;
  isActive: boolean;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export type QueryValue = string | number | bigint | boolean | Date | Buffer | null | undefined;
export type QueryParams = QueryValue[] | Record<string, QueryValue>;

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
