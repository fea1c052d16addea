export { PostgreSQLAdapter } from './adapter/postgresql-adapter';
export type { PostgreSQLAdapterOptions } from './adapter/postgresql-adapter';
export { PostgreSQLTransaction } from './adapter/postgresql-transaction';
export { PostgreSQLConnectionPool } from './pool/connection-pool';

export type {
  DatabaseAdapter,
  Transaction,
  ConnectionConfig,
  QueryResult,
} from '@dbversion/core';
