export { MySQLAdapter } from './adapter/mysql-adapter';
export type { MySQLAdapterOptions } from './adapter/mysql-adapter';
export { MySQLTransaction } from './adapter/mysql-transaction';
export { MySQLConnectionPool } from './pool/connection-pool';

export type {
  DatabaseAdapter,
  Transaction,
  ConnectionConfig,
  QueryResult,
} from '@dbversion/core';
