export { SQLiteAdapter } from './adapter/sqlite-adapter';
export type { SQLiteAdapterOptions } from './adapter/sqlite-adapter';
export { SQLiteTransaction } from './adapter/sqlite-transaction';
export { toSqliteParams, type SqliteValue } from './adapter/sqlite-values';

export type {
  DatabaseAdapter,
  Transaction,
  ConnectionConfig,
  QueryResult,
} from '@dbversion/core';
