/**
 * Version Dialect Layer
 *
 * Backend-specific SQL for the migration version-history table behind one
 * contract: postgres, mysql, sqlite3, redshift, tidb and oracle.
 *
 * @module dialect
 */

export {
  VersionDialect,
  DIALECT_NAMES,
  type AuxiliaryStep,
  type CatalogQuery,
  type DialectName,
  type PlaceholderStyle,
  type TableNameResolver,
  type VersionDialectConfig,
} from './version-dialect';
export {
  VersionRowCursor,
  decodeApplied,
  decodeVersionId,
  decodeVersionRow,
  type RawVersionRow,
  type VersionRow,
} from './version-row-cursor';
export { PostgresDialect } from './postgres-dialect';
export { MySQLDialect } from './mysql-dialect';
export { Sqlite3Dialect } from './sqlite3-dialect';
export { RedshiftDialect } from './redshift-dialect';
export { TiDBDialect } from './tidb-dialect';
export { OracleDialect } from './oracle-dialect';
export { DialectFactory } from './dialect-factory';
export {
  DialectRegistry,
  DEFAULT_DIALECT,
  createDialect,
  defineVersionTable,
  getDialect,
  setDialect,
  type VersionTableConfig,
} from './dialect-registry';
