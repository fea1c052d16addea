/**
 * Dialect Factory
 *
 * Creates the version dialect for a backend identifier.
 */

import { UnknownDialectError } from '../errors';
import { MySQLDialect } from './mysql-dialect';
import { OracleDialect } from './oracle-dialect';
import { PostgresDialect } from './postgres-dialect';
import { RedshiftDialect } from './redshift-dialect';
import { Sqlite3Dialect } from './sqlite3-dialect';
import { TiDBDialect } from './tidb-dialect';
import { DIALECT_NAMES } from './version-dialect';

import type { DialectName, TableNameResolver, VersionDialect } from './version-dialect';

const dialectConstructors: Record<
  DialectName,
  new (resolveTableName?: TableNameResolver) => VersionDialect
> = {
  postgres: PostgresDialect,
  mysql: MySQLDialect,
  sqlite3: Sqlite3Dialect,
  redshift: RedshiftDialect,
  tidb: TiDBDialect,
  oracle: OracleDialect,
};

export class DialectFactory {
  /**
   * Create a dialect bound to `resolveTableName` (the configured version
   * table name when omitted)
   */
  static createDialect(name: string, resolveTableName?: TableNameResolver): VersionDialect {
    if (!this.isSupported(name)) {
      throw new UnknownDialectError(name);
    }

    const DialectClass = dialectConstructors[name];
    return new DialectClass(resolveTableName);
  }

  /**
   * Check if a backend identifier is recognized
   */
  static isSupported(name: string): name is DialectName {
    return (DIALECT_NAMES as readonly string[]).includes(name);
  }

  static get names(): readonly DialectName[] {
    return DIALECT_NAMES;
  }
}
