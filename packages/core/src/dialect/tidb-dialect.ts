/**
 * TiDB Dialect
 *
 * MySQL-compatible; the id column spells out the AUTO_INCREMENT definition
 * that `serial` abbreviates on MySQL.
 */

import { MySQLDialect } from './mysql-dialect';

import type { DialectName, VersionDialectConfig } from './version-dialect';

export class TiDBDialect extends MySQLDialect {
  override readonly name: DialectName = 'tidb';

  override readonly config: VersionDialectConfig = {
    placeholderStyle: 'positional',
    columns: {
      id: 'BIGINT UNSIGNED NOT NULL AUTO_INCREMENT UNIQUE',
      versionId: 'bigint',
      isApplied: 'boolean',
      tstamp: 'timestamp NULL DEFAULT now()',
    },
    primaryKey: 'constraint',
    statementTerminator: ';',
  };
}
