/**
 * MySQL Dialect
 *
 * - `serial` id (BIGINT UNSIGNED NOT NULL AUTO_INCREMENT UNIQUE)
 * - Positional (?) parameter placeholders
 * - `boolean` is TINYINT(1); rows come back as 0/1
 */

import { VersionDialect } from './version-dialect';

import type { CatalogQuery, DialectName, VersionDialectConfig } from './version-dialect';

export class MySQLDialect extends VersionDialect {
  readonly name: DialectName = 'mysql';

  readonly config: VersionDialectConfig = {
    placeholderStyle: 'positional',
    columns: {
      id: 'serial NOT NULL',
      versionId: 'bigint',
      isApplied: 'boolean',
      tstamp: 'timestamp NULL DEFAULT now()',
    },
    primaryKey: 'constraint',
    statementTerminator: ';',
  };

  hasVersionTableSQL(): CatalogQuery {
    return {
      sql: 'SELECT 1 FROM information_schema.tables WHERE table_schema = DATABASE() AND table_name = ?',
      params: [this.tableName],
    };
  }
}
