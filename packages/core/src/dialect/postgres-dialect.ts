/**
 * PostgreSQL Dialect
 *
 * - `serial` id with a table-level primary key
 * - Numbered ($1, $2) parameter placeholders
 * - Unquoted identifiers fold to lower case in the catalog
 */

import { VersionDialect } from './version-dialect';

import type { CatalogQuery, DialectName, VersionDialectConfig } from './version-dialect';

export class PostgresDialect extends VersionDialect {
  readonly name: DialectName = 'postgres';

  readonly config: VersionDialectConfig = {
    placeholderStyle: 'numbered',
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
      sql: `SELECT 1 FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = ${this.placeholder(1)}`,
      params: [this.tableName.toLowerCase()],
    };
  }
}
