/**
 * Redshift Dialect
 *
 * PostgreSQL wire protocol and catalog, but no `serial`: ids come from an
 * `identity(1, 1)` column and the timestamp default is `sysdate`.
 */

import { PostgresDialect } from './postgres-dialect';

import type { DialectName, VersionDialectConfig } from './version-dialect';

export class RedshiftDialect extends PostgresDialect {
  override readonly name: DialectName = 'redshift';

  override readonly config: VersionDialectConfig = {
    placeholderStyle: 'numbered',
    columns: {
      id: 'integer NOT NULL identity(1, 1)',
      versionId: 'bigint',
      isApplied: 'boolean',
      tstamp: 'timestamp NULL DEFAULT sysdate',
    },
    primaryKey: 'constraint',
    statementTerminator: ';',
  };
}
