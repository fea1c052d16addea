/**
 * SQLite Dialect
 *
 * AUTOINCREMENT is only allowed on an inline INTEGER PRIMARY KEY, and
 * booleans are stored as 0/1 integers.
 */

import { VersionDialect } from './version-dialect';

import type { QueryValue } from '../types';
import type { CatalogQuery, DialectName, VersionDialectConfig } from './version-dialect';

export class Sqlite3Dialect extends VersionDialect {
  readonly name: DialectName = 'sqlite3';

  readonly config: VersionDialectConfig = {
    placeholderStyle: 'positional',
    columns: {
      id: 'INTEGER PRIMARY KEY AUTOINCREMENT',
      versionId: 'INTEGER',
      isApplied: 'INTEGER',
      tstamp: "TIMESTAMP DEFAULT (datetime('now'))",
    },
    primaryKey: 'inline',
    statementTerminator: ';',
  };

  hasVersionTableSQL(): CatalogQuery {
    return {
      sql: "SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?",
      params: [this.tableName],
    };
  }

  override encodeApplied(applied: boolean): QueryValue {
    return applied ? 1 : 0;
  }
}
