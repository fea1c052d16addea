import { toSqliteParams } from './sqlite-values';

import type { QueryParams, QueryResult } from '@dbversion/core';
import type Database from 'better-sqlite3';

/**
 * Prepare and run one statement. Statements that return data use `all()`,
 * everything else `run()`.
 */
export function runStatement<T>(db: Database.Database, sql: string, params?: QueryParams): QueryResult<T> {
  const statement = db.prepare<unknown[], T>(sql);
  const values = toSqliteParams(params);

  if (statement.reader) {
    const rows = statement.all(...values);
    return { rows, rowCount: rows.length };
  }

  return { rows: [], rowCount: statement.run(...values).changes };
}
