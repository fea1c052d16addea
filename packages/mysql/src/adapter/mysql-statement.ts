import type { QueryParams, QueryResult } from '@dbversion/core';
import type * as mysql from 'mysql2/promise';

const WRITE_COMMANDS = new Set(['INSERT', 'UPDATE', 'DELETE']);

/**
 * Run one statement on a pooled connection. Writes report their affected
 * row count; everything else returns its rows.
 */
export async function runStatement<T>(
  connection: mysql.PoolConnection,
  sql: string,
  params?: QueryParams,
): Promise<QueryResult<T>> {
  const values = Array.isArray(params) ? params : params ? Object.values(params) : [];
  const queryParams = values.map((value) => value ?? null);
  const command = sql.trim().split(/\s+/)[0]?.toUpperCase();

  // writes resolve to a ResultSetHeader, not rows
  if (command && WRITE_COMMANDS.has(command)) {
    const [header] = await connection.execute<mysql.ResultSetHeader>(sql, queryParams);
    return { rows: [], rowCount: header.affectedRows };
  }

  // DDL also resolves to a header, so only arrays count as rows
  const [rows] = await connection.execute<mysql.RowDataPacket[]>(sql, queryParams);
  return Array.isArray(rows) ? { rows: rows as T[], rowCount: rows.length } : { rows: [], rowCount: 0 };
}
