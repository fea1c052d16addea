import type { QueryParams } from '@dbversion/core';

export type SqliteValue = string | number | bigint | Buffer | null;

/**
 * SQLite has no boolean or date type: booleans bind as 1/0, dates as ISO
 * strings and undefined as NULL.
 */
export function toSqliteParams(params?: QueryParams): SqliteValue[] {
  const values = Array.isArray(params) ? params : params ? Object.values(params) : [];

  return values.map((value) => {
    if (value === undefined || value === null) {
      return null;
    }
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    return value;
  });
}
