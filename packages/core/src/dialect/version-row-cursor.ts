import { ValidationError } from '../errors';

/**
 * One row of the version table as the runner consumes it.
 */
export interface VersionRow {
  version_id: number;
  is_applied: boolean;
}

export type RawVersionRow = Record<string, unknown>;

const TRUE_FLAGS = new Set(['1', 't', 'true', 'y']);
const FALSE_FLAGS = new Set(['0', 'f', 'false', 'n']);

/**
 * Read a column by name, tolerating drivers that upper-case column keys.
 */
function readColumn(row: RawVersionRow, column: string): unknown {
  return column in row ? row[column] : row[column.toUpperCase()];
}

export function decodeVersionId(raw: unknown): number {
  if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
    return raw;
  }
  if (typeof raw === 'bigint' && Number.isSafeInteger(Number(raw))) {
    return Number(raw);
  }
  if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) {
    const value = Number(raw.trim());
    if (Number.isSafeInteger(value)) {
      return value;
    }
  }
  throw new ValidationError(`Cannot decode version_id value: ${String(raw)}`, 'version_id');
}

export function decodeApplied(raw: unknown): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    const value = Number(raw);
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
  }
  if (typeof raw === 'string') {
    const flag = raw.trim().toLowerCase();
    if (TRUE_FLAGS.has(flag)) {
      return true;
    }
    if (FALSE_FLAGS.has(flag)) {
      return false;
    }
  }
  throw new ValidationError(`Cannot decode is_applied value: ${String(raw)}`, 'is_applied');
}

export function decodeVersionRow(row: RawVersionRow): VersionRow {
  return {
    version_id: decodeVersionId(readColumn(row, 'version_id')),
    is_applied: decodeApplied(readColumn(row, 'is_applied')),
  };
}

/**
 * Forward-only cursor over version rows, most recent first.
 *
 * Rows are decoded one at a time as the cursor advances. Once exhausted or
 * closed it yields nothing more.
 */
export class VersionRowCursor implements IterableIterator<VersionRow> {
  private position = 0;
  private closed = false;

  constructor(private readonly rows: readonly RawVersionRow[]) {}

  get isClosed(): boolean {
    return this.closed;
  }

  next(): IteratorResult<VersionRow> {
    const raw = this.closed ? undefined : this.rows[this.position];
    if (raw === undefined) {
      this.closed = true;
      return { done: true, value: undefined };
    }

    this.position++;
    return { done: false, value: decodeVersionRow(raw) };
  }

  [Symbol.iterator](): IterableIterator<VersionRow> {
    return this;
  }

  /**
   * Drain the remaining rows.
   */
  toArray(): VersionRow[] {
    return [...this];
  }

  close(): void {
    this.closed = true;
  }
}
