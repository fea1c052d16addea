/**
 * Version Dialect Base Class
 *
 * Generates the handful of statements a migration runner needs to keep its
 * version-history table: CREATE TABLE, INSERT, the history query and the
 * catalog lookup. Backends lacking native auto-increment contribute
 * auxiliary steps that run inside the creating transaction.
 */

import { AuxiliarySetupError, toError } from '../errors';
import { getVersionTableName } from '../naming';
import { VersionRowCursor } from './version-row-cursor';

import type { Queryable, QueryValue, Transaction } from '../types';
import type { RawVersionRow } from './version-row-cursor';

export const DIALECT_NAMES = ['postgres', 'mysql', 'sqlite3', 'redshift', 'tidb', 'oracle'] as const;

export type DialectName = (typeof DIALECT_NAMES)[number];

export type TableNameResolver = () => string;

export type PlaceholderStyle = 'numbered' | 'positional';

export interface VersionDialectConfig {
  /** `$1, $2` (numbered) or `?, ?` (positional) */
  placeholderStyle: PlaceholderStyle;
  /** Full column definitions after the column name */
  columns: {
    id: string;
    versionId: string;
    isApplied: string;
    tstamp: string;
  };
  /**
   * Where the primary key on `id` is declared: as a table constraint, inline
   * in the id column, or by the auxiliary setup after creation.
   */
  primaryKey: 'constraint' | 'inline' | 'auxiliary';
  /** Appended to CREATE and INSERT statements */
  statementTerminator: ';' | '';
}

export interface AuxiliaryStep {
  name: string;
  sql: string;
}

export interface CatalogQuery {
  sql: string;
  params: QueryValue[];
}

export abstract class VersionDialect {
  abstract readonly name: DialectName;
  abstract readonly config: VersionDialectConfig;

  constructor(private readonly resolveTableName: TableNameResolver = getVersionTableName) {}

  get tableName(): string {
    return this.resolveTableName();
  }

  get placeholderStyle(): PlaceholderStyle {
    return this.config.placeholderStyle;
  }

  /**
   * Placeholder for the 1-based parameter `index`
   */
  placeholder(index: number): string {
    return this.config.placeholderStyle === 'numbered' ? `$${index}` : '?';
  }

  createVersionTableSQL(): string {
    const { columns, primaryKey, statementTerminator } = this.config;
    const definitions = [
      `id ${columns.id}`,
      `version_id ${columns.versionId} NOT NULL`,
      `is_applied ${columns.isApplied} NOT NULL`,
      `tstamp ${columns.tstamp}`,
    ];
    if (primaryKey === 'constraint') {
      definitions.push('PRIMARY KEY(id)');
    }

    return `CREATE TABLE ${this.tableName} (${definitions.join(', ')})${statementTerminator}`;
  }

  insertVersionSQL(): string {
    return (
      `INSERT INTO ${this.tableName} (version_id, is_applied) ` +
      `VALUES (${this.placeholder(1)}, ${this.placeholder(2)})${this.config.statementTerminator}`
    );
  }

  versionQuerySQL(): string {
    return `SELECT version_id, is_applied FROM ${this.tableName} ORDER BY id DESC`;
  }

  /**
   * Catalog query returning a row when the version table exists
   */
  abstract hasVersionTableSQL(): CatalogQuery;

  /**
   * Run the history query. Errors from the connection reach the caller as thrown.
   */
  async dbVersionQuery(connection: Queryable): Promise<VersionRowCursor> {
    const result = await connection.query<RawVersionRow>(this.versionQuerySQL());
    return new VersionRowCursor(result.rows);
  }

  /**
   * Statements to run after CREATE TABLE, in order
   */
  auxiliarySteps(): AuxiliaryStep[] {
    return [];
  }

  /**
   * Run the auxiliary steps inside the caller's transaction, stopping at the
   * first failure. The transaction is left for the caller to finish.
   */
  async dbRunAux(transaction: Transaction): Promise<void> {
    for (const step of this.auxiliarySteps()) {
      try {
        await transaction.query(step.sql);
      } catch (error) {
        throw new AuxiliarySetupError(this.name, step.name, toError(error));
      }
    }
  }

  /**
   * Bind value for the `is_applied` placeholder
   */
  encodeApplied(applied: boolean): QueryValue {
    return applied;
  }

  insertVersionParams(versionId: number, applied: boolean): QueryValue[] {
    return [versionId, this.encodeApplied(applied)];
  }
}
