import { TransactionError, toError } from '../errors';
import { consoleLogger } from '../logger';

import type { VersionDialect } from '../dialect';
import type { DatabaseAdapter } from '../interfaces';
import type { Logger, Queryable, Transaction } from '../types';

export interface VersionHistoryOptions {
  logger?: Logger;
  dryRun?: boolean;
}

/**
 * Reads and appends the migration version history through a dialect.
 *
 * The table holds one row per apply or rollback event. The current version
 * is the most recent version whose latest event is an apply.
 */
export class VersionHistory {
  private options: Required<VersionHistoryOptions>;

  constructor(
    private readonly adapter: DatabaseAdapter,
    private readonly dialect: VersionDialect,
    options: VersionHistoryOptions = {},
  ) {
    this.options = {
      logger: options.logger ?? consoleLogger,
      dryRun: options.dryRun ?? false,
    };
  }

  get tableName(): string {
    return this.dialect.tableName;
  }

  async hasVersionTable(): Promise<boolean> {
    const { sql, params } = this.dialect.hasVersionTableSQL();
    const result = await this.adapter.query(sql, params);
    return result.rows.length > 0;
  }

  /**
   * Create the version table with its initial `(0, applied)` row when it is
   * missing. Resolves to whether the table was created.
   */
  async ensureVersionTable(): Promise<boolean> {
    return (await this.prepareVersionTable()) === 'created';
  }

  private async prepareVersionTable(): Promise<'exists' | 'created' | 'dry-run'> {
    if (await this.hasVersionTable()) {
      return 'exists';
    }

    if (this.options.dryRun) {
      this.options.logger.info(`DRY RUN: Would create version table '${this.tableName}'`);
      return 'dry-run';
    }

    const transaction = await this.adapter.beginTransaction();

    try {
      await transaction.query(this.dialect.createVersionTableSQL());
      for (const step of this.dialect.auxiliarySteps()) {
        this.options.logger.debug(`Auxiliary setup: ${step.name}`);
      }
      await this.dialect.dbRunAux(transaction);
      await transaction.query(this.dialect.insertVersionSQL(), this.dialect.insertVersionParams(0, true));
      await transaction.commit();
    } catch (error) {
      const cause = toError(error);
      await this.rollbackQuietly(transaction);
      throw new TransactionError(
        `Failed to create version table '${this.tableName}': ${cause.message}`,
        transaction.id,
        cause,
      );
    }

    this.options.logger.info(`Created version table '${this.tableName}' (${this.dialect.name})`);
    return 'created';
  }

  // logs a failed rollback instead of throwing it
  private async rollbackQuietly(transaction: Transaction): Promise<void> {
    if (!transaction.isActive) {
      return;
    }
    try {
      await transaction.rollback();
    } catch (rollbackError) {
      this.options.logger.error(`Rollback failed for version table '${this.tableName}'`, rollbackError);
    }
  }

  /**
   * Latest state per version, keyed by version id
   */
  async getVersionStates(): Promise<Map<number, boolean>> {
    const cursor = await this.dialect.dbVersionQuery(this.adapter);
    const states = new Map<number, boolean>();

    for (const row of cursor) {
      if (!states.has(row.version_id)) {
        states.set(row.version_id, row.is_applied);
      }
    }

    return states;
  }

  async getCurrentVersion(): Promise<number> {
    if ((await this.prepareVersionTable()) === 'dry-run') {
      return 0;
    }

    const cursor = await this.dialect.dbVersionQuery(this.adapter);
    const seen = new Set<number>();

    try {
      for (const row of cursor) {
        if (seen.has(row.version_id)) {
          continue;
        }
        if (row.is_applied) {
          return row.version_id;
        }
        // rolled back: older rows for this version are stale
        seen.add(row.version_id);
      }
    } finally {
      cursor.close();
    }

    return 0;
  }

  async recordApplied(version: number, transaction?: Transaction): Promise<void> {
    await this.record(version, true, transaction);
  }

  async recordRolledBack(version: number, transaction?: Transaction): Promise<void> {
    await this.record(version, false, transaction);
  }

  private async record(version: number, applied: boolean, transaction?: Transaction): Promise<void> {
    const action = applied ? 'applied' : 'rolled back';

    if (this.options.dryRun) {
      this.options.logger.info(`DRY RUN: Would record version ${version} as ${action}`);
      return;
    }

    const target: Queryable = transaction ?? this.adapter;
    await target.query(this.dialect.insertVersionSQL(), this.dialect.insertVersionParams(version, applied));
    this.options.logger.debug(`Recorded version ${version} as ${action}`);
  }
}
