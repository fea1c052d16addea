import { createAdapter } from './adapter-factory';
import { loadConfig, toVersionTableConfig } from './config';
import { createDialect } from './dialect';
import { DatabaseError } from './errors';
import { consoleLogger } from './logger';
import { VersionHistory } from './migrations';

import type { BaseAdapter } from './base-adapter';
import type { DBVersionConfig } from './config';
import type { VersionDialect } from './dialect';
import type { Logger, Transaction } from './types';

export interface DBVersionOptions {
  logger?: Logger;
  dryRun?: boolean;
}

/**
 * Connects the adapter registered for a config's dialect and exposes its
 * version history.
 *
 * @example
 * ```typescript
 * import '@dbversion/postgresql/register';
 *
 * const db = await DBVersion.fromConfigFile();
 * await db.connect();
 * const current = await db.history.getCurrentVersion();
 * await db.disconnect();
 * ```
 */
export class DBVersion {
  readonly dialect: VersionDialect;
  private adapter?: BaseAdapter;
  private versionHistory?: VersionHistory;
  private readonly logger: Logger;

  constructor(
    private readonly config: DBVersionConfig,
    private readonly options: DBVersionOptions = {},
  ) {
    this.dialect = createDialect(toVersionTableConfig(config));
    this.logger = options.logger ?? consoleLogger;
  }

  static async fromConfigFile(cwd?: string, options?: DBVersionOptions): Promise<DBVersion> {
    return new DBVersion(await loadConfig(cwd), options);
  }

  get isConnected(): boolean {
    return this.adapter?.isConnected ?? false;
  }

  get history(): VersionHistory {
    if (!this.versionHistory) {
      throw new DatabaseError('Not connected. Call connect() first.');
    }
    return this.versionHistory;
  }

  /**
   * Connect the registered adapter. Does nothing when already connected.
   */
  async connect(): Promise<void> {
    if (this.adapter) {
      return;
    }

    const adapter = createAdapter({ dialect: this.config.dialect, logger: this.logger });
    adapter.on('query', ({ sql, duration }) => {
      this.logger.debug(`Query took ${duration}ms: ${sql}`);
    });
    adapter.on('queryError', ({ sql, error }) => {
      this.logger.debug(`Query failed: ${sql}`, error);
    });
    await adapter.connect(this.config.connection);

    this.adapter = adapter;
    this.versionHistory = new VersionHistory(adapter, this.dialect, {
      logger: this.logger,
      dryRun: this.options.dryRun,
    });
  }

  async disconnect(): Promise<void> {
    if (this.adapter) {
      await this.adapter.disconnect();
      this.adapter.removeAllListeners();
      this.adapter = undefined;
      this.versionHistory = undefined;
    }
  }

  /**
   * Run `callback` in a transaction, committing on success and rolling back
   * on failure
   */
  async transaction<T>(callback: (transaction: Transaction) => Promise<T>): Promise<T> {
    if (!this.adapter) {
      throw new DatabaseError('Not connected. Call connect() first.');
    }
    const transaction = await this.adapter.beginTransaction();

    try {
      const result = await callback(transaction);
      await transaction.commit();
      return result;
    } catch (error) {
      if (transaction.isActive) {
        try {
          await transaction.rollback();
        } catch (rollbackError) {
          this.logger.error('Rollback failed', rollbackError);
        }
      }
      throw error;
    }
  }
}
