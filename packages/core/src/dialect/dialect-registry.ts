/**
 * Dialect Registry
 *
 * Holds the active dialect. `setDialect`/`getDialect` act on one
 * process-wide registry; callers running several configurations in one
 * process should build a `VersionTableConfig` and inject the dialect from
 * `createDialect` instead.
 */

import { UnknownDialectError } from '../errors';
import { getVersionTableName } from '../naming';
import { validateTableName } from '../utils';
import { DialectFactory } from './dialect-factory';

import type { DialectName, TableNameResolver, VersionDialect } from './version-dialect';

export const DEFAULT_DIALECT: DialectName = 'postgres';

export interface VersionTableConfig {
  readonly dialect: DialectName;
  readonly tableName: string;
}

/**
 * Validate and freeze a version table configuration
 */
export function defineVersionTable(options: { dialect: string; tableName?: string }): VersionTableConfig {
  const { dialect } = options;
  if (!DialectFactory.isSupported(dialect)) {
    throw new UnknownDialectError(dialect);
  }

  const tableName = options.tableName ?? getVersionTableName();
  validateTableName(tableName);

  return Object.freeze({ dialect, tableName });
}

/**
 * Dialect for a fixed configuration; unaffected by the global registry or
 * later changes to the configured table name
 */
export function createDialect(config: VersionTableConfig): VersionDialect {
  const { tableName } = config;
  return DialectFactory.createDialect(config.dialect, () => tableName);
}

export class DialectRegistry {
  private active: VersionDialect;

  constructor(
    private readonly resolveTableName: TableNameResolver = getVersionTableName,
    initial: DialectName = DEFAULT_DIALECT,
  ) {
    this.active = DialectFactory.createDialect(initial, resolveTableName);
  }

  getActive(): VersionDialect {
    return this.active;
  }

  /**
   * Switch the active dialect. An unknown name throws and leaves the current
   * selection in place.
   */
  setActive(name: string): void {
    this.active = DialectFactory.createDialect(name, this.resolveTableName);
  }
}

const defaultRegistry = new DialectRegistry();

export function getDialect(): VersionDialect {
  return defaultRegistry.getActive();
}

export function setDialect(name: string): void {
  defaultRegistry.setActive(name);
}
