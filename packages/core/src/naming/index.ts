import { validateTableName } from '../utils';

export const DEFAULT_VERSION_TABLE_NAME = 'db_version';

let versionTableName = DEFAULT_VERSION_TABLE_NAME;

/**
 * Name of the version-history table every dialect interpolates into its SQL.
 */
export function getVersionTableName(): string {
  return versionTableName;
}

export function setVersionTableName(name: string): void {
  validateTableName(name);
  versionTableName = name;
}

export function resetVersionTableName(): void {
  versionTableName = DEFAULT_VERSION_TABLE_NAME;
}
