/**
 * Configuration
 * Load and validate dbversion.config.{ts,js,mjs}
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { defineVersionTable } from '../dialect/dialect-registry';
import { DialectFactory } from '../dialect/dialect-factory';
import { DBVersionError, ValidationError, toError } from '../errors';
import { DEFAULT_VERSION_TABLE_NAME } from '../naming';
import { validateTableName } from '../utils';

import type { VersionTableConfig } from '../dialect/dialect-registry';
import type { DialectName } from '../dialect/version-dialect';

export interface DBVersionConnectionConfig {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  /** SQLite database file */
  filename?: string;
  connectionString?: string;
  ssl?: boolean | Record<string, unknown>;
}

export interface DBVersionConfig {
  /** Backend the version table lives on */
  dialect: DialectName;
  /** Version table name (default: db_version) */
  tableName?: string;
  connection: DBVersionConnectionConfig;
}

export type ResolvedDBVersionConfig = DBVersionConfig & { tableName: string };

/**
 * Define configuration helper
 */
export function defineConfig(config: DBVersionConfig): DBVersionConfig {
  return config;
}

export const CONFIG_FILES = ['dbversion.config.ts', 'dbversion.config.js', 'dbversion.config.mjs'];

export const DEFAULT_PORTS: Record<DialectName, number | undefined> = {
  postgres: 5432,
  redshift: 5439,
  mysql: 3306,
  tidb: 4000,
  oracle: 1521,
  sqlite3: undefined,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`connection.${key} must be a string`, `connection.${key}`);
  }
  return value;
}

function optionalPort(value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ValidationError('connection.port must be between 1 and 65535', 'connection.port');
  }
  return value;
}

function optionalSSL(value: unknown): DBVersionConnectionConfig['ssl'] {
  if (value === undefined || typeof value === 'boolean' || isRecord(value)) {
    return value;
  }
  throw new ValidationError('connection.ssl must be a boolean or an object', 'connection.ssl');
}

/**
 * Load configuration from the first config file found in `cwd`
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<ResolvedDBVersionConfig> {
  const configPath = CONFIG_FILES.map((filename) => resolve(cwd, filename)).find((fullPath) =>
    existsSync(fullPath),
  );

  if (!configPath) {
    throw new DBVersionError(
      `Configuration file not found. Create one of: ${CONFIG_FILES.join(', ')}`,
      'CONFIG_NOT_FOUND',
    );
  }

  let loaded: unknown;
  try {
    const module: unknown = await import(pathToFileURL(configPath).href);
    loaded = isRecord(module) && 'default' in module ? module['default'] : module;
  } catch (error) {
    const cause = toError(error);
    throw new DBVersionError(
      `Failed to load config from ${configPath}: ${cause.message}`,
      'CONFIG_LOAD_ERROR',
      cause,
    );
  }

  return applyDefaults(validateConfig(loaded));
}

/**
 * Validate an untrusted configuration value
 */
export function validateConfig(config: unknown): DBVersionConfig {
  if (!isRecord(config)) {
    throw new ValidationError('Configuration must be an object');
  }

  const dialect = config['dialect'];
  if (typeof dialect !== 'string' || !DialectFactory.isSupported(dialect)) {
    throw new ValidationError(
      `dialect must be one of: ${DialectFactory.names.join(', ')}`,
      'dialect',
    );
  }

  const tableName = config['tableName'];
  if (tableName !== undefined) {
    if (typeof tableName !== 'string') {
      throw new ValidationError('tableName must be a string', 'tableName');
    }
    validateTableName(tableName);
  }

  const connection = config['connection'];
  if (!isRecord(connection)) {
    throw new ValidationError('Configuration must have a "connection" object', 'connection');
  }

  const resolved: DBVersionConnectionConfig = {
    host: optionalString(connection, 'host'),
    port: optionalPort(connection['port']),
    user: optionalString(connection, 'user'),
    password: optionalString(connection, 'password'),
    database: optionalString(connection, 'database'),
    filename: optionalString(connection, 'filename'),
    connectionString: optionalString(connection, 'connectionString'),
    ssl: optionalSSL(connection['ssl']),
  };

  if (dialect === 'sqlite3') {
    if (!resolved.filename && !resolved.database) {
      throw new ValidationError('connection.filename is required for sqlite3', 'connection.filename');
    }
  } else if (!resolved.connectionString) {
    if (!resolved.host) {
      throw new ValidationError('connection.host is required', 'connection.host');
    }
    if (!resolved.database) {
      throw new ValidationError('connection.database is required', 'connection.database');
    }
  }

  return { dialect, tableName, connection: resolved };
}

/**
 * Apply default values
 */
export function applyDefaults(config: DBVersionConfig): ResolvedDBVersionConfig {
  const { dialect, connection } = config;

  if (dialect === 'sqlite3') {
    return {
      ...config,
      tableName: config.tableName ?? DEFAULT_VERSION_TABLE_NAME,
      connection: { ...connection, filename: connection.filename ?? connection.database },
    };
  }

  return {
    ...config,
    tableName: config.tableName ?? DEFAULT_VERSION_TABLE_NAME,
    connection: {
      ...connection,
      port: connection.port ?? DEFAULT_PORTS[dialect],
      user: connection.user ?? (dialect === 'mysql' || dialect === 'tidb' ? 'root' : 'postgres'),
      password: connection.password ?? '',
    },
  };
}

/**
 * Frozen dialect and table name for building an injected dialect
 */
export function toVersionTableConfig(config: DBVersionConfig): VersionTableConfig {
  return defineVersionTable({ dialect: config.dialect, tableName: config.tableName });
}
