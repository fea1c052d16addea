import { DatabaseError } from './errors';

import type { BaseAdapter } from './base-adapter';
import type { DialectName } from './dialect';
import type { Logger } from './types';

export interface AdapterFactoryOptions {
  dialect: DialectName;
  logger?: Logger;
}

export interface AdapterFactory {
  createAdapter(options: AdapterFactoryOptions): BaseAdapter;
}

const adapterFactories = new Map<DialectName, AdapterFactory>();

/**
 * Register an adapter factory
 */
export function registerAdapterFactory(dialect: DialectName, factory: AdapterFactory): void {
  adapterFactories.set(dialect, factory);
}

export function hasAdapterFactory(dialect: DialectName): boolean {
  return adapterFactories.has(dialect);
}

/**
 * Create adapter using registered factory
 */
export function createAdapter(options: AdapterFactoryOptions): BaseAdapter {
  const factory = adapterFactories.get(options.dialect);

  if (!factory) {
    throw new DatabaseError(
      `No adapter factory registered for dialect: ${options.dialect}. ` +
        `Make sure you've imported the adapter package's register entry.`,
      'ADAPTER_NOT_REGISTERED',
    );
  }

  return factory.createAdapter(options);
}
