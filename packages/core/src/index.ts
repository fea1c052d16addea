export * from './types';
export * from './interfaces';
export * from './errors';
export * from './utils';
export * from './logger';
export * from './naming';
export * from './base-adapter';
export * from './dialect';
export * from './migrations';
export * from './config';
export * from './adapter-factory';
export { DBVersion, type DBVersionOptions } from './db-version';
