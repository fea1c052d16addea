export * from './retry';
export * from './uuid';
export * from './validation';
