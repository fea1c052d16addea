import { afterEach, describe, expect, it } from 'vitest';

import { ValidationError } from '../../errors';
import {
  DEFAULT_VERSION_TABLE_NAME,
  getVersionTableName,
  resetVersionTableName,
  setVersionTableName,
} from '../index';

describe('version table naming', () => {
  afterEach(() => {
    resetVersionTableName();
  });

  it('should default to db_version', () => {
    expect(DEFAULT_VERSION_TABLE_NAME).toBe('db_version');
    expect(getVersionTableName()).toBe('db_version');
  });

  it('should return the configured name', () => {
    setVersionTableName('schema_history');
    expect(getVersionTableName()).toBe('schema_history');
  });

  it('should reject invalid names and keep the previous one', () => {
    setVersionTableName('schema_history');

    expect(() => setVersionTableName('schema history')).toThrow(ValidationError);
    expect(getVersionTableName()).toBe('schema_history');
  });
});
