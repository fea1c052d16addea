import { describe, it, expect } from 'vitest';

import {
  AuxiliarySetupError,
  ConnectionError,
  DatabaseError,
  DBVersionError,
  QueryError,
  TransactionError,
  UnknownDialectError,
  ValidationError,
  toError,
} from '../index';

describe('Error classes', () => {
  describe('DatabaseError', () => {
    it('should create error with message', () => {
      const error = new DatabaseError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('DatabaseError');
    });

    it('should create error with code and cause', () => {
      const cause = new Error('Original error');
      const error = new DatabaseError('Test error', 'TEST_CODE', cause);
      expect(error.code).toBe('TEST_CODE');
      expect(error.cause).toBe(cause);
    });

    it('should be an instance of Error', () => {
      expect(new DatabaseError('Test error')).toBeInstanceOf(Error);
    });
  });

  describe('DBVersionError', () => {
    it('should extend DatabaseError', () => {
      const error = new DBVersionError('Test error');
      expect(error).toBeInstanceOf(DatabaseError);
      expect(error.name).toBe('DBVersionError');
    });
  });

  describe('ConnectionError', () => {
    it('should carry code and cause', () => {
      const cause = new Error('ECONNREFUSED');
      const error = new ConnectionError('Connection failed', cause);
      expect(error.name).toBe('ConnectionError');
      expect(error.code).toBe('CONNECTION_ERROR');
      expect(error.cause).toBe(cause);
    });
  });

  describe('QueryError', () => {
    it('should store sql and params', () => {
      const error = new QueryError('Query failed', 'SELECT * FROM db_version WHERE id = ?', [1]);
      expect(error.code).toBe('QUERY_ERROR');
      expect(error.sql).toBe('SELECT * FROM db_version WHERE id = ?');
      expect(error.params).toEqual([1]);
    });
  });

  describe('TransactionError', () => {
    it('should store transactionId', () => {
      const error = new TransactionError('Transaction failed', 'tx_123');
      expect(error.code).toBe('TRANSACTION_ERROR');
      expect(error.transactionId).toBe('tx_123');
    });
  });

  describe('ValidationError', () => {
    it('should store field name', () => {
      const error = new ValidationError('Invalid table name', 'tableName');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.field).toBe('tableName');
    });
  });

  describe('UnknownDialectError', () => {
    it('should quote the rejected identifier', () => {
      const error = new UnknownDialectError('mssql');
      expect(error.message).toBe('"mssql": unknown dialect');
      expect(error.code).toBe('UNKNOWN_DIALECT');
      expect(error.dialect).toBe('mssql');
      expect(error).toBeInstanceOf(DBVersionError);
    });
  });

  describe('AuxiliarySetupError', () => {
    it('should name the dialect, step and cause', () => {
      const cause = new Error('ORA-00955: name is already used by an existing object');
      const error = new AuxiliarySetupError('oracle', 'create sequence', cause);
      expect(error.message).toBe(
        'oracle auxiliary setup failed at step "create sequence": ORA-00955: name is already used by an existing object',
      );
      expect(error.code).toBe('AUX_SETUP_ERROR');
      expect(error.step).toBe('create sequence');
      expect(error.cause).toBe(cause);
    });

    it('should omit the cause suffix when there is none', () => {
      const error = new AuxiliarySetupError('oracle', 'create trigger');
      expect(error.message).toBe('oracle auxiliary setup failed at step "create trigger"');
    });
  });

  describe('toError', () => {
    it('should pass Error instances through', () => {
      const error = new Error('boom');
      expect(toError(error)).toBe(error);
    });

    it('should wrap other values', () => {
      expect(toError('boom').message).toBe('boom');
    });
  });
});
