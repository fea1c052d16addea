/**
 * Oracle Dialect
 *
 * No auto-increment column type: the table is created bare, then the
 * auxiliary setup adds the primary key, a `<table>_id_seq` sequence and a
 * before-insert trigger filling `id` from it. The flag is a CHAR(1) holding
 * '1' or '0'. Statements carry no terminator; Oracle drivers reject one.
 */

import { VersionDialect } from './version-dialect';

import type { QueryValue } from '../types';
import type { AuxiliaryStep, CatalogQuery, DialectName, VersionDialectConfig } from './version-dialect';

export class OracleDialect extends VersionDialect {
  readonly name: DialectName = 'oracle';

  readonly config: VersionDialectConfig = {
    placeholderStyle: 'positional',
    columns: {
      id: 'NUMBER(19)',
      versionId: 'NUMBER(19)',
      isApplied: 'CHAR(1)',
      tstamp: 'TIMESTAMP(6) DEFAULT SYS_EXTRACT_UTC(SYSTIMESTAMP)',
    },
    primaryKey: 'auxiliary',
    statementTerminator: '',
  };

  get sequenceName(): string {
    return `${this.tableName}_id_seq`;
  }

  get triggerName(): string {
    return `${this.tableName}_bi`;
  }

  hasVersionTableSQL(): CatalogQuery {
    return {
      sql: 'SELECT 1 FROM user_tables WHERE table_name = ?',
      params: [this.tableName.toUpperCase()],
    };
  }

  override auxiliarySteps(): AuxiliaryStep[] {
    const table = this.tableName;

    return [
      { name: 'add primary key', sql: `ALTER TABLE ${table} ADD PRIMARY KEY (id)` },
      { name: 'create sequence', sql: `CREATE SEQUENCE ${this.sequenceName}` },
      {
        name: 'create trigger',
        sql: [
          `CREATE OR REPLACE TRIGGER ${this.triggerName}`,
          `BEFORE INSERT ON ${table}`,
          'FOR EACH ROW',
          'BEGIN',
          '  IF :NEW.id IS NULL THEN',
          `    SELECT ${this.sequenceName}.NEXTVAL INTO :NEW.id FROM dual;`,
          '  END IF;',
          'END;',
        ].join('\n'),
      },
    ];
  }

  override encodeApplied(applied: boolean): QueryValue {
    return applied ? '1' : '0';
  }
}
