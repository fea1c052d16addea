/**
 * Version History Basics
 *
 * Creates the version table in an in-memory SQLite database, records a few
 * migrations and reads the current version back.
 */

import { DBVersion } from '@dbversion/core';
import '@dbversion/sqlite/register';

async function main(): Promise<void> {
  const db = new DBVersion({
    dialect: 'sqlite3',
    tableName: 'db_version',
    connection: { filename: ':memory:' },
  });

  await db.connect();

  try {
    console.log('Current version:', await db.history.getCurrentVersion());

    await db.transaction(async (trx) => {
      // schema changes for migration 1 would run here
      await db.history.recordApplied(1, trx);
    });
    await db.history.recordApplied(2);
    await db.history.recordRolledBack(2);

    console.log('Current version:', await db.history.getCurrentVersion());
    console.log('States:', Object.fromEntries(await db.history.getVersionStates()));
  } finally {
    await db.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
