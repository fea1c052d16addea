import { registerAdapterFactory } from '@dbversion/core';

import { SQLiteAdapter } from './adapter/sqlite-adapter';

registerAdapterFactory('sqlite3', {
  createAdapter: ({ logger }) => new SQLiteAdapter({ logger }),
});

export { SQLiteAdapter };
