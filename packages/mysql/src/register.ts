import { registerAdapterFactory } from '@dbversion/core';

import { MySQLAdapter } from './adapter/mysql-adapter';

// Auto-register MySQL adapter factories
registerAdapterFactory('mysql', {
  createAdapter: ({ logger }) => new MySQLAdapter({ logger }),
});

registerAdapterFactory('tidb', {
  createAdapter: ({ logger }) => new MySQLAdapter({ logger, defaultPort: 4000 }),
});

export { MySQLAdapter };
