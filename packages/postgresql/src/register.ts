import { registerAdapterFactory } from '@dbversion/core';

import { PostgreSQLAdapter } from './adapter/postgresql-adapter';

// Auto-register PostgreSQL adapter factories
registerAdapterFactory('postgres', {
  createAdapter: ({ logger }) => new PostgreSQLAdapter({ logger }),
});

registerAdapterFactory('redshift', {
  createAdapter: ({ logger }) => new PostgreSQLAdapter({ logger, defaultPort: 5439 }),
});

export { PostgreSQLAdapter };
