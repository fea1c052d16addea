import type { ConnectionConfig, Queryable, Transaction } from '../types';

export interface DatabaseAdapter extends Queryable {
  readonly name: string;
  readonly isConnected: boolean;

  connect(config: ConnectionConfig): Promise<void>;
  disconnect(): Promise<void>;

  beginTransaction(): Promise<Transaction>;
}
