import { Counter, Gauge, Registry } from 'prom-client';
import type { Account } from '../shared/types.js';
import { stateOrdinal } from './accountState.js';

export type AccountSnapshot = Pick<Account, 'name' | 'state' | 'processed' | 'lastError'>;

/** Metrics are filled from the live accounts on every scrape. */
export const createMetricsRegistry = (accounts: () => readonly AccountSnapshot[]) => {
  const registry = new Registry();

  new Gauge({
    name: 'mail_account_state',
    help: 'Lifecycle state of the account (initial=0, connecting=1, connected=2, watching=3, handling=4, shutdown=5)',
    labelNames: ['name'] as const,
    registers: [registry],
    collect() {
      this.reset();
      for (const account of accounts()) {
        this.set({ name: account.name }, stateOrdinal(account.state));
      }
    },
  });

  new Counter({
    name: 'mail_account_messages_total',
    help: 'Messages forwarded from source to target since start',
    labelNames: ['name'] as const,
    registers: [registry],
    collect() {
      this.reset();
      for (const account of accounts()) {
        this.inc({ name: account.name }, account.processed);
      }
    },
  });

  return registry;
};
