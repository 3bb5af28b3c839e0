import type { Logger } from 'pino';
import { attributeError, describeError } from '../shared/errors.js';
import type { MailMirrorError } from '../shared/errors.js';
import { formatStoreAddress } from '../shared/types.js';
import type { MailStore } from '../shared/types.js';
import type { AccountEngine } from './accountEngine.js';
import { logger as rootLogger } from './logger.js';

export type CrashReporter = {
  report: (error: unknown, context: Record<string, unknown>) => void;
};

export const createLogCrashReporter = (log: Logger = rootLogger): CrashReporter => ({
  report: (error, context) => {
    log.fatal({ ...context, error }, describeError(error));
  },
});

export type AccountOutcome = {
  name: string;
  error: MailMirrorError | null;
};

export type RunAccountsOptions = {
  logger?: Logger;
  reporter?: CrashReporter;
};

const describeStore = (store: MailStore) =>
  `${store.credentials.username}@${formatStoreAddress(store.credentials)}/${store.credentials.mailbox}`;

/**
 * Runs every account until it fails or `signal` aborts. A failing account
 * is closed and only ends its own task; siblings keep running.
 */
export const runAccounts = async (
  engines: readonly AccountEngine[],
  signal: AbortSignal,
  options: RunAccountsOptions = {},
): Promise<AccountOutcome[]> => {
  const log = options.logger ?? rootLogger;
  const reporter = options.reporter ?? createLogCrashReporter(log);

  return Promise.all(engines.map(async (engine): Promise<AccountOutcome> => {
    const { account } = engine;
    log.info(`${account.name} [${account.state}]: ${describeStore(account.source)} --> ${describeStore(account.target)}`);
    try {
      await engine.run(signal);
      return { name: account.name, error: null };
    } catch (error) {
      const failure = attributeError(error, account.name, account.state);
      // Logs out the watch session while siblings keep running.
      await engine.close().catch((closeError: unknown) => {
        log.error({ account: account.name, error: closeError }, 'releasing failed account failed');
      });
      account.lastError = failure;
      if (signal.aborted) {
        log.warn({ account: account.name, error: failure }, 'account stopped during shutdown');
      } else {
        reporter.report(failure, { account: account.name, state: failure.state });
      }
      return { name: account.name, error: failure };
    }
  }));
};

export const closeEngines = async (engines: readonly AccountEngine[], log: Logger = rootLogger) => {
  for (const engine of engines) {
    try {
      await engine.close();
    } catch (error) {
      log.error({ account: engine.account.name, error }, 'account shutdown failed');
    }
  }
};
