import type { Logger } from 'pino';
import { attributeError, ConnectionError, errorMessage } from '../shared/errors.js';
import type { MailMirrorError } from '../shared/errors.js';
import type { Account, LifecycleState, MailStore } from '../shared/types.js';
import { transition, withPhase } from './accountState.js';
import type { ConnectionManager, MailSession, OpenSessionOptions } from './imap/connection.js';
import { createIdleWatcher } from './imap/idleWatcher.js';
import type { IdleWatcher } from './imap/idleWatcher.js';
import { createAccountLogger } from './logger.js';
import { runSyncPipeline } from './syncPipeline.js';
import type { SyncPipelineResult } from './syncPipeline.js';

export type AccountEngineOptions = {
  connections: ConnectionManager;
  logger?: Logger;
  idleFallbackMs?: number;
  queueCapacity?: number;
};

export type AccountEngine = {
  readonly account: Account;
  init: () => Promise<void>;
  watch: (signal: AbortSignal) => Promise<void>;
  handle: () => Promise<SyncPipelineResult>;
  close: () => Promise<void>;
  run: (signal: AbortSignal) => Promise<void>;
};

export const createAccountEngine = (account: Account, options: AccountEngineOptions): AccountEngine => {
  const baseLogger = createAccountLogger(account, options.logger);
  const log = () => baseLogger.child({ state: account.state });
  const heldSessions = new Set<MailSession>();
  let watchSession: MailSession | null = null;
  let watcher: IdleWatcher | null = null;

  const fail = (error: unknown, state: LifecycleState): MailMirrorError => {
    const failure = attributeError(error, account.name, state);
    account.lastError = failure;
    return failure;
  };

  const acquire = async (store: MailStore, openOptions?: OpenSessionOptions) => {
    const session = await options.connections.open(store, openOptions);
    heldSessions.add(session);
    return session;
  };

  const release = async (session: MailSession) => {
    heldSessions.delete(session);
    await session.logout();
  };

  const releaseQuietly = async (session: MailSession) => {
    await release(session).catch((error: unknown) => {
      log().warn({ error, role: session.role }, 'session logout failed');
    });
  };

  const probe = async (store: MailStore) => {
    const session = await acquire(store);
    await release(session);
  };

  const init = async () => {
    transition(account, 'connecting');
    log().info('Connecting');
    try {
      await probe(account.source);
      await probe(account.target);

      const session = await acquire(account.source, { select: { readOnly: true } });
      watchSession = session;
      watcher = createIdleWatcher({
        session,
        mailbox: account.source.credentials.mailbox,
        logger: baseLogger,
        fallbackMs: options.idleFallbackMs,
      });
      watcher.prime({
        kind: 'mailbox',
        mailbox: account.source.credentials.mailbox,
        count: session.messageCount(),
        reason: 'initial',
      });
    } catch (error) {
      throw fail(error, 'connecting');
    }
    transition(account, 'connected');
    log().info('Connected');
  };

  const handle = () =>
    withPhase(account, 'handling', async () => {
      log().info('Begin handling');
      try {
        const source = await acquire(account.source);
        try {
          const target = await acquire(account.target);
          try {
            const result = await runSyncPipeline({
              source,
              target,
              sourceMailbox: account.source.credentials.mailbox,
              targetMailbox: account.target.credentials.mailbox,
              logger: log(),
              queueCapacity: options.queueCapacity,
              onForwarded: () => {
                account.processed += 1;
              },
            });
            log().info(
              { fetched: result.fetched, forwarded: result.forwarded, ignored: result.ignored },
              'Message handling successful',
            );
            return result;
          } finally {
            await releaseQuietly(target);
          }
        } finally {
          await releaseQuietly(source);
        }
      } catch (error) {
        const failure = fail(error, 'handling');
        log().error({ error: failure }, 'Message handling failed');
        throw failure;
      }
    });

  const watch = async (signal: AbortSignal) => {
    const active = watcher;
    if (!active) {
      throw fail(new ConnectionError('watch requires a successful init'), account.state);
    }
    await withPhase(account, 'watching', async () => {
      log().info('Begin idling');
      try {
        await active.watch(signal, async () => {
          await handle();
        });
        log().info('Not idling anymore');
      } catch (error) {
        const failure = fail(error, account.state);
        log().warn({ error: failure }, 'Not idling anymore');
        throw failure;
      } finally {
        watcher = null;
      }
    });
  };

  const close = async () => {
    if (account.state !== 'shutdown') {
      transition(account, 'shutdown');
    }
    log().info('Shutting down');

    const failures: string[] = [];
    const sessions = [...(watchSession ? [watchSession] : []), ...heldSessions];
    watchSession = null;
    watcher = null;
    for (const session of new Set(sessions)) {
      try {
        await release(session);
      } catch (error) {
        failures.push(`${session.role} ${session.address}: ${errorMessage(error)}`);
      }
    }

    transition(account, 'initial');
    if (failures.length > 0) {
      throw fail(new ConnectionError(`logout failed: ${failures.join('; ')}`), 'shutdown');
    }
  };

  const run = async (signal: AbortSignal) => {
    await init();
    await watch(signal);
  };

  return { account, init, watch, handle, close, run };
};
