import type { Logger } from 'pino';
import { ConnectionError, errorMessage, MailMirrorError } from '../../shared/errors.js';
import type { MailboxChangeEvent } from '../../shared/types.js';
import type { MailSession } from './connection.js';
import { createEventRelay } from './eventRelay.js';

export const DEFAULT_IDLE_FALLBACK_MS = 60_000;

export type IdleWatcherOptions = {
  session: MailSession;
  mailbox: string;
  logger: Logger;
  /** Upper bound on one IDLE round; 0 selects the default. */
  fallbackMs?: number;
};

export type IdleWatcher = {
  prime: (event: MailboxChangeEvent) => void;
  watch: (signal: AbortSignal, onTrigger: (event: MailboxChangeEvent) => Promise<void>) => Promise<void>;
};

export const resolveFallbackMs = (value: number | undefined) =>
  value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : DEFAULT_IDLE_FALLBACK_MS;

/**
 * Folds a burst into the pending slot. A mailbox change always survives a
 * later expunge or flag update, otherwise the newest event wins.
 */
export const mergeChangeEvents = (pending: MailboxChangeEvent, incoming: MailboxChangeEvent) =>
  pending.kind === 'mailbox' && incoming.kind !== 'mailbox' ? pending : incoming;

export const createIdleWatcher = (options: IdleWatcherOptions): IdleWatcher => {
  const { session, mailbox, logger } = options;
  const fallbackMs = resolveFallbackMs(options.fallbackMs);
  const relay = createEventRelay<MailboxChangeEvent>(mergeChangeEvents);
  // Last message count the consumer was told about.
  let seenCount = session.messageCount();
  const offer = (event: MailboxChangeEvent) => {
    if (event.kind === 'mailbox' && event.count !== undefined) {
      seenCount = event.count;
    }
    return relay.offer(event);
  };
  const unsubscribe = session.onChange((event) => {
    if (offer(event) === 'coalesced') {
      logger.debug({ kind: event.kind }, 'update coalesced with pending one');
    }
  });
  let started = false;

  const breakIdle = () => {
    if (!session.usable) {
      return;
    }
    session.noop().catch((error: unknown) => {
      logger.warn({ error }, 'failed to interrupt IDLE');
    });
  };

  const runLongPoll = async (signal: AbortSignal) => {
    while (!signal.aborted) {
      const round: { check: Promise<void> | null } = { check: null };
      const timer = setTimeout(() => {
        round.check = session.noop();
        round.check.catch((error: unknown) => {
          logger.debug({ error }, 'fallback check failed');
        });
      }, fallbackMs);

      try {
        await session.idle();
      } finally {
        clearTimeout(timer);
      }

      if (signal.aborted) {
        return;
      }
      if (!session.usable) {
        throw new ConnectionError(`watch session to ${session.address} closed`);
      }
      if (round.check) {
        await round.check;
        const count = session.messageCount();
        if (count !== seenCount) {
          offer({ kind: 'mailbox', mailbox, count, reason: 'fallback' });
        }
      }
    }
  };

  const prime = (event: MailboxChangeEvent) => {
    offer(event);
  };

  const watch = async (signal: AbortSignal, onTrigger: (event: MailboxChangeEvent) => Promise<void>) => {
    if (started) {
      throw new Error('idle watcher can only watch once');
    }
    started = true;
    if (signal.aborted) {
      unsubscribe();
      return;
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });
    controller.signal.addEventListener('abort', () => {
      relay.close();
      breakIdle();
    }, { once: true });

    const longPoll = runLongPoll(controller.signal).then(
      () => relay.close(),
      (error: unknown) => {
        if (controller.signal.aborted) {
          logger.debug({ error }, 'IDLE ended during shutdown');
          relay.close();
          return;
        }
        relay.close(error instanceof MailMirrorError
          ? error
          : new ConnectionError(`IDLE on ${session.address} failed: ${errorMessage(error)}`, { cause: error }));
      },
    );

    try {
      for (;;) {
        const event = await relay.next();
        if (!event) {
          break;
        }
        logger.debug({ kind: event.kind, reason: event.reason, count: event.count }, 'New update');
        if (event.kind !== 'mailbox') {
          continue;
        }
        await onTrigger(event);
      }
    } finally {
      signal.removeEventListener('abort', forwardAbort);
      controller.abort();
      unsubscribe();
      await longPoll;
    }
  };

  return { prime, watch };
};
