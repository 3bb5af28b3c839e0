import type { Logger } from 'pino';
import { CleanupError, errorMessage, FetchError, MailMirrorError, StoreError } from '../shared/errors.js';
import type { Message } from '../shared/types.js';
import { createBoundedQueue } from './imap/boundedQueue.js';
import type { BoundedQueue } from './imap/boundedQueue.js';
import type { MailSession } from './imap/connection.js';
import { compressUidSet, forwardableFlags, isDeleted } from './imap/utils.js';

const DEFAULT_QUEUE_CAPACITY = 1;

export type SyncPipelineInput = {
  source: MailSession;
  target: MailSession;
  sourceMailbox: string;
  targetMailbox: string;
  logger: Logger;
  onForwarded?: (uid: number) => void;
  queueCapacity?: number;
};

export type SyncPipelineResult = {
  fetched: number;
  forwarded: number;
  ignored: number;
  deleted: number[];
};

const fetchStage = async (
  input: SyncPipelineInput,
  messages: BoundedQueue<Message>,
  result: SyncPipelineResult,
) => {
  const { source, sourceMailbox } = input;
  try {
    const status = await source.select(sourceMailbox, { readOnly: true });
    if (status.exists < 1) {
      return;
    }
    for await (const message of source.fetchAll(status.exists)) {
      result.fetched += 1;
      if (!(await messages.push(message))) {
        break;
      }
    }
  } catch (error) {
    throw new FetchError(`fetch from ${sourceMailbox} failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    messages.close();
  }
};

const storeStage = async (
  input: SyncPipelineInput,
  messages: BoundedQueue<Message>,
  deletes: BoundedQueue<number>,
  result: SyncPipelineResult,
) => {
  const { target, targetMailbox, logger } = input;
  try {
    let mailbox: string;
    try {
      mailbox = (await target.select(targetMailbox, { readOnly: false })).mailbox;
    } catch (error) {
      throw new StoreError(`select ${targetMailbox} failed: ${errorMessage(error)}`, null, { cause: error });
    }

    for await (const message of messages) {
      logger.debug({ uid: message.uid }, 'Handling message');
      if (isDeleted(message.flags)) {
        result.ignored += 1;
        logger.debug({ uid: message.uid }, 'Ignoring message');
        continue;
      }

      logger.debug({ uid: message.uid }, 'Storing message');
      try {
        await target.append(mailbox, {
          body: message.body,
          flags: forwardableFlags(message.flags),
          internalDate: message.internalDate,
        });
      } catch (error) {
        throw new StoreError(
          `append of message ${message.uid} to ${mailbox} failed: ${errorMessage(error)}`,
          message.uid,
          { cause: error },
        );
      }

      result.forwarded += 1;
      input.onForwarded?.(message.uid);
      await deletes.push(message.uid);
    }
  } finally {
    messages.close();
    deletes.close();
  }
};

const cleanupStage = async (
  input: SyncPipelineInput,
  deletes: BoundedQueue<number>,
  result: SyncPipelineResult,
) => {
  const { source, sourceMailbox, logger } = input;
  const uids = new Set<number>();
  for await (const uid of deletes) {
    logger.debug({ uid }, 'Deleting message');
    uids.add(uid);
  }
  if (uids.size === 0) {
    return;
  }

  const uidSet = compressUidSet(uids);
  try {
    await source.select(sourceMailbox, { readOnly: false });
    await source.markDeleted(uidSet);
  } catch (error) {
    throw new CleanupError(`marking ${uidSet} deleted in ${sourceMailbox} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  result.deleted = Array.from(uids).sort((left, right) => left - right);
};

/**
 * Moves everything currently in the source mailbox to the target. Fetch,
 * store and cleanup run concurrently over two bounded queues; a UID only
 * reaches cleanup after its APPEND succeeded. The first stage failure is the
 * result, the other stages wind down through queue closure.
 */
export const runSyncPipeline = async (input: SyncPipelineInput): Promise<SyncPipelineResult> => {
  const capacity = input.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
  const messages = createBoundedQueue<Message>(capacity);
  const deletes = createBoundedQueue<number>(capacity);
  const result: SyncPipelineResult = { fetched: 0, forwarded: 0, ignored: 0, deleted: [] };

  const outcome: { failure: MailMirrorError | null } = { failure: null };
  const settle = (stage: Promise<void>) =>
    stage.catch((error: unknown) => {
      if (outcome.failure) {
        input.logger.debug({ error }, 'additional stage failure');
        return;
      }
      outcome.failure = error instanceof MailMirrorError
        ? error
        : new FetchError(errorMessage(error), { cause: error });
    });

  await Promise.all([
    settle(fetchStage(input, messages, result)),
    settle(storeStage(input, messages, deletes, result)),
    settle(cleanupStage(input, deletes, result)),
  ]);

  if (outcome.failure) {
    throw outcome.failure;
  }
  return result;
};
