import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { pino } from 'pino';
import { ConnectionError, StoreError } from '../../shared/errors.js';
import type { MailboxChangeEvent } from '../../shared/types.js';
import { createIdleWatcher, DEFAULT_IDLE_FALLBACK_MS, mergeChangeEvents, resolveFallbackMs } from '../imap/idleWatcher.js';
import { createFakeSession, createFakeStore, flushAsync } from './support/fakeMail.js';
import type { FakeMessage } from './support/fakeMail.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

const silent = pino({ level: 'silent' });

const setup = (messages: FakeMessage[] = [], fallbackMs = 60_000) => {
  const store = createFakeStore('source.example.test:993', messages);
  const session = createFakeSession(store, 'source');
  const watcher = createIdleWatcher({ session, mailbox: 'INBOX', logger: silent, fallbackMs });
  const triggers: MailboxChangeEvent[] = [];
  return { store, session, watcher, controller: new AbortController(), triggers };
};

await test('zero or invalid fallback selects the default', () => {
  assert.equal(DEFAULT_IDLE_FALLBACK_MS, 60_000);
  assert.equal(resolveFallbackMs(0), 60_000);
  assert.equal(resolveFallbackMs(undefined), 60_000);
  assert.equal(resolveFallbackMs(-5), 60_000);
  assert.equal(resolveFallbackMs(1500), 1500);
});

await test('a pending mailbox change survives later flag and expunge updates', () => {
  const mailbox: MailboxChangeEvent = { kind: 'mailbox', mailbox: 'INBOX', count: 3 };
  const flags: MailboxChangeEvent = { kind: 'flags', mailbox: 'INBOX', uid: 7 };
  const newer: MailboxChangeEvent = { kind: 'mailbox', mailbox: 'INBOX', count: 4 };
  assert.equal(mergeChangeEvents(mailbox, flags), mailbox);
  assert.equal(mergeChangeEvents(flags, mailbox), mailbox);
  assert.equal(mergeChangeEvents(mailbox, newer), newer);
});

await test('flag and expunge events never trigger a handle', async () => {
  const { session, watcher, controller, triggers } = setup([{ uid: 1 }]);
  const watching = watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
  });
  await flushAsync();

  session.emit({ kind: 'flags', mailbox: 'INBOX', uid: 1 });
  session.emit({ kind: 'expunge', mailbox: 'INBOX' });
  await flushAsync();
  controller.abort();
  await watching;

  assert.deepEqual(triggers, []);
});

await test('changes during a busy handle collapse into one extra trigger', async () => {
  const { session, watcher, controller, triggers } = setup([{ uid: 1 }]);
  watcher.prime({ kind: 'mailbox', mailbox: 'INBOX', count: 1, reason: 'initial' });

  await watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
    if (triggers.length === 1) {
      session.emit({ kind: 'mailbox', mailbox: 'INBOX', count: 2, reason: 'push' });
      session.emit({ kind: 'flags', mailbox: 'INBOX', uid: 1 });
      session.emit({ kind: 'mailbox', mailbox: 'INBOX', count: 4, reason: 'push' });
      session.emit({ kind: 'expunge', mailbox: 'INBOX' });
      return;
    }
    controller.abort();
  });

  assert.deepEqual(triggers.map((event) => [event.reason, event.count]), [['initial', 1], ['push', 4]]);
});

await test('the fallback check triggers when the message count changed unannounced', async () => {
  const { store, watcher, controller, triggers } = setup([{ uid: 1 }], 20);
  store.messages.push({ uid: 2 });

  await watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
    controller.abort();
  });

  assert.deepEqual(triggers, [{ kind: 'mailbox', mailbox: 'INBOX', count: 2, reason: 'fallback' }]);
  assert.equal(store.journal[0], 'source idle');
  assert.equal(store.journal[1], 'source noop');
});

await test('the fallback check stays quiet while the message count is unchanged', async () => {
  const { store, watcher, controller, triggers } = setup([{ uid: 1, flags: ['\\Deleted'] }], 20);
  const watching = watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
  });

  await sleep(90);
  controller.abort();
  await watching;

  assert.deepEqual(triggers, []);
  assert.ok(store.journal.filter((entry) => entry === 'source noop').length >= 2);
});

await test('the fallback check stays quiet for an empty mailbox', async () => {
  const { store, watcher, controller, triggers } = setup([], 20);
  const watching = watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
  });

  await sleep(70);
  controller.abort();
  await watching;

  assert.deepEqual(triggers, []);
  assert.ok(store.journal.filter((entry) => entry === 'source noop').length >= 2);
});

await test('a dropped watch session ends the watch with a connection error', async () => {
  const { session, watcher, controller } = setup();
  const watching = watcher.watch(controller.signal, async () => undefined);
  await flushAsync();
  session.drop();

  await assert.rejects(watching, (error: unknown) => {
    assert.ok(error instanceof ConnectionError);
    assert.equal(error.message, 'watch session to source.example.test:993 closed');
    return true;
  });
});

await test('a failing IDLE is wrapped as a connection error', async () => {
  const { session, watcher, controller } = setup();
  const watching = watcher.watch(controller.signal, async () => undefined);
  await flushAsync();
  session.failIdle(new Error('connection reset'));

  await assert.rejects(watching, (error: unknown) => {
    assert.ok(error instanceof ConnectionError);
    assert.equal(error.message, 'IDLE on source.example.test:993 failed: connection reset');
    return true;
  });
});

await test('a failing handle ends the watch with its error', async () => {
  const { store, watcher, controller } = setup([{ uid: 1 }]);
  watcher.prime({ kind: 'mailbox', mailbox: 'INBOX', count: 1, reason: 'initial' });

  await assert.rejects(
    watcher.watch(controller.signal, async () => {
      throw new StoreError('append failed', 1);
    }),
    (error: unknown) => error instanceof StoreError && error.uid === 1,
  );
  assert.ok(store.journal.includes('source noop'));
});

await test('an aborted signal returns without entering IDLE', async () => {
  const { store, watcher, controller, triggers } = setup([{ uid: 1 }]);
  watcher.prime({ kind: 'mailbox', mailbox: 'INBOX', count: 1, reason: 'initial' });
  controller.abort();

  await watcher.watch(controller.signal, async (event) => {
    triggers.push(event);
  });

  assert.deepEqual(triggers, []);
  assert.deepEqual(store.journal, []);
});

await test('a watcher only watches once', async () => {
  const { watcher, controller } = setup();
  controller.abort();
  await watcher.watch(controller.signal, async () => undefined);
  await assert.rejects(watcher.watch(controller.signal, async () => undefined), /can only watch once/);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
