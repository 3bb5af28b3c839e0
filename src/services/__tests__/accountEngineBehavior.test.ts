import assert from 'node:assert/strict';
import { pino } from 'pino';
import { ConnectionError, StoreError } from '../../shared/errors.js';
import { createAccountEngine } from '../accountEngine.js';
import { canTransition, StateTransitionError, stateOrdinal, transition, withPhase } from '../accountState.js';
import { createFakeConnections, createFakeStore, createTestAccount, flushAsync } from './support/fakeMail.js';
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

const setup = (messages: FakeMessage[] = []) => {
  const journal: string[] = [];
  const source = createFakeStore('source.example.test:993', messages, journal);
  const target = createFakeStore('target.example.test:993', [], journal);
  const { connections, sessions } = createFakeConnections({ source, target });
  const account = createTestAccount();
  const engine = createAccountEngine(account, { connections, logger: silent });
  return { journal, source, target, sessions, account, engine, controller: new AbortController() };
};

const waitFor = async (predicate: () => boolean) => {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    if (predicate()) {
      return;
    }
    await flushAsync();
  }
  throw new Error('condition not reached');
};

await test('allows only the listed lifecycle transitions', () => {
  assert.equal(canTransition('initial', 'connecting'), true);
  assert.equal(canTransition('handling', 'watching'), true);
  assert.equal(canTransition('initial', 'watching'), false);
  assert.equal(canTransition('shutdown', 'connecting'), false);
  assert.equal(stateOrdinal('initial'), 0);
  assert.equal(stateOrdinal('watching'), 3);
  assert.equal(stateOrdinal('shutdown'), 5);

  const account = createTestAccount();
  assert.throws(() => transition(account, 'handling'), StateTransitionError);
  assert.equal(account.state, 'initial');
});

await test('a phase restores the previous state on failure', async () => {
  const account = createTestAccount();
  account.state = 'watching';
  await assert.rejects(withPhase(account, 'handling', async () => {
    assert.equal(account.state, 'handling');
    throw new Error('boom');
  }), /boom/);
  assert.equal(account.state, 'watching');
});

await test('a phase does not undo a shutdown', async () => {
  const account = createTestAccount();
  account.state = 'connected';
  await withPhase(account, 'watching', async () => {
    transition(account, 'shutdown');
  });
  assert.equal(account.state, 'shutdown');
});

await test('init probes both stores before opening the watch session', async () => {
  const { journal, account, engine, sessions } = setup();

  await engine.init();

  assert.equal(account.state, 'connected');
  assert.deepEqual(journal, [
    'source login',
    'source logout',
    'target login',
    'target logout',
    'source login',
    'source select INBOX ro',
  ]);
  assert.equal(sessions.length, 3);
  assert.equal(sessions[2].usable, true);
});

await test('a failed probe leaves the account connecting with an attributed error', async () => {
  const { source, target, account, engine } = setup();
  target.failLogin = true;

  await assert.rejects(engine.init(), (error: unknown) => {
    assert.ok(error instanceof ConnectionError);
    assert.equal(error.account, 'alice@example.test');
    assert.equal(error.state, 'connecting');
    return true;
  });
  assert.equal(account.state, 'connecting');
  assert.ok(account.lastError instanceof ConnectionError);
  assert.equal(source.opened, 1);
  assert.equal(source.loggedOut, 1);
});

await test('handle restores the state after success and failure', async () => {
  const { source, target, account, engine } = setup([{ uid: 1 }, { uid: 2 }]);
  await engine.init();

  const result = await engine.handle();
  assert.deepEqual(result, { fetched: 2, forwarded: 2, ignored: 0, deleted: [1, 2] });
  assert.equal(account.state, 'connected');
  assert.equal(account.processed, 2);

  target.failAppendAt = target.appendAttempts + 1;
  await assert.rejects(engine.handle(), (error: unknown) => {
    assert.ok(error instanceof StoreError);
    assert.equal(error.account, 'alice@example.test');
    assert.equal(error.state, 'handling');
    return true;
  });
  assert.equal(account.state, 'connected');
  assert.equal(account.processed, 2);
  assert.ok(account.lastError instanceof StoreError);

  assert.equal(source.opened, 4);
  assert.equal(source.loggedOut, 3);
  assert.equal(target.opened, 3);
  assert.equal(target.loggedOut, 3);
});

await test('only one handle cycle runs at a time', async () => {
  const { account, engine } = setup([{ uid: 1 }]);
  await engine.init();

  const first = engine.handle();
  await assert.rejects(engine.handle(), StateTransitionError);
  await first;
  assert.equal(account.state, 'connected');
});

await test('watch requires init', async () => {
  const { engine, controller } = setup();
  await assert.rejects(engine.watch(controller.signal), /watch requires a successful init/);
});

await test('run mirrors pending mail at start-up and close ends in initial', async () => {
  const { source, target, account, engine, controller } = setup([{ uid: 1 }, { uid: 2 }]);
  source.onMarkDeleted = () => controller.abort();

  await engine.run(controller.signal);

  assert.equal(account.state, 'connected');
  assert.equal(account.processed, 2);
  assert.deepEqual(target.appended.map((message) => message.body), ['message 1', 'message 2']);
  assert.deepEqual(source.deletedSets, ['1:2']);

  await engine.close();
  assert.equal(account.state, 'initial');
  assert.equal(source.opened, source.loggedOut);
  assert.equal(target.opened, target.loggedOut);
});

await test('a dropped watch session ends the run as a watching failure', async () => {
  const { journal, account, engine, sessions, controller } = setup();
  const running = engine.run(controller.signal);

  await waitFor(() =>
    account.state === 'watching' && journal.filter((entry) => entry === 'target logout').length === 2);
  sessions[2].drop();

  await assert.rejects(running, (error: unknown) => {
    assert.ok(error instanceof ConnectionError);
    assert.equal(error.message, 'watch session to source.example.test:993 closed');
    assert.equal(error.state, 'watching');
    return true;
  });
  assert.equal(account.state, 'connected');
  assert.ok(account.lastError instanceof ConnectionError);

  await engine.close();
  assert.equal(account.state, 'initial');
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
