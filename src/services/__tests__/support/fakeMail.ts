import type { ConnectionManager, MailSession } from '../../imap/connection.js';
import { ConnectionError } from '../../../shared/errors.js';
import type { Account, MailboxChangeEvent, MailStore, Message } from '../../../shared/types.js';

export type FakeMessage = {
  uid: number;
  flags?: string[];
  body?: string;
  internalDate?: Date;
};

export type AppendedMessage = {
  mailbox: string;
  flags: string[];
  internalDate: Date;
  body: string;
};

/** Mailbox state shared by every session opened against one fake server. */
export type FakeMailStore = {
  address: string;
  messages: FakeMessage[];
  appended: AppendedMessage[];
  deletedSets: string[];
  journal: string[];
  appendAttempts: number;
  opened: number;
  loggedOut: number;
  failLogin: boolean;
  failSelect: boolean;
  failFetch: boolean;
  failStore: boolean;
  failAppendAt: number | null;
  onMarkDeleted: ((uidSet: string) => void) | null;
};

export type FakeSession = MailSession & {
  emit: (event: MailboxChangeEvent) => void;
  drop: () => void;
  failIdle: (error: unknown) => void;
};

export const createFakeStore = (
  address: string,
  messages: FakeMessage[] = [],
  journal: string[] = [],
): FakeMailStore => ({
  address,
  messages,
  appended: [],
  deletedSets: [],
  journal,
  appendAttempts: 0,
  opened: 0,
  loggedOut: 0,
  failLogin: false,
  failSelect: false,
  failFetch: false,
  failStore: false,
  failAppendAt: null,
  onMarkDeleted: null,
});

export const createFakeSession = (store: FakeMailStore, role: MailStore['role']): FakeSession => {
  const listeners = new Set<(event: MailboxChangeEvent) => void>();
  let usable = true;
  let idleWaiter: { resolve: () => void; reject: (error: unknown) => void } | null = null;

  const releaseIdle = () => {
    const waiter = idleWaiter;
    idleWaiter = null;
    waiter?.resolve();
  };

  return {
    role,
    address: store.address,
    get usable() {
      return usable;
    },
    select: async (mailbox, { readOnly }) => {
      store.journal.push(`${role} select ${mailbox} ${readOnly ? 'ro' : 'rw'}`);
      if (store.failSelect) {
        throw new Error(`NO [NONEXISTENT] ${mailbox}`);
      }
      return { mailbox, exists: store.messages.length, uidValidity: '1' };
    },
    async *fetchAll(count: number): AsyncGenerator<Message> {
      store.journal.push(`${role} fetch 1:${count}`);
      if (store.failFetch) {
        throw new Error('BAD fetch aborted');
      }
      for (const [index, message] of store.messages.slice(0, count).entries()) {
        yield {
          seq: index + 1,
          uid: message.uid,
          flags: message.flags ?? [],
          internalDate: message.internalDate ?? new Date(0),
          body: Buffer.from(message.body ?? `message ${message.uid}`),
        };
      }
    },
    append: async (mailbox, input) => {
      store.appendAttempts += 1;
      store.journal.push(`${role} append ${mailbox} ${input.body.toString()}`);
      if (store.failAppendAt === store.appendAttempts) {
        throw new Error('NO [OVERQUOTA] mailbox full');
      }
      store.appended.push({
        mailbox,
        flags: input.flags,
        internalDate: input.internalDate,
        body: input.body.toString(),
      });
    },
    markDeleted: async (uidSet) => {
      store.journal.push(`${role} store ${uidSet} +\\Deleted`);
      if (store.failStore) {
        throw new Error('NO store rejected');
      }
      store.deletedSets.push(uidSet);
      store.onMarkDeleted?.(uidSet);
    },
    idle: () => {
      store.journal.push(`${role} idle`);
      if (!usable) {
        return Promise.resolve();
      }
      return new Promise<void>((resolve, reject) => {
        idleWaiter = { resolve, reject };
      });
    },
    noop: async () => {
      store.journal.push(`${role} noop`);
      releaseIdle();
    },
    messageCount: () => store.messages.length,
    onChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    logout: async () => {
      store.journal.push(`${role} logout`);
      store.loggedOut += 1;
      usable = false;
      releaseIdle();
    },
    emit: (event) => {
      for (const listener of listeners) {
        listener(event);
      }
    },
    drop: () => {
      usable = false;
      releaseIdle();
    },
    failIdle: (error) => {
      const waiter = idleWaiter;
      idleWaiter = null;
      waiter?.reject(error);
    },
  };
};

export const createFakeConnections = (stores: { source: FakeMailStore; target: FakeMailStore }) => {
  const sessions: FakeSession[] = [];
  const connections: ConnectionManager = {
    open: async (store, options = {}) => {
      const fake = stores[store.role];
      if (fake.failLogin) {
        throw new ConnectionError(`${store.role} ${fake.address}: login rejected (AUTHENTICATIONFAILED)`);
      }
      fake.opened += 1;
      fake.journal.push(`${store.role} login`);
      const session = createFakeSession(fake, store.role);
      sessions.push(session);
      if (options.select) {
        await session.select(store.credentials.mailbox, options.select);
      }
      return session;
    },
  };
  return { connections, sessions };
};

export const createTestAccount = (name = 'alice@example.test'): Account => ({
  name,
  source: {
    role: 'source',
    credentials: {
      host: 'source.example.test',
      port: 993,
      username: 'alice',
      auth: { type: 'password', password: 'test-secret' },
      mailbox: 'INBOX',
    },
  },
  target: {
    role: 'target',
    credentials: {
      host: 'target.example.test',
      port: 993,
      username: 'alice',
      auth: { type: 'password', password: 'test-secret' },
      mailbox: 'Archive',
    },
  },
  state: 'initial',
  processed: 0,
  lastError: null,
});

export const flushAsync = () => new Promise<void>((resolve) => setImmediate(resolve));
