import { ImapFlow } from 'imapflow';
import type { Logger } from 'pino';
import { AuthError, ConnectionError, errorMessage, MailMirrorError } from '../../shared/errors.js';
import { formatStoreAddress } from '../../shared/types.js';
import type { MailboxChangeEvent, MailStore, Message, Token } from '../../shared/types.js';
import { parseXoauth2Challenge, Xoauth2Error } from '../modernauth/xoauth2.js';
import { DELETED_FLAG, toNumberUid } from './utils.js';

export type SelectResult = {
  mailbox: string;
  exists: number;
  uidValidity: string | null;
};

export type AppendInput = {
  body: Buffer;
  flags: string[];
  internalDate: Date;
};

/**
 * The slice of an authenticated IMAP connection the engine works with. One
 * session belongs to exactly one opener, which must `logout` it.
 */
export type MailSession = {
  readonly role: MailStore['role'];
  readonly address: string;
  readonly usable: boolean;
  select: (mailbox: string, options: { readOnly: boolean }) => Promise<SelectResult>;
  fetchAll: (count: number) => AsyncIterable<Message>;
  append: (mailbox: string, input: AppendInput) => Promise<void>;
  markDeleted: (uidSet: string) => Promise<void>;
  idle: () => Promise<void>;
  noop: () => Promise<void>;
  messageCount: () => number;
  onChange: (listener: (event: MailboxChangeEvent) => void) => () => void;
  logout: () => Promise<void>;
};

export type AccessTokenSource = {
  token: () => Promise<Token>;
};

export type OpenSessionOptions = {
  select?: { readOnly: boolean };
};

export type ConnectionManager = {
  open: (store: MailStore, options?: OpenSessionOptions) => Promise<MailSession>;
};

type ExistsEventData = { path: string; count: number };
type ExpungeEventData = { path: string; seq?: number };
type FlagsEventData = { path: string; uid?: number | string };

const toMessage = (fetched: {
  seq: number;
  uid: number;
  flags?: Set<string>;
  internalDate?: Date | string;
  source?: Buffer;
}): Message => {
  const uid = toNumberUid(fetched.uid);
  if (uid === null) {
    throw new Error(`message #${fetched.seq} has no UID`);
  }
  if (!fetched.source) {
    throw new Error(`message ${uid} was fetched without a body`);
  }
  return {
    seq: fetched.seq,
    uid,
    flags: fetched.flags ? Array.from(fetched.flags) : [],
    internalDate: fetched.internalDate ? new Date(fetched.internalDate) : new Date(),
    body: fetched.source,
  };
};

export const createImapSession = (client: ImapFlow, store: MailStore, logger?: Logger): MailSession => {
  let count = 0;
  let closed = false;

  client.on('close', () => {
    closed = true;
  });
  // Socket and timeout failures after connect arrive here; an open IDLE then ends.
  client.on('error', (error: unknown) => {
    closed = true;
    logger?.warn({ error, role: store.role, address: formatStoreAddress(store.credentials) }, 'IMAP connection error');
  });
  client.on('exists', (data: ExistsEventData) => {
    count = data.count;
  });
  client.on('expunge', () => {
    count = Math.max(0, count - 1);
  });

  async function* fetchAll(total: number): AsyncGenerator<Message> {
    if (total < 1) {
      return;
    }
    const messages = client.fetch(`1:${total}`, {
      uid: true,
      flags: true,
      internalDate: true,
      source: true,
    });
    for await (const fetched of messages) {
      yield toMessage(fetched);
    }
  }

  return {
    role: store.role,
    address: formatStoreAddress(store.credentials),
    get usable() {
      return !closed;
    },
    select: async (mailbox, { readOnly }) => {
      const opened = await client.mailboxOpen(mailbox, { readOnly });
      count = opened.exists;
      return {
        mailbox: opened.path,
        exists: opened.exists,
        uidValidity: opened.uidValidity ? String(opened.uidValidity) : null,
      };
    },
    fetchAll,
    append: async (mailbox, { body, flags, internalDate }) => {
      const appended = await client.append(mailbox, body, flags, internalDate);
      if (!appended) {
        throw new Error(`APPEND to ${mailbox} was rejected`);
      }
    },
    markDeleted: async (uidSet) => {
      const stored = await client.messageFlagsAdd(uidSet, [DELETED_FLAG], { uid: true });
      if (!stored) {
        throw new Error(`UID STORE ${uidSet} +FLAGS (${DELETED_FLAG}) was rejected`);
      }
    },
    idle: async () => {
      await client.idle();
    },
    noop: async () => {
      await client.noop();
    },
    messageCount: () => count,
    onChange: (listener) => {
      const onExists = (data: ExistsEventData) => {
        listener({ kind: 'mailbox', mailbox: data.path, count: data.count, reason: 'push' });
      };
      const onExpunge = (data: ExpungeEventData) => {
        listener({ kind: 'expunge', mailbox: data.path });
      };
      const onFlags = (data: FlagsEventData) => {
        listener({ kind: 'flags', mailbox: data.path, uid: toNumberUid(data.uid) ?? undefined });
      };
      client.on('exists', onExists);
      client.on('expunge', onExpunge);
      client.on('flags', onFlags);
      return () => {
        client.off('exists', onExists);
        client.off('expunge', onExpunge);
        client.off('flags', onFlags);
      };
    },
    logout: async () => {
      await client.logout();
    },
  };
};

const readErrorField = (error: unknown, field: 'responseText' | 'response') => {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : null;
  }
  return null;
};

const isAuthenticationFailure = (error: unknown) =>
  typeof error === 'object'
  && error !== null
  && 'authenticationFailed' in error
  && Reflect.get(error, 'authenticationFailed') === true;

export const toConnectionFailure = (error: unknown, store: MailStore, step: string): MailMirrorError => {
  if (error instanceof MailMirrorError) {
    return error;
  }
  const address = formatStoreAddress(store.credentials);
  if (isAuthenticationFailure(error)) {
    const responseText = readErrorField(error, 'responseText') ?? readErrorField(error, 'response');
    const challenge = responseText ? parseXoauth2Challenge(responseText) : null;
    if (store.credentials.auth.type === 'oauth2' && challenge) {
      return new Xoauth2Error(challenge, { cause: error });
    }
    return new ConnectionError(`${store.role} ${address}: login rejected (${responseText ?? errorMessage(error)})`, { cause: error });
  }
  return new ConnectionError(`${store.role} ${address}: ${step} failed: ${errorMessage(error)}`, { cause: error });
};

export type ConnectionManagerOptions = {
  tokenSourceFor?: (store: MailStore) => AccessTokenSource | null;
  logger?: Logger;
};

export const createConnectionManager = (options: ConnectionManagerOptions = {}): ConnectionManager => {
  const resolveAuth = async (store: MailStore) => {
    const { auth, username } = store.credentials;
    if (auth.type === 'password') {
      return { user: username, pass: auth.password };
    }
    const tokenSource = options.tokenSourceFor?.(store);
    if (!tokenSource) {
      throw new AuthError(`${store.role}: no token source for provider ${auth.provider}`);
    }
    const token = await tokenSource.token();
    return { user: username, accessToken: token.accessToken };
  };

  const open = async (store: MailStore, openOptions: OpenSessionOptions = {}) => {
    const { host, port, mailbox } = store.credentials;
    const client = new ImapFlow({
      host,
      port,
      secure: true,
      auth: await resolveAuth(store),
      logger: false,
      disableAutoIdle: true,
    });

    try {
      await client.connect();
    } catch (error) {
      throw toConnectionFailure(error, store, 'login');
    }
    options.logger?.debug({ role: store.role, address: formatStoreAddress(store.credentials) }, 'session opened');

    const session = createImapSession(client, store, options.logger);
    if (!openOptions.select) {
      return session;
    }
    try {
      await session.select(mailbox, openOptions.select);
    } catch (error) {
      await session.logout().catch((logoutError: unknown) => {
        options.logger?.warn({ error: logoutError, role: store.role }, 'logout after failed select failed');
      });
      throw toConnectionFailure(error, store, `select ${mailbox}`);
    }
    return session;
  };

  return { open };
};
