import { Mutex } from 'async-mutex';
import { connectAsync } from 'mqtt';
import type { Logger } from 'pino';
import { BrokerError, errorMessage, MailMirrorError } from '../../shared/errors.js';
import type { BrokerSettings, DeviceAuthChallenge, Token } from '../../shared/types.js';
import { parseStoredToken, serializeToken } from './token.js';

const DEFAULT_LOAD_TIMEOUT_MS = 1_000;

/** What the backend needs from one short-lived broker connection. */
export type BrokerClient = {
  subscribe: (topic: string) => Promise<void>;
  publish: (topic: string, payload: string, options: { retain: boolean }) => Promise<void>;
  onMessage: (listener: (topic: string, payload: Buffer) => void) => void;
  end: () => Promise<void>;
};

export type BrokerConnector = (settings: BrokerSettings) => Promise<BrokerClient>;

export const mqttConnector: BrokerConnector = async (settings) => {
  const client = await connectAsync(settings.url, {
    clientId: settings.clientId,
    username: settings.username,
    password: settings.password,
    clean: true,
    reconnectPeriod: 0,
  });
  return {
    subscribe: async (topic) => {
      await client.subscribeAsync(topic, { qos: 0 });
    },
    publish: async (topic, payload, { retain }) => {
      await client.publishAsync(topic, payload, { qos: 0, retain });
    },
    onMessage: (listener) => {
      client.on('message', (topic, payload) => listener(topic, payload));
    },
    end: async () => {
      await client.endAsync();
    },
  };
};

const brokerLocks = new Map<string, Mutex>();

/** One lock per broker client id, shared by every backend in the process. */
export const brokerLock = (clientId: string) => {
  let lock = brokerLocks.get(clientId);
  if (!lock) {
    lock = new Mutex();
    brokerLocks.set(clientId, lock);
  }
  return lock;
};

export const accountKey = (name: string) => name.replace(/[@.]/g, '-');

export const tokenTopic = (clientId: string, name: string) =>
  `modernauth/${clientId}/${accountKey(name)}/token`;

export const eventTopicBase = (clientId: string, name: string) =>
  `homeassistant/event/${clientId}/${accountKey(name)}`;

export const buildDiscoveryConfig = (clientId: string, name: string) => ({
  '~': eventTopicBase(clientId, name),
  name,
  event_types: ['auth'],
  state_topic: '~/state',
  unique_id: `${clientId}-${accountKey(name)}`,
  device: {
    identifiers: [clientId],
    name,
  },
});

export const buildAuthEvent = (challenge: DeviceAuthChallenge) => ({
  event_type: 'auth',
  link: challenge.verificationUri,
  code: challenge.userCode,
});

export type TokenBackend = {
  loadToken: (signal?: AbortSignal) => Promise<Token | null>;
  saveToken: (token: Token) => Promise<void>;
  notify: (challenge: DeviceAuthChallenge) => Promise<void>;
};

export type TokenBackendOptions = {
  name: string;
  broker: BrokerSettings;
  connector?: BrokerConnector;
  logger?: Logger;
  loadTimeoutMs?: number;
};

/**
 * Keeps an account's token as a retained message on the broker and relays
 * device-login prompts as Home Assistant events. Every call runs its own
 * connect/use/disconnect sequence under the client id's lock.
 */
export const createTokenBackend = (options: TokenBackendOptions): TokenBackend => {
  const { name, broker, logger } = options;
  const connector = options.connector ?? mqttConnector;
  const loadTimeoutMs = options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
  const lock = brokerLock(broker.clientId);
  const topic = tokenTopic(broker.clientId, name);

  const withBroker = <T>(body: (client: BrokerClient) => Promise<T>) =>
    lock.runExclusive(async () => {
      let client: BrokerClient;
      try {
        client = await connector(broker);
      } catch (error) {
        throw new BrokerError(`connect to ${broker.url} failed: ${errorMessage(error)}`, { cause: error });
      }
      try {
        return await body(client);
      } catch (error) {
        if (error instanceof MailMirrorError) {
          throw error;
        }
        throw new BrokerError(`broker request failed: ${errorMessage(error)}`, { cause: error });
      } finally {
        await client.end().catch((error: unknown) => {
          logger?.warn({ error, broker: broker.url }, 'broker disconnect failed');
        });
      }
    });

  const loadToken = (signal?: AbortSignal) =>
    withBroker((client) =>
      new Promise<Token | null>((resolve, reject) => {
        let settled = false;
        const finish = (settle: () => void) => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          settle();
        };
        const onAbort = () => finish(() => resolve(null));
        const timer = setTimeout(() => finish(() => resolve(null)), loadTimeoutMs);
        if (signal?.aborted) {
          onAbort();
          return;
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        client.onMessage((received, payload) => {
          if (received !== topic) {
            return;
          }
          if (payload.length === 0) {
            finish(() => resolve(null));
            return;
          }
          try {
            const token = parseStoredToken(payload);
            finish(() => resolve(token));
          } catch (error) {
            finish(() => reject(error));
          }
        });
        client.subscribe(topic).catch((error: unknown) => {
          finish(() => reject(new BrokerError(`subscribe to ${topic} failed: ${errorMessage(error)}`, { cause: error })));
        });
      }));

  const saveToken = (token: Token) =>
    withBroker(async (client) => {
      await client.publish(topic, serializeToken(token), { retain: true });
      logger?.debug({ topic }, 'token saved');
    });

  const notify = (challenge: DeviceAuthChallenge) =>
    withBroker(async (client) => {
      const base = eventTopicBase(broker.clientId, name);
      await client.publish(`${base}/config`, JSON.stringify(buildDiscoveryConfig(broker.clientId, name)), { retain: false });
      await client.publish(`${base}/state`, JSON.stringify(buildAuthEvent(challenge)), { retain: false });
    });

  return { loadToken, saveToken, notify };
};
