import type { Logger } from 'pino';
import { AuthError } from '../../shared/errors.js';
import type { Account, BrokerSettings, MailStore, OAuthProviderTable, Token } from '../../shared/types.js';
import type { AccessTokenSource } from '../imap/connection.js';
import { createDeviceAuthorizationClient } from './deviceAuthClient.js';
import type { DeviceAuthorizationClient } from './deviceAuthClient.js';
import { isTokenLive } from './token.js';
import { createTokenBackend } from './tokenBackend.js';
import type { BrokerConnector, TokenBackend } from './tokenBackend.js';

export type TokenSourceOptions = {
  backend: TokenBackend;
  client: DeviceAuthorizationClient;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => number;
};

/**
 * Device-authorization grant backed by the broker cache. Holds no token
 * itself: every call reloads, refreshes when needed and stores the result.
 */
export const createTokenSource = (options: TokenSourceOptions): AccessTokenSource => {
  const { backend, client, logger, signal } = options;
  const now = options.now ?? Date.now;

  const authorize = async () => {
    const authorization = await client.requestDeviceCode();
    await backend.notify(authorization.challenge);
    logger?.info(
      { link: authorization.challenge.verificationUri, code: authorization.challenge.userCode },
      'Waiting for device authorization',
    );
    return authorization.waitForToken(signal);
  };

  const ensureLive = async (token: Token) => {
    if (isTokenLive(token, now())) {
      return token;
    }
    const refreshed = await client.refresh(token);
    if (!isTokenLive(refreshed, now())) {
      throw new AuthError('refreshed token is already expired');
    }
    return refreshed;
  };

  const token = async () => {
    const cached = await backend.loadToken(signal);
    const live = await ensureLive(cached ?? (await authorize()));
    await backend.saveToken(live);
    return live;
  };

  return { token };
};

export type TokenSourceResolverOptions = {
  account: Pick<Account, 'name'>;
  broker: BrokerSettings | null;
  providers: OAuthProviderTable;
  logger?: Logger;
  signal?: AbortSignal;
  connector?: BrokerConnector;
  clientFor?: (provider: string) => DeviceAuthorizationClient;
};

/**
 * Broker key for a store's token. The source store uses the account name,
 * a bearer-token target gets its own suffixed key.
 */
export const tokenNameFor = (account: Pick<Account, 'name'>, store: MailStore) =>
  store.role === 'source' ? account.name : `${account.name}-target`;

export const createTokenSourceResolver = (options: TokenSourceResolverOptions) => {
  const sources = new Map<MailStore['role'], AccessTokenSource>();

  const clientFor = options.clientFor ?? ((providerName: string) => {
    const provider = options.providers[providerName];
    if (!provider) {
      throw new AuthError(`unknown OAuth2 provider "${providerName}"`);
    }
    return createDeviceAuthorizationClient(provider);
  });

  return (store: MailStore): AccessTokenSource | null => {
    const { auth } = store.credentials;
    if (auth.type !== 'oauth2' || !options.broker) {
      return null;
    }
    const existing = sources.get(store.role);
    if (existing) {
      return existing;
    }
    const source = createTokenSource({
      backend: createTokenBackend({
        name: tokenNameFor(options.account, store),
        broker: options.broker,
        connector: options.connector,
        logger: options.logger,
      }),
      client: clientFor(auth.provider),
      logger: options.logger,
      signal: options.signal,
    });
    sources.set(store.role, source);
    return source;
  };
};
