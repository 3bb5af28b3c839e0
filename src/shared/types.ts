export const LIFECYCLE_STATES = [
  'initial',
  'connecting',
  'connected',
  'watching',
  'handling',
  'shutdown',
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export type PasswordAuth = { type: 'password'; password: string };
export type BearerAuth = { type: 'oauth2'; provider: string };
export type StoreAuth = PasswordAuth | BearerAuth;

/** Credentials and location of one mail store, shared by both roles. */
export type MailStoreCredentials = {
  host: string;
  port: number;
  username: string;
  auth: StoreAuth;
  mailbox: string;
};

export type SourceStore = { role: 'source'; credentials: MailStoreCredentials };
export type TargetStore = { role: 'target'; credentials: MailStoreCredentials };
export type MailStore = SourceStore | TargetStore;

export type Account = {
  name: string;
  source: SourceStore;
  target: TargetStore;
  state: LifecycleState;
  processed: number;
  lastError: Error | null;
};

export type Message = {
  seq: number;
  uid: number;
  flags: string[];
  internalDate: Date;
  body: Buffer;
};

export type Token = {
  accessToken: string;
  tokenType: string;
  refreshToken: string | null;
  expiresAt: Date | null;
};

export type DeviceAuthChallenge = {
  verificationUri: string;
  userCode: string;
  expiresInSeconds: number | null;
};

export type OAuthProviderConfig = {
  clientId: string;
  clientSecret?: string;
  scopes: string[];
  deviceAuthorizationUrl: string;
  tokenUrl: string;
};

export type OAuthProviderTable = Record<string, OAuthProviderConfig>;

export type BrokerSettings = {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
};

export type MailboxChangeKind = 'mailbox' | 'expunge' | 'flags';

export type MailboxChangeEvent = {
  kind: MailboxChangeKind;
  mailbox: string;
  count?: number;
  uid?: number;
  reason?: 'push' | 'fallback' | 'initial';
};

export const formatStoreAddress = (credentials: MailStoreCredentials) =>
  `${credentials.host}:${credentials.port}`;
