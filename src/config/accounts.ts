import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../shared/errors.js';
import type {
  Account,
  BrokerSettings,
  MailStoreCredentials,
  OAuthProviderTable,
} from '../shared/types.js';
import { env } from './env.js';

const DEFAULT_IMAPS_PORT = 993;
const DEFAULT_MAILBOX = 'INBOX';

export const defaultOAuthProviders: OAuthProviderTable = {
  microsoft: {
    clientId: '9e5f94bc-e8a4-4e73-b8be-63364c29d753',
    scopes: ['https://outlook.office.com/IMAP.AccessAsUser.All', 'offline_access'],
    deviceAuthorizationUrl: 'https://login.microsoftonline.com/common/oauth2/v2.0/devicecode',
    tokenUrl: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
  },
};

const SERVER_PATTERN = /^[^:\s]+(?::(\d{1,5}))?$/;

const serverSchema = z
  .string()
  .trim()
  .min(1, 'server is required')
  .refine((value) => SERVER_PATTERN.test(value), 'server must be host or host:port')
  .refine((value) => {
    const port = SERVER_PATTERN.exec(value)?.[1];
    return port === undefined || (Number(port) >= 1 && Number(port) <= 65535);
  }, 'server port must be between 1 and 65535');

const storeSchema = z
  .object({
    server: serverSchema,
    username: z.string().min(1, 'username is required'),
    password: z.string().optional(),
    mailbox: z.string().trim().min(1).optional(),
    auth: z
      .discriminatedUnion('type', [
        z.object({ type: z.literal('password') }),
        z.object({ type: z.literal('oauth2'), provider: z.string().min(1) }),
      ])
      .optional(),
  })
  .superRefine((store, ctx) => {
    const type = store.auth?.type ?? 'password';
    if (type === 'password' && !store.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: 'password is required for password login' });
    }
  });

const providerSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  scopes: z.array(z.string().min(1)).min(1),
  deviceAuthorizationUrl: z.string().url(),
  tokenUrl: z.string().url(),
});

const configSchema = z.object({
  accounts: z
    .array(
      z.object({
        name: z.string().trim().min(1, 'name is required'),
        source: storeSchema,
        target: storeSchema,
      }),
    )
    .min(1, 'at least one account is required'),
  mqtt: z
    .object({
      url: z.string().min(1),
      clientId: z.string().min(1),
      username: z.string().optional(),
      password: z.string().optional(),
    })
    .optional(),
  providers: z.record(providerSchema).optional(),
});

type StoreInput = z.infer<typeof storeSchema>;

export type AccountsConfig = {
  accounts: Account[];
  broker: BrokerSettings | null;
  providers: OAuthProviderTable;
};

const parseServer = (server: string) => {
  const [host, port] = server.split(':');
  return { host, port: port ? Number(port) : DEFAULT_IMAPS_PORT };
};

const toCredentials = (store: StoreInput): MailStoreCredentials => {
  const { host, port } = parseServer(store.server);
  const auth = store.auth?.type === 'oauth2'
    ? { type: 'oauth2' as const, provider: store.auth.provider }
    : { type: 'password' as const, password: store.password ?? '' };
  return {
    host,
    port,
    username: store.username,
    auth,
    mailbox: store.mailbox ?? DEFAULT_MAILBOX,
  };
};

const formatIssuePath = (pathParts: Array<string | number>) =>
  pathParts.length > 0 ? pathParts.join('.') : '(root)';

const envBrokerSettings = (): BrokerSettings | null => {
  if (!env.mqtt.url || !env.mqtt.clientId) {
    return null;
  }
  return {
    url: env.mqtt.url,
    clientId: env.mqtt.clientId,
    username: env.mqtt.username,
    password: env.mqtt.password,
  };
};

export const parseAccountsConfig = (
  raw: unknown,
  fallbackBroker: BrokerSettings | null = envBrokerSettings(),
): AccountsConfig => {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'invalid accounts configuration',
      parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`),
    );
  }

  const providers: OAuthProviderTable = { ...defaultOAuthProviders, ...(parsed.data.providers ?? {}) };
  const broker = parsed.data.mqtt ?? fallbackBroker;
  const issues: string[] = [];
  const seenNames = new Set<string>();

  parsed.data.accounts.forEach((account, index) => {
    if (seenNames.has(account.name)) {
      issues.push(`accounts.${index}.name: duplicate account name "${account.name}"`);
    }
    seenNames.add(account.name);

    for (const role of ['source', 'target'] as const) {
      const auth = account[role].auth;
      if (auth?.type !== 'oauth2') {
        continue;
      }
      if (!providers[auth.provider]) {
        issues.push(`accounts.${index}.${role}.auth.provider: unknown provider "${auth.provider}"`);
      }
      if (!broker) {
        issues.push(`accounts.${index}.${role}.auth: oauth2 login needs an mqtt broker`);
      }
    }
  });

  if (issues.length > 0) {
    throw new ConfigError('invalid accounts configuration', issues);
  }

  const accounts = parsed.data.accounts.map((account): Account => ({
    name: account.name,
    source: { role: 'source', credentials: toCredentials(account.source) },
    target: { role: 'target', credentials: toCredentials(account.target) },
    state: 'initial',
    processed: 0,
    lastError: null,
  }));

  return { accounts, broker, providers };
};

export const loadAccountsConfig = async (configPath = env.configPath): Promise<AccountsConfig> => {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read accounts file ${configPath}`, [errorMessage(error)], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`accounts file ${configPath} is not valid JSON`, [errorMessage(error)], { cause: error });
  }

  return parseAccountsConfig(raw);
};
