import type { LifecycleState } from './types.js';

export type MailMirrorErrorKind =
  | 'config'
  | 'connection'
  | 'fetch'
  | 'store'
  | 'cleanup'
  | 'auth'
  | 'broker';

type AttributionOptions = {
  cause?: unknown;
  account?: string;
  state?: LifecycleState;
};

export class MailMirrorError extends Error {
  readonly kind: MailMirrorErrorKind;
  account: string | null;
  state: LifecycleState | null;

  constructor(kind: MailMirrorErrorKind, message: string, options: AttributionOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.account = options.account ?? null;
    this.state = options.state ?? null;
  }
}

export class ConfigError extends MailMirrorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: AttributionOptions = {}) {
    super('config', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.issues = issues;
  }
}

export class ConnectionError extends MailMirrorError {
  constructor(message: string, options: AttributionOptions = {}) {
    super('connection', message, options);
  }
}

export class FetchError extends MailMirrorError {
  constructor(message: string, options: AttributionOptions = {}) {
    super('fetch', message, options);
  }
}

export class StoreError extends MailMirrorError {
  readonly uid: number | null;

  constructor(message: string, uid: number | null, options: AttributionOptions = {}) {
    super('store', message, options);
    this.uid = uid;
  }
}

export class CleanupError extends MailMirrorError {
  constructor(message: string, options: AttributionOptions = {}) {
    super('cleanup', message, options);
  }
}

export class AuthError extends MailMirrorError {
  constructor(message: string, options: AttributionOptions = {}) {
    super('auth', message, options);
  }
}

export class BrokerError extends MailMirrorError {
  constructor(message: string, options: AttributionOptions = {}) {
    super('broker', message, options);
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/**
 * Stamps the account and lifecycle state onto a failure. Errors that are not
 * yet one of ours become a `ConnectionError`, since anything escaping the
 * pipeline stages unclassified came from session handling.
 */
export const attributeError = (
  error: unknown,
  account: string,
  state: LifecycleState,
): MailMirrorError => {
  const attributed = error instanceof MailMirrorError
    ? error
    : new ConnectionError(errorMessage(error), { cause: error });
  attributed.account ??= account;
  attributed.state ??= state;
  return attributed;
};

export const describeError = (error: unknown): string => {
  if (error instanceof MailMirrorError && error.account) {
    return `${error.account} [${error.state ?? 'unknown'}]: ${error.message}`;
  }
  return errorMessage(error);
};
