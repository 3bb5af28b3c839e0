import { AuthError } from '../../shared/errors.js';

export type Xoauth2ErrorDetails = {
  status: string;
  schemes: string;
  scope: string;
};

/** Failure reported by the server during a bearer-token (XOAUTH2) login. */
export class Xoauth2Error extends AuthError {
  readonly details: Xoauth2ErrorDetails;

  constructor(details: Xoauth2ErrorDetails, options: { cause?: unknown } = {}) {
    super(`XOAUTH2 authentication error (${details.status})`, options);
    this.details = details;
  }
}

const readString = (record: Record<string, unknown>, key: string) => {
  const value = record[key];
  return typeof value === 'string' ? value : '';
};

const decodeChallenge = (challenge: string): string => {
  const trimmed = challenge.trim();
  if (trimmed.startsWith('{')) {
    return trimmed;
  }
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) {
    return trimmed;
  }
  return Buffer.from(trimmed, 'base64').toString('utf8');
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses the JSON error document a server sends as the XOAUTH2 challenge,
 * either raw or base64 encoded. Returns null when the text is not one.
 */
export const parseXoauth2Challenge = (challenge: string): Xoauth2ErrorDetails | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeChallenge(challenge));
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.status !== 'string') {
    return null;
  }
  return {
    status: readString(parsed, 'status'),
    schemes: readString(parsed, 'schemes'),
    scope: readString(parsed, 'scope'),
  };
};
