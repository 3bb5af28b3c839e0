import { z } from 'zod';
import { AuthError, errorMessage } from '../../shared/errors.js';
import type { Token } from '../../shared/types.js';

/** Tokens this close to their expiry are treated as already expired. */
export const TOKEN_EXPIRY_LEEWAY_MS = 10_000;

const storedTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  expiry: z.string().optional(),
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

// Year-one timestamps are how "no expiry" is written by other token writers.
const parseExpiry = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const expiresAt = new Date(value);
  if (Number.isNaN(expiresAt.getTime()) || expiresAt.getUTCFullYear() <= 1) {
    return null;
  }
  return expiresAt;
};

export const serializeToken = (token: Token): string => {
  const stored: StoredToken = {
    access_token: token.accessToken,
    token_type: token.tokenType,
  };
  if (token.refreshToken) {
    stored.refresh_token = token.refreshToken;
  }
  if (token.expiresAt) {
    stored.expiry = token.expiresAt.toISOString();
  }
  return JSON.stringify(stored);
};

export const parseStoredToken = (payload: Buffer | string): Token => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload.toString());
  } catch (error) {
    throw new AuthError(`stored token is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = storedTokenSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthError(`stored token is malformed: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return {
    accessToken: parsed.data.access_token,
    tokenType: parsed.data.token_type || 'Bearer',
    refreshToken: parsed.data.refresh_token || null,
    expiresAt: parseExpiry(parsed.data.expiry),
  };
};

export const isTokenLive = (token: Token, now = Date.now()) =>
  token.accessToken.length > 0
  && (token.expiresAt === null || token.expiresAt.getTime() - TOKEN_EXPIRY_LEEWAY_MS > now);
