import { Issuer } from 'openid-client';
import type { TokenSet } from 'openid-client';
import { AuthError, errorMessage } from '../../shared/errors.js';
import type { DeviceAuthChallenge, OAuthProviderConfig, Token } from '../../shared/types.js';

export type DeviceAuthorization = {
  challenge: DeviceAuthChallenge;
  /** Polls the token endpoint until the user approved, denied or the code expired. */
  waitForToken: (signal?: AbortSignal) => Promise<Token>;
};

export type DeviceAuthorizationClient = {
  requestDeviceCode: () => Promise<DeviceAuthorization>;
  refresh: (token: Token) => Promise<Token>;
};

export const tokenFromTokenSet = (tokenSet: TokenSet, previous?: Token): Token => {
  if (!tokenSet.access_token) {
    throw new AuthError('token response carried no access token');
  }
  return {
    accessToken: tokenSet.access_token,
    tokenType: tokenSet.token_type ?? 'Bearer',
    refreshToken: tokenSet.refresh_token ?? previous?.refreshToken ?? null,
    expiresAt: tokenSet.expires_at ? new Date(tokenSet.expires_at * 1000) : null,
  };
};

export const createDeviceAuthorizationClient = (provider: OAuthProviderConfig): DeviceAuthorizationClient => {
  const issuer = new Issuer({
    issuer: new URL(provider.tokenUrl).origin,
    token_endpoint: provider.tokenUrl,
    device_authorization_endpoint: provider.deviceAuthorizationUrl,
  });
  const client = provider.clientSecret
    ? new issuer.Client({
      client_id: provider.clientId,
      client_secret: provider.clientSecret,
      token_endpoint_auth_method: 'client_secret_post',
    })
    : new issuer.Client({
      client_id: provider.clientId,
      token_endpoint_auth_method: 'none',
    });

  const requestDeviceCode = async (): Promise<DeviceAuthorization> => {
    const handle = await client.deviceAuthorization({ scope: provider.scopes.join(' ') }).catch((error: unknown) => {
      throw new AuthError(`device authorization request failed: ${errorMessage(error)}`, { cause: error });
    });
    return {
      challenge: {
        verificationUri: handle.verification_uri,
        userCode: handle.user_code,
        expiresInSeconds: handle.expires_in,
      },
      waitForToken: async (signal) => {
        try {
          return tokenFromTokenSet(await handle.poll({ signal }));
        } catch (error) {
          throw new AuthError(`device authorization failed: ${errorMessage(error)}`, { cause: error });
        }
      },
    };
  };

  const refresh = async (token: Token) => {
    if (!token.refreshToken) {
      throw new AuthError('token expired and no refresh token is set');
    }
    try {
      return tokenFromTokenSet(await client.refresh(token.refreshToken), token);
    } catch (error) {
      throw new AuthError(`token refresh failed: ${errorMessage(error)}`, { cause: error });
    }
  };

  return { requestDeviceCode, refresh };
};
