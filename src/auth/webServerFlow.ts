import { ConnectionType, type Token, type WebServerCredentials } from '../types/connection.js';
import type { AuthProviderOptions, WebServerAuthProvider } from './index.js';
import { jsforceOAuth2Factory } from './oauth2Client.js';
import { toToken } from './tokenResponse.js';
import { AuthError, toAuthError } from '../utils/errorHandler.js';
import { log } from '../utils/logger.js';

const FLOW = 'OAuth 2.0 Web Server';

/**
 * Scope requested on the consent screen; refresh_token is needed so the
 * runtime can renew sessions without sending the user back through consent
 */
export const DEFAULT_AUTHORIZATION_SCOPE = 'api refresh_token';

/**
 * OAuth 2.0 Web Server flow.
 *
 * The authorization code is single-use: it is marked redeemed before the
 * exchange is sent and is never retried, even when the exchange fails. Every
 * later session comes from the refresh token.
 */
export function createWebServerProvider(
  credentials: WebServerCredentials,
  options: AuthProviderOptions
): WebServerAuthProvider {
  const now = options.now ?? Date.now;
  const factory = options.oauth2Factory ?? jsforceOAuth2Factory;
  const client = factory({
    loginUrl: options.loginUrl,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    redirectUri: credentials.redirectUri,
  });

  let codeRedeemed = false;
  let lastRefreshToken = credentials.refreshToken;

  const assertClient = () => {
    if (!credentials.clientId || !credentials.clientSecret) {
      throw new AuthError(
        'SALESFORCE_CLIENT_ID and SALESFORCE_CLIENT_SECRET are required for the web server flow',
        'malformed_credentials'
      );
    }
  };

  const refreshWith = async (refreshToken: string): Promise<Token> => {
    let response: unknown;
    try {
      response = await client.refreshToken(refreshToken);
    } catch (error) {
      throw toAuthError(error, FLOW);
    }
    const token = toToken(response, FLOW, {
      now,
      sessionTtlSeconds: options.sessionTtlSeconds,
      fallbackRefreshToken: refreshToken,
    });
    lastRefreshToken = token.refreshToken ?? refreshToken;
    log('INFO', 'Access token refreshed via refresh token');
    return token;
  };

  const authenticate = async (): Promise<Token> => {
    assertClient();

    if (credentials.authCode && !codeRedeemed) {
      codeRedeemed = true;
      log('DEBUG', 'Exchanging authorization code for tokens');

      let response: unknown;
      try {
        response = await client.requestToken(credentials.authCode);
      } catch (error) {
        throw toAuthError(error, FLOW);
      }
      const token = toToken(response, FLOW, {
        now,
        sessionTtlSeconds: options.sessionTtlSeconds,
        fallbackRefreshToken: lastRefreshToken,
      });
      lastRefreshToken = token.refreshToken ?? lastRefreshToken;
      log('INFO', 'Authorization code exchanged successfully');
      return token;
    }

    if (lastRefreshToken) {
      return refreshWith(lastRefreshToken);
    }

    throw new AuthError(
      codeRedeemed
        ? 'Authorization code was already redeemed and no refresh token is available; restart the authorization flow'
        : 'Either an authorization code or a refresh token is required for the web server flow',
      'malformed_credentials'
    );
  };

  const refresh = async (current: Token): Promise<Token> => {
    assertClient();
    const refreshToken = current.refreshToken ?? lastRefreshToken;
    if (!refreshToken) {
      throw new AuthError('No refresh token available; restart the authorization flow', 'malformed_credentials');
    }
    return refreshWith(refreshToken);
  };

  return {
    type: ConnectionType.OAuth_2_0_Web_Server,
    authenticate,
    refresh,
    authorizationUrl: (state?: string) =>
      client.getAuthorizationUrl({
        scope: DEFAULT_AUTHORIZATION_SCOPE,
        ...(state ? { state } : {}),
      }),
  };
}
