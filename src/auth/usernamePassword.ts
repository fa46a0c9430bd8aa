import { ConnectionType, type UsernamePasswordCredentials } from '../types/connection.js';
import type { AuthProviderOptions, PasswordAuthProvider } from './index.js';
import { jsforceOAuth2Factory } from './oauth2Client.js';
import { toToken } from './tokenResponse.js';
import { AuthError, toAuthError } from '../utils/errorHandler.js';
import { log } from '../utils/logger.js';

const FLOW = 'Username/Password';

/**
 * OAuth 2.0 Username-Password flow. Sessions are never refreshed proactively;
 * a refresh is simply a new login.
 */
export function createUsernamePasswordProvider(
  credentials: UsernamePasswordCredentials,
  options: AuthProviderOptions
): PasswordAuthProvider {
  const now = options.now ?? Date.now;
  const factory = options.oauth2Factory ?? jsforceOAuth2Factory;
  const client = factory({
    loginUrl: options.loginUrl,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
  });

  const authenticate = async () => {
    if (!credentials.username || !credentials.password) {
      throw new AuthError(
        'SALESFORCE_USERNAME and SALESFORCE_PASSWORD are required for Username/Password authentication',
        'malformed_credentials'
      );
    }

    log('DEBUG', `Requesting Username/Password token for ${credentials.username}`);

    let response: unknown;
    try {
      response = await client.authenticate(credentials.username, credentials.password + (credentials.securityToken || ''));
    } catch (error) {
      throw toAuthError(error, FLOW);
    }

    const token = toToken(response, FLOW, { now, sessionTtlSeconds: options.sessionTtlSeconds });
    log('INFO', 'Username/Password session established');
    return token;
  };

  return {
    type: ConnectionType.User_Password,
    authenticate,
    refresh: () => authenticate(),
  };
}
