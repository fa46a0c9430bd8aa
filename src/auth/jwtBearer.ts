import crypto from 'crypto';
import { SignJWT, importPKCS8, type KeyLike } from 'jose';
import { ConnectionType, type JwtBearerCredentials, type Token } from '../types/connection.js';
import type { AuthProviderOptions, JwtAuthProvider } from './index.js';
import { jsforceOAuth2Factory } from './oauth2Client.js';
import { toToken } from './tokenResponse.js';
import { AuthError, toAuthError } from '../utils/errorHandler.js';
import { log } from '../utils/logger.js';

const FLOW = 'JWT Bearer';

/**
 * Lifetime of a signed assertion; Salesforce rejects anything past 3 minutes
 */
export const ASSERTION_TTL_SECONDS = 180;

/**
 * OAuth 2.0 JWT Bearer flow. There is no refresh token: every session, first
 * or renewed, comes from a freshly signed assertion.
 */
export function createJwtBearerProvider(
  credentials: JwtBearerCredentials,
  options: AuthProviderOptions
): JwtAuthProvider {
  const now = options.now ?? Date.now;
  const factory = options.oauth2Factory ?? jsforceOAuth2Factory;
  const client = factory({ loginUrl: options.loginUrl, clientId: credentials.clientId });
  let signingKey: Promise<KeyLike> | null = null;

  const signAssertion = async (): Promise<string> => {
    try {
      signingKey ??= importPKCS8(credentials.privateKey, 'RS256');
      const key = await signingKey;
      const issuedAt = Math.floor(now() / 1000);

      return await new SignJWT({})
        .setProtectedHeader({ alg: 'RS256' })
        .setIssuer(credentials.clientId)
        .setSubject(credentials.username)
        .setAudience(options.loginUrl)
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + ASSERTION_TTL_SECONDS)
        .setJti(crypto.randomUUID())
        .sign(key);
    } catch (error) {
      signingKey = null;
      throw new AuthError(
        `Failed to sign JWT assertion: ${error instanceof Error ? error.message : String(error)}`,
        'signature_failure',
        undefined,
        error
      );
    }
  };

  const authenticate = async (): Promise<Token> => {
    if (!credentials.clientId || !credentials.username || !credentials.privateKey) {
      throw new AuthError(
        'SALESFORCE_CLIENT_ID, SALESFORCE_USERNAME and a private key are required for the JWT bearer flow',
        'malformed_credentials'
      );
    }

    const assertion = await signAssertion();

    let response: unknown;
    try {
      response = await client.jwtAuthorize(assertion);
    } catch (error) {
      throw toAuthError(error, FLOW);
    }

    const token = toToken(response, FLOW, { now, sessionTtlSeconds: options.sessionTtlSeconds });
    log('INFO', `JWT bearer session established for ${credentials.username}`);
    return token;
  };

  return {
    type: ConnectionType.JWT_Bearer,
    authenticate,
    refresh: () => authenticate(),
  };
}
