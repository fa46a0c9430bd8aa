import { ConnectionType, type Credentials, type Token } from '../types/connection.js';
import { createUsernamePasswordProvider } from './usernamePassword.js';
import { createWebServerProvider } from './webServerFlow.js';
import { createJwtBearerProvider } from './jwtBearer.js';
import type { OAuth2ClientFactory } from './oauth2Client.js';

export type { OAuth2Client, OAuth2ClientConfig, OAuth2ClientFactory } from './oauth2Client.js';
export { jsforceOAuth2Factory } from './oauth2Client.js';

/**
 * Capability shared by every authentication flow. Providers never retry;
 * retry policy belongs to the dispatcher.
 */
interface AuthProviderBase {
  authenticate(): Promise<Token>;
  refresh(current: Token): Promise<Token>;
}

export interface PasswordAuthProvider extends AuthProviderBase {
  readonly type: ConnectionType.User_Password;
}

export interface WebServerAuthProvider extends AuthProviderBase {
  readonly type: ConnectionType.OAuth_2_0_Web_Server;
  /** Consent URL the user opens to obtain an authorization code */
  authorizationUrl(state?: string): string;
}

export interface JwtAuthProvider extends AuthProviderBase {
  readonly type: ConnectionType.JWT_Bearer;
}

export type AuthProvider = PasswordAuthProvider | WebServerAuthProvider | JwtAuthProvider;

export interface AuthProviderOptions {
  loginUrl: string;
  sessionTtlSeconds?: number;
  now?: () => number;
  oauth2Factory?: OAuth2ClientFactory;
}

/**
 * Build the provider for a credential set
 */
export function createAuthProvider(credentials: Credentials, options: AuthProviderOptions): AuthProvider {
  switch (credentials.type) {
    case ConnectionType.User_Password:
      return createUsernamePasswordProvider(credentials, options);
    case ConnectionType.OAuth_2_0_Web_Server:
      return createWebServerProvider(credentials, options);
    case ConnectionType.JWT_Bearer:
      return createJwtBearerProvider(credentials, options);
  }
}
