import jsforce from 'jsforce';

/**
 * Subset of jsforce's OAuth2 client the auth flows use
 */
export interface OAuth2Client {
  authenticate(username: string, password: string): Promise<unknown>;
  requestToken(code: string): Promise<unknown>;
  refreshToken(refreshToken: string): Promise<unknown>;
  /** Exchange a signed JWT bearer assertion */
  jwtAuthorize(assertion: string): Promise<unknown>;
  getAuthorizationUrl(params: { scope?: string; state?: string }): string;
}

export interface OAuth2ClientConfig {
  loginUrl: string;
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
}

export type OAuth2ClientFactory = (config: OAuth2ClientConfig) => OAuth2Client;

export const jsforceOAuth2Factory: OAuth2ClientFactory = (config) => new jsforce.OAuth2(config);
