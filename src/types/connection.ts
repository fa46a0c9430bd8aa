/**
 * Enum representing the available Salesforce connection types
 */
export enum ConnectionType {
  /**
   * OAuth 2.0 Username-Password flow with security token
   * Requires SALESFORCE_USERNAME, SALESFORCE_PASSWORD, and optionally SALESFORCE_SECURITY_TOKEN
   */
  User_Password = 'User_Password',

  /**
   * OAuth 2.0 Web Server flow (authorization code, then refresh token)
   * Requires SALESFORCE_CLIENT_ID, SALESFORCE_CLIENT_SECRET, SALESFORCE_REDIRECT_URI
   * and either SALESFORCE_AUTH_CODE or SALESFORCE_REFRESH_TOKEN
   */
  OAuth_2_0_Web_Server = 'OAuth_2.0_Web_Server',

  /**
   * OAuth 2.0 JWT Bearer flow signed with a connected app certificate key
   * Requires SALESFORCE_CLIENT_ID, SALESFORCE_USERNAME and SALESFORCE_PRIVATE_KEY(_FILE)
   */
  JWT_Bearer = 'JWT_Bearer'
}

export interface UsernamePasswordCredentials {
  readonly type: ConnectionType.User_Password;
  readonly username: string;
  readonly password: string;
  /** Appended to the password; empty when the org trusts the caller's IP range */
  readonly securityToken: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
}

export interface WebServerCredentials {
  readonly type: ConnectionType.OAuth_2_0_Web_Server;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
  /** Single-use code from the consent redirect */
  readonly authCode?: string;
  /** Refresh token from an earlier exchange */
  readonly refreshToken?: string;
}

export interface JwtBearerCredentials {
  readonly type: ConnectionType.JWT_Bearer;
  readonly clientId: string;
  readonly username: string;
  /** PKCS#8 PEM private key matching the connected app certificate */
  readonly privateKey: string;
}

export type Credentials =
  | UsernamePasswordCredentials
  | WebServerCredentials
  | JwtBearerCredentials;

/**
 * Access token issued for one org. Instances are frozen and replaced whole.
 */
export interface Token {
  readonly accessToken: string;
  readonly instanceUrl: string;
  readonly issuedAt: Date;
  /** null when the flow reported no expiry; the token then lives until a 401 */
  readonly expiresAt: Date | null;
  readonly refreshToken?: string;
}

/**
 * Configuration for one registered Salesforce org
 */
export interface OrgConfig {
  readonly alias: string;
  /**
   * "login", "test", a My Domain host or a full login URL
   * @default 'login'
   */
  readonly domain: string;
  readonly credentials: Credentials;
  /** @default '59.0' */
  readonly apiVersion: string;
  /** Session lifetime to assume when the token response carries none */
  readonly sessionTtlSeconds?: number;
}

export interface RateLimitConfig {
  readonly requestsPerSecond: number;
  readonly burstSize: number;
  readonly waitOnLimit: boolean;
}

export interface RetryConfig {
  /** Retries after the first attempt for 429, 5xx and network failures */
  readonly maxRetries: number;
  readonly baseBackoffMs: number;
  readonly maxBackoffMs: number;
  /** Delay used for a 429 without a Retry-After header */
  readonly retryAfterFallbackMs: number;
  /** Default per-call deadline */
  readonly timeoutMs: number;
}

export const DEFAULT_API_VERSION = '59.0';

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  requestsPerSecond: 10,
  burstSize: 20,
  waitOnLimit: true
};

export const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseBackoffMs: 500,
  maxBackoffMs: 8000,
  retryAfterFallbackMs: 1000,
  timeoutMs: 30_000
};

/**
 * Resolve the login endpoint for an org domain setting
 */
export function resolveLoginUrl(domain: string): string {
  const trimmed = domain.trim().replace(/\/+$/, '');
  if (trimmed === '' || trimmed === 'login' || trimmed === 'test') {
    return `https://${trimmed || 'login'}.salesforce.com`;
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

/**
 * Summary of a credential set that is safe to log
 */
export function describeCredentials(credentials: Credentials): string {
  switch (credentials.type) {
    case ConnectionType.User_Password:
      return `${credentials.type} (username=${credentials.username})`;
    case ConnectionType.OAuth_2_0_Web_Server:
      return `${credentials.type} (clientId=${mask(credentials.clientId)}, ` +
        `authCode=${credentials.authCode ? 'present' : 'absent'}, ` +
        `refreshToken=${credentials.refreshToken ? 'present' : 'absent'})`;
    case ConnectionType.JWT_Bearer:
      return `${credentials.type} (clientId=${mask(credentials.clientId)}, username=${credentials.username})`;
  }
}

function mask(value: string): string {
  return value.length <= 6 ? '***' : `${value.slice(0, 6)}***`;
}
