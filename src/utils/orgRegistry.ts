import {
  DEFAULT_RATE_LIMIT,
  describeCredentials,
  resolveLoginUrl,
  type OrgConfig,
  type RateLimitConfig,
} from '../types/connection.js';
import { createAuthProvider, type AuthProvider, type OAuth2ClientFactory } from '../auth/index.js';
import { TokenCache } from './tokenManager.js';
import { RateLimiter } from './rateLimiter.js';
import { ConfigurationError, UnknownOrgError } from './errorHandler.js';
import { log } from './logger.js';

/**
 * Everything the runtime keeps per registered org
 */
export interface OrgRuntime {
  readonly alias: string;
  readonly config: OrgConfig;
  readonly loginUrl: string;
  readonly authProvider: AuthProvider;
  readonly tokenCache: TokenCache;
  readonly rateLimiter: RateLimiter;
}

export interface RegisterOptions {
  rateLimit?: RateLimitConfig;
  /** Clock shared by the token cache and limiter */
  now?: () => number;
  /** Bound on each token request */
  tokenRequestTimeoutMs?: number;
  oauth2Factory?: OAuth2ClientFactory;
  authProvider?: AuthProvider;
}

/**
 * Maps org aliases to their auth provider, token cache and rate limiter.
 * Registration happens once at startup; lookups are read-only.
 */
export class OrgRegistry {
  private readonly orgs = new Map<string, OrgRuntime>();
  private defaultAlias?: string;

  constructor(defaultAlias?: string) {
    this.defaultAlias = defaultAlias;
  }

  register(config: OrgConfig, options: RegisterOptions = {}): OrgRuntime {
    if (this.orgs.has(config.alias)) {
      throw new ConfigurationError(`Org "${config.alias}" is already registered`);
    }

    const loginUrl = resolveLoginUrl(config.domain);
    const runtime: OrgRuntime = Object.freeze({
      alias: config.alias,
      config,
      loginUrl,
      authProvider: options.authProvider ?? createAuthProvider(config.credentials, {
        loginUrl,
        sessionTtlSeconds: config.sessionTtlSeconds,
        now: options.now,
        oauth2Factory: options.oauth2Factory,
      }),
      tokenCache: new TokenCache(config.alias, {
        now: options.now,
        requestTimeoutMs: options.tokenRequestTimeoutMs,
      }),
      rateLimiter: new RateLimiter(options.rateLimit ?? DEFAULT_RATE_LIMIT, options.now),
    });

    this.orgs.set(config.alias, runtime);
    log('INFO', `Registered org "${config.alias}" at ${loginUrl} using ${describeCredentials(config.credentials)}`);
    return runtime;
  }

  /**
   * Look up an org; the default org when no alias is given
   */
  resolve(alias?: string): OrgRuntime {
    const effectiveAlias = alias ?? this.defaultOrg;
    const runtime = effectiveAlias === undefined ? undefined : this.orgs.get(effectiveAlias);
    if (!runtime) {
      throw new UnknownOrgError(effectiveAlias ?? '(default)', this.aliases());
    }
    return runtime;
  }

  has(alias: string): boolean {
    return this.orgs.has(alias);
  }

  /** Explicit default, else the first registered org */
  get defaultOrg(): string | undefined {
    if (this.defaultAlias !== undefined) {
      return this.defaultAlias;
    }
    const first = this.orgs.keys().next();
    return first.done ? undefined : first.value;
  }

  aliases(): string[] {
    return Array.from(this.orgs.keys());
  }

  /**
   * Get registry statistics
   */
  getStats(): Array<{ alias: string; authenticated: boolean; tokenExpiresAt: string | null; availablePermits: number }> {
    return Array.from(this.orgs.values()).map((runtime) => {
      const token = runtime.tokenCache.peek();
      return {
        alias: runtime.alias,
        authenticated: token !== null,
        tokenExpiresAt: token?.expiresAt ? token.expiresAt.toISOString() : null,
        availablePermits: Math.floor(runtime.rateLimiter.available),
      };
    });
  }
}
