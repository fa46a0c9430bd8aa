import type { Token } from '../types/connection.js';
import type { AuthProvider } from '../auth/index.js';
import { AuthError, NotAuthenticatedError } from './errorHandler.js';
import { DeadlineExceeded, createDeadline, raceAbort } from './abort.js';
import { log } from './logger.js';

/**
 * Safety margin subtracted from a token's expiry
 */
export const TOKEN_EXPIRY_SKEW_MS = 30 * 1000;

/**
 * Upper bound on one provider call; a request past it is abandoned so the next
 * caller can start over
 */
export const TOKEN_REQUEST_TIMEOUT_MS = 30 * 1000;

/**
 * Check if token is expired or will expire within the skew window.
 * A token without expiry is assumed valid until a 401 says otherwise.
 */
export function isTokenExpired(token: Token, now: number = Date.now(), skewMs: number = TOKEN_EXPIRY_SKEW_MS): boolean {
  if (!token.expiresAt) {
    return false;
  }
  return now >= token.expiresAt.getTime() - skewMs;
}

export interface TokenCacheOptions {
  skewMs?: number;
  requestTimeoutMs?: number;
  now?: () => number;
}

/**
 * Holds the live token of one org. Every check-then-refresh-then-store sequence
 * runs through a single in-flight promise, so concurrent callers that need a new
 * token share one provider call instead of racing.
 */
export class TokenCache {
  private current: Token | null = null;
  private pending: Promise<Token> | null = null;
  private readonly skewMs: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;

  constructor(public readonly orgAlias: string, options: TokenCacheOptions = {}) {
    this.skewMs = options.skewMs ?? TOKEN_EXPIRY_SKEW_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? TOKEN_REQUEST_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Current token, or NotAuthenticatedError when none has been stored
   */
  get(): Token {
    if (!this.current) {
      throw new NotAuthenticatedError(this.orgAlias);
    }
    return this.current;
  }

  peek(): Token | null {
    return this.current;
  }

  set(token: Token): void {
    this.current = Object.freeze({ ...token });
  }

  clear(): void {
    this.current = null;
  }

  isExpired(token: Token, now: number = this.now()): boolean {
    return isTokenExpired(token, now, this.skewMs);
  }

  /** True while a refresh for this org is in flight */
  get refreshing(): boolean {
    return this.pending !== null;
  }

  /**
   * Return a usable token, authenticating or refreshing when the cached one is
   * missing or expired
   */
  async acquire(provider: AuthProvider, signal?: AbortSignal): Promise<Token> {
    const current = this.current;
    if (current && !this.isExpired(current)) {
      return current;
    }
    return this.exclusive(
      () => (current ? provider.refresh(current) : provider.authenticate()),
      signal
    );
  }

  /**
   * Replace a token the remote rejected. If another caller already swapped it
   * out, the newer token is reused instead of refreshing again.
   */
  async replaceRejected(provider: AuthProvider, rejected: Token, signal?: AbortSignal): Promise<Token> {
    const current = this.current;
    if (current && current !== rejected && !this.isExpired(current)) {
      return current;
    }
    if (this.pending) {
      return raceAbort(this.pending, signal);
    }
    return this.exclusive(() => provider.refresh(current ?? rejected), signal);
  }

  private exclusive(task: () => Promise<Token>, signal?: AbortSignal): Promise<Token> {
    if (!this.pending) {
      const deadline = createDeadline(undefined, this.requestTimeoutMs);
      const pending = raceAbort(task(), deadline.signal)
        .catch((error: unknown) => {
          if (error instanceof DeadlineExceeded) {
            throw new AuthError(
              `Token request for org ${this.orgAlias} timed out after ${error.timeoutMs}ms`,
              'network',
              undefined,
              error
            );
          }
          throw error;
        })
        .then((token) => {
          this.set(token);
          log('DEBUG', `Token stored for org: ${this.orgAlias}`);
          return this.get();
        })
        .finally(() => {
          deadline.dispose();
          this.pending = null;
        });
      pending.catch((error: unknown) => {
        log('WARN', `Token refresh failed for org: ${this.orgAlias}`, error instanceof Error ? error.message : error);
      });
      this.pending = pending;
    }
    return raceAbort(this.pending, signal);
  }
}
