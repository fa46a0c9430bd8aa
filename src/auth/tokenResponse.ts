import { z } from 'zod';
import type { Token } from '../types/connection.js';
import { AuthError } from '../utils/errorHandler.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  instance_url: z.string().url(),
  refresh_token: z.string().min(1).optional(),
  issued_at: z.union([z.string(), z.number()]).optional(),
  expires_in: z.union([z.string(), z.number()]).optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export interface TokenMappingOptions {
  now: () => number;
  sessionTtlSeconds?: number;
  /** Kept when the response carries no new refresh token */
  fallbackRefreshToken?: string;
}

/**
 * Map an OAuth token endpoint response onto a Token
 */
export function toToken(raw: unknown, flow: string, options: TokenMappingOptions): Token {
  const parsed = TokenResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthError(
      `${flow} authentication failed: malformed token response (${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')})`,
      'remote_rejection'
    );
  }
  const response = parsed.data;
  const now = options.now();

  const issuedAtMs = response.issued_at === undefined ? NaN : Number(response.issued_at);
  const issuedAt = new Date(Number.isFinite(issuedAtMs) && issuedAtMs > 0 ? issuedAtMs : now);

  const expiresInSeconds = response.expires_in === undefined ? NaN : Number(response.expires_in);
  let expiresAt: Date | null = null;
  if (Number.isFinite(expiresInSeconds) && expiresInSeconds > 0) {
    expiresAt = new Date(now + expiresInSeconds * 1000);
  } else if (options.sessionTtlSeconds !== undefined) {
    expiresAt = new Date(issuedAt.getTime() + options.sessionTtlSeconds * 1000);
  }

  const refreshToken = response.refresh_token ?? options.fallbackRefreshToken;

  return Object.freeze({
    accessToken: response.access_token,
    instanceUrl: response.instance_url.replace(/\/+$/, ''),
    issuedAt,
    expiresAt,
    ...(refreshToken ? { refreshToken } : {}),
  });
}
