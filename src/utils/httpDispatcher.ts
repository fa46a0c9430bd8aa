import { DEFAULT_RETRY, type RetryConfig, type Token } from '../types/connection.js';
import type { AuditSink } from '../types/audit.js';
import type { OrgRegistry, OrgRuntime } from './orgRegistry.js';
import {
  AuthenticationError,
  RateLimitError,
  SalesforceError,
  errorFromResponse,
  toRuntimeError,
} from './errorHandler.js';
import { createDeadline, sleep } from './abort.js';
import { NoopAuditSink, reportAudit } from './audit.js';
import { log } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface DispatchRequest {
  method: HttpMethod;
  /** Path on the org's instance, e.g. /services/data/v59.0/query */
  path: string;
  query?: Record<string, string | undefined>;
  /** Sent as JSON */
  body?: unknown;
  /** Sent as text/csv; takes precedence over body */
  csvBody?: string;
  /** Expected response format */
  accept?: 'json' | 'csv';
  /** Label used in audit entries and logs */
  operation?: string;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Overrides the configured per-call deadline */
  timeoutMs?: number;
}

export interface DispatchResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON, CSV text, or undefined for an empty body */
  body: unknown;
}

export interface HttpDispatcherOptions {
  retry?: Partial<RetryConfig>;
  auditSink?: AuditSink;
  now?: () => number;
}

/**
 * Parse a Retry-After header given in seconds or as an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Issues authenticated, rate-limited calls against an org and turns responses
 * into values or typed errors.
 *
 * - 401: one token refresh and one retry; a second 401 is an AuthenticationError
 * - 429: waits Retry-After (or the fallback) and retries up to maxRetries
 * - 5xx and network failures: exponential backoff up to maxRetries
 * - 400 / 404 / other 4xx: propagated immediately with the remote payload
 */
export class HttpDispatcher {
  readonly retry: RetryConfig;
  private readonly auditSink: AuditSink;
  private readonly now: () => number;

  constructor(readonly registry: OrgRegistry, options: HttpDispatcherOptions = {}) {
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.auditSink = options.auditSink ?? new NoopAuditSink();
    this.now = options.now ?? Date.now;
  }

  async send(orgAlias: string | undefined, request: DispatchRequest, options: DispatchOptions = {}): Promise<DispatchResponse> {
    const operation = request.operation ?? `${request.method} ${request.path}`;
    const started = this.now();
    const deadline = createDeadline(options.signal, options.timeoutMs ?? this.retry.timeoutMs);
    let resolvedAlias = orgAlias;
    let lastStatus: number | undefined;

    try {
      const runtime = this.registry.resolve(orgAlias);
      resolvedAlias = runtime.alias;
      const response = await this.execute(runtime, request, operation, deadline.signal, (status) => {
        lastStatus = status;
      });
      this.audit(resolvedAlias, operation, started, 'success', lastStatus);
      return response;
    } catch (error) {
      const failure = toRuntimeError(error, deadline.signal, operation);
      this.audit(resolvedAlias, operation, started, 'failure', lastStatus, failure.kind);
      throw failure;
    } finally {
      deadline.dispose();
    }
  }

  private async execute(
    runtime: OrgRuntime,
    request: DispatchRequest,
    operation: string,
    signal: AbortSignal,
    onStatus: (status: number) => void
  ): Promise<DispatchResponse> {
    let token = await runtime.tokenCache.acquire(runtime.authProvider, signal);
    let refreshedAfterRejection = false;
    let retries = 0;

    for (;;) {
      await runtime.rateLimiter.acquire(signal);

      let response: Response;
      try {
        response = await fetch(this.buildUrl(token, request), this.buildInit(token, request, signal));
      } catch (error) {
        if (signal.aborted || retries >= this.retry.maxRetries) {
          throw error;
        }
        retries++;
        const delay = this.backoff(retries);
        log('WARN', `${operation} on org "${runtime.alias}" failed (${describe(error)}), retry ${retries}/${this.retry.maxRetries} in ${delay}ms`);
        await sleep(delay, signal);
        continue;
      }

      onStatus(response.status);

      if (response.ok) {
        return { status: response.status, headers: response.headers, body: await this.readBody(response, request, operation) };
      }

      const payload = await readErrorPayload(response);

      if (response.status === 401) {
        if (refreshedAfterRejection) {
          throw new AuthenticationError(
            `Session for org "${runtime.alias}" was rejected again after a token refresh`,
            { orgAlias: runtime.alias, payload }
          );
        }
        refreshedAfterRejection = true;
        log('WARN', `${operation} on org "${runtime.alias}" returned 401, refreshing token and retrying once`);
        token = await runtime.tokenCache.replaceRejected(runtime.authProvider, token, signal);
        continue;
      }

      if (response.status === 429 || response.status >= 500) {
        const retryAfterMs = response.status === 429
          ? parseRetryAfter(response.headers.get('Retry-After'), this.now())
          : undefined;

        if (retries < this.retry.maxRetries) {
          retries++;
          const delay = response.status === 429
            ? retryAfterMs ?? this.retry.retryAfterFallbackMs
            : this.backoff(retries);
          log('WARN', `${operation} on org "${runtime.alias}" returned ${response.status}, retry ${retries}/${this.retry.maxRetries} in ${delay}ms`);
          await sleep(delay, signal);
          continue;
        }

        if (response.status === 429) {
          throw new RateLimitError(
            `Salesforce is still throttling ${operation} after ${this.retry.maxRetries} retries`,
            'remote_throttled',
            retryAfterMs,
            payload
          );
        }
      }

      throw errorFromResponse(response.status, payload, operation);
    }
  }

  private buildUrl(token: Token, request: DispatchRequest): string {
    const url = new URL(request.path, token.instanceUrl);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }

  private buildInit(token: Token, request: DispatchRequest, signal: AbortSignal): RequestInit {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token.accessToken}`,
      Accept: request.accept === 'csv' ? 'text/csv' : 'application/json',
    };

    let body: string | undefined;
    if (request.csvBody !== undefined) {
      headers['Content-Type'] = 'text/csv';
      body = request.csvBody;
    } else if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    return { method: request.method, headers, body, signal };
  }

  private async readBody(response: Response, request: DispatchRequest, operation: string): Promise<unknown> {
    const text = await response.text();
    if (response.status === 204 || text === '') {
      return undefined;
    }
    if (request.accept === 'csv') {
      return text;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new SalesforceError(`${operation} returned a body that is not valid JSON`, {
        errorCode: 'MALFORMED_RESPONSE',
        statusCode: response.status,
        details: { body: text.slice(0, 500) },
        cause: error,
      });
    }
  }

  private backoff(attempt: number): number {
    return Math.min(this.retry.maxBackoffMs, this.retry.baseBackoffMs * 2 ** (attempt - 1));
  }

  private audit(
    orgAlias: string | undefined,
    operation: string,
    started: number,
    outcome: 'success' | 'failure',
    status?: number,
    errorKind?: string
  ): void {
    const finished = this.now();
    reportAudit(this.auditSink, {
      timestamp: new Date(finished).toISOString(),
      orgAlias: orgAlias ?? '(default)',
      operation,
      outcome,
      durationMs: finished - started,
      ...(status === undefined ? {} : { status }),
      ...(errorKind === undefined ? {} : { errorKind }),
    });
  }
}

async function readErrorPayload(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
