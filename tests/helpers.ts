import { vi } from "vitest";
import { ConnectionType, type OrgConfig, type RateLimitConfig, type RetryConfig, type Token } from "../src/types/connection.js";
import type { PasswordAuthProvider } from "../src/auth/index.js";
import type { AuditLogEntry, AuditSink } from "../src/types/audit.js";
import { OrgRegistry } from "../src/utils/orgRegistry.js";
import { HttpDispatcher } from "../src/utils/httpDispatcher.js";

export const INSTANCE_URL = "https://example.my.salesforce.com";

export function makeToken(accessToken: string, overrides: Partial<Token> = {}): Token {
  return {
    accessToken,
    instanceUrl: INSTANCE_URL,
    issuedAt: new Date(0),
    expiresAt: null,
    ...overrides,
  };
}

export function orgConfig(alias: string, overrides: Partial<OrgConfig> = {}): OrgConfig {
  return {
    alias,
    domain: "login",
    credentials: {
      type: ConnectionType.User_Password,
      username: `${alias}@example.com`,
      password: "test-password",
      securityToken: "test-token",
    },
    apiVersion: "59.0",
    ...overrides,
  };
}

/**
 * Provider that hands out token-1, token-2, ... and counts its calls
 */
export function fakeProvider(tokenOverrides: Partial<Token> = {}) {
  let issued = 0;
  const next = async (): Promise<Token> => makeToken(`token-${++issued}`, tokenOverrides);
  const authenticate = vi.fn(next);
  const refresh = vi.fn((_current: Token) => next());
  const provider: PasswordAuthProvider = {
    type: ConnectionType.User_Password,
    authenticate,
    refresh,
  };
  return { provider, authenticate, refresh };
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditLogEntry[] = [];

  record(entry: AuditLogEntry): void {
    this.entries.push(entry);
  }
}

export type FetchMock = ReturnType<typeof stubFetch>;

export function stubFetch() {
  const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function csvResponse(body: string): Response {
  return new Response(body, { status: 200, headers: { "Content-Type": "text/csv" } });
}

export function emptyResponse(status = 204): Response {
  return new Response(null, { status });
}

/** URL and method of the nth fetch call */
export function callAt(fetchMock: FetchMock, index: number): { url: string; method: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} time(s), no call #${index}`);
  }
  const [input, init = {}] = call;
  return { url: String(input), method: init.method ?? "GET", init };
}

export function headerOf(init: RequestInit, name: string): string | undefined {
  const headers = init.headers;
  if (headers && !(headers instanceof Headers) && !Array.isArray(headers)) {
    const value = headers[name];
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

export const FAST_RETRY: Partial<RetryConfig> = {
  baseBackoffMs: 1,
  maxBackoffMs: 4,
  retryAfterFallbackMs: 1,
  timeoutMs: 5_000,
};

export const NO_LIMIT: RateLimitConfig = {
  requestsPerSecond: 1000,
  burstSize: 1000,
  waitOnLimit: true,
};

/**
 * Registry with one org backed by a fake provider, and a dispatcher over it
 */
export function createTestDispatcher(options: {
  alias?: string;
  retry?: Partial<RetryConfig>;
  rateLimit?: RateLimitConfig;
  token?: Partial<Token>;
  tokenRequestTimeoutMs?: number;
} = {}) {
  const alias = options.alias ?? "default";
  const fake = fakeProvider(options.token);
  const registry = new OrgRegistry(alias);
  const org = registry.register(orgConfig(alias), {
    rateLimit: options.rateLimit ?? NO_LIMIT,
    authProvider: fake.provider,
    tokenRequestTimeoutMs: options.tokenRequestTimeoutMs,
  });
  const audit = new MemoryAuditSink();
  const dispatcher = new HttpDispatcher(registry, {
    retry: { ...FAST_RETRY, ...options.retry },
    auditSink: audit,
  });
  return { registry, org, dispatcher, audit, ...fake };
}

/** Let fire-and-forget work such as audit reporting settle */
export async function flushMicrotasks(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}
