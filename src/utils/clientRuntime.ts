import type { AuditSink } from '../types/audit.js';
import type { AppConfig } from './config.js';
import { OrgRegistry, type RegisterOptions } from './orgRegistry.js';
import { HttpDispatcher } from './httpDispatcher.js';
import { SalesforceClient } from './salesforceClient.js';
import { JsonLinesAuditSink, LoggerAuditSink, NoopAuditSink } from './audit.js';

export interface ClientRuntimeOptions {
  auditSink?: AuditSink;
  /** Per-alias overrides such as an injected auth provider or clock */
  registerOptions?: (alias: string) => RegisterOptions;
  now?: () => number;
}

export function createAuditSink(config: AppConfig['audit']): AuditSink {
  if (!config.enabled) {
    return new NoopAuditSink();
  }
  return config.filePath ? new JsonLinesAuditSink(config.filePath) : new LoggerAuditSink();
}

/**
 * The registry, dispatcher and one client per org, built once at startup
 */
export class ClientRuntime {
  private readonly clients = new Map<string, SalesforceClient>();

  constructor(
    readonly registry: OrgRegistry,
    readonly dispatcher: HttpDispatcher,
    private readonly config: AppConfig
  ) {}

  /**
   * Client for an org; the default org when no alias is given
   */
  client(alias?: string): SalesforceClient {
    const org = this.registry.resolve(alias);
    let client = this.clients.get(org.alias);
    if (!client) {
      client = new SalesforceClient(this.dispatcher, org, this.config.bulk);
      this.clients.set(org.alias, client);
    }
    return client;
  }
}

export function createClientRuntime(config: AppConfig, options: ClientRuntimeOptions = {}): ClientRuntime {
  const registry = new OrgRegistry(config.defaultOrg);
  for (const org of config.orgs) {
    registry.register(org, {
      rateLimit: config.rateLimit,
      tokenRequestTimeoutMs: config.retry.timeoutMs,
      ...(options.now ? { now: options.now } : {}),
      ...options.registerOptions?.(org.alias),
    });
  }

  const dispatcher = new HttpDispatcher(registry, {
    retry: config.retry,
    auditSink: options.auditSink ?? createAuditSink(config.audit),
    ...(options.now ? { now: options.now } : {}),
  });

  return new ClientRuntime(registry, dispatcher, config);
}
