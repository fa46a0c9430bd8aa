import { readFileSync } from 'fs';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  ConnectionType,
  DEFAULT_API_VERSION,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RETRY,
  type Credentials,
  type OrgConfig,
  type RateLimitConfig,
  type RetryConfig,
} from '../types/connection.js';
import {
  DEFAULT_MAX_POLLS,
  DEFAULT_POLL_INTERVAL_MS,
  type BulkPollingConfig,
} from './bulkJobOrchestrator.js';
import { ConfigurationError } from './errorHandler.js';
import { isLogLevel, type LogLevel } from './logger.js';

export type Env = Record<string, string | undefined>;

export interface AuditConfig {
  enabled: boolean;
  /** JSON-lines file; entries go to the log when unset */
  filePath?: string;
}

export interface AppConfig {
  orgs: OrgConfig[];
  defaultOrg: string;
  retry: RetryConfig;
  rateLimit: RateLimitConfig;
  bulk: BulkPollingConfig;
  audit: AuditConfig;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  readFile?: (path: string) => string;
}

export const DEFAULT_REDIRECT_URI = 'https://login.salesforce.com/services/oauth2/callback';

const ALIAS_PATTERN = /^[A-Za-z0-9_-]+$/;

const wholeNumber = (min: number) =>
  z.string().trim().regex(/^\d+$/, 'must be a whole number').transform(Number).pipe(z.number().int().min(min));

const positiveNumber = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'must be a number')
  .transform(Number)
  .pipe(z.number().positive());

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const apiVersion = z.string().trim().regex(/^\d+\.\d+$/, 'must look like 59.0');

const connectionType = z.string().trim().pipe(z.nativeEnum(ConnectionType));

/**
 * Collects every problem in the environment so they are reported together
 */
class EnvReader {
  readonly issues: string[] = [];

  constructor(private readonly env: Env) {}

  raw(...names: string[]): string | undefined {
    for (const name of names) {
      const value = this.env[name];
      if (value !== undefined && value.trim() !== '') {
        return value;
      }
    }
    return undefined;
  }

  optional<T>(names: string[], schema: ZodType<T, ZodTypeDef, string>, fallback: T): T {
    const value = this.raw(...names);
    if (value === undefined) {
      return fallback;
    }
    const result = schema.safeParse(value);
    if (!result.success) {
      this.issues.push(`${names[0]} ${result.error.issues.map((issue) => issue.message).join('; ')}`);
      return fallback;
    }
    return result.data;
  }

  required(names: string[], why: string): string {
    const value = this.raw(...names);
    if (value === undefined) {
      this.issues.push(`${names[0]} is required ${why}`);
      return '';
    }
    return value;
  }
}

/**
 * Environment variable prefix for an org; the "default" org uses the bare
 * SALESFORCE_ prefix
 */
export function orgEnvPrefix(alias: string): string {
  return alias === 'default'
    ? 'SALESFORCE_'
    : `SALESFORCE_${alias.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_`;
}

/**
 * Load every org and the runtime settings from environment variables
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
  const reader = new EnvReader(env);
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, 'utf8'));

  const aliases = (reader.raw('SALESFORCE_ORGS') ?? 'default')
    .split(',')
    .map((alias) => alias.trim())
    .filter((alias) => alias !== '');

  if (aliases.length === 0) {
    reader.issues.push('SALESFORCE_ORGS must name at least one org');
  }
  for (const alias of aliases) {
    if (!ALIAS_PATTERN.test(alias)) {
      reader.issues.push(`Org alias "${alias}" may only contain letters, digits, "_" and "-"`);
    }
  }
  const duplicates = aliases.filter((alias, index) => aliases.indexOf(alias) !== index);
  if (duplicates.length > 0) {
    reader.issues.push(`SALESFORCE_ORGS lists ${duplicates.join(', ')} more than once`);
  }

  const defaultOrg = reader.raw('SALESFORCE_DEFAULT_ORG')?.trim() ?? aliases[0] ?? 'default';
  if (aliases.length > 0 && !aliases.includes(defaultOrg)) {
    reader.issues.push(`SALESFORCE_DEFAULT_ORG "${defaultOrg}" is not listed in SALESFORCE_ORGS`);
  }

  const orgs = aliases.map((alias) => loadOrg(reader, alias, readFile));

  const timeoutSeconds = reader.optional(['SALESFORCE_TIMEOUT'], positiveNumber, DEFAULT_RETRY.timeoutMs / 1000);
  const retry: RetryConfig = {
    ...DEFAULT_RETRY,
    maxRetries: reader.optional(['SALESFORCE_MAX_RETRIES'], wholeNumber(0), DEFAULT_RETRY.maxRetries),
    timeoutMs: Math.round(timeoutSeconds * 1000),
  };

  const rateLimit: RateLimitConfig = {
    requestsPerSecond: reader.optional(['SALESFORCE_RATE_LIMIT_RPS'], positiveNumber, DEFAULT_RATE_LIMIT.requestsPerSecond),
    burstSize: reader.optional(['SALESFORCE_RATE_LIMIT_BURST'], wholeNumber(1), DEFAULT_RATE_LIMIT.burstSize),
    waitOnLimit: reader.optional(['SALESFORCE_RATE_LIMIT_WAIT'], booleanFlag, DEFAULT_RATE_LIMIT.waitOnLimit),
  };

  const bulk: BulkPollingConfig = {
    pollIntervalMs: reader.optional(['SALESFORCE_BULK_POLL_INTERVAL_MS'], wholeNumber(0), DEFAULT_POLL_INTERVAL_MS),
    maxPolls: reader.optional(['SALESFORCE_BULK_MAX_POLLS'], wholeNumber(1), DEFAULT_MAX_POLLS),
  };

  const auditFile = reader.raw('SALESFORCE_AUDIT_LOG_FILE');
  const audit: AuditConfig = {
    enabled: reader.optional(['SALESFORCE_ENABLE_AUDIT_LOG'], booleanFlag, false),
    ...(auditFile ? { filePath: auditFile.trim() } : {}),
  };

  const level = (reader.raw('LOG_LEVEL') ?? 'INFO').trim().toUpperCase();
  if (!isLogLevel(level)) {
    reader.issues.push(`LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR`);
  }

  if (reader.issues.length > 0) {
    throw new ConfigurationError(
      `Invalid Salesforce configuration: ${reader.issues.length} problem(s) found`,
      reader.issues
    );
  }

  return {
    orgs,
    defaultOrg,
    retry,
    rateLimit,
    bulk,
    audit,
    logLevel: isLogLevel(level) ? level : 'INFO',
  };
}

function loadOrg(reader: EnvReader, alias: string, readFile: (path: string) => string): OrgConfig {
  const prefix = orgEnvPrefix(alias);
  // Prefixed name first, then the shared SALESFORCE_ value
  const names = (key: string, ...fallbackKeys: string[]): string[] =>
    Array.from(new Set([key, ...fallbackKeys].flatMap((k) => [`${prefix}${k}`, `SALESFORCE_${k}`])));
  const forOrg = `for org "${alias}"`;

  const type = reader.optional(names('CONNECTION_TYPE'), connectionType, ConnectionType.User_Password);
  const sessionTtlSeconds = reader.optional(names('SESSION_TTL_SECONDS'), wholeNumber(1), 0);

  const credentials = loadCredentials(reader, type, names, forOrg, readFile);

  return {
    alias,
    domain: reader.raw(...names('DOMAIN'))?.trim() ?? 'login',
    credentials,
    apiVersion: reader.optional(names('API_VERSION'), apiVersion, DEFAULT_API_VERSION),
    ...(sessionTtlSeconds > 0 ? { sessionTtlSeconds } : {}),
  };
}

function loadCredentials(
  reader: EnvReader,
  type: ConnectionType,
  names: (key: string, ...fallbackKeys: string[]) => string[],
  forOrg: string,
  readFile: (path: string) => string
): Credentials {
  switch (type) {
    case ConnectionType.User_Password: {
      const clientId = reader.raw(...names('CLIENT_ID'));
      const clientSecret = reader.raw(...names('CLIENT_SECRET'));
      return {
        type,
        username: reader.required(names('USERNAME'), forOrg),
        password: reader.required(names('PASSWORD'), forOrg),
        securityToken: reader.raw(...names('SECURITY_TOKEN', 'TOKEN')) ?? '',
        ...(clientId ? { clientId } : {}),
        ...(clientSecret ? { clientSecret } : {}),
      };
    }
    case ConnectionType.OAuth_2_0_Web_Server: {
      const authCode = reader.raw(...names('AUTH_CODE'));
      const refreshToken = reader.raw(...names('REFRESH_TOKEN'));
      return {
        type,
        clientId: reader.required(names('CLIENT_ID'), forOrg),
        clientSecret: reader.required(names('CLIENT_SECRET'), forOrg),
        redirectUri: reader.raw(...names('REDIRECT_URI')) ?? DEFAULT_REDIRECT_URI,
        ...(authCode ? { authCode } : {}),
        ...(refreshToken ? { refreshToken } : {}),
      };
    }
    case ConnectionType.JWT_Bearer:
      return {
        type,
        clientId: reader.required(names('CLIENT_ID'), forOrg),
        username: reader.required(names('USERNAME'), forOrg),
        privateKey: loadPrivateKey(reader, names, forOrg, readFile),
      };
  }
}

function loadPrivateKey(
  reader: EnvReader,
  names: (key: string) => string[],
  forOrg: string,
  readFile: (path: string) => string
): string {
  const inline = reader.raw(...names('PRIVATE_KEY'));
  if (inline) {
    // keys pasted into .env files usually carry escaped newlines
    return inline.replace(/\\n/g, '\n');
  }
  const keyFile = reader.raw(...names('PRIVATE_KEY_FILE'));
  if (!keyFile) {
    reader.issues.push(`${names('PRIVATE_KEY')[0]} or ${names('PRIVATE_KEY_FILE')[0]} is required ${forOrg}`);
    return '';
  }
  try {
    return readFile(keyFile.trim());
  } catch (error) {
    reader.issues.push(
      `Cannot read private key file ${keyFile.trim()}: ${error instanceof Error ? error.message : String(error)}`
    );
    return '';
  }
}
