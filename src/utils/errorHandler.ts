import { z } from 'zod';
import type { RemoteErrorItem } from '../types/salesforce.js';
import { DeadlineExceeded } from './abort.js';

export type ErrorKind =
  | 'auth_error'
  | 'authentication_error'
  | 'not_authenticated'
  | 'rate_limit_error'
  | 'validation_error'
  | 'not_found_error'
  | 'salesforce_error'
  | 'bulk_operation_error'
  | 'unknown_org_error'
  | 'apex_execution_error'
  | 'connection_error'
  | 'configuration_error'
  | 'invalid_arguments'
  | 'unknown_operation';

/**
 * Base class for every failure the runtime reports. Instances are values handed
 * back to the caller; none of them leaves the client unusable.
 */
export class SalesforceError extends Error {
  public readonly kind: ErrorKind;
  public readonly errorCode: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      kind?: ErrorKind;
      errorCode?: string;
      statusCode?: number;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SalesforceError';
    this.kind = options.kind ?? 'salesforce_error';
    this.errorCode = options.errorCode ?? 'UNKNOWN_ERROR';
    this.statusCode = options.statusCode;
    this.details = options.details ?? {};
  }

  toJSON(): { error_kind: ErrorKind; message: string; details: Record<string, unknown> } {
    return {
      error_kind: this.kind,
      message: this.message,
      details: {
        errorCode: this.errorCode,
        ...(this.statusCode === undefined ? {} : { statusCode: this.statusCode }),
        ...this.details
      }
    };
  }
}

export type AuthFailureReason =
  | 'malformed_credentials'
  | 'signature_failure'
  | 'invalid_grant'
  | 'invalid_client'
  | 'remote_rejection'
  | 'network';

/**
 * Raised by an AuthProvider: bad credentials, signing failure or a rejected grant
 */
export class AuthError extends SalesforceError {
  public readonly reason: AuthFailureReason;
  public readonly remoteMessage?: string;

  constructor(message: string, reason: AuthFailureReason, remoteMessage?: string, cause?: unknown) {
    super(message, {
      kind: 'auth_error',
      errorCode: reason.toUpperCase(),
      details: { reason, ...(remoteMessage ? { remoteMessage } : {}) },
      cause
    });
    this.name = 'AuthError';
    this.reason = reason;
    this.remoteMessage = remoteMessage;
  }
}

/**
 * The remote rejected a freshly refreshed token as well
 */
export class AuthenticationError extends SalesforceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, { kind: 'authentication_error', errorCode: 'INVALID_SESSION_ID', statusCode: 401, details });
    this.name = 'AuthenticationError';
  }
}

export class NotAuthenticatedError extends SalesforceError {
  constructor(orgAlias: string) {
    super(`No token cached for org "${orgAlias}"`, {
      kind: 'not_authenticated',
      errorCode: 'NOT_AUTHENTICATED',
      details: { orgAlias }
    });
    this.name = 'NotAuthenticatedError';
  }
}

export type RateLimitReason = 'bucket_exhausted' | 'remote_throttled';

export class RateLimitError extends SalesforceError {
  public readonly reason: RateLimitReason;
  public readonly retryAfterMs?: number;

  constructor(message: string, reason: RateLimitReason, retryAfterMs?: number, payload?: unknown) {
    super(message, {
      kind: 'rate_limit_error',
      errorCode: 'RATE_LIMIT_EXCEEDED',
      statusCode: reason === 'remote_throttled' ? 429 : undefined,
      details: {
        reason,
        ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
        ...(payload === undefined ? {} : { payload })
      }
    });
    this.name = 'RateLimitError';
    this.reason = reason;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ValidationError extends SalesforceError {
  public readonly fields: string[];

  constructor(message: string, errorCode: string, fields: string[] = [], payload?: unknown) {
    super(message, {
      kind: 'validation_error',
      errorCode,
      statusCode: 400,
      details: { fields, ...(payload === undefined ? {} : { payload }) }
    });
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class NotFoundError extends SalesforceError {
  public readonly fields: string[];

  constructor(message: string, errorCode: string, fields: string[] = [], payload?: unknown) {
    super(message, {
      kind: 'not_found_error',
      errorCode,
      statusCode: 404,
      details: { fields, ...(payload === undefined ? {} : { payload }) }
    });
    this.name = 'NotFoundError';
    this.fields = fields;
  }
}

export type BulkFailureReason = 'timeout' | 'failed' | 'aborted' | 'invalid_request' | 'invalid_transition';

export class BulkOperationError extends SalesforceError {
  public readonly reason: BulkFailureReason;
  public readonly jobId?: string;
  public readonly remoteMessage?: string;

  constructor(message: string, reason: BulkFailureReason, jobId?: string, remoteMessage?: string) {
    super(message, {
      kind: 'bulk_operation_error',
      errorCode: 'BULK_OPERATION_FAILED',
      details: {
        reason,
        ...(jobId ? { jobId } : {}),
        ...(remoteMessage ? { remoteMessage } : {})
      }
    });
    this.name = 'BulkOperationError';
    this.reason = reason;
    this.jobId = jobId;
    this.remoteMessage = remoteMessage;
  }
}

export class UnknownOrgError extends SalesforceError {
  constructor(alias: string, known: string[]) {
    super(`Unknown org "${alias}"`, {
      kind: 'unknown_org_error',
      errorCode: 'UNKNOWN_ORG',
      details: { alias, registered: known }
    });
    this.name = 'UnknownOrgError';
  }
}

export class ApexExecutionError extends SalesforceError {
  constructor(message: string, details: { compileProblem?: string; exceptionMessage?: string; line?: number }) {
    super(message, { kind: 'apex_execution_error', errorCode: 'APEX_EXECUTION_ERROR', details });
    this.name = 'ApexExecutionError';
  }
}

/**
 * Network failure, timeout or cancellation before a response arrived
 */
export class ConnectionError extends SalesforceError {
  public readonly code: string;

  constructor(message: string, code: 'NETWORK_ERROR' | 'TIMEOUT' | 'ABORTED', cause?: unknown) {
    super(message, { kind: 'connection_error', errorCode: code, cause });
    this.name = 'ConnectionError';
    this.code = code;
  }
}

export class ConfigurationError extends SalesforceError {
  constructor(message: string, issues: string[] = []) {
    super(message, { kind: 'configuration_error', errorCode: 'INVALID_CONFIGURATION', details: { issues } });
    this.name = 'ConfigurationError';
  }
}

/**
 * Operation arguments failed validation before any remote call
 */
export class InvalidArgumentsError extends SalesforceError {
  constructor(operation: string, issues: string[]) {
    super(`Invalid arguments for ${operation}: ${issues.join('; ')}`, {
      kind: 'invalid_arguments',
      errorCode: 'INVALID_ARGUMENTS',
      details: { operation, issues }
    });
    this.name = 'InvalidArgumentsError';
  }
}

export class UnknownOperationError extends SalesforceError {
  constructor(operation: string, known: string[]) {
    super(`Unknown operation "${operation}"`, {
      kind: 'unknown_operation',
      errorCode: 'UNKNOWN_OPERATION',
      details: { operation, available: known }
    });
    this.name = 'UnknownOperationError';
  }
}

const RemoteErrorShape = z.object({
  message: z.string().optional(),
  errorCode: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
  fields: z.union([z.array(z.unknown()), z.string()]).optional()
});

/**
 * Pull the first error item out of a Salesforce error body. REST errors come as
 * an array of {message, errorCode, fields}; OAuth errors as {error, error_description}.
 */
export function parseRemoteError(payload: unknown, fallback: string): RemoteErrorItem {
  const first = Array.isArray(payload) ? payload[0] : payload;
  const parsed = RemoteErrorShape.safeParse(first);
  if (parsed.success) {
    const item = parsed.data;
    const fields = Array.isArray(item.fields)
      ? item.fields.filter((f): f is string => typeof f === 'string')
      : typeof item.fields === 'string' ? [item.fields] : undefined;
    return {
      message: item.message ?? item.error_description ?? fallback,
      errorCode: item.errorCode ?? item.error,
      fields
    };
  }
  if (typeof first === 'string' && first.trim() !== '') {
    return { message: first };
  }
  return { message: fallback };
}

/**
 * Map a non-retryable error response to its error class
 */
export function errorFromResponse(status: number, payload: unknown, context: string): SalesforceError {
  const remote = parseRemoteError(payload, `${context} failed with HTTP ${status}`);
  const errorCode = remote.errorCode ?? 'UNKNOWN_ERROR';

  if (status === 400) {
    return new ValidationError(remote.message, errorCode, remote.fields, payload);
  }
  if (status === 404) {
    return new NotFoundError(remote.message, errorCode, remote.fields, payload);
  }
  return new SalesforceError(remote.message, {
    errorCode,
    statusCode: status,
    details: { payload }
  });
}

/**
 * Map an OAuth token endpoint rejection to an AuthError
 */
export function authErrorFromRemote(flow: string, code: string | undefined, description: string | undefined): AuthError {
  const remoteMessage = description ?? code;
  const reason: AuthFailureReason =
    code === 'invalid_grant' ? 'invalid_grant'
      : code === 'invalid_client' || code === 'invalid_client_id' ? 'invalid_client'
        : 'remote_rejection';
  return new AuthError(`${flow} authentication failed: ${remoteMessage ?? 'unknown error'}`, reason, remoteMessage);
}

/**
 * Normalize anything thrown by a token request into an AuthError
 */
export function toAuthError(error: unknown, flow: string): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  if (error instanceof Error) {
    // jsforce reports the OAuth error code as the error name
    if (/^[a-z_]+$/.test(error.name) && error.name !== 'error') {
      return authErrorFromRemote(flow, error.name, error.message);
    }
    return new AuthError(`${flow} authentication failed: ${error.message}`, 'network', undefined, error);
  }
  return new AuthError(`${flow} authentication failed: ${String(error)}`, 'remote_rejection');
}

/**
 * Keep runtime errors as they are; anything else thrown while a call was in
 * flight becomes a ConnectionError (timeout, cancellation or network)
 */
export function toRuntimeError(error: unknown, signal: AbortSignal | undefined, operation: string): SalesforceError {
  if (error instanceof SalesforceError) {
    return error;
  }
  if (signal?.aborted) {
    return signal.reason instanceof DeadlineExceeded
      ? new ConnectionError(`${operation} timed out after ${signal.reason.timeoutMs}ms`, 'TIMEOUT', error)
      : new ConnectionError(`${operation} was cancelled`, 'ABORTED', error);
  }
  return new ConnectionError(
    `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
    'NETWORK_ERROR',
    error
  );
}

/**
 * Convert any failure into the outbound error payload
 */
export function toErrorPayload(error: unknown): { error_kind: string; message: string; details: Record<string, unknown> } {
  if (error instanceof SalesforceError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { error_kind: 'internal_error', message: error.message, details: { name: error.name } };
  }
  return { error_kind: 'internal_error', message: String(error), details: {} };
}

/**
 * Create a one-line description of per-record DML errors
 */
export function formatRecordErrors(result: { errors?: RemoteErrorItem[] }, operation: string): string {
  let errorMessage = `Failed to ${operation}`;
  if (result.errors && result.errors.length > 0) {
    errorMessage += ': ' + result.errors.map((e) => {
      let text = e.message;
      if (e.fields && e.fields.length > 0) {
        text += ` (Fields: ${e.fields.join(', ')})`;
      }
      if (e.errorCode) {
        text += ` [${e.errorCode}]`;
      }
      return text;
    }).join(', ');
  }
  return errorMessage;
}
