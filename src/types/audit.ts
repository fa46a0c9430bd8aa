export type AuditOutcome = 'success' | 'failure';

export interface AuditLogEntry {
  /** ISO-8601 time the call completed */
  timestamp: string;
  orgAlias: string;
  operation: string;
  outcome: AuditOutcome;
  durationMs: number;
  /** Last HTTP status seen, when a response arrived */
  status?: number;
  errorKind?: string;
}

/**
 * Receives one entry per completed or failed call
 */
export interface AuditSink {
  record(entry: AuditLogEntry): void | Promise<void>;
}
