import { appendFile } from 'fs/promises';
import type { AuditLogEntry, AuditSink } from '../types/audit.js';
import { log } from './logger.js';

/**
 * Writes audit entries to the log at INFO level
 */
export class LoggerAuditSink implements AuditSink {
  record(entry: AuditLogEntry): void {
    log('INFO', `Audit: ${JSON.stringify(entry)}`);
  }
}

/**
 * Appends one JSON object per line to a file
 */
export class JsonLinesAuditSink implements AuditSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  record(entry: AuditLogEntry): Promise<void> {
    // chained so lines land in completion order
    const write = this.queue.then(() => appendFile(this.filePath, JSON.stringify(entry) + '\n', { mode: 0o600 }));
    this.queue = write.catch((error: unknown) => {
      log('ERROR', `Failed to write audit log ${this.filePath}:`, error instanceof Error ? error.message : error);
    });
    return this.queue;
  }
}

export class NoopAuditSink implements AuditSink {
  record(): void {}
}

/**
 * Hand an entry to the sink without letting the sink delay or fail the call
 */
export function reportAudit(sink: AuditSink, entry: AuditLogEntry): void {
  void Promise.resolve()
    .then(() => sink.record(entry))
    .catch((error: unknown) => {
      log('WARN', 'Audit sink rejected entry', error instanceof Error ? error.message : error);
    });
}
