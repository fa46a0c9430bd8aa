import {
  BulkIngestJobInfoSchema,
  type BulkIngestJobInfo,
  type BulkOperation,
  type SObjectRecord,
} from '../types/salesforce.js';
import type { HttpDispatcher, DispatchRequest } from './httpDispatcher.js';
import { BulkJob, BulkJobState, isTerminal } from './bulkJob.js';
import { cellValue, parseCsvRecords, toCsv } from './csv.js';
import { sleep } from './abort.js';
import { BulkOperationError, SalesforceError, toRuntimeError } from './errorHandler.js';
import { log } from './logger.js';

export const DEFAULT_BATCH_SIZE = 200;
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_MAX_POLLS = 150;

export interface BulkPollingConfig {
  pollIntervalMs: number;
  maxPolls: number;
}

export interface BulkRunOptions {
  batchSize?: number;
  /** Required for upsert */
  externalIdField?: string;
  signal?: AbortSignal;
}

export interface BulkRecordResult {
  /** Position of the record in the caller's input */
  index: number;
  success: boolean;
  id?: string;
  created?: boolean;
  error?: string;
}

export interface BulkJobResult {
  jobId: string;
  object: string;
  operation: BulkOperation;
  state: BulkJobState.JobComplete;
  numberRecordsProcessed: number;
  numberRecordsFailed: number;
  successCount: number;
  failureCount: number;
  /** One entry per input record, in input order */
  results: BulkRecordResult[];
}

const SF_COLUMN_PREFIX = 'sf__';

/**
 * Identity of a record by its non-empty data cells, so result rows can be
 * matched back to the input whatever column order Salesforce returns
 */
function recordKey(entries: Array<[string, string]>): string {
  return JSON.stringify(
    entries
      .filter(([field, value]) => value !== '' && !field.startsWith(SF_COLUMN_PREFIX))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}

/**
 * Runs one Bulk API 2.0 ingest job for one org: create, upload in batches,
 * close, poll until terminal, then collect per-record results.
 */
export class BulkJobOrchestrator {
  private readonly polling: BulkPollingConfig;

  constructor(
    private readonly dispatcher: HttpDispatcher,
    private readonly orgAlias: string,
    private readonly apiVersion: string,
    polling: Partial<BulkPollingConfig> = {}
  ) {
    this.polling = {
      pollIntervalMs: polling.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      maxPolls: polling.maxPolls ?? DEFAULT_MAX_POLLS,
    };
  }

  private get ingestPath(): string {
    return `/services/data/v${this.apiVersion}/jobs/ingest`;
  }

  async run(
    objectType: string,
    operation: BulkOperation,
    records: readonly SObjectRecord[],
    options: BulkRunOptions = {}
  ): Promise<BulkJobResult> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (records.length === 0) {
      throw new BulkOperationError('Bulk operation requires at least one record', 'invalid_request');
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new BulkOperationError(`Batch size must be a positive integer, got ${batchSize}`, 'invalid_request');
    }
    if (operation === 'upsert' && !options.externalIdField) {
      throw new BulkOperationError('Upsert requires an external ID field', 'invalid_request');
    }

    const job = new BulkJob(objectType, operation);
    const created = await this.send({
      method: 'POST',
      path: this.ingestPath,
      body: {
        object: objectType,
        operation,
        contentType: 'CSV',
        lineEnding: 'LF',
        ...(operation === 'upsert' ? { externalIdFieldName: options.externalIdField } : {}),
      },
      operation: `bulk ${operation} ${objectType}: create job`,
    }, options.signal);
    job.open(parseJobInfo(created, job).id);
    log('INFO', `Bulk ${operation} job ${job.id} opened for ${records.length} ${objectType} records on org "${this.orgAlias}"`);

    try {
      const batchCount = Math.ceil(records.length / batchSize);
      for (let batch = 0; batch < batchCount; batch++) {
        const slice = records.slice(batch * batchSize, (batch + 1) * batchSize);
        await this.send({
          method: 'PUT',
          path: `${this.ingestPath}/${job.id}/batches`,
          csvBody: toCsv(slice),
          operation: `bulk ${operation} ${objectType}: upload batch ${batch + 1}/${batchCount}`,
        }, options.signal);
      }

      await this.send({
        method: 'PATCH',
        path: `${this.ingestPath}/${job.id}`,
        body: { state: BulkJobState.UploadComplete },
        operation: `bulk ${operation} ${objectType}: close job`,
      }, options.signal);
      job.transition(BulkJobState.UploadComplete);
    } catch (error) {
      await this.abort(job);
      throw error;
    }

    const final = await this.poll(job, options.signal);
    if (job.state !== BulkJobState.JobComplete) {
      const remoteMessage = final.errorMessage ?? final.stateMessage ?? undefined;
      throw new BulkOperationError(
        `Bulk job ${final.id} ended in state ${job.state}${remoteMessage ? `: ${remoteMessage}` : ''}`,
        job.state === BulkJobState.Aborted ? 'aborted' : 'failed',
        final.id,
        remoteMessage
      );
    }

    const results = await this.collectResults(job, records, options.signal);
    const successCount = results.filter((r) => r.success).length;
    log('INFO', `Bulk job ${final.id} complete: ${successCount}/${records.length} records succeeded`);

    return {
      jobId: final.id,
      object: objectType,
      operation,
      state: BulkJobState.JobComplete,
      numberRecordsProcessed: final.numberRecordsProcessed ?? records.length,
      numberRecordsFailed: final.numberRecordsFailed ?? records.length - successCount,
      successCount,
      failureCount: records.length - successCount,
      results,
    };
  }

  /**
   * Poll job status until it is terminal, issuing at most maxPolls checks
   */
  private async poll(job: BulkJob, signal?: AbortSignal): Promise<BulkIngestJobInfo> {
    for (let attempt = 1; attempt <= this.polling.maxPolls; attempt++) {
      const info = parseJobInfo(await this.send({
        method: 'GET',
        path: `${this.ingestPath}/${job.id}`,
        operation: `bulk ${job.operation} ${job.object}: status`,
      }, signal), job);

      job.transition(info.state);
      if (isTerminal(job.state)) {
        return info;
      }
      log('DEBUG', `Bulk job ${info.id} is ${info.state} (check ${attempt}/${this.polling.maxPolls})`);

      if (attempt < this.polling.maxPolls) {
        try {
          await sleep(this.polling.pollIntervalMs, signal);
        } catch (error) {
          throw toRuntimeError(error, signal, `Waiting for bulk job ${info.id}`);
        }
      }
    }

    throw new BulkOperationError(
      `Bulk job ${job.id} did not finish after ${this.polling.maxPolls} status checks`,
      'timeout',
      job.id
    );
  }

  private async collectResults(
    job: BulkJob,
    records: readonly SObjectRecord[],
    signal?: AbortSignal
  ): Promise<BulkRecordResult[]> {
    const pending = new Map<string, number[]>();
    records.forEach((record, index) => {
      const key = recordKey(Object.entries(record).map(([field, value]): [string, string] => [field, cellValue(value)]));
      pending.set(key, [...(pending.get(key) ?? []), index]);
    });

    const results = new Array<BulkRecordResult | undefined>(records.length).fill(undefined);
    const assign = (row: Record<string, string>, build: (index: number) => BulkRecordResult): void => {
      const queue = pending.get(recordKey(Object.entries(row)));
      const index = queue?.shift();
      if (index === undefined) {
        log('WARN', `Bulk job ${job.id} returned a result row that matches no input record`);
        return;
      }
      results[index] = build(index);
    };

    for (const row of await this.fetchResults(job, 'successfulResults', signal)) {
      assign(row, (index) => ({
        index,
        success: true,
        ...(row.sf__Id ? { id: row.sf__Id } : {}),
        ...(row.sf__Created !== undefined ? { created: row.sf__Created === 'true' } : {}),
      }));
    }
    for (const row of await this.fetchResults(job, 'failedResults', signal)) {
      assign(row, (index) => ({
        index,
        success: false,
        ...(row.sf__Id ? { id: row.sf__Id } : {}),
        error: row.sf__Error || 'Record failed without an error message',
      }));
    }
    for (const row of await this.fetchResults(job, 'unprocessedrecords', signal)) {
      assign(row, (index) => ({ index, success: false, error: 'Record was not processed' }));
    }

    return results.map((result, index) => result ?? {
      index,
      success: false,
      error: 'No result was returned for this record',
    });
  }

  private async fetchResults(job: BulkJob, kind: string, signal?: AbortSignal): Promise<Array<Record<string, string>>> {
    const body = await this.send({
      method: 'GET',
      path: `${this.ingestPath}/${job.id}/${kind}`,
      accept: 'csv',
      operation: `bulk ${job.operation} ${job.object}: ${kind}`,
    }, signal);
    return typeof body === 'string' ? parseCsvRecords(body) : [];
  }

  /**
   * Best-effort abort of a job that failed while Open; a failure here is
   * logged and the original error is what the caller sees
   */
  private async abort(job: BulkJob): Promise<void> {
    if (job.id === undefined || job.state !== BulkJobState.Open) {
      return;
    }
    try {
      await this.send({
        method: 'PATCH',
        path: `${this.ingestPath}/${job.id}`,
        body: { state: BulkJobState.Aborted },
        operation: `bulk ${job.operation} ${job.object}: abort job`,
      });
      job.transition(BulkJobState.Aborted);
      log('WARN', `Bulk job ${job.id} aborted after a failed upload`);
    } catch (error) {
      log('ERROR', `Failed to abort bulk job ${job.id}:`, error instanceof Error ? error.message : error);
    }
  }

  private async send(request: DispatchRequest, signal?: AbortSignal): Promise<unknown> {
    const response = await this.dispatcher.send(this.orgAlias, request, { signal });
    return response.body;
  }
}

function parseJobInfo(body: unknown, job: BulkJob): BulkIngestJobInfo {
  const parsed = BulkIngestJobInfoSchema.safeParse(body);
  if (!parsed.success) {
    throw new SalesforceError('Unexpected bulk job response', {
      errorCode: 'MALFORMED_RESPONSE',
      details: { ...(job.id ? { jobId: job.id } : {}), issues: parsed.error.issues.map((i) => i.message) },
    });
  }
  return parsed.data;
}
