import type { ZodType, ZodTypeDef } from 'zod';
import {
  DescribeResponseSchema,
  DMLResultSchema,
  ExecuteAnonymousResultSchema,
  GlobalDescribeResponseSchema,
  QueryResultSchema,
  ReportListSchema,
  SObjectRecordSchema,
  type BulkOperation,
  type DMLResult,
  type ExecuteAnonymousResult,
  type GlobalDescribeResponse,
  type QueryResult,
  type ReportSummary,
  type SalesforceDescribeResponse,
  type SObjectRecord,
} from '../types/salesforce.js';
import type { OrgRuntime } from './orgRegistry.js';
import type { DispatchRequest, HttpDispatcher } from './httpDispatcher.js';
import {
  BulkJobOrchestrator,
  type BulkJobResult,
  type BulkPollingConfig,
  type BulkRunOptions,
} from './bulkJobOrchestrator.js';
import { ApexExecutionError, SalesforceError, formatRecordErrors } from './errorHandler.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface QueryOptions extends CallOptions {
  /** Use queryAll so deleted and archived rows are returned */
  includeDeleted?: boolean;
  /** Follow nextRecordsUrl until every page has been read */
  fetchAll?: boolean;
}

/**
 * REST operations against one registered org. Every remote call goes through
 * the shared HttpDispatcher, so auth, rate limiting and retries apply.
 */
export class SalesforceClient {
  private readonly bulkOrchestrator: BulkJobOrchestrator;

  constructor(
    private readonly dispatcher: HttpDispatcher,
    readonly org: OrgRuntime,
    bulkPolling: Partial<BulkPollingConfig> = {}
  ) {
    this.bulkOrchestrator = new BulkJobOrchestrator(dispatcher, org.alias, org.config.apiVersion, bulkPolling);
  }

  private get basePath(): string {
    return `/services/data/v${this.org.config.apiVersion}`;
  }

  async query(soql: string, options: QueryOptions = {}): Promise<QueryResult> {
    const endpoint = options.includeDeleted ? 'queryAll' : 'query';
    const first = await this.request(QueryResultSchema, {
      method: 'GET',
      path: `${this.basePath}/${endpoint}`,
      query: { q: soql },
      operation: endpoint,
    }, options);

    if (!options.fetchAll) {
      return first;
    }

    const records = [...first.records];
    let nextRecordsUrl = first.nextRecordsUrl;
    while (nextRecordsUrl) {
      const page = await this.request(QueryResultSchema, {
        method: 'GET',
        path: nextRecordsUrl,
        operation: `${endpoint} (next page)`,
      }, options);
      records.push(...page.records);
      nextRecordsUrl = page.nextRecordsUrl;
    }

    return { totalSize: first.totalSize, done: true, records };
  }

  async getRecord(objectType: string, id: string, fields?: string[], options: CallOptions = {}): Promise<SObjectRecord> {
    return this.request(SObjectRecordSchema, {
      method: 'GET',
      path: `${this.basePath}/sobjects/${encodeURIComponent(objectType)}/${encodeURIComponent(id)}`,
      query: { fields: fields && fields.length > 0 ? fields.join(',') : undefined },
      operation: `get ${objectType}`,
    }, options);
  }

  async createRecord(objectType: string, data: SObjectRecord, options: CallOptions = {}): Promise<DMLResult> {
    const result = await this.request(DMLResultSchema, {
      method: 'POST',
      path: `${this.basePath}/sobjects/${encodeURIComponent(objectType)}`,
      body: data,
      operation: `create ${objectType}`,
    }, options);

    if (!result.success) {
      throw new SalesforceError(formatRecordErrors(result, `create ${objectType}`), {
        errorCode: result.errors?.[0]?.errorCode ?? 'CREATE_FAILED',
        details: { errors: result.errors ?? [] },
      });
    }
    return result;
  }

  async updateRecord(objectType: string, id: string, data: SObjectRecord, options: CallOptions = {}): Promise<void> {
    await this.dispatcher.send(this.org.alias, {
      method: 'PATCH',
      path: `${this.basePath}/sobjects/${encodeURIComponent(objectType)}/${encodeURIComponent(id)}`,
      body: data,
      operation: `update ${objectType}`,
    }, options);
  }

  async deleteRecord(objectType: string, id: string, options: CallOptions = {}): Promise<void> {
    await this.dispatcher.send(this.org.alias, {
      method: 'DELETE',
      path: `${this.basePath}/sobjects/${encodeURIComponent(objectType)}/${encodeURIComponent(id)}`,
      operation: `delete ${objectType}`,
    }, options);
  }

  async describeObject(objectType: string, options: CallOptions = {}): Promise<SalesforceDescribeResponse> {
    return this.request(DescribeResponseSchema, {
      method: 'GET',
      path: `${this.basePath}/sobjects/${encodeURIComponent(objectType)}/describe`,
      operation: `describe ${objectType}`,
    }, options);
  }

  async describeGlobal(options: CallOptions = {}): Promise<GlobalDescribeResponse> {
    return this.request(GlobalDescribeResponseSchema, {
      method: 'GET',
      path: `${this.basePath}/sobjects`,
      operation: 'describe global',
    }, options);
  }

  /**
   * Run anonymous Apex through the Tooling API; a compile or runtime failure
   * is an ApexExecutionError
   */
  async executeApex(apexBody: string, options: CallOptions = {}): Promise<ExecuteAnonymousResult> {
    const result = await this.request(ExecuteAnonymousResultSchema, {
      method: 'GET',
      path: `${this.basePath}/tooling/executeAnonymous`,
      query: { anonymousBody: apexBody },
      operation: 'execute anonymous apex',
    }, options);

    if (!result.success) {
      const message = !result.compiled
        ? `Apex compilation failed at line ${result.line}: ${result.compileProblem ?? 'unknown problem'}`
        : `Apex execution failed: ${result.exceptionMessage ?? 'unknown exception'}`;
      throw new ApexExecutionError(message, {
        ...(result.compileProblem ? { compileProblem: result.compileProblem } : {}),
        ...(result.exceptionMessage ? { exceptionMessage: result.exceptionMessage } : {}),
        line: result.line,
      });
    }
    return result;
  }

  async listReports(options: CallOptions = {}): Promise<ReportSummary[]> {
    return this.request(ReportListSchema, {
      method: 'GET',
      path: `${this.basePath}/analytics/reports`,
      operation: 'list reports',
    }, options);
  }

  /**
   * Run a report synchronously; filters replace the saved report metadata
   */
  async runReport(reportId: string, filters?: Record<string, unknown>, options: CallOptions = {}): Promise<unknown> {
    const response = await this.dispatcher.send(this.org.alias, {
      method: 'POST',
      path: `${this.basePath}/analytics/reports/${encodeURIComponent(reportId)}`,
      ...(filters ? { body: { reportMetadata: filters } } : {}),
      operation: 'run report',
    }, options);
    return response.body;
  }

  async bulk(
    objectType: string,
    operation: BulkOperation,
    records: readonly SObjectRecord[],
    options: BulkRunOptions = {}
  ): Promise<BulkJobResult> {
    return this.bulkOrchestrator.run(objectType, operation, records, options);
  }

  private async request<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    request: DispatchRequest,
    options: CallOptions
  ): Promise<T> {
    const response = await this.dispatcher.send(this.org.alias, request, options);
    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new SalesforceError(`Unexpected response for ${request.operation ?? request.path}`, {
        errorCode: 'MALFORMED_RESPONSE',
        statusCode: response.status,
        details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }
    return parsed.data;
  }
}
