import { z } from 'zod';

/**
 * Wire shapes of the Salesforce REST and Bulk API 2.0 payloads this runtime reads.
 * Responses are parsed through these schemas before they reach a caller.
 */

export const SObjectRecordSchema = z.record(z.string(), z.unknown());
export type SObjectRecord = z.infer<typeof SObjectRecordSchema>;

export const QueryResultSchema = z.object({
  totalSize: z.number(),
  done: z.boolean(),
  records: z.array(SObjectRecordSchema),
  nextRecordsUrl: z.string().optional(),
});
export type QueryResult = z.infer<typeof QueryResultSchema>;

export interface RemoteErrorItem {
  message: string;
  errorCode?: string;
  fields?: string[];
}

export const RemoteErrorItemSchema = z.object({
  message: z.string(),
  errorCode: z.string().optional(),
  statusCode: z.string().optional(),
  fields: z.array(z.string()).optional(),
});

export const DMLResultSchema = z.object({
  id: z.string().optional(),
  success: z.boolean(),
  errors: z.array(RemoteErrorItemSchema).optional(),
});
export type DMLResult = z.infer<typeof DMLResultSchema>;

export const SalesforceFieldSchema = z.object({
  name: z.string(),
  label: z.string(),
  type: z.string(),
  nillable: z.boolean().optional(),
  length: z.number().optional(),
  custom: z.boolean().optional(),
  createable: z.boolean().optional(),
  updateable: z.boolean().optional(),
  defaultedOnCreate: z.boolean().optional(),
  calculated: z.boolean().optional(),
  autoNumber: z.boolean().optional(),
  defaultValue: z.unknown().optional(),
  referenceTo: z.array(z.string()).optional(),
  picklistValues: z
    .array(z.object({ value: z.string(), label: z.string().nullish(), active: z.boolean().optional() }))
    .optional(),
});
export type SalesforceField = z.infer<typeof SalesforceFieldSchema>;

export const DescribeResponseSchema = z.object({
  name: z.string(),
  label: z.string(),
  custom: z.boolean().optional(),
  keyPrefix: z.string().nullish(),
  fields: z.array(SalesforceFieldSchema),
});
export type SalesforceDescribeResponse = z.infer<typeof DescribeResponseSchema>;

const GlobalDescribeObjectSchema = z.object({
  name: z.string(),
  label: z.string(),
  custom: z.boolean(),
  queryable: z.boolean().optional(),
});

export const GlobalDescribeResponseSchema = z.object({
  encoding: z.string().optional(),
  maxBatchSize: z.number().optional(),
  sobjects: z.array(GlobalDescribeObjectSchema),
});
export type GlobalDescribeResponse = z.infer<typeof GlobalDescribeResponseSchema>;

export const ExecuteAnonymousResultSchema = z.object({
  compiled: z.boolean(),
  success: z.boolean(),
  compileProblem: z.string().nullable(),
  exceptionMessage: z.string().nullable(),
  exceptionStackTrace: z.string().nullish(),
  line: z.number(),
  column: z.number(),
});
export type ExecuteAnonymousResult = z.infer<typeof ExecuteAnonymousResultSchema>;

export const ReportSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  describeUrl: z.string().optional(),
  instancesUrl: z.string().optional(),
});
export const ReportListSchema = z.array(ReportSummarySchema);
export type ReportSummary = z.infer<typeof ReportSummarySchema>;

export const BULK_OPERATIONS = ['insert', 'update', 'upsert', 'delete'] as const;
export type BulkOperation = (typeof BULK_OPERATIONS)[number];

/**
 * Job resource returned by the jobs/ingest endpoints
 */
export const BulkIngestJobInfoSchema = z.object({
  id: z.string(),
  state: z.string(),
  object: z.string().optional(),
  operation: z.string().optional(),
  externalIdFieldName: z.string().nullish(),
  createdDate: z.string().optional(),
  numberRecordsProcessed: z.number().optional(),
  numberRecordsFailed: z.number().optional(),
  errorMessage: z.string().nullish(),
  stateMessage: z.string().nullish(),
});
export type BulkIngestJobInfo = z.infer<typeof BulkIngestJobInfoSchema>;
