import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { BULK_OPERATIONS, SObjectRecordSchema } from "../types/salesforce.js";
import { DEFAULT_BATCH_SIZE } from "../utils/bulkJobOrchestrator.js";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const BULK_OPERATION: Tool = {
  name: "salesforce_bulk_operation",
  description: "Insert, update, upsert or delete many records with Bulk API 2.0. Waits for the job to finish and returns one result per input record, in input order. Upsert needs external_id_field; update and delete records must carry Id.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object" },
      operation: { type: "string", enum: [...BULK_OPERATIONS], description: "Bulk operation to run" },
      records: {
        type: "array",
        items: { type: "object" },
        description: "Records to process"
      },
      batch_size: { type: "integer", description: "Records per upload", default: DEFAULT_BATCH_SIZE },
      external_id_field: { type: "string", description: "External ID field used to match records on upsert" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type", "operation", "records"]
  }
};

export const BulkOperationArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  operation: z.enum(BULK_OPERATIONS),
  records: z.array(SObjectRecordSchema),
  batch_size: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  external_id_field: z.string().trim().min(1).optional(),
  org_alias: OrgAliasSchema
});

export const bulkOperationTool = defineTool(BULK_OPERATION, BulkOperationArgsSchema, async (args, { runtime, signal }) =>
  runtime.client(args.org_alias).bulk(args.object_type, args.operation, args.records, {
    batchSize: args.batch_size,
    externalIdField: args.external_id_field,
    signal
  })
);
