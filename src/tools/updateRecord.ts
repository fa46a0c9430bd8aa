import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { SObjectRecordSchema } from "../types/salesforce.js";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const UPDATE_RECORD: Tool = {
  name: "salesforce_update_record",
  description: "Update fields on an existing record. Only the fields given are changed.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object" },
      record_id: { type: "string", description: "ID of the record to update" },
      data: { type: "object", description: "Field values to set" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type", "record_id", "data"]
  }
};

export const UpdateRecordArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  record_id: z.string().trim().min(1),
  data: SObjectRecordSchema.refine((data) => Object.keys(data).length > 0, "data must set at least one field"),
  org_alias: OrgAliasSchema
});

export const updateRecordTool = defineTool(UPDATE_RECORD, UpdateRecordArgsSchema, async (args, { runtime, signal }) => {
  await runtime.client(args.org_alias).updateRecord(args.object_type, args.record_id, args.data, { signal });
  return { success: true, id: args.record_id };
});
