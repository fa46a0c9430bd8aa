import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const DELETE_RECORD: Tool = {
  name: "salesforce_delete_record",
  description: "Delete a record by ID. The record goes to the org's recycle bin.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object" },
      record_id: { type: "string", description: "ID of the record to delete" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type", "record_id"]
  }
};

export const DeleteRecordArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  record_id: z.string().trim().min(1),
  org_alias: OrgAliasSchema
});

export const deleteRecordTool = defineTool(DELETE_RECORD, DeleteRecordArgsSchema, async (args, { runtime, signal }) => {
  await runtime.client(args.org_alias).deleteRecord(args.object_type, args.record_id, { signal });
  return { success: true, id: args.record_id };
});
