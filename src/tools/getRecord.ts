import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const GET_RECORD: Tool = {
  name: "salesforce_get_record",
  description: "Retrieve a single record by ID. Returns every accessible field unless a field list is given.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object, e.g. Account or Invoice__c" },
      record_id: { type: "string", description: "15 or 18 character record ID" },
      fields: {
        type: "array",
        items: { type: "string" },
        description: "Fields to retrieve"
      },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type", "record_id"]
  }
};

export const GetRecordArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  record_id: z.string().trim().min(1),
  fields: z.array(z.string().trim().min(1)).optional(),
  org_alias: OrgAliasSchema
});

export const getRecordTool = defineTool(GET_RECORD, GetRecordArgsSchema, async (args, { runtime, signal }) =>
  runtime.client(args.org_alias).getRecord(args.object_type, args.record_id, args.fields, { signal })
);
