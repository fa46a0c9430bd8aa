import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { SObjectRecordSchema } from "../types/salesforce.js";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const CREATE_RECORD: Tool = {
  name: "salesforce_create_record",
  description: "Create a new record. Returns the ID Salesforce assigned to it.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object, e.g. Contact" },
      data: { type: "object", description: "Field values keyed by field API name" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type", "data"]
  }
};

export const CreateRecordArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  data: SObjectRecordSchema,
  org_alias: OrgAliasSchema
});

export const createRecordTool = defineTool(CREATE_RECORD, CreateRecordArgsSchema, async (args, { runtime, signal }) => {
  const result = await runtime.client(args.org_alias).createRecord(args.object_type, args.data, { signal });
  return { success: true, id: result.id };
});
