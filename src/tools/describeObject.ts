import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceField } from "../types/salesforce.js";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const DESCRIBE_OBJECT: Tool = {
  name: "salesforce_describe_object",
  description: "Get metadata about an object: its fields, their types, picklist values and relationships. Set required_only to list just the fields a user must fill in when creating a record.",
  inputSchema: {
    type: "object",
    properties: {
      object_type: { type: "string", description: "API name of the object, e.g. Case" },
      required_only: {
        type: "boolean",
        description: "Only fields that are required on create and have no default",
        default: false
      },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["object_type"]
  }
};

export const DescribeObjectArgsSchema = z.object({
  object_type: z.string().trim().min(1),
  required_only: z.boolean().default(false),
  org_alias: OrgAliasSchema
});

const SYSTEM_FIELDS = new Set(["id", "createddate", "lastmodifieddate", "createdbyid", "lastmodifiedbyid", "systemmodstamp"]);

/**
 * Required on create and not filled in by Salesforce: non-nillable, createable,
 * not a formula or auto-number, not a system field, no default
 */
export function isUserRequiredField(field: SalesforceField): boolean {
  if (field.nillable !== false) return false;
  if (field.createable === false) return false;
  if (field.calculated || field.autoNumber) return false;
  if (SYSTEM_FIELDS.has(field.name.toLowerCase())) return false;
  return !field.defaultedOnCreate && (field.defaultValue === undefined || field.defaultValue === null);
}

function summarizeField(field: SalesforceField) {
  return {
    name: field.name,
    label: field.label,
    type: field.type,
    ...(field.length ? { length: field.length } : {}),
    required: field.nillable === false && !field.defaultedOnCreate,
    ...(field.custom ? { custom: true } : {}),
    ...(field.referenceTo && field.referenceTo.length > 0 ? { referenceTo: field.referenceTo } : {}),
    ...(field.picklistValues && field.picklistValues.length > 0
      ? { picklistValues: field.picklistValues.filter((v) => v.active !== false).map((v) => v.value) }
      : {})
  };
}

export const describeObjectTool = defineTool(DESCRIBE_OBJECT, DescribeObjectArgsSchema, async (args, { runtime, signal }) => {
  const describe = await runtime.client(args.org_alias).describeObject(args.object_type, { signal });
  const fields = args.required_only ? describe.fields.filter(isUserRequiredField) : describe.fields;

  return {
    name: describe.name,
    label: describe.label,
    custom: describe.custom ?? false,
    fieldCount: fields.length,
    fields: fields.map(summarizeField)
  };
});
