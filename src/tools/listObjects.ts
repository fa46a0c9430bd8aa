import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const LIST_OBJECTS: Tool = {
  name: "salesforce_list_objects",
  description: "List the objects available in an org, optionally filtered by a name or label fragment.",
  inputSchema: {
    type: "object",
    properties: {
      search: { type: "string", description: "Case-insensitive fragment of the object name or label" },
      custom_only: { type: "boolean", description: "Only custom objects", default: false },
      org_alias: ORG_ALIAS_PROPERTY
    }
  }
};

export const ListObjectsArgsSchema = z.object({
  search: z.string().trim().optional(),
  custom_only: z.boolean().default(false),
  org_alias: OrgAliasSchema
});

export const listObjectsTool = defineTool(LIST_OBJECTS, ListObjectsArgsSchema, async (args, { runtime, signal }) => {
  const { sobjects } = await runtime.client(args.org_alias).describeGlobal({ signal });
  const needle = args.search?.toLowerCase();

  const objects = sobjects
    .filter((obj) => !args.custom_only || obj.custom)
    .filter((obj) => !needle || obj.name.toLowerCase().includes(needle) || obj.label.toLowerCase().includes(needle))
    .map((obj) => ({
      name: obj.name,
      label: obj.label,
      custom: obj.custom,
      queryable: obj.queryable ?? false
    }));

  return { count: objects.length, objects };
});
