import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const QUERY: Tool = {
  name: "salesforce_query",
  description: "Execute a SOQL query against an org. Set include_deleted to also return deleted and archived rows, and fetch_all to follow every page of a large result.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "SOQL query to execute" },
      include_deleted: { type: "boolean", description: "Include deleted records (queryAll)", default: false },
      fetch_all: { type: "boolean", description: "Read every page of the result", default: false },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["query"]
  }
};

export const QueryArgsSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  include_deleted: z.boolean().default(false),
  fetch_all: z.boolean().default(false),
  org_alias: OrgAliasSchema
});

export const queryTool = defineTool(QUERY, QueryArgsSchema, async (args, { runtime, signal }) =>
  runtime.client(args.org_alias).query(args.query, {
    includeDeleted: args.include_deleted,
    fetchAll: args.fetch_all,
    signal
  })
);
