import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const EXECUTE_APEX: Tool = {
  name: "salesforce_execute_apex",
  description: "Execute anonymous Apex code. Compile errors and uncaught exceptions are reported with the failing line.",
  inputSchema: {
    type: "object",
    properties: {
      apex_body: { type: "string", description: "Apex code to execute" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["apex_body"]
  }
};

export const ExecuteApexArgsSchema = z.object({
  apex_body: z.string().trim().min(1, "apex_body must not be empty"),
  org_alias: OrgAliasSchema
});

export const executeApexTool = defineTool(EXECUTE_APEX, ExecuteApexArgsSchema, async (args, { runtime, signal }) => {
  const result = await runtime.client(args.org_alias).executeApex(args.apex_body, { signal });
  return { success: true, compiled: result.compiled, executed: result.success };
});
