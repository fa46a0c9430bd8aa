import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool } from "./toolDefinition.js";

export const LIST_ORGS: Tool = {
  name: "salesforce_list_orgs",
  description: "List the configured orgs, which one is the default, and whether each currently holds a session.",
  inputSchema: {
    type: "object",
    properties: {}
  }
};

export const ListOrgsArgsSchema = z.object({});

export const listOrgsTool = defineTool(LIST_ORGS, ListOrgsArgsSchema, async (_args, { runtime }) => {
  const defaultOrg = runtime.registry.defaultOrg;
  return {
    defaultOrg: defaultOrg ?? null,
    orgs: runtime.registry.getStats().map((stats) => {
      const org = runtime.registry.resolve(stats.alias);
      return {
        ...stats,
        isDefault: stats.alias === defaultOrg,
        connectionType: org.config.credentials.type,
        loginUrl: org.loginUrl,
        apiVersion: org.config.apiVersion
      };
    })
  };
});
