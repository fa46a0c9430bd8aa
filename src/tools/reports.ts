import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const LIST_REPORTS: Tool = {
  name: "salesforce_list_reports",
  description: "List the reports recently viewed in an org.",
  inputSchema: {
    type: "object",
    properties: {
      org_alias: ORG_ALIAS_PROPERTY
    }
  }
};

export const RUN_REPORT: Tool = {
  name: "salesforce_run_report",
  description: "Run a report synchronously and return its results. Filters replace the report's saved metadata for this run.",
  inputSchema: {
    type: "object",
    properties: {
      report_id: { type: "string", description: "Report ID" },
      filters: { type: "object", description: "Report metadata overrides, e.g. reportFilters" },
      org_alias: ORG_ALIAS_PROPERTY
    },
    required: ["report_id"]
  }
};

export const ListReportsArgsSchema = z.object({
  org_alias: OrgAliasSchema
});

export const RunReportArgsSchema = z.object({
  report_id: z.string().trim().min(1),
  filters: z.record(z.string(), z.unknown()).optional(),
  org_alias: OrgAliasSchema
});

export const listReportsTool = defineTool(LIST_REPORTS, ListReportsArgsSchema, async (args, { runtime, signal }) => {
  const reports = await runtime.client(args.org_alias).listReports({ signal });
  return { count: reports.length, reports: reports.map(({ id, name }) => ({ id, name })) };
});

export const runReportTool = defineTool(RUN_REPORT, RunReportArgsSchema, async (args, { runtime, signal }) =>
  runtime.client(args.org_alias).runReport(args.report_id, args.filters, { signal })
);
