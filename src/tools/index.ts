import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ClientRuntime } from "../utils/clientRuntime.js";
import { toErrorPayload, UnknownOperationError } from "../utils/errorHandler.js";
import { log } from "../utils/logger.js";
import type { RegisteredTool } from "./toolDefinition.js";
import { queryTool } from "./query.js";
import { getRecordTool } from "./getRecord.js";
import { createRecordTool } from "./createRecord.js";
import { updateRecordTool } from "./updateRecord.js";
import { deleteRecordTool } from "./deleteRecord.js";
import { describeObjectTool } from "./describeObject.js";
import { listObjectsTool } from "./listObjects.js";
import { bulkOperationTool } from "./bulkOperation.js";
import { executeApexTool } from "./executeApex.js";
import { listReportsTool, runReportTool } from "./reports.js";
import { listOrgsTool } from "./listOrgs.js";
import { authorizationUrlTool } from "./authorizationUrl.js";

export const TOOLS: readonly RegisteredTool[] = [
  queryTool,
  getRecordTool,
  createRecordTool,
  updateRecordTool,
  deleteRecordTool,
  describeObjectTool,
  listObjectsTool,
  bulkOperationTool,
  executeApexTool,
  listReportsTool,
  runReportTool,
  listOrgsTool,
  authorizationUrlTool
];

const TOOLS_BY_NAME = new Map(TOOLS.map((entry) => [entry.tool.name, entry]));

export function listTools(): Tool[] {
  return TOOLS.map((entry) => entry.tool);
}

export interface OperationRequest {
  operation_name: string;
  org_alias?: string;
  arguments?: Record<string, unknown>;
}

export type OperationResponse =
  | { result: unknown }
  | { error_kind: string; message: string; details: Record<string, unknown> };

/**
 * Run one named operation. Failures are returned as an error payload, never
 * thrown, so one bad call cannot take the server down.
 */
export async function invokeOperation(
  runtime: ClientRuntime,
  request: OperationRequest,
  signal?: AbortSignal
): Promise<OperationResponse> {
  try {
    const entry = TOOLS_BY_NAME.get(request.operation_name);
    if (!entry) {
      throw new UnknownOperationError(request.operation_name, Array.from(TOOLS_BY_NAME.keys()));
    }

    const args = request.org_alias === undefined
      ? request.arguments ?? {}
      : { ...request.arguments, org_alias: request.org_alias };

    log("DEBUG", `Invoking ${request.operation_name}`);
    const result = await entry.invoke({ runtime, ...(signal ? { signal } : {}) }, args);
    return { result };
  } catch (error) {
    const payload = toErrorPayload(error);
    log(
      payload.error_kind === "internal_error" ? "ERROR" : "WARN",
      `${request.operation_name} failed: [${payload.error_kind}] ${payload.message}`
    );
    return payload;
  }
}

export type { OperationContext, RegisteredTool } from "./toolDefinition.js";
