import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodType, type ZodTypeDef } from "zod";
import type { ClientRuntime } from "../utils/clientRuntime.js";
import { InvalidArgumentsError } from "../utils/errorHandler.js";

export interface OperationContext {
  runtime: ClientRuntime;
  signal?: AbortSignal;
}

/**
 * A tool as listed to MCP clients, plus the validated entry point behind it
 */
export interface RegisteredTool {
  readonly tool: Tool;
  invoke(context: OperationContext, args: unknown): Promise<unknown>;
}

export const ORG_ALIAS_PROPERTY = {
  type: "string",
  description: "Alias of the target org. Uses the default org when omitted."
} as const;

export const OrgAliasSchema = z.string().min(1).optional();

export function defineTool<T>(
  tool: Tool,
  schema: ZodType<T, ZodTypeDef, unknown>,
  handler: (args: T, context: OperationContext) => Promise<unknown>
): RegisteredTool {
  return {
    tool,
    async invoke(context, args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidArgumentsError(
          tool.name,
          parsed.error.issues.map((issue) =>
            issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
          )
        );
      }
      return handler(parsed.data, context);
    }
  };
}
