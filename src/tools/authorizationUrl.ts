import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ConnectionType } from "../types/connection.js";
import { ConfigurationError } from "../utils/errorHandler.js";
import { defineTool, ORG_ALIAS_PROPERTY, OrgAliasSchema } from "./toolDefinition.js";

export const AUTHORIZATION_URL: Tool = {
  name: "salesforce_authorization_url",
  description: "Build the consent URL for an org that uses the OAuth 2.0 Web Server flow. After the user approves access, Salesforce redirects to the configured redirect URI with a one-time code parameter; store it as the org's AUTH_CODE (or the resulting refresh token as REFRESH_TOKEN) and restart the server.",
  inputSchema: {
    type: "object",
    properties: {
      state: { type: "string", description: "Opaque value echoed back on the redirect" },
      org_alias: ORG_ALIAS_PROPERTY
    }
  }
};

export const AuthorizationUrlArgsSchema = z.object({
  state: z.string().min(1).optional(),
  org_alias: OrgAliasSchema
});

export const authorizationUrlTool = defineTool(AUTHORIZATION_URL, AuthorizationUrlArgsSchema, async (args, { runtime }) => {
  const org = runtime.registry.resolve(args.org_alias);
  const provider = org.authProvider;
  if (provider.type !== ConnectionType.OAuth_2_0_Web_Server) {
    throw new ConfigurationError(
      `Org "${org.alias}" uses ${provider.type}; an authorization URL only applies to the ${ConnectionType.OAuth_2_0_Web_Server} flow`
    );
  }

  return {
    orgAlias: org.alias,
    authorizationUrl: provider.authorizationUrl(args.state),
    tokenEndpoint: `${org.loginUrl}/services/oauth2/token`
  };
});
