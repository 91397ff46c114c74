import { McpServer, type RegisteredTool } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult, ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { GephiClient } from "../bridge/client.js";
import { formatOutcome } from "../bridge/format.js";
import type { BridgeConfig } from "../config/bridge.js";
import { resolveInvocation } from "../catalog/invocation.js";
import type { OperationCatalog, OperationDescriptor } from "../catalog/schema.js";
import type { StructuredLogger } from "../logger.js";

/** Name advertised during the MCP handshake. Callers persist it in their configuration. */
export const SERVER_NAME = "gephi_mcp" as const;
export const SERVER_VERSION = "0.1.0" as const;

/**
 * Input shape shared by every tool: a single optional `params` object. Keeping
 * the convention uniform lets generic callers invoke parameterless tools the
 * same way as the others.
 */
export const CatalogToolInputShape = {
  params: z
    .record(z.unknown())
    .optional()
    .describe("Operation parameters, forwarded to Gephi as-is. May be omitted or empty."),
} satisfies z.ZodRawShape;

export type CatalogToolInput = z.infer<z.ZodObject<typeof CatalogToolInputShape>>;

/** Dependencies shared by the generated tool handlers. */
export interface CatalogToolContext {
  readonly catalog: OperationCatalog;
  readonly client: GephiClient;
  readonly logger: StructuredLogger;
}

/** Annotations derived from the descriptor. They are hints only; nothing is gated. */
export function describeAnnotations(descriptor: OperationDescriptor): ToolAnnotations {
  return {
    title: descriptor.title,
    readOnlyHint: descriptor.method === "GET",
    destructiveHint: descriptor.destructive ?? false,
    openWorldHint: false,
  };
}

/**
 * Executes one catalog operation and renders the outcome. The returned text is
 * the only result channel: failures are reported inside it (`success: false`)
 * rather than through exceptions or `isError`.
 */
export async function invokeCatalogOperation(
  descriptor: OperationDescriptor,
  input: CatalogToolInput,
  context: Pick<CatalogToolContext, "client" | "logger">,
): Promise<CallToolResult> {
  const call = resolveInvocation(descriptor, input.params ?? {});
  context.logger.debug("tool_invoked", { tool: descriptor.name, method: call.method, path: call.path });
  const outcome = await context.client.execute(call.method, call.path, call.query, call.body);
  return { content: [{ type: "text", text: formatOutcome(outcome) }] };
}

/** Registers one MCP tool per catalog entry and returns them keyed by name. */
export function registerCatalogTools(server: McpServer, context: CatalogToolContext): Map<string, RegisteredTool> {
  const registered = new Map<string, RegisteredTool>();
  for (const descriptor of context.catalog.operations) {
    const tool = server.registerTool(
      descriptor.name,
      {
        title: descriptor.title,
        description: descriptor.description,
        inputSchema: CatalogToolInputShape,
        annotations: describeAnnotations(descriptor),
      },
      async (input) => invokeCatalogOperation(descriptor, input, context),
    );
    registered.set(descriptor.name, tool);
  }
  context.logger.info("catalog_loaded", { version: context.catalog.version, tools: registered.size });
  return registered;
}

export interface BridgeServerOptions {
  readonly config: Pick<BridgeConfig, "baseUrl" | "timeoutMs">;
  readonly catalog: OperationCatalog;
  readonly logger: StructuredLogger;
  /** Alternative fetch implementation, used by tests. */
  readonly fetchImpl?: typeof fetch;
}

export interface BridgeServer {
  readonly server: McpServer;
  readonly client: GephiClient;
  readonly tools: ReadonlyMap<string, RegisteredTool>;
}

/** Builds the MCP server with every catalog operation registered. */
export function createBridgeServer(options: BridgeServerOptions): BridgeServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const client = new GephiClient(options.config, options.logger, options.fetchImpl);
  const tools = registerCatalogTools(server, { catalog: options.catalog, client, logger: options.logger });
  return { server, client, tools };
}
