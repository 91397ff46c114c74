#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { GephiClient } from "./bridge/client.js";
import { loadOperationCatalog, type OperationCatalog } from "./catalog/schema.js";
import { loadBridgeConfig } from "./config/bridge.js";
import { StructuredLogger } from "./logger.js";
import { runPreflight } from "./mcp/preflight.js";
import { createBridgeServer } from "./mcp/registry.js";
import { parseBridgeRuntimeOptions, type BridgeRuntimeOptions } from "./serverOptions.js";

export { createBridgeServer, SERVER_NAME, SERVER_VERSION } from "./mcp/registry.js";
export { GephiClient } from "./bridge/client.js";
export { formatOutcome, formatPayload } from "./bridge/format.js";
export type { TransportOutcome, TransportFailure, TransportFailureKind } from "./bridge/outcome.js";
export { loadOperationCatalog, parseOperationCatalog } from "./catalog/schema.js";
export type { OperationCatalog, OperationDescriptor } from "./catalog/schema.js";
export { resolveInvocation } from "./catalog/invocation.js";
export { loadBridgeConfig } from "./config/bridge.js";
export type { BridgeConfig } from "./config/bridge.js";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bootstraps the bridge: parses CLI flags, freezes the configuration, loads
 * the catalog and serves it over stdio until SIGINT/SIGTERM.
 */
async function main(): Promise<void> {
  let options: BridgeRuntimeOptions;
  try {
    options = parseBridgeRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const config = loadBridgeConfig(options.overrides);
  const logger = new StructuredLogger({ logFile: config.logFile, level: config.logLevel });

  if (options.check) {
    const client = new GephiClient({ baseUrl: config.baseUrl, timeoutMs: config.checkTimeoutMs }, logger);
    const blocked = await runPreflight(client);
    if (blocked) {
      process.stdout.write(`${blocked}\n`);
    }
    await logger.flush();
    return;
  }

  logger.info("bridge_starting", { base_url: config.baseUrl, timeout_ms: config.timeoutMs });

  let catalog: OperationCatalog;
  try {
    catalog = await loadOperationCatalog();
  } catch (error) {
    logger.error("catalog_load_failed", { message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }

  const { server } = createBridgeServer({ config, catalog, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", { tools: catalog.operations.length });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    try {
      await server.close();
    } catch (error) {
      logger.error("server_close_failed", { message: describeError(error) });
    }
    await logger.flush();
    process.exit(0);
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // `npm` installs the bin as a symlink; compare resolved paths.
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    process.stderr.write(`${JSON.stringify({ level: "error", message: "bridge_crashed", payload: describeError(error) })}\n`);
    process.exit(1);
  });
}
