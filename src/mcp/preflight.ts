import type { GephiClient } from "../bridge/client.js";

/** Message printed when Gephi cannot serve graph operations. */
export const PREFLIGHT_BLOCK_MESSAGE =
  "BLOCK: Gephi Desktop is not running or the MCP plugin is not responding. " +
  "Please start Gephi with the MCP plugin installed before performing graph operations.";

/**
 * Probes `GET /health` once. Resolves to `null` when Gephi answered with HTTP
 * 200, otherwise to {@link PREFLIGHT_BLOCK_MESSAGE}. Only the status counts: a
 * 200 with an undecodable body still passes. Meant to run as a tool-use hook
 * before graph operations; it never throws.
 */
export async function runPreflight(client: GephiClient): Promise<string | null> {
  const outcome = await client.execute("GET", "/health");
  return outcome.ok || outcome.status === 200 ? null : PREFLIGHT_BLOCK_MESSAGE;
}
