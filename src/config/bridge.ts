import { readEnum, readInt, readOptionalString, readString } from "./env.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";

/** Address of the Gephi MCP plugin HTTP API when nothing else is configured. */
export const DEFAULT_GEPHI_API_URL = "http://127.0.0.1:8080";
/** Budget applied to every call against Gephi (60 s, matching long statistics runs). */
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
/** Budget applied by the connectivity preflight (`--check`). */
export const DEFAULT_CHECK_TIMEOUT_MS = 2_000;
/** Upper bound accepted for any timeout override (one hour). */
export const MAX_TIMEOUT_MS = 3_600_000;

/**
 * Process-wide configuration of the bridge. Built once at start-up, frozen,
 * then handed by reference to the transport client and the logger.
 */
export interface BridgeConfig {
  /** Base URL of the Gephi plugin API, without trailing slash. */
  readonly baseUrl: string;
  /** Per-call timeout in milliseconds. Never retried. */
  readonly timeoutMs: number;
  /** Timeout used by the connectivity preflight. */
  readonly checkTimeoutMs: number;
  readonly logFile: string | null;
  readonly logLevel: LogLevel;
}

/** Overrides coming from the command line; they win over the environment. */
export type BridgeConfigOverrides = Partial<Omit<BridgeConfig, "logFile">> & {
  readonly logFile?: string | null;
};

/** Strips trailing slashes so endpoint paths can be appended verbatim. */
export function normaliseBaseUrl(raw: string): string {
  return raw.trim().replace(/\/+$/, "");
}

/**
 * Loads the bridge configuration from the environment:
 *
 * - `GEPHI_API_URL` (default {@link DEFAULT_GEPHI_API_URL})
 * - `GEPHI_REQUEST_TIMEOUT_MS` (default {@link DEFAULT_REQUEST_TIMEOUT_MS})
 * - `GEPHI_CHECK_TIMEOUT_MS` (default {@link DEFAULT_CHECK_TIMEOUT_MS})
 * - `GEPHI_BRIDGE_LOG_FILE`, `GEPHI_BRIDGE_LOG_LEVEL`
 *
 * Invalid values fall back to the defaults.
 */
export function loadBridgeConfig(overrides: BridgeConfigOverrides = {}): BridgeConfig {
  const timeoutBounds = { min: 1, max: MAX_TIMEOUT_MS };
  const config: BridgeConfig = {
    baseUrl: normaliseBaseUrl(overrides.baseUrl ?? readString("GEPHI_API_URL", DEFAULT_GEPHI_API_URL)),
    timeoutMs: overrides.timeoutMs ?? readInt("GEPHI_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, timeoutBounds),
    checkTimeoutMs:
      overrides.checkTimeoutMs ?? readInt("GEPHI_CHECK_TIMEOUT_MS", DEFAULT_CHECK_TIMEOUT_MS, timeoutBounds),
    logFile: overrides.logFile !== undefined ? overrides.logFile : readOptionalString("GEPHI_BRIDGE_LOG_FILE") ?? null,
    logLevel: overrides.logLevel ?? readEnum("GEPHI_BRIDGE_LOG_LEVEL", LOG_LEVELS, "info"),
  };
  return Object.freeze(config);
}
