import { MAX_TIMEOUT_MS, normaliseBaseUrl, type BridgeConfigOverrides } from "./config/bridge.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

/** Runtime options parsed from the command line. */
export interface BridgeRuntimeOptions {
  /** Run the connectivity preflight and exit instead of serving MCP. */
  readonly check: boolean;
  /** Values that take precedence over the environment. */
  readonly overrides: BridgeConfigOverrides;
}

/** Raised when a flag is malformed. The entry point logs it and exits with 1. */
export class CliOptionsError extends Error {
  public readonly code = "E-CLI-OPTIONS" as const;

  constructor(message: string) {
    super(message);
    this.name = "CliOptionsError";
  }
}

/** Flags expecting a value, given inline (`--flag=value`) or as the next argument. */
const FLAG_WITH_VALUE = new Set(["--base-url", "--timeout-ms", "--check-timeout-ms", "--log-file", "--log-level"]);

/** Ensures a numeric flag is a positive integer within the accepted timeout range. */
function parseTimeout(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0 || num > MAX_TIMEOUT_MS) {
    throw new CliOptionsError(`The value ${value} for ${flag} must be an integer between 1 and ${MAX_TIMEOUT_MS}.`);
  }
  return num;
}

function parseBaseUrl(value: string, flag: string): string {
  const normalised = normaliseBaseUrl(value);
  let parsed: URL;
  try {
    parsed = new URL(normalised);
  } catch {
    throw new CliOptionsError(`The value ${value} for ${flag} is not a valid URL.`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new CliOptionsError(`The value ${value} for ${flag} must use http or https.`);
  }
  return normalised;
}

function parseLogLevel(value: string, flag: string): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value.trim().toLowerCase());
  if (!match) {
    throw new CliOptionsError(`The value ${value} for ${flag} must be one of ${LOG_LEVELS.join(", ")}.`);
  }
  return match;
}

/**
 * Parses `process.argv.slice(2)`. Unknown flags and positional arguments are
 * ignored so wrappers can pass extra arguments through.
 */
export function parseBridgeRuntimeOptions(argv: readonly string[]): BridgeRuntimeOptions {
  let check = false;
  const overrides: {
    baseUrl?: string;
    timeoutMs?: number;
    checkTimeoutMs?: number;
    logFile?: string | null;
    logLevel?: LogLevel;
  } = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliOptionsError(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--base-url":
        overrides.baseUrl = parseBaseUrl(value ?? "", flag);
        break;
      case "--timeout-ms":
        overrides.timeoutMs = parseTimeout(value ?? "", flag);
        break;
      case "--check-timeout-ms":
        overrides.checkTimeoutMs = parseTimeout(value ?? "", flag);
        break;
      case "--log-file": {
        const trimmed = (value ?? "").trim();
        overrides.logFile = trimmed.length > 0 ? trimmed : null;
        break;
      }
      case "--log-level":
        overrides.logLevel = parseLogLevel(value ?? "", flag);
        break;
      case "--check":
        check = true;
        break;
      default:
        break;
    }
  }

  return { check, overrides };
}
