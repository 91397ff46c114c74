import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

/** Default placeholder inserted when a secret value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when `GEPHI_BRIDGE_LOG_REDACT=on`. */
const SENSITIVE_KEYS = new Set(["authorization", "password", "token", "api_key"]);

/**
 * Parses the `GEPHI_BRIDGE_LOG_REDACT` environment variable so operators can both
 * toggle redaction and provide a list of sensitive substrings that must be
 * scrubbed from log lines. The helper accepts comma-separated directives such
 * as `"on,secret-"` or `"off"` and enables redaction when custom patterns are
 * provided without an explicit toggle.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of log files retained during rotation (active one included). */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface the logger emits JSON lines to. */
export interface LogSink {
  write(line: string): unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Substrings or expressions scrubbed from string values in payloads. */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Explicit toggle for structured payload redaction. When omitted, the logger
   * falls back to {@link parseRedactionDirectives} applied to `GEPHI_BRIDGE_LOG_REDACT`.
   */
  readonly redactionEnabled?: boolean;
  /**
   * Destination of the JSON lines. Defaults to stderr: stdout is reserved for
   * the MCP stdio transport.
   */
  readonly sink?: LogSink;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly threshold: number;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly sink: LogSink;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory containing {@link logFile} has already been created. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.threshold = LEVEL_WEIGHT[options.level ?? "info"];
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.GEPHI_BRIDGE_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.sink = options.sink ?? process.stderr;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_WEIGHT[level] < this.threshold) {
      return;
    }
    const safePayload = payload !== undefined && this.redactionEnabled ? this.deepRedact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        this.reportInternalFailure("log_file_write_failed", err);
        // Allow future attempts to retry directory creation after a failure.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending {@link pendingBytes} would exceed
   * the configured size. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFileError(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  private async performRotation(logFile: string): Promise<void> {
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  /** Failures of the logger itself go straight to stderr to avoid recursion. */
  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: error instanceof Error ? error.message : String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.redactString(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private redactString(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }
}
