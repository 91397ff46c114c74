import type { BridgeConfig } from "../config/bridge.js";
import type { StructuredLogger } from "../logger.js";
import { failure, success, type TransportOutcome } from "./outcome.js";

/** HTTP verbs exposed by the Gephi plugin API. */
export const HTTP_METHODS = ["GET", "POST", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Scalar accepted in a query string. */
export type QueryValue = string | number | boolean;

export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * Error codes surfaced by Node's networking stack (and undici) when no
 * connection to the target could be established.
 */
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EHOSTDOWN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/** Longest excerpt of an undecodable body echoed back to the caller. */
const BODY_EXCERPT_LIMIT = 200;

/**
 * HTTP client for the Gephi MCP plugin. One call to {@link execute} issues
 * exactly one request and always resolves with a {@link TransportOutcome}:
 * transport failures are reported as values, never thrown, and nothing is
 * retried since most Gephi operations are not idempotent.
 */
export class GephiClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(
    config: Pick<BridgeConfig, "baseUrl" | "timeoutMs">,
    logger: StructuredLogger,
    fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
    this.logger = logger;
    this.fetchImpl = fetchImpl;
  }

  /** Issues `method path` against Gephi and normalises whatever happens. */
  async execute(method: HttpMethod, path: string, query?: QueryParams, body?: unknown): Promise<TransportOutcome> {
    const startedAt = Date.now();
    this.logger.debug("gephi_request", { method, path, query: query ?? null });

    const outcome = await this.perform(method, path, query, body);

    const durationMs = Date.now() - startedAt;
    if (outcome.ok) {
      this.logger.debug("gephi_response", { method, path, duration_ms: durationMs });
    } else {
      this.logger.warn("gephi_request_failed", {
        method,
        path,
        kind: outcome.kind,
        status: outcome.status ?? null,
        message: outcome.message,
        duration_ms: durationMs,
      });
    }
    return outcome;
  }

  private async perform(
    method: HttpMethod,
    path: string,
    query: QueryParams | undefined,
    body: unknown,
  ): Promise<TransportOutcome> {
    let url: URL;
    let serialisedBody: string | undefined;
    // One connection per call: keep-alive sockets are never reused.
    const headers = new Headers({ Accept: "application/json", Connection: "close" });
    try {
      url = this.buildUrl(path, query);
      if (body !== undefined) {
        serialisedBody = JSON.stringify(body);
        headers.set("Content-Type", "application/json");
      }
    } catch (error) {
      return failure("other", `Request failed: ${describeError(error)}`);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: serialisedBody,
        signal: controller.signal,
      });
      // The body is read under the same deadline as the headers.
      const text = await response.text();
      return interpretResponse(response.status, response.ok, text);
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        return failure(
          "timeout",
          `Request timed out after ${this.timeoutMs}ms. The operation may still be running in Gephi.`,
        );
      }
      if (isConnectionError(error)) {
        return failure(
          "connection_error",
          `Cannot connect to Gephi at ${this.baseUrl}. Ensure Gephi is running with the MCP plugin installed.`,
        );
      }
      return failure("other", `Request failed: ${describeError(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildUrl(path: string, query: QueryParams | undefined): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.append(key, String(value));
      }
    }
    return url;
  }
}

/**
 * Maps a completed HTTP exchange onto an outcome. Error statuses keep Gephi's
 * own JSON description when one is present and fall back to the raw text
 * otherwise.
 */
export function interpretResponse(status: number, ok: boolean, text: string): TransportOutcome {
  const parsed = parseJson(text);

  if (ok) {
    if (!parsed.valid) {
      return failure("decode_error", `Invalid JSON response from Gephi (HTTP ${status}): ${excerpt(text)}`, {
        status,
      });
    }
    return success(parsed.value);
  }

  if (!parsed.valid) {
    return failure("http_status_error", `HTTP ${status}: ${text}`, { status });
  }
  return failure("http_status_error", extractErrorMessage(parsed.value) ?? `HTTP ${status}`, {
    status,
    payload: parsed.value,
  });
}

type JsonParseResult = { valid: true; value: unknown } | { valid: false };

function parseJson(text: string): JsonParseResult {
  if (text.trim().length === 0) {
    return { valid: false };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { valid: true, value };
  } catch {
    return { valid: false };
  }
}

function extractErrorMessage(value: unknown): string | undefined {
  if (value && typeof value === "object" && "error" in value && typeof value.error === "string") {
    return value.error;
  }
  return undefined;
}

function excerpt(text: string): string {
  if (text.length === 0) {
    return "<empty body>";
  }
  return text.length <= BODY_EXCERPT_LIMIT ? text : `${text.slice(0, BODY_EXCERPT_LIMIT)}…`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Walks the `cause` chain (fetch wraps socket errors in a `TypeError`) and the
 * members of `AggregateError`s (dual-stack connection attempts) looking for a
 * connection-level error code.
 */
export function isConnectionError(error: unknown, depth = 0): boolean {
  if (!(error instanceof Error) || depth > 5) {
    return false;
  }
  if ("code" in error && typeof error.code === "string" && CONNECTION_ERROR_CODES.has(error.code)) {
    return true;
  }
  if (error instanceof AggregateError && error.errors.some((member) => isConnectionError(member, depth + 1))) {
    return true;
  }
  return isConnectionError(error.cause, depth + 1);
}
