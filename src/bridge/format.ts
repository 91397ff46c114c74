import type { TransportOutcome } from "./outcome.js";

/** Indentation used for every rendered payload. */
const INDENT = 2;

/**
 * Renders a JSON-compatible value as pretty-printed text. Key order follows
 * insertion order. Values JSON cannot express (cycles, `BigInt`, a bare
 * `undefined`) are coerced to their string form instead of throwing.
 */
export function formatPayload(value: unknown): string {
  try {
    const rendered = JSON.stringify(value, null, INDENT);
    // JSON.stringify yields undefined for undefined, functions and symbols.
    return typeof rendered === "string" ? rendered : String(value);
  } catch {
    return String(value);
  }
}

/**
 * Renders an outcome in the shape callers branch on: Gephi's payload for a
 * success, Gephi's own error body when it sent one, and a synthesised
 * `{ success: false, error }` document otherwise.
 */
export function formatOutcome(outcome: TransportOutcome): string {
  if (outcome.ok) {
    return formatPayload(outcome.payload);
  }
  if (outcome.payload !== undefined) {
    return formatPayload(outcome.payload);
  }
  return formatPayload({
    success: false,
    error: outcome.message,
    error_kind: outcome.kind,
    ...(outcome.status !== undefined ? { status: outcome.status } : {}),
  });
}
