import type { HttpMethod, QueryParams, QueryValue } from "../bridge/client.js";
import { PATH_SLOT_PATTERN, type OperationDescriptor } from "./schema.js";

/** Parameter object supplied by the caller. Always an object, possibly empty. */
export type InvocationParams = Readonly<Record<string, unknown>>;

/** Concrete HTTP call derived from a descriptor and the caller's parameters. */
export interface TransportCall {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: QueryParams;
  readonly body?: unknown;
}

/**
 * Applies the descriptor's placement rule to the caller's parameters. Nothing
 * is validated here: malformed input is forwarded and Gephi reports it.
 *
 * - `query`: only the keys listed in `defaults` are forwarded, caller values
 *   win over defaults;
 * - `body`: `{ ...defaults, ...params }` is sent as JSON;
 * - `path`: `{slot}` placeholders are filled from params, then defaults;
 * - `none`: params are accepted and ignored.
 */
export function resolveInvocation(descriptor: OperationDescriptor, params: InvocationParams = {}): TransportCall {
  switch (descriptor.placement) {
    case "query": {
      const query: Record<string, QueryValue> = {};
      for (const [key, fallback] of Object.entries(descriptor.defaults)) {
        query[key] = toQueryValue(pickValue(params, key) ?? fallback);
      }
      return { method: descriptor.method, path: descriptor.path, query };
    }
    case "body":
      return { method: descriptor.method, path: descriptor.path, body: { ...descriptor.defaults, ...params } };
    case "path": {
      const defaults = descriptor.defaults;
      const path = descriptor.path.replace(PATH_SLOT_PATTERN, (_slot, key: string) =>
        encodeURIComponent(String(toQueryValue(pickValue(params, key) ?? defaults[key] ?? ""))),
      );
      return { method: descriptor.method, path };
    }
    case "none":
      return { method: descriptor.method, path: descriptor.path };
  }
}

/** Returns the caller's value for `key`, treating `null` like an absent key. */
function pickValue(params: InvocationParams, key: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(params, key)) {
    return undefined;
  }
  const value = params[key];
  return value === null ? undefined : value;
}

/** Scalars go through untouched; structured values are sent as their JSON text. */
function toQueryValue(value: unknown): QueryValue {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  try {
    const json = JSON.stringify(value);
    return typeof json === "string" ? json : String(value);
  } catch {
    return String(value);
  }
}
