/** Categories of failures the transport client can report. */
export const TRANSPORT_FAILURE_KINDS = [
  "connection_error",
  "timeout",
  "http_status_error",
  "decode_error",
  "other",
] as const;

export type TransportFailureKind = (typeof TRANSPORT_FAILURE_KINDS)[number];

/** Successful exchange: Gephi answered 2xx with a JSON body. */
export interface TransportSuccess {
  readonly ok: true;
  readonly payload: unknown;
}

/**
 * Failed exchange. `payload` is only present for `http_status_error` when
 * Gephi described the failure itself with a JSON body; it is forwarded to the
 * caller untouched.
 */
export interface TransportFailure {
  readonly ok: false;
  readonly kind: TransportFailureKind;
  readonly message: string;
  readonly status?: number;
  readonly payload?: unknown;
}

/** Normalised result of exactly one call against Gephi. */
export type TransportOutcome = TransportSuccess | TransportFailure;

export function success(payload: unknown): TransportSuccess {
  const outcome: TransportSuccess = { ok: true, payload };
  return Object.freeze(outcome);
}

export function failure(
  kind: TransportFailureKind,
  message: string,
  extras: { status?: number; payload?: unknown } = {},
): TransportFailure {
  const outcome: TransportFailure = {
    ok: false,
    kind,
    message,
    ...(extras.status !== undefined ? { status: extras.status } : {}),
    ...(extras.payload !== undefined ? { payload: extras.payload } : {}),
  };
  return Object.freeze(outcome);
}
