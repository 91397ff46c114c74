/**
 * Scripted replacement for `fetch`. Each call consumes the next entry of the
 * sequence: a response factory, or a function returning/throwing whatever the
 * scenario needs. Calls are recorded for assertions on URL, verb and body.
 */
export type FetchRecorder = Array<{ url: string; init: RequestInit | undefined }>;

export type FetchSequenceEntry = (init: RequestInit | undefined) => Response | Promise<Response>;

export function createFetchStub(sequence: FetchSequenceEntry[], recorder: FetchRecorder = []): typeof fetch {
  const entries = [...sequence];
  return async (input: string | URL | Request, init?: RequestInit) => {
    recorder.push({ url: input instanceof Request ? input.url : String(input), init });
    const next = entries.shift();
    if (!next) {
      throw new Error("Unexpected fetch call in test");
    }
    return next(init);
  };
}

export function jsonResponse(payload: unknown, status = 200): FetchSequenceEntry {
  return () =>
    new Response(JSON.stringify(payload), {
      status,
      headers: { "content-type": "application/json" },
    });
}

export function textResponse(text: string, status = 200): FetchSequenceEntry {
  return () => new Response(text, { status, headers: { "content-type": "text/plain" } });
}

/** Rejects the way undici does when nothing listens on the target port. */
export function connectionRefused(): FetchSequenceEntry {
  return () => {
    const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8080"), { code: "ECONNREFUSED" });
    throw new TypeError("fetch failed", { cause });
  };
}

/** Never settles until the request's abort signal fires, then rejects like fetch. */
export function hangUntilAborted(): FetchSequenceEntry {
  return (init) =>
    new Promise<Response>((_, reject) => {
      const signal = init?.signal;
      if (!signal) {
        reject(new Error("Missing abort signal"));
        return;
      }
      signal.addEventListener("abort", () => {
        const abortError = new Error("This operation was aborted");
        abortError.name = "AbortError";
        reject(abortError);
      });
    });
}

/** Reads the JSON body recorded for a call. */
export function recordedBody(entry: { init: RequestInit | undefined }): unknown {
  const body = entry.init?.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}
