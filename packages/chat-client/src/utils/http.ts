/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * Sends a JSON POST and hands back the raw response stream. Status handling
 * is left to the caller.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a streaming HTTP request. */
export interface HttpStreamResponse {
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array>;
}

/** Options for `httpStream`. */
export interface HttpRequestOptions {
  /** Caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/** Read a whole response stream as text. */
export async function readStreamText(
  stream: ReadableStream<Uint8Array>,
): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = "";
  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    return text + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return a streaming response.
 *
 * The caller is responsible for consuming and closing the stream.
 *
 * @throws {Error} On network-level failures or abort before any data arrives.
 */
export async function httpStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpStreamResponse> {
  const res = await fetch(url, {
    method: "POST",
    headers: mergeHeaders(headers),
    body: JSON.stringify(body),
    signal: options?.signal,
  });

  if (!res.body) {
    throw new Error("Response body is null -- streaming not supported");
  }

  return {
    status: res.status,
    headers: res.headers,
    body: res.body,
  };
}
