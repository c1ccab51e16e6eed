import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { httpStream, mergeHeaders, readStreamText } from "../src/utils/http.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a minimal mock Response. */
function mockResponse(init: {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
  stream?: ReadableStream<Uint8Array>;
}): Response {
  const { status = 200, body = "", headers = {}, stream } = init;
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: new Headers(headers),
    text: () => Promise.resolve(body),
    json: () => Promise.resolve(JSON.parse(body)),
    body: stream ?? null,
  } as unknown as Response;
}

describe("mergeHeaders", () => {
  it("sets Content-Type: application/json by default", () => {
    const result = mergeHeaders();
    expect(result["Content-Type"]).toBe("application/json");
  });

  it("merges multiple header objects, later overriding earlier", () => {
    const result = mergeHeaders(
      { Authorization: "Bearer test-secret", "X-Custom": "first" },
      { "X-Custom": "second", "X-New": "value" },
    );
    expect(result).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
      "X-Custom": "second",
      "X-New": "value",
    });
  });

  it("allows overriding Content-Type", () => {
    const result = mergeHeaders({ "Content-Type": "text/plain" });
    expect(result["Content-Type"]).toBe("text/plain");
  });

  it("ignores undefined header sets", () => {
    const result = mergeHeaders(undefined, { "X-Key": "val" }, undefined);
    expect(result).toEqual({
      "Content-Type": "application/json",
      "X-Key": "val",
    });
  });
});

describe("readStreamText", () => {
  it("reads a whole stream as text", async () => {
    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"error":'));
        controller.enqueue(encoder.encode('"bad key"}'));
        controller.close();
      },
    });

    expect(await readStreamText(stream)).toBe('{"error":"bad key"}');
    expect(stream.locked).toBe(false);
  });
});

describe("httpStream", () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("returns a streaming response", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("chunk1"));
        controller.close();
      },
    });

    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        mockResponse({ status: 200, stream }),
      ),
    );

    const result = await httpStream("https://example.com", {}, {});
    expect(result.status).toBe(200);
    expect(result.body).toBeInstanceOf(ReadableStream);

    // Read the stream to verify data.
    const reader = result.body.getReader();
    const { value, done } = await reader.read();
    expect(done).toBe(false);
    expect(new TextDecoder().decode(value)).toBe("chunk1");
    const final = await reader.read();
    expect(final.done).toBe(true);
  });

  it("sends a JSON POST with merged headers and the caller's signal", async () => {
    const mockFn = vi.fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>()
      .mockResolvedValue(
        mockResponse({ status: 200, stream: new ReadableStream<Uint8Array>() }),
      );
    vi.stubGlobal("fetch", mockFn);
    const controller = new AbortController();

    await httpStream(
      "https://api.example.com/v1/chat/completions",
      { model: "gpt-4-0613", stream: true },
      { Authorization: "Bearer test-secret" },
      { signal: controller.signal },
    );

    expect(mockFn).toHaveBeenCalledOnce();
    const [url, init] = mockFn.mock.calls[0]!;
    expect(url).toBe("https://api.example.com/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ model: "gpt-4-0613", stream: true }));
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(init?.signal).toBe(controller.signal);
  });

  it("returns non-200 responses without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        mockResponse({ status: 401, stream: new ReadableStream<Uint8Array>() }),
      ),
    );

    const result = await httpStream("https://example.com", {}, {});
    expect(result.status).toBe(401);
  });

  it("propagates network errors from fetch", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockRejectedValue(new TypeError("Failed to fetch")),
    );

    await expect(httpStream("https://example.com", {}, {})).rejects.toThrow(
      "Failed to fetch",
    );
  });

  it("throws if response body is null", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        mockResponse({ status: 200 }), // no stream
      ),
    );

    await expect(httpStream("https://example.com", {}, {})).rejects.toThrow(
      "Response body is null",
    );
  });
});
