/**
 * ChatTransport interface: the contract between a chat session and the
 * network.
 */

import type { ChatCompletionRequest } from "../types/index.js";

/**
 * Opens streaming chat completion requests.
 *
 * A transport is acquired once for the lifetime of a client and released with
 * `close()`; implementations reject `openStream` after that.
 */
export interface ChatTransport {
  /** Transport name, used in logs. */
  readonly name: string;

  /**
   * POST a request and return the response body stream.
   *
   * Must reject with a `TransportError` for any non-200 status or
   * connection failure. The caller consumes (or cancels) the stream.
   */
  openStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ReadableStream<Uint8Array>>;

  /** Release connections and abort requests still in flight. */
  close(): Promise<void>;
}
