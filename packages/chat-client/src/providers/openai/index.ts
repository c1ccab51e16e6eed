/**
 * OpenAI chat completions transport.
 *
 * POST {baseUrl}/chat/completions with `stream: true`.
 * Authentication via Bearer token in Authorization header.
 */

import type { Logger } from "pino";
import type { ChatTransport } from "../adapter.js";
import type { ChatCompletionRequest } from "../../types/index.js";
import { TransportError } from "../../types/index.js";
import { httpStream, mergeHeaders, readStreamText } from "../../utils/index.js";
import { childLogger } from "../../logger.js";
import { DEFAULT_BASE_URL } from "../../config.js";
import type { ChatConfig } from "../../config.js";

export interface OpenAIChatTransportOptions {
  apiKey: string;
  baseUrl?: string;
  organization?: string;
  defaultHeaders?: Record<string, string>;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Abort `target` when any of `sources` aborts. Returns an unlink function. */
function linkSignals(
  target: AbortController,
  sources: Array<AbortSignal | undefined>,
): () => void {
  const onAbort = (): void => target.abort();
  const linked: AbortSignal[] = [];
  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      target.abort();
      continue;
    }
    source.addEventListener("abort", onAbort, { once: true });
    linked.push(source);
  }
  return () => {
    for (const source of linked) {
      source.removeEventListener("abort", onAbort);
    }
  };
}

/**
 * Re-expose `body` through a stream that calls `onSettled` once it is fully
 * read, errors, or is cancelled. A failed read errors the stream with a
 * TransportError.
 */
function settleOnEnd(
  body: ReadableStream<Uint8Array>,
  onSettled: () => void,
): ReadableStream<Uint8Array> {
  const reader = body.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await reader.read();
        if (done) {
          onSettled();
          controller.close();
          return;
        }
        controller.enqueue(value);
      } catch (error) {
        onSettled();
        controller.error(
          new TransportError(
            `Chat completions stream failed: ${errorMessage(error)}`,
            { cause: error },
          ),
        );
      }
    },
    async cancel(reason) {
      onSettled();
      await reader.cancel(reason);
    },
  });
}

export class OpenAIChatTransport implements ChatTransport {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly organization?: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: Logger;
  /** Lifetime of the transport; aborted by close(). */
  private readonly lifetime = new AbortController();

  constructor(options: OpenAIChatTransportOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.organization = options.organization;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.logger = options.logger ?? childLogger("transport");
  }

  /** Create a transport from a loaded ChatConfig. */
  static fromConfig(config: ChatConfig, logger?: Logger): OpenAIChatTransport {
    return new OpenAIChatTransport({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      organization: config.organization,
      logger,
    });
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
    };
    if (this.organization) {
      headers["OpenAI-Organization"] = this.organization;
    }
    return mergeHeaders(headers, this.defaultHeaders);
  }

  async openStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ReadableStream<Uint8Array>> {
    if (this.closed) {
      throw new TransportError("Transport is closed");
    }

    const url = `${this.baseUrl}/chat/completions`;
    const controller = new AbortController();
    const unlink = linkSignals(controller, [this.lifetime.signal, signal]);

    this.logger.debug(
      { url, model: request.model, messages: request.messages.length },
      "opening chat completion stream",
    );

    try {
      const res = await httpStream(url, request, this.buildHeaders(), {
        signal: controller.signal,
      });

      if (res.status !== 200) {
        const body = await readStreamText(res.body);
        throw new TransportError(
          `Chat completions endpoint returned status code ${res.status}: ${body}`,
          { status_code: res.status, body },
        );
      }

      return settleOnEnd(res.body, unlink);
    } catch (error) {
      unlink();
      if (error instanceof TransportError) throw error;
      throw new TransportError(
        `Chat completions request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.logger.debug("closing transport");
      this.lifetime.abort();
    }
  }
}
