/**
 * Chunk accumulator: folds streamed completion chunks into one assembled
 * response per request.
 *
 * Usage:
 * ```ts
 * let response: AssembledResponse | undefined;
 * for await (const payload of decodeEventStream(body)) {
 *   response = foldChunk(response, payload);
 *   if (response.deltaText) process.stdout.write(response.deltaText);
 *   if (response.ready) break;
 * }
 * ```
 */

import {
  ChatCompletionChunkSchema,
  UpstreamErrorPayloadSchema,
} from "./types/chunk.js";
import { ProtocolError, UpstreamError } from "./types/errors.js";
import { createAssistantMessage } from "./types/message.js";
import type { Message } from "./types/message.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The state of one response as assembled so far. */
export interface AssembledResponse {
  /** True once the choice reported a finish reason. */
  readonly ready: boolean;
  /** All content fragments so far, each with trailing newlines removed. */
  readonly content: string;
  /** The function the model is calling, if any. */
  readonly functionName?: string;
  /** Raw argument text; a complete JSON object only once `ready`. */
  readonly functionArguments: string;
  /** The content fragment carried by the latest chunk, for display. */
  readonly deltaText?: string;
}

/** A function call extracted from a ready response. */
export interface FunctionCallRequest {
  readonly name: string;
  /** Argument name to the argument's JSON text. */
  readonly arguments: Record<string, string>;
}

const EMPTY: AssembledResponse = {
  ready: false,
  content: "",
  functionArguments: "",
};

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parsePayload(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new ProtocolError("Stream payload is not valid JSON", {
      payload,
      cause: error,
    });
  }
}

/** Pull a readable message out of an upstream error object. */
function upstreamMessage(error: unknown): string {
  if (typeof error === "string") return error;
  if (error != null && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string") return message;
  }
  return JSON.stringify(error);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fold one event payload into the response assembled so far.
 *
 * @throws {UpstreamError} The payload is an error object.
 * @throws {ProtocolError} The payload is not a well-formed chunk, or names a
 *   different function than an earlier chunk of the same response.
 */
export function foldChunk(
  previous: AssembledResponse | undefined,
  payload: string,
): AssembledResponse {
  const base = previous ?? EMPTY;
  const json = parsePayload(payload);

  const upstream = UpstreamErrorPayloadSchema.safeParse(json);
  if (upstream.success) {
    const message = upstreamMessage(upstream.data.error);
    throw new UpstreamError(`Upstream error: ${message}`, {
      raw: upstream.data.error,
    });
  }

  const parsed = ChatCompletionChunkSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProtocolError(
      `Malformed completion chunk: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`,
      { payload, cause: parsed.error },
    );
  }

  // Requests are sent with n = 1, so only the first choice matters.
  const choice = parsed.data.choices[0];
  if (!choice) {
    return {
      ready: false,
      content: base.content,
      functionName: base.functionName,
      functionArguments: base.functionArguments,
    };
  }

  const { delta } = choice;

  let deltaText: string | undefined;
  let content = base.content;
  if (delta.content) {
    deltaText = delta.content.replace(/\n+$/, "");
    content += deltaText;
  }

  let functionName = base.functionName;
  let functionArguments = base.functionArguments;
  const call = delta.function_call;
  if (call) {
    if (call.name) {
      if (functionName !== undefined && functionName !== call.name) {
        throw new ProtocolError(
          `Function name changed mid-response from "${functionName}" to "${call.name}"`,
          { payload },
        );
      }
      functionName = call.name;
    }
    if (call.arguments) {
      functionArguments += call.arguments;
    }
  }

  return {
    ready: choice.finish_reason != null,
    content,
    functionName,
    functionArguments,
    deltaText,
  };
}

/**
 * The assistant message to store for a ready response, or `undefined` when
 * the response is not ready or carried no text.
 */
export function getAssistantMessage(
  response: AssembledResponse,
): Message | undefined {
  if (response.ready && response.content) {
    return createAssistantMessage(response.content);
  }
  return undefined;
}

/**
 * The function call requested by a ready response, or `undefined`.
 *
 * Every argument value is re-serialized to JSON text so that each one can be
 * decoded against its own parameter type. Empty argument text means `{}`.
 *
 * @throws {ProtocolError} The argument text is not a JSON object.
 */
export function getFunctionCall(
  response: AssembledResponse,
): FunctionCallRequest | undefined {
  if (!response.ready || !response.functionName) {
    return undefined;
  }

  const name = response.functionName;
  const text = response.functionArguments.trim();
  if (text === "") {
    return { name, arguments: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(
      `Arguments for function ${name} are not valid JSON`,
      { payload: text, cause: error },
    );
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ProtocolError(
      `Arguments for function ${name} must be a JSON object`,
      { payload: text },
    );
  }

  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    args[key] = JSON.stringify(value);
  }
  return { name, arguments: args };
}
