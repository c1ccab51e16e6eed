/**
 * Request types for the chat completions endpoint.
 */

import type { RequestMessage } from "./message.js";

// ---------------------------------------------------------------------------
// FunctionSchema
// ---------------------------------------------------------------------------

/** A JSON Schema fragment. */
export type JsonSchema = { [key: string]: unknown };

/** One entry of the request's `functions` array. */
export interface FunctionSchema {
  readonly name: string;
  readonly description: string;
  /** Root is always `{type: "object", properties, required}`. */
  readonly parameters: {
    readonly type: "object";
    readonly properties: Record<string, JsonSchema>;
    readonly required: readonly string[];
  };
}

// ---------------------------------------------------------------------------
// ChatCompletionRequest
// ---------------------------------------------------------------------------

/** The JSON body POSTed to `/chat/completions`. */
export interface ChatCompletionRequest {
  readonly model: string;
  readonly messages: readonly RequestMessage[];
  /** Omitted when no functions are registered. */
  readonly functions?: readonly FunctionSchema[];
  readonly max_tokens: number;
  readonly n: 1;
  readonly temperature: number;
  readonly stream: true;
}
