/**
 * Streamed chat completion chunk shape.
 *
 * data: {"id":"...","object":"chat.completion.chunk","created":1,"model":"...",
 *        "choices":[{"index":0,"delta":{"content":"Hi"},"finish_reason":null}]}
 */

import { z } from "zod";

const FunctionCallDeltaSchema = z.object({
  name: z.string().nullish(),
  arguments: z.string().nullish(),
});

const DeltaSchema = z.object({
  role: z.string().nullish(),
  content: z.string().nullish(),
  function_call: FunctionCallDeltaSchema.nullish(),
});

const ChoiceSchema = z.object({
  index: z.number().int(),
  delta: DeltaSchema,
  finish_reason: z.string().nullish(),
});

export const ChatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  object: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(ChoiceSchema),
});

export type FunctionCallDelta = z.infer<typeof FunctionCallDeltaSchema>;
export type ChunkDelta = z.infer<typeof DeltaSchema>;
export type ChunkChoice = z.infer<typeof ChoiceSchema>;
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

/** The error object an upstream server may embed in the stream. */
export const UpstreamErrorPayloadSchema = z.object({
  error: z.unknown().refine((value) => value != null, "error must be set"),
});
