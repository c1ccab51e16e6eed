/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role } from "./enums.js";

// Message types
export type { Message, RequestMessage } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createFunctionMessage,
  toRequestMessage,
} from "./message.js";

// Request types
export type {
  JsonSchema,
  FunctionSchema,
  ChatCompletionRequest,
} from "./request.js";

// Stream chunk types
export type {
  ChatCompletionChunk,
  ChunkChoice,
  ChunkDelta,
  FunctionCallDelta,
} from "./chunk.js";
export { ChatCompletionChunkSchema } from "./chunk.js";

// Error types
export {
  ChatError,
  TransportError,
  UpstreamError,
  ProtocolError,
  ConfigurationError,
} from "./errors.js";
