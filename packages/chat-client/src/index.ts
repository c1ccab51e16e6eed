export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export transport utilities
export * from "./utils/index.js";

// Re-export transports
export * from "./providers/index.js";

// Conversation state
export { ConversationState } from "./conversation.js";

// Chunk accumulation
export {
  foldChunk,
  getAssistantMessage,
  getFunctionCall,
} from "./accumulator.js";
export type {
  AssembledResponse,
  FunctionCallRequest,
} from "./accumulator.js";

// Configuration
export { loadConfig, DEFAULT_BASE_URL, DEFAULT_MODEL } from "./config.js";
export type { ChatConfig } from "./config.js";

// Logging
export { logger, createLogger, childLogger } from "./logger.js";
export type { Logger } from "./logger.js";
