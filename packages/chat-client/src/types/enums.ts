/**
 * Core enums for the chat client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The four roles understood by the chat completions function-calling API. */
export const Role = {
  /** Fixed instructions installed once at the start of a conversation. */
  SYSTEM: "system",
  /** Prompt text from the caller. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
  /** The serialized return value of an invoked function. */
  FUNCTION: "function",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];
