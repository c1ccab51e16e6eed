/**
 * Message types for the chat client.
 */

import { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** One entry of a conversation. */
export interface Message {
  /** Who produced this message. */
  readonly role: Role;
  /** Plain text body. */
  readonly content: string;
  /** Set on function-result messages: the invoked function's name. */
  readonly name?: string;
}

/** A message as it appears in the request body. */
export interface RequestMessage {
  role: Role;
  content: string;
  name?: string;
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: text };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): Message {
  return { role: Role.USER, content: text };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(text: string): Message {
  return { role: Role.ASSISTANT, content: text };
}

/** Create a function-result message carrying the function's JSON output. */
export function createFunctionMessage(name: string, content: string): Message {
  return { role: Role.FUNCTION, content, name };
}

/**
 * Convert a message to its wire form. `name` is only sent when present.
 */
export function toRequestMessage(message: Message): RequestMessage {
  const result: RequestMessage = {
    role: message.role,
    content: message.content,
  };
  if (message.name) {
    result.name = message.name;
  }
  return result;
}
