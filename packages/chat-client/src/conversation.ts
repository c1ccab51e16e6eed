/**
 * Conversation state: the append-only message history of one session.
 */

import { createSystemMessage, toRequestMessage } from "./types/message.js";
import type { Message, RequestMessage } from "./types/message.js";

/**
 * Ordered, append-only list of messages. The first entry is always the system
 * prompt given at construction.
 */
export class ConversationState {
  private readonly _messages: Message[];

  constructor(systemPrompt: string) {
    this._messages = [createSystemMessage(systemPrompt)];
  }

  /** Append a message to the end of the conversation. */
  append(message: Message): void {
    this._messages.push(message);
  }

  /** Number of messages, system prompt included. */
  get length(): number {
    return this._messages.length;
  }

  /** A copy of the current history. */
  messages(): readonly Message[] {
    return [...this._messages];
  }

  /** The history in request form. */
  snapshot(): RequestMessage[] {
    return this._messages.map(toRequestMessage);
  }
}
