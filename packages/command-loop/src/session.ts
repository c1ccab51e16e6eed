/**
 * ChatSession: the function-calling loop.
 *
 * A session owns one conversation and drives it turn by turn:
 *
 *   prompt -> request -> streamed response -> function call -> request -> ...
 *
 * until the model answers without calling a function, calls a function that
 * returns nothing, or the round limit is reached.
 */

import type {
  AssembledResponse,
  ChatCompletionRequest,
  ChatConfig,
  ChatTransport,
  Logger,
  Message,
} from "@chatcmd/chat-client";
import {
  ConversationState,
  OpenAIChatTransport,
  childLogger,
  createFunctionMessage,
  createLogger,
  createUserMessage,
  decodeEventStream,
  foldChunk,
  getAssistantMessage,
  getFunctionCall,
} from "@chatcmd/chat-client";

import type { Command } from "./command.js";
import { SessionBusyError } from "./errors.js";
import { EventEmitter } from "./events.js";
import { buildRegistry } from "./function-registry.js";
import type { FunctionRegistry } from "./function-registry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Session configuration.
 */
export interface ChatSessionConfig {
  /** Where requests go. */
  transport: ChatTransport;
  /** Model name sent with every request. */
  model: string;
  /** First message of the conversation. */
  systemPrompt: string;
  /** Completion token cap per request (default 2000). */
  maxTokens?: number;
  /** Sampling temperature (default 0.7). */
  temperature?: number;
  /** Max function-call rounds per turn (0 = unlimited). */
  maxFunctionRounds?: number;
  logger?: Logger;
}

/**
 * Session lifecycle states.
 */
export type SessionState =
  | "idle"
  | "sending"
  | "streaming"
  | "dispatching"
  | "finalizing"
  | "failed";

// ---------------------------------------------------------------------------
// ChatSession
// ---------------------------------------------------------------------------

export class ChatSession {
  readonly events: EventEmitter;

  private readonly _config: ChatSessionConfig;
  private readonly _conversation: ConversationState;
  private readonly _logger: Logger;
  private _state: SessionState = "idle";
  private _busy = false;
  private _commands?: readonly Command[];
  private _registry?: FunctionRegistry;

  constructor(config: ChatSessionConfig) {
    this._config = config;
    this._conversation = new ConversationState(config.systemPrompt);
    this._logger = config.logger ?? childLogger("session");
    this.events = new EventEmitter();
  }

  /**
   * Create a session talking to the OpenAI endpoint described by `config`.
   * Without a `logger`, one is created at `config.logLevel`.
   */
  static fromConfig(
    config: ChatConfig,
    options: { systemPrompt: string; logger?: Logger },
  ): ChatSession {
    const base = options.logger ?? createLogger(config.logLevel);
    return new ChatSession({
      transport: OpenAIChatTransport.fromConfig(
        config,
        childLogger("transport", base),
      ),
      model: config.model,
      systemPrompt: options.systemPrompt,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      maxFunctionRounds: config.maxFunctionRounds,
      logger: options.logger ?? childLogger("session", base),
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /** Read-only snapshot of the conversation, system prompt first. */
  get history(): readonly Message[] {
    return this._conversation.messages();
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Run one turn and yield the assistant's text fragments as they arrive.
   *
   * Functions the model calls are executed against `commands` between
   * requests. Any error puts the session in the `failed` state and is
   * rethrown; messages appended before the failure stay in the history.
   *
   * @throws {SessionBusyError} Another turn is running on this session.
   */
  async *sendAndStream(
    prompt: string,
    commands: readonly Command[],
  ): AsyncGenerator<string, void, undefined> {
    if (this._busy) {
      throw new SessionBusyError();
    }

    this._busy = true;
    try {
      yield* this._runTurn(prompt, commands);
    } catch (error) {
      this._state = "failed";
      this._logger.error({ err: error }, "turn failed");
      this.events.emit("ERROR", { error });
      throw error;
    } finally {
      this._busy = false;
      if (this._state !== "failed") {
        this._state = "idle";
      }
    }
  }

  /**
   * Run one turn and resolve with the concatenated assistant text.
   *
   * @throws {SessionBusyError} Another turn is running on this session.
   */
  async send(prompt: string, commands: readonly Command[]): Promise<string> {
    let text = "";
    for await (const delta of this.sendAndStream(prompt, commands)) {
      text += delta;
    }
    return text;
  }

  /**
   * Release the transport. Requests still in flight are aborted.
   */
  async close(): Promise<void> {
    await this._config.transport.close();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async *_runTurn(
    prompt: string,
    commands: readonly Command[],
  ): AsyncGenerator<string, void, undefined> {
    const registry = this._registryFor(commands);
    const maxRounds = this._config.maxFunctionRounds ?? 0;

    this._append(createUserMessage(prompt));
    this.events.emit("TURN_START", { prompt });

    let rounds = 0;
    let text = "";

    while (true) {
      if (maxRounds > 0 && rounds >= maxRounds) {
        this._logger.debug({ rounds }, "function round limit reached");
        this.events.emit("ROUND_LIMIT", { rounds });
        break;
      }

      // 1. Send the full history
      this._state = "sending";
      const request = this._buildRequest(registry);
      this._logger.debug(
        {
          model: request.model,
          messages: request.messages.length,
          functions: registry.size,
        },
        "sending chat completion request",
      );
      const body = await this._config.transport.openStream(request);
      this.events.emit("REQUEST_SENT", {
        round: rounds,
        messages: request.messages.length,
        functions: registry.size,
      });

      // 2. Stream until the response is ready
      this._state = "streaming";
      let response: AssembledResponse | undefined;
      for await (const payload of decodeEventStream(body)) {
        response = foldChunk(response, payload);
        if (response.deltaText) {
          text += response.deltaText;
          this.events.emit("CONTENT_DELTA", { delta: response.deltaText });
          yield response.deltaText;
        }
        if (response.ready) break;
      }

      if (!response?.ready) {
        this._logger.debug("stream ended without a finish reason");
        break;
      }

      // 3. Store the answer
      const message = getAssistantMessage(response);
      if (message) {
        this._append(message);
      }

      const call = getFunctionCall(response);
      if (!call) {
        this._state = "finalizing";
        break;
      }

      // 4. Dispatch the function call
      this._state = "dispatching";
      this._logger.debug(
        { function: call.name, arguments: call.arguments },
        "executing function",
      );
      this.events.emit("FUNCTION_CALL_START", {
        name: call.name,
        arguments: call.arguments,
      });
      const result = await registry.execute(call.name, call.arguments);
      this.events.emit("FUNCTION_CALL_END", { name: call.name, result });
      rounds += 1;

      if (result === undefined) {
        break;
      }
      this._append(createFunctionMessage(call.name, result));
    }

    this.events.emit("TURN_END", { content: text, rounds });
  }

  private _registryFor(commands: readonly Command[]): FunctionRegistry {
    if (!this._registry || this._commands !== commands) {
      this._registry = buildRegistry(commands);
      this._commands = commands;
    }
    return this._registry;
  }

  private _buildRequest(registry: FunctionRegistry): ChatCompletionRequest {
    return {
      model: this._config.model,
      messages: this._conversation.snapshot(),
      // The endpoint rejects an empty function list.
      ...(registry.size > 0 ? { functions: registry.schemas() } : {}),
      max_tokens: this._config.maxTokens ?? 2000,
      n: 1,
      temperature: this._config.temperature ?? 0.7,
      stream: true,
    };
  }

  private _append(message: Message): void {
    this._conversation.append(message);
    this._logger.debug(
      { role: message.role, name: message.name, content: message.content },
      "stored message",
    );
  }
}

// ---------------------------------------------------------------------------
// Scoped usage
// ---------------------------------------------------------------------------

/**
 * Create a session, run `fn` with it, and close it whether `fn` succeeds or
 * throws.
 */
export async function withChatSession<T>(
  config: ChatSessionConfig,
  fn: (session: ChatSession) => Promise<T> | T,
): Promise<T> {
  const session = new ChatSession(config);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
