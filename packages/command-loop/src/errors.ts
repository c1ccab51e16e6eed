/**
 * Errors raised while building a function registry, executing a command or
 * running a chat turn. All extend ChatError from the chat client.
 */

import { ChatError } from "@chatcmd/chat-client";

// ---------------------------------------------------------------------------
// Build-time errors
// ---------------------------------------------------------------------------

/** A type descriptor cannot be expressed as JSON Schema. */
export class SchemaError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SchemaError";
  }
}

/** A command set cannot be turned into a function registry. */
export class RegistryError extends ChatError {
  /** The offending function, when one is known. */
  readonly functionName?: string;

  constructor(
    message: string,
    options?: { functionName?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "RegistryError";
    this.functionName = options?.functionName;
  }
}

// ---------------------------------------------------------------------------
// Value errors
// ---------------------------------------------------------------------------

/**
 * A value does not match its type descriptor. Raised by decode and encode;
 * the registry reports it as the cause of an ArgumentError or ExecutionError.
 */
export class CodecError extends ChatError {
  /** Location inside the value, e.g. `selected_points[1].x`. Empty at the root. */
  readonly path: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CodecError";
    this.path = options?.path ?? "";
  }
}

// ---------------------------------------------------------------------------
// Execution errors
// ---------------------------------------------------------------------------

/** The model asked for a function the registry does not hold. */
export class UnknownFunctionError extends ChatError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(`Function not found: ${functionName}`);
    this.name = "UnknownFunctionError";
    this.functionName = functionName;
  }
}

/** An argument was missing or could not be decoded against its type. */
export class ArgumentError extends ChatError {
  readonly functionName: string;
  readonly parameter: string;

  constructor(
    message: string,
    options: { functionName: string; parameter: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ArgumentError";
    this.functionName = options.functionName;
    this.parameter = options.parameter;
  }
}

/**
 * Wraps any failure while preparing arguments for, or running, a command
 * handler. The original error is the `cause`.
 */
export class ExecutionError extends ChatError {
  readonly functionName: string;

  constructor(functionName: string, options: { cause: unknown }) {
    super(`Function execution failed: ${functionName}`, {
      cause: options.cause,
    });
    this.name = "ExecutionError";
    this.functionName = functionName;
  }
}

// ---------------------------------------------------------------------------
// Session errors
// ---------------------------------------------------------------------------

/** A turn was started while another turn on the same session was running. */
export class SessionBusyError extends ChatError {
  constructor(message = "A turn is already in progress on this session") {
    super(message);
    this.name = "SessionBusyError";
  }
}
