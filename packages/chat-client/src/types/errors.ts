/**
 * Error hierarchy for the chat client.
 *
 * All library errors inherit from ChatError. The command-loop package extends
 * the same base for registry, argument and execution failures.
 */

// ---------------------------------------------------------------------------
// ChatError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all chat client errors. */
export class ChatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ChatError";
  }
}

// ---------------------------------------------------------------------------
// Transport and stream errors
// ---------------------------------------------------------------------------

/**
 * The chat completions endpoint could not be reached or answered with a
 * non-200 status.
 */
export class TransportError extends ChatError {
  /** HTTP status code. Absent for connection-level failures. */
  readonly status_code?: number;
  /** Raw response body text, if one was read. */
  readonly body?: string;

  constructor(
    message: string,
    options?: { status_code?: number; body?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "TransportError";
    this.status_code = options?.status_code;
    this.body = options?.body;
  }
}

/** The stream carried an error object instead of a completion chunk. */
export class UpstreamError extends ChatError {
  /** The decoded error object as sent by the server. */
  readonly raw?: unknown;

  constructor(message: string, options?: { raw?: unknown; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "UpstreamError";
    this.raw = options?.raw;
  }
}

/** A stream payload or function-call fragment could not be interpreted. */
export class ProtocolError extends ChatError {
  /** The offending payload text. */
  readonly payload?: string;

  constructor(
    message: string,
    options?: { payload?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProtocolError";
    this.payload = options?.payload;
  }
}

// ---------------------------------------------------------------------------
// Non-protocol errors
// ---------------------------------------------------------------------------

/** Misconfiguration: missing API key, out-of-range setting. */
export class ConfigurationError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigurationError";
  }
}
