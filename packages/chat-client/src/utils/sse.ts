/**
 * Server-Sent Events decoder for chat completion streams.
 *
 * Turns a `ReadableStream<Uint8Array>` into the sequence of `data:` payloads
 * it carries:
 *   - `data: [DONE]` ends the sequence
 *   - `data: <payload>` yields `<payload>`
 *   - every other line (blank keep-alives, `:` comments, `event:`) is skipped
 *
 * Handles chunks that split mid-line. A stream that closes without the
 * sentinel simply ends the sequence.
 */

const DATA_PREFIX = "data: ";
const DONE_SENTINEL = "data: [DONE]";

/** What a single line means to the decoder. */
type LineResult =
  | { kind: "payload"; data: string }
  | { kind: "done" }
  | { kind: "skip" };

function classifyLine(line: string): LineResult {
  if (line.trim() === DONE_SENTINEL) {
    return { kind: "done" };
  }
  if (line.startsWith(DATA_PREFIX)) {
    return { kind: "payload", data: line.slice(DATA_PREFIX.length) };
  }
  return { kind: "skip" };
}

/**
 * Decode a byte stream into event payload strings.
 *
 * The iterator is lazy and single-use. The reader lock is always released;
 * if the sequence stops before the stream is exhausted (sentinel reached or
 * the consumer stopped iterating) the stream is cancelled.
 */
export async function* decodeEventStream(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  // Buffer for incomplete lines across chunk boundaries.
  let buffer = "";
  let exhausted = false;
  // An errored stream rejects cancel() too; the read error is what surfaces.
  let readFailed = false;

  try {
    for (;;) {
      let chunk: ReadableStreamReadResult<Uint8Array>;
      try {
        chunk = await reader.read();
      } catch (error) {
        readFailed = true;
        throw error;
      }
      const { value, done } = chunk;

      if (done) {
        exhausted = true;
        // A trailing line without a final newline is still a line.
        const tail = buffer + decoder.decode();
        buffer = "";
        if (tail.length > 0) {
          const result = classifyLine(tail);
          if (result.kind === "payload") {
            yield result.data;
          }
        }
        return;
      }

      buffer += decoder.decode(value, { stream: true });

      // Lines are terminated by \r\n, \r, or \n. The last element is either
      // "" or a partial line that needs more data.
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const result = classifyLine(line);
        if (result.kind === "done") {
          return;
        }
        if (result.kind === "payload") {
          yield result.data;
        }
      }
    }
  } finally {
    if (!exhausted && !readFailed) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
