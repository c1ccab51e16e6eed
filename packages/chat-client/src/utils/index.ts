/**
 * Barrel re-export for transport utility modules.
 */

// HTTP client wrapper
export { httpStream, mergeHeaders, readStreamText } from "./http.js";
export type { HttpStreamResponse, HttpRequestOptions } from "./http.js";

// SSE decoder
export { decodeEventStream } from "./sse.js";
