export type { ChatTransport } from "./adapter.js";
export { OpenAIChatTransport } from "./openai/index.js";
export type { OpenAIChatTransportOptions } from "./openai/index.js";
