/**
 * Environment-based configuration.
 *
 * All variables are read from the given environment (default `process.env`)
 * and validated in one pass, so a bad value names every offending field.
 */

import { z } from "zod";
import { ConfigurationError } from "./types/errors.js";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4-0613";

const ConfigSchema = z.object({
  apiKey: z.string().min(1, "OPENAI_API_KEY is required"),
  organization: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  model: z.string().min(1).default(DEFAULT_MODEL),
  maxTokens: z.coerce.number().int().positive().default(2000),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  // 0 = no bound on function-call rounds per turn
  maxFunctionRounds: z.coerce.number().int().nonnegative().default(0),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type ChatConfig = z.infer<typeof ConfigSchema>;

/** Empty strings count as unset. */
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build a ChatConfig from environment variables.
 *
 * @throws {ConfigurationError} A required variable is missing or a value is
 *   out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
  const result = ConfigSchema.safeParse({
    apiKey: read(env, "OPENAI_API_KEY") ?? "",
    organization: read(env, "OPENAI_ORGANIZATION"),
    baseUrl: read(env, "OPENAI_BASE_URL"),
    model: read(env, "CHAT_MODEL"),
    maxTokens: read(env, "CHAT_MAX_TOKENS"),
    temperature: read(env, "CHAT_TEMPERATURE"),
    maxFunctionRounds: read(env, "CHAT_MAX_FUNCTION_ROUNDS"),
    logLevel: read(env, "LOG_LEVEL"),
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`, {
      cause: result.error,
    });
  }

  return result.data;
}
