import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/** A root logger for the library at `level`. */
export function createLogger(level: string): Logger {
  return pino({ name: "chatcmd", level });
}

export const logger: Logger = createLogger(process.env.LOG_LEVEL ?? "info");

/** A logger for one component, sharing the parent's settings. */
export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
