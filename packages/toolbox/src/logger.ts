import { pino, type Logger } from "pino";

export type { Logger };

/** Process-wide root logger. Level from LOG_LEVEL, ISO timestamps. */
export const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** A child of the root logger tagged with the component name. */
export function createLogger(name: string): Logger {
  return rootLogger.child({ module: name });
}
