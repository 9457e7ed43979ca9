import { pino, type Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/** The subset of the pino API the application layer writes through. */
export type LoggerPort = Pick<Logger, "debug" | "info" | "warn" | "error">;

export function createLogger(level: LogLevel, name = "dispute-case-engine"): Logger {
  return pino({
    name,
    level,
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["authorization", "headers.authorization", "*.card_number"],
      censor: "[redacted]",
    },
  });
}

export const silentLogger: LoggerPort = pino({ level: "silent" });
