import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL wins; otherwise development logs at debug and everything else at info.
 */
function getInitialLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

const prettyTransport = process.env.NODE_ENV === "development";

export const logger = pino({
  level: getInitialLogLevel(),
  transport: prettyTransport
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  timestamp: prettyTransport ? undefined : pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  logger.info({ level }, "log level changed");
}
