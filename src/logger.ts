import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(s: string): s is LogLevel {
  return LEVELS.some((l) => l === s);
}

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: { service: "campaign-target-extractor" },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    rootLogger = isPrettyEnabled()
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
          },
        })
      : pino(options);
  }
  return rootLogger;
}

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger("pipeline");
 * log.info({ url }, "Processing page");
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/** Logger that drops everything; for tests and library callers without logging. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
