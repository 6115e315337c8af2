import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

/** stdout carries command output, so logs go to stderr */
const STDERR_FD = 2;

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  return Boolean(process.stderr.isTTY);
}

function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
  if (process.env.CHAT_BUDGET_LOG_JSON === "true") {
    return pino({ level }, pino.destination(STDERR_FD));
  }
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: shouldColorizeLogs(),
        destination: STDERR_FD,
      },
    },
  });
}

export const logger = createLogger();

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
