/**
 * Process-wide logger.
 *
 * Plain level-prefixed lines in development, one JSON object per line when
 * NODE_ENV=production. LOG_LEVEL (debug | info | warn | error) sets the threshold.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export type LogMeta = Record<string, unknown>;

export class Logger {
  constructor(private readonly threshold: LogLevel = "info") {}

  debug(message: string, meta?: LogMeta) {
    if (this.enabled("debug")) console.debug(this.formatLog("debug", message, meta));
  }

  info(message: string, meta?: LogMeta) {
    if (this.enabled("info")) console.info(this.formatLog("info", message, meta));
  }

  warn(message: string, meta?: LogMeta) {
    if (this.enabled("warn")) console.warn(this.formatLog("warn", message, meta));
  }

  error(message: string, meta?: LogMeta) {
    if (this.enabled("error")) console.error(this.formatLog("error", message, meta));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  private formatLog(level: LogLevel, message: string, meta?: LogMeta): string {
    if (process.env.NODE_ENV === "production") {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta && { meta }),
      });
    }

    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `${level.toUpperCase()} ${message}${metaStr}`;
  }
}

function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export const logger = new Logger(thresholdFromEnv());
