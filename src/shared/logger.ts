/**
 * Structured Logger
 * =================
 * Consistent logging across the application
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: unknown): value is LogThreshold {
  return typeof value === "string" && Object.hasOwn(LEVEL_RANK, value);
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
let threshold: LogThreshold = isLogThreshold(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export class Logger {
  constructor(private readonly bound: LogContext = {}) {}

  /**
   * Logger that stamps every line with `context` (e.g. `{ component: "auth" }`).
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.bound, ...context });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const merged = { ...this.bound, ...context };
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext) {
    if (!this.enabled("info")) {return;}
    console.log(this.formatMessage("info", message, context));
  }

  warn(message: string, context?: LogContext) {
    if (!this.enabled("warn")) {return;}
    console.warn(this.formatMessage("warn", message, context));
  }

  error(message: string, error?: Error | LogContext) {
    if (!this.enabled("error")) {return;}
    if (error instanceof Error) {
      console.error(
        this.formatMessage("error", message, {
          error: error.message,
          stack: error.stack,
        })
      );
    } else {
      console.error(this.formatMessage("error", message, error));
    }
  }

  debug(message: string, context?: LogContext) {
    if (!this.enabled("debug")) {return;}
    console.log(this.formatMessage("debug", message, context));
  }
}

export const logger = new Logger();
