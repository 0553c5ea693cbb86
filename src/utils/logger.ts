/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

type LogMeta = Record<string, unknown>;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "schema-derive";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog("error")) {
      console.error(`[${this.prefix}] ERROR:`, message, meta || "");
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog("warn")) {
      console.warn(`[${this.prefix}] WARN:`, message, meta || "");
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog("info")) {
      // stderr keeps stdout free for piped schema output
      process.stderr.write(
        `[${this.prefix}] INFO: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(
        `[${this.prefix}] DEBUG: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.SCHEMA_DERIVE_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

// Default logger instance
export const logger = new Logger({ level: initialLevel() });

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
