/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug"];

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "warn";
}

class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: defaultLevel() }) {
    this.level = config.level;
    this.prefix = config.prefix || "typesmith";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  // Everything goes to stderr: stdout carries generated source
  private write(label: string, message: string, meta?: unknown): void {
    const suffix = meta === undefined ? "" : ` ${JSON.stringify(meta)}`;
    process.stderr.write(`[${this.prefix}] ${label}: ${message}${suffix}\n`);
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) {
      this.write("ERROR", message, meta);
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) {
      this.write("WARN", message, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) {
      this.write("INFO", message, meta);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) {
      this.write("DEBUG", message, meta);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export type { Logger };

// Default logger instance
export const logger = new Logger();

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
