// Structured logging service with multiple levels and secret redaction
// Provides consistent JSON-line logging across the orchestrator, adaptors and CLI

import { appendFileSync } from "node:fs";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export interface LogEntry {
  timestamp: string;
  level: string;
  service: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    kind?: string;
    stack?: string;
  };
  runId?: string;
}

export interface LogContext {
  service?: string;
  runId?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  service: string;
  enableConsole: boolean;
  enableFile?: boolean;
  filePath?: string;
  redactSensitive: boolean;
}

export class StructuredLogger {
  private config: LoggerConfig;
  private readonly sensitiveFields = new Set([
    "password",
    "secret",
    "token",
    "credential",
    "authorization",
    "unicodepwd",
  ]);

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  debug(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.DEBUG) {
      this.log(LogLevel.DEBUG, message, data, context);
    }
  }

  info(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.INFO) {
      this.log(LogLevel.INFO, message, data, context);
    }
  }

  warn(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.WARN) {
      this.log(LogLevel.WARN, message, data, context);
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>, context?: LogContext): void {
    if (this.config.level <= LogLevel.ERROR) {
      this.log(LogLevel.ERROR, message, data, context, describeError(error));
    }
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>, context?: LogContext): void {
    this.log(LogLevel.FATAL, message, data, context, describeError(error));
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: LogContext,
    error?: LogEntry["error"],
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      service: context?.service ?? this.config.service,
      message,
      ...(context?.runId ? { runId: context.runId } : {}),
    };

    if (data) {
      entry.data = this.config.redactSensitive ? this.redactSensitiveData(data) : data;
    }

    if (error) {
      entry.error = error;
    }

    if (this.config.enableConsole) {
      this.logToConsole(level, entry);
    }

    if (this.config.enableFile && this.config.filePath) {
      this.logToFile(entry, this.config.filePath);
    }
  }

  private logToConsole(level: LogLevel, entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(formatted);
        break;
    }
  }

  private logToFile(entry: LogEntry, filePath: string): void {
    try {
      appendFileSync(filePath, JSON.stringify(entry) + "\n");
    } catch (error) {
      // Fallback to console if file logging fails
      console.error("Failed to write to log file:", error);
      console.error("Original log entry:", JSON.stringify(entry));
    }
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redactRecursive = (obj: Record<string, unknown>): Record<string, unknown> => {
      const result: Record<string, unknown> = {};

      for (const [key, value] of Object.entries(obj)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = Array.from(this.sensitiveFields).some((field) => lowerKey.includes(field));

        if (isSensitive) {
          result[key] = "[REDACTED]";
        } else if (isPlainRecord(value)) {
          result[key] = redactRecursive(value);
        } else {
          result[key] = value;
        }
      }

      return result;
    };

    return redactRecursive(data);
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): ContextLogger {
    return new ContextLogger(this, additionalContext);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

/**
 * Context-aware logger that stamps every entry with its service and run id
 */
export class ContextLogger {
  constructor(
    private parent: StructuredLogger,
    private context: LogContext,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.parent.debug(message, data, this.context);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.parent.info(message, data, this.context);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.parent.warn(message, data, this.context);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.parent.error(message, error, data, this.context);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.parent.fatal(message, error, data, this.context);
  }

  child(additionalContext: LogContext): ContextLogger {
    return new ContextLogger(this.parent, { ...this.context, ...additionalContext });
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): LogEntry["error"] {
  if (!(error instanceof Error)) return undefined;
  const kind = "kind" in error && typeof error.kind === "string" ? error.kind : undefined;
  return {
    name: error.name,
    message: error.message,
    ...(kind ? { kind } : {}),
    ...(error.stack ? { stack: error.stack } : {}),
  };
}

/**
 * Create a logger instance with environment-based configuration
 */
export function createLogger(
  service: string,
  overrides: Partial<LoggerConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): StructuredLogger {
  const level = parseLogLevel(env.LABSEED_LOG_LEVEL || "INFO");
  const verbose = env.LABSEED_VERBOSE === "true";
  const filePath = env.LABSEED_LOG_FILE;

  return new StructuredLogger({
    level: verbose ? LogLevel.DEBUG : level,
    service,
    enableConsole: true,
    enableFile: Boolean(filePath),
    filePath,
    redactSensitive: env.LABSEED_LOG_REDACT_SENSITIVE !== "false",
    ...overrides,
  });
}

export function parseLogLevel(levelStr: string): LogLevel {
  switch (levelStr.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

export default StructuredLogger;
