/**
 * Structured JSON Logger
 *
 * Provides structured logging with:
 * - JSON lines on stdout
 * - Log levels (LOG_LEVEL env)
 * - Context propagation (agent, requestId, component)
 * - Automatic redaction of sensitive data
 */

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export interface LogContext {
  agent?: string;
  requestId?: string;
  component?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Logger {
  child(context: LogContext): Logger;
  log(level: LogLevel, message: string, context?: LogContext, error?: Error): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  fatal(message: string, error?: Error, context?: LogContext): void;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

// Sensitive fields to redact
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /auth/i,
  /credential/i,
  /private/i,
];

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class StructuredLogger implements Logger {
  private level: LogLevel = "info";
  private defaultContext: LogContext = {};
  private output: (entry: LogEntry) => void;

  constructor() {
    this.output = (entry) => {
      console.log(JSON.stringify(entry));
    };

    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.level = envLevel;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Set default context (added to all logs)
   */
  setDefaultContext(context: LogContext): void {
    this.defaultContext = { ...this.defaultContext, ...context };
  }

  /**
   * Replace the output handler (tests capture entries this way)
   */
  setOutput(handler: (entry: LogEntry) => void): void {
    this.output = handler;
  }

  child(context: LogContext): Logger {
    return new ChildLogger(this, context);
  }

  log(level: LogLevel, message: string, context: LogContext = {}, error?: Error): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.redact({ ...this.defaultContext, ...context }),
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: this.level === "debug" ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log("error", message, context, error);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.log("fatal", message, context, error);
  }

  /**
   * Redact sensitive data from context
   */
  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      const isSensitive = SENSITIVE_PATTERNS.some((p) => p.test(key));

      if (isSensitive) {
        result[key] = "[REDACTED]";
      } else if (isRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

/**
 * Child logger with inherited context
 */
class ChildLogger implements Logger {
  constructor(
    private readonly parent: StructuredLogger,
    private readonly context: LogContext
  ) {}

  child(context: LogContext): Logger {
    return new ChildLogger(this.parent, { ...this.context, ...context });
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    this.parent.log(level, message, { ...this.context, ...context }, error);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log("error", message, context, error);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.log("fatal", message, context, error);
  }
}

// ============================================================================
// SINGLETON
// ============================================================================

let loggerInstance: StructuredLogger | null = null;

export function getLogger(): StructuredLogger {
  if (!loggerInstance) {
    loggerInstance = new StructuredLogger();
  }
  return loggerInstance;
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
