/**
 * Structured Logging Module
 *
 * JSON log entries with a service name, correlation id and bound context.
 * Observer records carry access tokens, so values of secret-looking fields
 * are masked before an entry is stored or written.
 *
 * @tested tests/property/structured-logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Field names whose values never reach a log sink
 */
export const SECRET_FIELD_NAMES = [
  'accessToken',
  'token',
  'password',
  'secret',
  'apiKey',
  'authorization',
] as const;

export const MASKED_VALUE = '[MASKED]';

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  context: z.record(z.unknown()).optional(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Destination for finished log entries
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Writes one JSON line per entry; errors go to stderr
 */
export class ConsoleLogSink implements LogSink {
  write(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    if (entry.level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Keeps entries in memory (for testing)
 */
export class InMemoryLogSink implements LogSink {
  public entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  byMessage(message: string): LogEntry[] {
    return this.entries.filter((entry) => entry.message === message);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  sinks: LogSink[];
  maskSecrets: boolean;
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'mapwatch',
  minLevel: LogLevel.INFO,
  sinks: [new ConsoleLogSink()],
  maskSecrets: true,
};

export function isSecretFieldName(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return SECRET_FIELD_NAMES.some((secret) => lower.includes(secret.toLowerCase()));
}

/**
 * Masks secret fields in a value recursively
 */
export function maskSecrets(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (Array.isArray(value)) {
    return value.map((item) => maskSecrets(item, depth + 1));
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'object' && value !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      masked[key] = maskField(key, inner, depth + 1);
    }
    return masked;
  }

  return value;
}

function maskField(key: string, value: unknown, depth: number): unknown {
  if (isSecretFieldName(key) && value !== null && value !== undefined) {
    return MASKED_VALUE;
  }
  return maskSecrets(value, depth);
}

function maskRecord(record: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    masked[key] = maskField(key, value, 0);
  }
  return masked;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel);
}

/**
 * Structured Logger class
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private context: Record<string, unknown>;

  constructor(config: Partial<LoggerConfig> = {}, context: Record<string, unknown> = {}) {
    this.config = { ...defaultLoggerConfig, ...config };
    this.context = context;
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  getContext(): Record<string, unknown> {
    return { ...this.context };
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Creates a child logger that shares the sinks and adds bound context.
   * The child inherits the parent's correlation id unless one is given.
   */
  child(bindings: { correlationId?: string; context?: Record<string, unknown> } = {}): Logger {
    const childLogger = new Logger(this.config, { ...this.context, ...bindings.context });
    const correlationId = bindings.correlationId ?? this.correlationId;
    if (correlationId !== undefined) {
      childLogger.setCorrelationId(correlationId);
    }
    return childLogger;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
    };

    if (this.correlationId !== undefined) {
      entry.correlationId = this.correlationId;
    }

    if (Object.keys(this.context).length > 0) {
      entry.context = this.config.maskSecrets ? maskRecord(this.context) : { ...this.context };
    }

    if (metadata) {
      entry.metadata = this.config.maskSecrets ? maskRecord(metadata) : metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, error?: Error): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);

    for (const sink of this.config.sinks) {
      sink.write(entry);
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }
}

/**
 * Normalises anything thrown into an Error for logging
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new Error(String(thrown));
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * Global logger instance
 */
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
