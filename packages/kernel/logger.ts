import { sanitizeForLogging, sanitizeErrorMessage } from './redaction';

/**
* Structured Logger
*
* One JSON line per entry on stderr, level-filtered by LOG_LEVEL, with
* metadata passed through the redaction engine. Handlers are pluggable so
* tests can capture entries.
*/

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Service name */
  service?: string | undefined;
  /** Correlation ID */
  correlationId?: string | undefined;
  /** Error details */
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  /** Additional metadata (already redacted) */
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  service: string;
  /** Correlation ID attached to every entry */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

// ============================================================================
// Handler management
// ============================================================================

let handlers: LogHandler[] = [];

/**
* Default console handler. Everything goes to stderr so stdout stays clean.
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, correlationId, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (correlationId) logOutput['correlationId'] = correlationId;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = metadata;
  }

  console.error(JSON.stringify(logOutput));
}

handlers = [consoleHandler];

/**
* Add a log handler
* @returns Function removing the handler again
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

function dispatch(entry: LogEntry): void {
  for (const handler of [...handlers]) {
    handler(entry);
  }
}

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

/**
* Configured log level. Defaults to 'info' in production, 'debug' elsewhere.
*/
function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(getConfiguredLogLevel());
}

function redactMetadata(obj: Record<string, unknown>): Record<string, unknown> {
  const result = sanitizeForLogging(obj);
  return typeof result === 'object' && result !== null && !Array.isArray(result)
    ? result
    : { _redacted: result };
}

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: redactMetadata({ ...this.context, ...metadata }),
    };

    if (this.correlationId) entry.correlationId = this.correlationId;

    if (err) {
      entry.error = err;
      entry.errorMessage = sanitizeErrorMessage(err);
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (shouldLog(level)) {
      dispatch(this.createEntry(level, message, metadata, err));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  /**
  * Log at error level
  * @param err - Optional error object; its message is sanitized before output
  */
  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.service,
      this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
