import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';
export type LogOutput = 'console' | 'file' | 'both';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Service name (e.g., "job-runner", "health-reporter") */
  service: string;

  /** Event type/name */
  event: string;

  /** Severity level */
  severity: LogLevel;

  /** ISO timestamp */
  timestamp: string;

  /** Job/request correlation ID */
  trace_id?: string;

  /** Additional context-specific fields */
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  message: string;

  /** Duration in ms, set by performance timers */
  duration?: number;

  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };

  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  output: LogOutput;
  includeTrace: boolean;
  logDir: string;
  logFile: string;

  /** Per-service overrides, parsed from SERVICE_LOG_LEVELS=svc=level,... */
  serviceLevels?: Record<string, LogLevel>;
}

export interface PerformanceTimer {
  startTime: number;
  operation: string;
  traceId?: string;
  context?: Record<string, unknown>;

  /** End the timer and log duration */
  end(additionalContext?: Record<string, unknown>): number;
}

// ============================================================================
// Environment Configuration
// ============================================================================

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

const parseServiceLevels = (env?: string): Record<string, LogLevel> => {
  if (!env) return {};

  const levels: Record<string, LogLevel> = {};
  env.split(',').forEach(pair => {
    const [service, rawLevel = ''] = pair.trim().split('=');
    const level = rawLevel.trim();
    if (service && isLogLevel(level)) {
      levels[service.trim()] = level;
    }
  });
  return levels;
};

const getConfig = (): LoggerConfig => {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  const format = process.env.LOG_FORMAT === 'text' ? 'text' : 'json';
  const output = process.env.LOG_OUTPUT;

  return {
    level: isLogLevel(level) ? level : 'info',
    format,
    output: output === 'file' || output === 'both' ? output : 'console',
    includeTrace: process.env.LOG_INCLUDE_TRACE !== 'false',
    logDir: resolve(process.env.LOG_DIR || process.cwd()),
    logFile: process.env.LOG_FILE || 'protect-gateway.log',
    serviceLevels: parseServiceLevels(process.env.SERVICE_LOG_LEVELS)
  };
};

// ============================================================================
// Logger Implementation
// ============================================================================

class StructuredLogger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = { ...getConfig(), ...config };
  }

  private get logFilePath(): string {
    return resolve(this.config.logDir, this.config.logFile);
  }

  generateTraceId(): string {
    return uuidv4().replace(/-/g, '').substring(0, 16);
  }

  /**
   * Create a performance timer; `end()` logs and returns the elapsed ms.
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const startTime = Date.now();

    return {
      startTime,
      operation,
      traceId,
      context,
      end: (additionalContext?: Record<string, unknown>) => {
        const duration = Date.now() - startTime;

        this.logEntry({
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          timestamp: new Date().toISOString(),
          trace_id: traceId,
          operation,
          duration,
          message: `Operation ${operation} completed in ${duration}ms`,
          ...context,
          ...additionalContext
        });

        return duration;
      }
    };
  }

  private shouldLog(service: string, severity: LogLevel): boolean {
    const configLevel = this.config.serviceLevels?.[service] || this.config.level;
    return LOG_LEVELS.indexOf(severity) >= LOG_LEVELS.indexOf(configLevel);
  }

  private format(entry: LogEntry): string {
    if (this.config.format === 'text') {
      const parts = [
        `[${entry.timestamp}]`,
        `[${entry.severity.toUpperCase()}]`,
        entry.service,
        entry.event,
        entry.message
      ];

      if (entry.trace_id && this.config.includeTrace) {
        parts.push(`[trace:${entry.trace_id}]`);
      }

      if (entry.duration !== undefined) {
        parts.push(`(${entry.duration}ms)`);
      }

      let formatted = parts.join(' ');

      if (entry.error) {
        formatted += ` Error: ${entry.error.name}: ${entry.error.message}`;
      }

      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        formatted += ` ${JSON.stringify(entry.metadata)}`;
      }

      return formatted;
    }

    const { metadata, ...rest } = entry;
    const jsonEntry: Record<string, unknown> = { ...rest, ...metadata };

    if (!this.config.includeTrace || jsonEntry.trace_id === undefined) {
      delete jsonEntry.trace_id;
    }

    return JSON.stringify(jsonEntry);
  }

  private write(formattedEntry: string, severity: LogLevel): void {
    if (this.config.output !== 'console') {
      try {
        if (!existsSync(this.config.logDir)) {
          mkdirSync(this.config.logDir, { recursive: true });
        }
        appendFileSync(this.logFilePath, formattedEntry + '\n');
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }

    if (this.config.output === 'file') {
      return;
    }

    if (severity === 'error') {
      console.error(formattedEntry);
    } else if (severity === 'warn') {
      console.warn(formattedEntry);
    } else {
      console.log(formattedEntry);
    }
  }

  logEntry(entry: LogEntry): void {
    if (!this.shouldLog(entry.service, entry.severity)) {
      return;
    }

    this.write(this.format(entry), entry.severity);
  }

  debug(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      service,
      event,
      severity: 'debug',
      timestamp: new Date().toISOString(),
      trace_id: traceId,
      message,
      metadata
    });
  }

  info(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      service,
      event,
      severity: 'info',
      timestamp: new Date().toISOString(),
      trace_id: traceId,
      message,
      metadata
    });
  }

  warn(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      service,
      event,
      severity: 'warn',
      timestamp: new Date().toISOString(),
      trace_id: traceId,
      message,
      metadata
    });
  }

  error(service: string, event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      service,
      event,
      severity: 'error',
      timestamp: new Date().toISOString(),
      trace_id: traceId,
      message,
      metadata,
      error: error ? describeError(error) : undefined
    });
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  updateConfig(updates: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
    ? error.code
    : undefined;

  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code
  };
}

// ============================================================================
// Service-Specific Logger
// ============================================================================

class ServiceLogger {
  constructor(
    private logger: StructuredLogger,
    private serviceName: string
  ) {}

  generateTraceId(): string {
    return this.logger.generateTraceId();
  }

  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    return this.logger.startTimer(`${this.serviceName}:${operation}`, traceId, context);
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.serviceName, event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.serviceName, event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.serviceName, event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.serviceName, event, message, error, traceId, metadata);
  }
}

// ============================================================================
// Export Instances
// ============================================================================

const structuredLogger = new StructuredLogger();

export const createServiceLogger = (serviceName: string): ServiceLogger => {
  return new ServiceLogger(structuredLogger, serviceName);
};

/** Process-level logger for bootstrap and shutdown messages. */
export const logger = {
  info: (message: string, details?: Record<string, unknown>) => {
    structuredLogger.info('gateway', 'info', message, undefined, details);
  },

  warn: (message: string, details?: Record<string, unknown>) => {
    structuredLogger.warn('gateway', 'warn', message, undefined, details);
  },

  error: (message: string, details?: Record<string, unknown> | Error) => {
    if (details instanceof Error) {
      structuredLogger.error('gateway', 'error', message, details);
    } else {
      structuredLogger.error('gateway', 'error', message, undefined, undefined, details);
    }
  },

  updateConfig: (updates: Partial<LoggerConfig>) => structuredLogger.updateConfig(updates)
};

export { StructuredLogger, ServiceLogger };
