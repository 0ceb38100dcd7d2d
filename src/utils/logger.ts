import { ConfigService } from '../config/config-service.js';
import { isDiagnosticError } from '../diagnostics/diagnostics.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /** Diagnostic errors add their `code`; anything that is not an `Error` is logged as a string. */
  error(message: string, error?: unknown, meta?: LogMetadata): void {
    const errorMeta = error === undefined ? meta : { ...errorFields(error), ...meta };
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  /** A logger for a sub-component, e.g. `backend:python` → `backend:python:engine`. */
  child(name: string): Logger {
    return new Logger(`${this.component}:${name}`, this.minLevel);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // stderr only: stdout carries the JSON-RPC stream
    console.error(JSON.stringify(entry));
  }
}

function errorFields(error: unknown): LogMetadata {
  if (isDiagnosticError(error)) return { error: error.message, code: error.code, stack: error.stack };
  if (error instanceof Error) return { error: error.message, stack: error.stack };
  return { error: String(error) };
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  const logger = createLogger(metrics.component);
  logger.info(`${metrics.operation} completed`, {
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
