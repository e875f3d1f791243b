import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { ArtifactRef } from '../interfaces/ArtifactRef';
import { ManifestEntry } from '../interfaces/ManifestStore';
import { Operation } from '../interfaces/Operation';
import { SweepResult } from '../interfaces/RetentionSweeper';

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'credential',
  'accesskey',
  'connectionstring',
  'access_key',
  'secret_key',
  'connection_string',
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Recursively replace values whose key looks like a secret
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

function errorDetails(error: Error): Record<string, unknown> {
  const details: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  // Node system errors carry these
  for (const field of ['code', 'errno', 'syscall', 'path'] as const) {
    const value: unknown = Reflect.get(error, field);
    if (value !== undefined) {
      details[field] = value;
    }
  }
  return details;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      ...(error && { error: errorDetails(error) }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logOperationSubmitted(ref: ArtifactRef, location: string): void {
    this.info('Backup operation submitted', {
      operation: 'backup_submit',
      ...refMeta(ref),
      location,
    });
  }

  logOperationTerminal(operation: Operation): void {
    const meta = {
      operation: 'backup_terminal',
      ...refMeta(operation.ref),
      state: operation.state,
      sizeBytes: operation.sizeBytes,
      location: operation.location,
      durationMs: operation.terminalAt
        ? operation.terminalAt.getTime() - operation.submittedAt.getTime()
        : null,
    };

    if (operation.error) {
      this.warn(`Backup operation ended in ${operation.state}`, { ...meta, reason: operation.error });
    } else {
      this.info(`Backup operation ended in ${operation.state}`, meta);
    }
  }

  logAdapterError(ref: ArtifactRef, error: Error, consecutiveErrors: number): void {
    this.warn('Backend status check failed', {
      operation: 'adapter_error',
      ...refMeta(ref),
      consecutiveErrors,
      error: error.message,
    });
  }

  logManifestAppend(entry: ManifestEntry): void {
    this.info('Manifest entry recorded', {
      operation: 'manifest_append',
      ...refMeta(entry.ref),
      outcome: entry.outcome,
      sizeBytes: entry.sizeBytes,
      sizeMB: Math.round((entry.sizeBytes / 1024 / 1024) * 100) / 100,
      location: entry.location,
    });
  }

  logRetentionSweep(result: SweepResult, maxAgeMs: number): void {
    this.info('Retention sweep completed', {
      operation: 'retention_sweep',
      scanned: result.scanned,
      deleted: result.deleted,
      failed: result.failed.length,
      maxAgeMs,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(jobName: string, cronExpression: string): void {
    this.info('Scheduled execution triggered', {
      operation: 'scheduled_execution',
      job: jobName,
      cronExpression,
    });
  }

  /**
   * Create a logger instance with the level named by LOG_LEVEL
   */
  static createFromEnvironment(): Logger {
    const requested = process.env.LOG_LEVEL?.toLowerCase();
    if (requested === undefined) {
      return new Logger(LogLevel.INFO);
    }

    const logLevel = Object.values(LogLevel).find(level => level === requested);
    if (!logLevel) {
      console.warn(`Invalid LOG_LEVEL: ${process.env.LOG_LEVEL}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}

function refMeta(ref: ArtifactRef): Record<string, string> {
  return {
    backend: ref.backend,
    kind: ref.kind,
    sourceId: ref.sourceId,
    artifactId: ref.artifactId,
  };
}
