import { ArtifactRef } from './ArtifactRef';
import { ManifestEntry } from './ManifestStore';
import { Operation } from './Operation';
import { SweepResult } from './RetentionSweeper';

export type LogMeta = Record<string, unknown>;

/**
 * Structured event sink injected into every engine component
 */
export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Lifecycle events
  logOperationSubmitted(ref: ArtifactRef, location: string): void;
  logOperationTerminal(operation: Operation): void;
  logAdapterError(ref: ArtifactRef, error: Error, consecutiveErrors: number): void;
  logManifestAppend(entry: ManifestEntry): void;
  logRetentionSweep(result: SweepResult, maxAgeMs: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(jobName: string, cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
