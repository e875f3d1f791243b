import { ArtifactRef } from '../interfaces/ArtifactRef';
import { ManifestEntry } from '../interfaces/ManifestStore';

/**
 * Base class for every error raised by the backup lifecycle engine
 */
export class LifecycleError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LifecycleError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ValidationError extends LifecycleError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

/**
 * The backend rejected the start request (duplicate name, resource busy, ...).
 * Never retried automatically.
 */
export class SubmissionError extends LifecycleError {
  constructor(
    message: string,
    public readonly ref: ArtifactRef,
    cause?: Error
  ) {
    super(message, 'submit', cause);
    this.name = 'SubmissionError';
  }
}

/**
 * A status call failed without telling us anything about the backup itself
 */
export class AdapterTransientError extends LifecycleError {
  constructor(
    message: string,
    public readonly ref: ArtifactRef,
    public readonly consecutiveErrors: number,
    cause?: Error
  ) {
    super(message, 'status', cause);
    this.name = 'AdapterTransientError';
  }
}

export class SchedulerTimeoutError extends LifecycleError {
  constructor(
    message: string,
    public readonly ref: ArtifactRef,
    public readonly timeoutMs: number
  ) {
    super(message, 'timeout');
    this.name = 'SchedulerTimeoutError';
  }
}

/**
 * A terminal outcome could not be persisted. The backend artifact may still
 * exist and needs manual reconciliation.
 */
export class ManifestWriteError extends LifecycleError {
  public unrecorded: ManifestEntry[];

  constructor(
    message: string,
    public readonly entry: ManifestEntry,
    cause?: Error
  ) {
    super(message, 'manifest_write', cause);
    this.name = 'ManifestWriteError';
    this.unrecorded = [entry];
  }
}

export class ManifestReadError extends LifecycleError {
  constructor(
    message: string,
    public readonly location: string,
    cause?: Error
  ) {
    super(message, 'manifest_read', cause);
    this.name = 'ManifestReadError';
  }
}

export class DuplicateArtifactError extends LifecycleError {
  constructor(public readonly artifactId: string) {
    super(`Manifest already contains an entry for artifact ${artifactId}`, 'manifest_append');
    this.name = 'DuplicateArtifactError';
  }
}

export class DeletionError extends LifecycleError {
  constructor(
    message: string,
    public readonly ref: ArtifactRef,
    cause?: Error
  ) {
    super(message, 'delete', cause);
    this.name = 'DeletionError';
  }
}

/**
 * Raised for transitions out of a terminal state. Indicates a caller bug.
 */
export class InvalidStateError extends LifecycleError {
  constructor(message: string) {
    super(message, 'transition');
    this.name = 'InvalidStateError';
  }
}

export class CancellationError extends LifecycleError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'cancel');
    this.name = 'CancellationError';
  }
}

/**
 * Format an unknown thrown value for log lines and error messages
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
