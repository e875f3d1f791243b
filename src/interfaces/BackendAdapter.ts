import { ArtifactRef } from './ArtifactRef';

/**
 * Returned by a backend when it accepts a backup request.
 * `location` and `extra` end up in the manifest entry.
 */
export interface AdapterHandle {
  artifactId: string;
  location: string;
  extra?: Record<string, string>;
}

export interface RunningStatus {
  state: 'running';
  /** Optional progress in percent, for logging only */
  progress?: number;
}

export interface DoneStatus {
  state: 'done';
  sizeBytes: number;
  location?: string;
  extra?: Record<string, string>;
}

export interface ErroredStatus {
  state: 'errored';
  reason: string;
}

export type AdapterStatus = RunningStatus | DoneStatus | ErroredStatus;

/**
 * Contract every backend (RDS, Elasticsearch, pg_dump, ...) implements.
 *
 * Implementations should honour the signal where the underlying client
 * supports it; the engine additionally enforces a per-call timeout.
 */
export interface BackendAdapter {
  /** Backend name, matched against `ArtifactRef.backend` */
  readonly backend: string;

  /** Start a backup. Rejections are surfaced as SubmissionError. */
  submit(ref: ArtifactRef, signal?: AbortSignal): Promise<AdapterHandle>;

  /** Report the current state of a submitted backup */
  status(handle: AdapterHandle, signal?: AbortSignal): Promise<AdapterStatus>;

  /** Delete an artifact. An artifact that is already gone counts as deleted. */
  delete(ref: ArtifactRef, signal?: AbortSignal): Promise<void>;

  /**
   * Stop work for a backup the engine no longer follows (timed out, failed
   * or abandoned). Backends whose work runs remotely may leave this out.
   */
  cancel?(handle: AdapterHandle): Promise<void>;

  /** Optional connectivity check used before the service starts */
  testConnection?(): Promise<boolean>;
}
