import { ArtifactRef } from './ArtifactRef';
import { ManifestEntry } from './ManifestStore';
import { Operation } from './Operation';
import { SubmissionError } from '../errors/LifecycleErrors';

export interface SubmissionFailure {
  ref: ArtifactRef;
  error: SubmissionError;
}

/**
 * Result of one backup run over a set of refs
 */
export interface BackupRunResult {
  /** Manifest entries written for operations that reached a terminal state */
  entries: ManifestEntry[];

  /** Refs the backend refused to start; nothing was recorded for them */
  submissionFailures: SubmissionFailure[];

  /** Operations cut short by cancellation; outcome unknown, nothing recorded */
  abandoned: Operation[];
}

export interface BackupOrchestratorConfig {
  pollIntervalMs: number;
  operationTimeoutMs: number;
  maxConsecutiveAdapterErrors: number;
  pollConcurrency?: number;
}
