import { ArtifactKind, ArtifactRef } from './ArtifactRef';
import { DeletionError } from '../errors/LifecycleErrors';

/**
 * Time-based retention policy
 */
export interface RetentionPolicy {
  /** Entries created more than this long ago are expired */
  maxAgeMs: number;

  /** Restricts the sweep to matching refs; all refs when omitted */
  scope?: (ref: ArtifactRef) => boolean;
}

export interface SweepFailure {
  ref: ArtifactRef;
  error: DeletionError;
}

/**
 * Result of a retention sweep
 */
export interface SweepResult {
  /** Number of expired entries that were considered */
  scanned: number;

  /** Number of artifacts deleted together with their manifest entry */
  deleted: number;

  deletedArtifactIds: string[];

  /** Entries left in the manifest because deletion failed */
  failed: SweepFailure[];
}

export interface RetentionSweeperOptions {
  /** Maximum number of concurrent adapter deletions */
  concurrency?: number;

  /** Timeout for a single adapter delete call */
  deleteTimeoutMs?: number;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function retentionDaysToPolicy(
  days: number,
  scope?: (ref: ArtifactRef) => boolean
): RetentionPolicy {
  return scope ? { maxAgeMs: days * DAY_MS, scope } : { maxAgeMs: days * DAY_MS };
}

/**
 * Scope predicate matching one backend and, optionally, one artifact kind
 */
export function scopeByBackend(backend: string, kind?: ArtifactKind): (ref: ArtifactRef) => boolean {
  return ref => ref.backend === backend && (kind === undefined || ref.kind === kind);
}
