import { ArtifactKind, ArtifactRef } from './ArtifactRef';

export enum ManifestOutcome {
  SUCCESS = 'Success',
  FAILED = 'Failed',
  TIMED_OUT = 'TimedOut',
}

/**
 * Durable record of one terminal backup outcome
 */
export interface ManifestEntry {
  readonly ref: ArtifactRef;
  readonly outcome: ManifestOutcome;
  /** When the backup was submitted (UTC) */
  readonly createdAt: Date;
  readonly sizeBytes: number;
  readonly location: string;
  readonly extra: Readonly<Record<string, string>>;
}

/**
 * Optional filter for listing entries. All given fields must match.
 */
export interface ManifestFilter {
  backend?: string;
  kind?: ArtifactKind;
  sourceId?: string;
  outcome?: ManifestOutcome;
  /** Exclusive upper bound on createdAt */
  createdBefore?: Date;
  /** Inclusive lower bound on createdAt */
  createdAfter?: Date;
  predicate?: (entry: ManifestEntry) => boolean;
}

/**
 * Ledger of terminal backup outcomes, keyed by artifact id
 */
export interface ManifestStore {
  /**
   * Record an entry.
   * Rejects with DuplicateArtifactError if the artifact id is already present
   * and with ManifestWriteError if the entry could not be persisted.
   */
  append(entry: ManifestEntry): Promise<void>;

  /** Entries matching the filter, oldest first */
  list(filter?: ManifestFilter): Promise<ManifestEntry[]>;

  get(artifactId: string): Promise<ManifestEntry | undefined>;

  /** Remove an entry. Removing an unknown id is a no-op. */
  remove(artifactId: string): Promise<void>;

  /** Optional connectivity check used before the service starts */
  testConnection?(): Promise<boolean>;
}
