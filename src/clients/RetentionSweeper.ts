import { describeRef } from '../interfaces/ArtifactRef';
import { Logger } from '../interfaces/Logger';
import { ManifestEntry, ManifestStore } from '../interfaces/ManifestStore';
import {
  RetentionPolicy,
  RetentionSweeperOptions,
  SweepFailure,
  SweepResult,
} from '../interfaces/RetentionSweeper';
import {
  CancellationError,
  DeletionError,
  ValidationError,
  formatError,
  toError,
} from '../errors/LifecycleErrors';
import { Clock, systemClock, withTimeout } from '../utils/abort';
import { mapWithConcurrency } from '../utils/concurrency';
import { AdapterRegistry } from './AdapterRegistry';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_DELETE_TIMEOUT_MS = 60_000;

/**
 * Deletes expired artifacts together with their manifest entries.
 *
 * A manifest entry is removed only after its adapter confirmed the artifact
 * is gone. Entries whose deletion failed stay in the manifest and are retried
 * by the next sweep.
 */
export class RetentionSweeper {
  private readonly concurrency: number;
  private readonly deleteTimeoutMs: number;

  constructor(
    private readonly store: ManifestStore,
    private readonly adapters: AdapterRegistry,
    private readonly logger: Logger,
    options: RetentionSweeperOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.deleteTimeoutMs = options.deleteTimeoutMs ?? DEFAULT_DELETE_TIMEOUT_MS;

    if (this.concurrency < 1) {
      throw new ValidationError('Sweeper concurrency must be at least 1', 'concurrency');
    }
  }

  /**
   * Delete every in-scope entry created before now - maxAge, oldest first
   */
  async sweep(policy: RetentionPolicy, signal?: AbortSignal): Promise<SweepResult> {
    if (!Number.isFinite(policy.maxAgeMs) || policy.maxAgeMs < 0) {
      throw new ValidationError('Retention max age must be a non-negative number', 'maxAgeMs');
    }

    const cutoff = this.cutoffFor(policy);
    const scope = policy.scope;
    const expired = await this.store.list({
      createdBefore: cutoff,
      ...(scope && { predicate: (entry: ManifestEntry) => scope(entry.ref) }),
    });

    const result: SweepResult = {
      scanned: expired.length,
      deleted: 0,
      deletedArtifactIds: [],
      failed: [],
    };

    if (expired.length === 0) {
      this.logger.debug('No expired backups found', { cutoff: cutoff.toISOString() });
      this.logger.logRetentionSweep(result, policy.maxAgeMs);
      return result;
    }

    this.logger.info(`Found ${expired.length} expired backups`, {
      operation: 'retention_scan',
      cutoff: cutoff.toISOString(),
    });

    const outcomes = await mapWithConcurrency(expired, this.concurrency, entry =>
      this.deleteEntry(entry, signal)
    );

    outcomes.forEach((failure, index) => {
      if (failure === null) {
        result.deleted++;
        result.deletedArtifactIds.push(expired[index].ref.artifactId);
      } else if (failure !== undefined) {
        result.failed.push(failure);
      }
    });

    if (result.failed.length > 0) {
      this.logger.warn(
        `Retention sweep had ${result.failed.length} failures. Those entries stay in the manifest.`,
        { artifactIds: result.failed.map(failure => failure.ref.artifactId) }
      );
    }

    this.logger.logRetentionSweep(result, policy.maxAgeMs);
    return result;
  }

  /**
   * Whether an entry falls outside the retention window
   */
  isExpired(entry: ManifestEntry, policy: RetentionPolicy): boolean {
    if (policy.scope && !policy.scope(entry.ref)) {
      return false;
    }
    return entry.createdAt.getTime() < this.cutoffFor(policy).getTime();
  }

  private cutoffFor(policy: RetentionPolicy): Date {
    return new Date(this.clock().getTime() - policy.maxAgeMs);
  }

  /**
   * Returns null when deleted, a failure when not, and undefined when the
   * sweep was cancelled before this entry was attempted
   */
  private async deleteEntry(
    entry: ManifestEntry,
    signal?: AbortSignal
  ): Promise<SweepFailure | null | undefined> {
    if (signal?.aborted) {
      return undefined;
    }

    const { ref } = entry;
    const adapter = this.adapters.resolve(ref.backend);
    if (!adapter) {
      return {
        ref,
        error: new DeletionError(`No adapter registered for backend ${ref.backend}`, ref),
      };
    }

    try {
      await withTimeout(
        callSignal => adapter.delete(ref, callSignal),
        this.deleteTimeoutMs,
        `delete ${describeRef(ref)}`,
        signal
      );
    } catch (error) {
      if (error instanceof CancellationError) {
        return undefined;
      }
      const deletionError =
        error instanceof DeletionError
          ? error
          : new DeletionError(
              `Failed to delete ${describeRef(ref)}: ${formatError(error)}`,
              ref,
              toError(error)
            );
      this.logger.error(deletionError.message, deletionError, {
        artifactId: ref.artifactId,
        createdAt: entry.createdAt.toISOString(),
      });
      return { ref, error: deletionError };
    }

    try {
      await this.store.remove(ref.artifactId);
    } catch (error) {
      const deletionError = new DeletionError(
        `Artifact ${describeRef(ref)} was deleted but its manifest entry could not be removed: ${formatError(error)}`,
        ref,
        toError(error)
      );
      this.logger.error(deletionError.message, deletionError);
      return { ref, error: deletionError };
    }

    this.logger.info(`Deleted expired backup: ${ref.artifactId}`, {
      operation: 'retention_delete',
      backend: ref.backend,
      createdAt: entry.createdAt.toISOString(),
    });
    return null;
  }
}
