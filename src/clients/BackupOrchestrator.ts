import { ArtifactRef, describeRef } from '../interfaces/ArtifactRef';
import {
  BackupOrchestratorConfig,
  BackupRunResult,
  SubmissionFailure,
} from '../interfaces/BackupOrchestrator';
import { Logger } from '../interfaces/Logger';
import { ManifestEntry, ManifestOutcome, ManifestStore } from '../interfaces/ManifestStore';
import { Operation, OperationState } from '../interfaces/Operation';
import {
  CancellationError,
  InvalidStateError,
  ManifestWriteError,
  SubmissionError,
  ValidationError,
  toError,
} from '../errors/LifecycleErrors';
import { Clock, systemClock } from '../utils/abort';
import { AdapterRegistry } from './AdapterRegistry';
import { OperationStateMachine } from './OperationStateMachine';
import { PollScheduler } from './PollScheduler';

const OUTCOMES: Partial<Record<OperationState, ManifestOutcome>> = {
  [OperationState.SUCCESS]: ManifestOutcome.SUCCESS,
  [OperationState.FAILED]: ManifestOutcome.FAILED,
  [OperationState.TIMED_OUT]: ManifestOutcome.TIMED_OUT,
};

/**
 * Build the manifest entry for a terminal operation
 */
export function toManifestEntry(operation: Operation): ManifestEntry {
  const outcome = OUTCOMES[operation.state];
  if (!outcome) {
    throw new InvalidStateError(
      `Cannot record ${describeRef(operation.ref)}: operation is still ${operation.state}`
    );
  }

  const extra: Record<string, string> = { ...operation.extra };
  if (operation.error) {
    extra.error = operation.error;
  }

  return Object.freeze({
    ref: operation.ref,
    outcome,
    createdAt: operation.submittedAt,
    sizeBytes: operation.sizeBytes ?? 0,
    location: operation.location,
    extra: Object.freeze(extra),
  });
}

/**
 * Artifact id of the form <source>-YYYY-MM-DD-HH-MM-SS (UTC).
 * Only lowercase letters, digits and hyphens, which every backend accepts.
 */
export function generateArtifactId(sourceId: string, date: Date): string {
  const source = sourceId
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  const timestamp = date.toISOString().slice(0, 19).replace(/[T:]/g, '-');
  return `${source || 'backup'}-${timestamp}`;
}

/**
 * Submits backups, drives them to a terminal state and records each outcome
 * in the manifest exactly once.
 */
export class BackupOrchestrator {
  constructor(
    private readonly stateMachine: OperationStateMachine,
    private readonly store: ManifestStore,
    private readonly adapters: AdapterRegistry,
    private readonly config: BackupOrchestratorConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async runBackup(ref: ArtifactRef, signal?: AbortSignal): Promise<BackupRunResult> {
    return this.runBackups([ref], signal);
  }

  /**
   * Back up every ref concurrently.
   *
   * Rejects with ManifestWriteError when any terminal outcome could not be
   * recorded; `unrecorded` on that error lists all of them. This takes
   * precedence over a DuplicateArtifactError raised in the same run.
   */
  async runBackups(refs: ArtifactRef[], signal?: AbortSignal): Promise<BackupRunResult> {
    this.assertUniqueArtifacts(refs);

    const scheduler = new PollScheduler(
      this.stateMachine,
      {
        intervalMs: this.config.pollIntervalMs,
        timeoutMs: this.config.operationTimeoutMs,
        maxConsecutiveAdapterErrors: this.config.maxConsecutiveAdapterErrors,
        concurrency: this.config.pollConcurrency,
      },
      this.logger,
      this.clock
    );

    const entries: ManifestEntry[] = [];
    const submissionFailures: SubmissionFailure[] = [];
    const writeErrors: ManifestWriteError[] = [];

    const record = async (operation: Operation): Promise<void> => {
      const entry = toManifestEntry(operation);
      try {
        await this.store.append(entry);
      } catch (error) {
        if (!(error instanceof ManifestWriteError)) {
          throw error;
        }
        this.logger.error(
          `Backup ${describeRef(operation.ref)} finished as ${entry.outcome} but was not recorded; manual reconciliation required`,
          error
        );
        writeErrors.push(error);
        return;
      }
      entries.push(entry);
      this.logger.logManifestAppend(entry);
    };

    await Promise.all(
      refs.map(async ref => {
        const failure = await this.submitOne(ref, scheduler, record, signal);
        if (failure) {
          submissionFailures.push(failure);
        }
      })
    );

    let abandoned: Operation[];
    try {
      ({ abandoned } = await scheduler.run(signal));
    } catch (error) {
      // Unrecorded outcomes outrank any other listener failure
      throw this.unrecordedError(writeErrors) ?? error;
    }

    const writeError = this.unrecordedError(writeErrors);
    if (writeError) {
      throw writeError;
    }

    this.logger.info('Backup run completed', {
      operation: 'backup_run',
      recorded: entries.length,
      submissionFailures: submissionFailures.length,
      abandoned: abandoned.length,
    });

    return { entries, submissionFailures, abandoned };
  }

  /**
   * Check connectivity of every adapter that supports it
   */
  async validateConfiguration(): Promise<boolean> {
    for (const adapter of this.adapters.all()) {
      if (!adapter.testConnection) {
        continue;
      }
      this.logger.info(`Testing ${adapter.backend} connection...`);
      const connected = await adapter.testConnection();
      if (!connected) {
        this.logger.error(`${adapter.backend} connection test failed`);
        return false;
      }
    }

    if (this.store.testConnection) {
      this.logger.info('Testing manifest store connection...');
      if (!(await this.store.testConnection())) {
        this.logger.error('Manifest store connection test failed');
        return false;
      }
    }
    return true;
  }

  private async submitOne(
    ref: ArtifactRef,
    scheduler: PollScheduler,
    record: (operation: Operation) => Promise<void>,
    signal?: AbortSignal
  ): Promise<SubmissionFailure | null> {
    const adapter = this.adapters.resolve(ref.backend);
    if (!adapter) {
      return {
        ref,
        error: new SubmissionError(`No adapter registered for backend ${ref.backend}`, ref),
      };
    }

    try {
      const operation = await this.stateMachine.submit(ref, adapter, signal);
      scheduler.track(operation, adapter, record);
      return null;
    } catch (error) {
      if (error instanceof SubmissionError) {
        this.logger.error(error.message, error);
        return { ref, error };
      }
      if (error instanceof CancellationError) {
        return {
          ref,
          error: new SubmissionError(`Submission of ${describeRef(ref)} was cancelled`, ref, toError(error)),
        };
      }
      throw error;
    }
  }

  private unrecordedError(writeErrors: ManifestWriteError[]): ManifestWriteError | undefined {
    const [first] = writeErrors;
    if (first) {
      first.unrecorded = writeErrors.map(error => error.entry);
    }
    return first;
  }

  private assertUniqueArtifacts(refs: ArtifactRef[]): void {
    const seen = new Set<string>();
    for (const ref of refs) {
      if (seen.has(ref.artifactId)) {
        throw new ValidationError(`Artifact id ${ref.artifactId} appears more than once in one run`, 'artifactId');
      }
      seen.add(ref.artifactId);
    }
  }
}
