import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { CancellationError, SubmissionError, formatError, toError } from '../errors/LifecycleErrors';
import { isMissingFile } from '../utils/fsErrors';

export interface SqliteFileAdapterOptions {
  outputDir: string;
  /** Pages copied per backup step */
  pagesPerStep?: number;
}

interface BackupJob {
  target: string;
  finished: boolean;
  cancelled: boolean;
  error?: Error;
  progress?: number;
  completion?: Promise<void>;
}

const DEFAULT_PAGES_PER_STEP = 100;

/**
 * SQLite databases backed up with SQLite's online backup API.
 *
 * The backup reads through SQLite, so it sees every committed transaction,
 * including ones still in the write-ahead log, and is consistent even while
 * other connections write. Source ids are paths to database files.
 */
export class SqliteFileAdapter implements BackendAdapter {
  readonly backend = 'sqlite';
  private readonly jobs = new Map<string, BackupJob>();

  constructor(
    private readonly options: SqliteFileAdapterOptions,
    private readonly logger: Logger
  ) {}

  async submit(ref: ArtifactRef): Promise<AdapterHandle> {
    const target = this.targetPath(ref.artifactId);

    if (this.jobs.has(ref.artifactId)) {
      throw new SubmissionError(`A backup for ${ref.artifactId} is already running`, ref);
    }

    let source: Database.Database;
    try {
      await fs.mkdir(this.options.outputDir, { recursive: true });
      // Never overwrite an earlier backup
      if (await this.exists(target)) {
        throw new Error(`${target} already exists`);
      }
      source = new Database(ref.sourceId, { fileMustExist: true });
    } catch (error) {
      throw new SubmissionError(
        `Failed to back up ${ref.sourceId} to ${target}: ${formatError(error)}`,
        ref,
        toError(error)
      );
    }

    const job: BackupJob = { target, finished: false, cancelled: false };
    this.jobs.set(ref.artifactId, job);
    job.completion = this.runBackup(source, job, ref.sourceId);

    this.logger.info(`Started SQLite backup of ${ref.sourceId} to ${target}`);
    return {
      artifactId: ref.artifactId,
      location: target,
      extra: { source: path.basename(ref.sourceId) },
    };
  }

  async status(handle: AdapterHandle): Promise<AdapterStatus> {
    const job = this.jobs.get(handle.artifactId);

    if (job) {
      if (!job.finished) {
        return job.progress === undefined ? { state: 'running' } : { state: 'running', progress: job.progress };
      }

      this.jobs.delete(handle.artifactId);
      if (job.error) {
        await this.removePartialFile(job.target);
        return { state: 'errored', reason: `SQLite backup failed: ${job.error.message}` };
      }
    }

    try {
      const stats = await fs.stat(handle.location);
      return { state: 'done', sizeBytes: stats.size };
    } catch (error) {
      if (isMissingFile(error)) {
        return { state: 'errored', reason: `Backup file ${handle.location} is missing` };
      }
      throw error;
    }
  }

  async delete(ref: ArtifactRef): Promise<void> {
    const target = this.targetPath(ref.artifactId);
    try {
      await fs.unlink(target);
      this.logger.info(`Deleted backup file: ${target}`);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  /**
   * Stop a running backup at its next step and drop the partial copy
   */
  async cancel(handle: AdapterHandle): Promise<void> {
    const job = this.jobs.get(handle.artifactId);
    if (!job) {
      return;
    }
    this.jobs.delete(handle.artifactId);

    if (!job.finished) {
      this.logger.warn(`Stopping SQLite backup for ${handle.artifactId}`);
      job.cancelled = true;
      await job.completion;
    }
    await this.removePartialFile(job.target);
  }

  private runBackup(source: Database.Database, job: BackupJob, sourceId: string): Promise<void> {
    const pagesPerStep = this.options.pagesPerStep ?? DEFAULT_PAGES_PER_STEP;

    const settle = (error?: Error): void => {
      job.finished = true;
      if (error) {
        job.error = error;
      }
      try {
        source.close();
      } catch (closeError) {
        this.logger.warn(`Failed to close ${sourceId} after backup: ${formatError(closeError)}`);
      }
    };

    return source
      .backup(job.target, {
        progress: ({ totalPages, remainingPages }) => {
          // Throwing here aborts the backup
          if (job.cancelled) {
            throw new CancellationError();
          }
          if (totalPages > 0) {
            job.progress = Math.round(((totalPages - remainingPages) / totalPages) * 100);
          }
          return pagesPerStep;
        },
      })
      .then(
        () => settle(),
        (error: unknown) => settle(toError(error))
      );
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  private async removePartialFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`Failed to cleanup partial backup file ${filePath}: ${formatError(error)}`);
      }
    }
  }

  private targetPath(artifactId: string): string {
    return path.join(this.options.outputDir, `${artifactId}.sqlite`);
  }
}
