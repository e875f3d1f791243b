import { promises as fs } from 'fs';
import * as path from 'path';
import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { SubmissionError, formatError, toError } from '../errors/LifecycleErrors';
import { ChildJob, startChild } from '../utils/childProcess';
import { isMissingFile } from '../utils/fsErrors';

export interface ToolCommand {
  command: string;
  args: string[];
}

interface DumpJob {
  job: ChildJob;
  filePath: string;
}

/**
 * Backups written to one file per artifact by an external tool (pg_dump,
 * mongodump, clickhouse-client).
 *
 * `submit` starts the tool as a child process and returns once it is
 * running; `status` reports running until it exits, then judges the file it
 * left behind. `cancel` stops a tool the engine has given up on.
 */
export abstract class SubprocessBackupAdapter implements BackendAdapter {
  abstract readonly backend: string;

  /** Tool name used in log and error messages */
  protected abstract readonly toolName: string;

  /** Suffix of the backup file, including the leading dot */
  protected abstract readonly fileExtension: string;

  /** Whether a zero-byte file counts as a finished backup */
  protected readonly allowEmptyFile: boolean = false;

  private readonly jobs = new Map<string, DumpJob>();

  constructor(
    protected readonly outputDir: string,
    protected readonly logger: Logger
  ) {}

  /** Command line that writes the backup of `ref` to `filePath` */
  protected abstract buildCommand(ref: ArtifactRef, filePath: string): ToolCommand;

  /** Readable reason for a non-zero exit */
  protected abstract describeFailure(exitCode: number, stderr: string, handle: AdapterHandle): string;

  protected handleExtra(_ref: ArtifactRef): Record<string, string> | undefined {
    return undefined;
  }

  async submit(ref: ArtifactRef): Promise<AdapterHandle> {
    const filePath = this.filePathFor(ref.artifactId);

    if (this.jobs.has(ref.artifactId)) {
      throw new SubmissionError(`A backup for ${ref.artifactId} is already running`, ref);
    }

    const { command, args } = this.buildCommand(ref, filePath);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
    } catch (error) {
      throw new SubmissionError(
        `Failed to create output directory ${this.outputDir}: ${formatError(error)}`,
        ref,
        toError(error)
      );
    }

    this.logger.info(`Starting ${this.toolName} for ${ref.sourceId}`);
    let job: ChildJob;
    try {
      job = await startChild(command, args, {
        onStderr: chunk => {
          if (chunk.includes('WARNING')) {
            this.logger.warn(`${this.toolName} warning: ${chunk.trim()}`);
          }
        },
      });
    } catch (error) {
      throw new SubmissionError(
        `Failed to execute ${this.toolName}: ${toError(error).message}`,
        ref,
        toError(error)
      );
    }
    this.jobs.set(ref.artifactId, { job, filePath });

    const handle: AdapterHandle = { artifactId: ref.artifactId, location: filePath };
    const extra = this.handleExtra(ref);
    if (extra) {
      handle.extra = extra;
    }
    return handle;
  }

  async status(handle: AdapterHandle): Promise<AdapterStatus> {
    const tracked = this.jobs.get(handle.artifactId);
    if (!tracked) {
      // Not started by this process; judge by what is on disk
      return this.statusFromFile(handle.location);
    }

    const { job, filePath } = tracked;
    if (job.processError) {
      this.jobs.delete(handle.artifactId);
      return { state: 'errored', reason: `Failed to execute ${this.toolName}: ${job.processError.message}` };
    }

    if (!job.finished) {
      return { state: 'running' };
    }

    this.jobs.delete(handle.artifactId);
    this.logger.debug(`${this.toolName} for ${handle.artifactId} exited with code ${job.exitCode}`);

    if (job.exitCode !== 0) {
      await this.removePartialFile(filePath);
      return {
        state: 'errored',
        reason: this.describeFailure(job.exitCode ?? -1, job.stderr, handle),
      };
    }

    return this.statusFromFile(filePath);
  }

  async delete(ref: ArtifactRef): Promise<void> {
    const filePath = this.filePathFor(ref.artifactId);
    try {
      await fs.unlink(filePath);
      this.logger.info(`Deleted backup file: ${filePath}`);
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Backup file ${filePath} already deleted`);
        return;
      }
      throw error;
    }
  }

  /**
   * Stop the tool if it is still running and drop what it wrote
   */
  async cancel(handle: AdapterHandle): Promise<void> {
    const tracked = this.jobs.get(handle.artifactId);
    if (!tracked) {
      return;
    }
    this.jobs.delete(handle.artifactId);

    if (!tracked.job.finished && !tracked.job.processError) {
      this.logger.warn(`Stopping ${this.toolName} for ${handle.artifactId}`);
      tracked.job.child.kill('SIGTERM');
    }
    await this.removePartialFile(tracked.filePath);
  }

  /** Number of tool runs this adapter is still following */
  get runningCount(): number {
    return this.jobs.size;
  }

  protected filePathFor(artifactId: string): string {
    return path.join(this.outputDir, `${artifactId}${this.fileExtension}`);
  }

  private async statusFromFile(filePath: string): Promise<AdapterStatus> {
    try {
      const stats = await fs.stat(filePath);
      if (stats.size === 0 && !this.allowEmptyFile) {
        return { state: 'errored', reason: `Backup file is empty: ${filePath}` };
      }
      return { state: 'done', sizeBytes: stats.size, location: filePath };
    } catch (error) {
      if (isMissingFile(error)) {
        return { state: 'errored', reason: `Backup file was not created at ${filePath}` };
      }
      throw error;
    }
  }

  private async removePartialFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.info(`Cleaned up partial backup file: ${filePath}`);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`Failed to cleanup partial backup file ${filePath}: ${formatError(error)}`);
      }
    }
  }
}
