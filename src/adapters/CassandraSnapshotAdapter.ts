import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { SubmissionError, toError } from '../errors/LifecycleErrors';
import { ChildJob, outputTail, runChild, startChild } from '../utils/childProcess';

export interface CassandraSnapshotAdapterOptions {
  /** JMX host of the node, nodetool's default when unset */
  host?: string;
  /** JMX port of the node */
  port?: number;
  /** Executable to run, `nodetool` on the PATH by default */
  nodetoolPath?: string;
}

/** Source id that snapshots every keyspace on the node */
export const ALL_KEYSPACES = '*';

const SIZE_UNITS = new Map<string, number>([
  ['bytes', 1],
  ['B', 1],
  ['KiB', 1024],
  ['MiB', 1024 ** 2],
  ['GiB', 1024 ** 3],
  ['TiB', 1024 ** 4],
]);

const SNAPSHOT_ROW = /^(\S+)\s+(\S+)\s+(\S+)\s+([\d.]+\s+\S+)\s+([\d.]+\s+\S+)/;

/**
 * Convert a nodetool size such as "5.5 KiB" to bytes
 */
export function parseNodetoolSize(text: string): number {
  const match = /^([\d.]+)\s*(\S+)$/.exec(text.trim());
  if (!match) {
    return 0;
  }
  const multiplier = SIZE_UNITS.get(match[2]) ?? 1;
  return Math.round(Number(match[1]) * multiplier);
}

/**
 * Total size on disk of one snapshot in `nodetool listsnapshots` output,
 * or null when the snapshot is not listed
 */
export function snapshotSizeFromListing(output: string, tag: string): number | null {
  let total: number | null = null;

  for (const line of output.split('\n')) {
    const match = SNAPSHOT_ROW.exec(line.trim());
    if (match && match[1] === tag) {
      total = (total ?? 0) + parseNodetoolSize(match[5]);
    }
  }
  return total;
}

function keyspaceArgs(keyspace: string): string[] {
  return keyspace === ALL_KEYSPACES ? [] : [keyspace];
}

/**
 * Cassandra snapshots taken with `nodetool snapshot`.
 *
 * The snapshot tag is the artifact id and each source id is a keyspace, or
 * `*` for every keyspace. Snapshots stay on the node's data directories;
 * their size comes from `nodetool listsnapshots`.
 */
export class CassandraSnapshotAdapter implements BackendAdapter {
  readonly backend = 'cassandra';
  private readonly jobs = new Map<string, ChildJob>();

  constructor(
    private readonly options: CassandraSnapshotAdapterOptions,
    private readonly logger: Logger
  ) {}

  async submit(ref: ArtifactRef): Promise<AdapterHandle> {
    if (this.jobs.has(ref.artifactId)) {
      throw new SubmissionError(`A snapshot for ${ref.artifactId} is already running`, ref);
    }

    const target = ref.sourceId === ALL_KEYSPACES ? 'all keyspaces' : `keyspace ${ref.sourceId}`;
    this.logger.info(`Creating Cassandra snapshot ${ref.artifactId} for ${target}`);

    let job: ChildJob;
    try {
      job = await startChild(this.command(), [
        ...this.connectionArgs(),
        'snapshot',
        '-t',
        ref.artifactId,
        ...keyspaceArgs(ref.sourceId),
      ]);
    } catch (error) {
      throw new SubmissionError(
        `Failed to execute nodetool: ${toError(error).message}`,
        ref,
        toError(error)
      );
    }
    this.jobs.set(ref.artifactId, job);

    return {
      artifactId: ref.artifactId,
      location: `snapshots/${ref.artifactId}`,
      extra: { keyspace: ref.sourceId, tag: ref.artifactId },
    };
  }

  async status(handle: AdapterHandle): Promise<AdapterStatus> {
    const job = this.jobs.get(handle.artifactId);

    if (job) {
      if (job.processError) {
        this.jobs.delete(handle.artifactId);
        return { state: 'errored', reason: `Failed to execute nodetool: ${job.processError.message}` };
      }
      if (!job.finished) {
        return { state: 'running' };
      }

      this.jobs.delete(handle.artifactId);
      if (job.exitCode !== 0) {
        const details = outputTail(job.stderr) || 'No additional error information available';
        return {
          state: 'errored',
          reason: `nodetool snapshot failed with exit code ${job.exitCode ?? -1}. Error details: ${details}`,
        };
      }
    }

    const listing = await this.nodetool(['listsnapshots']);
    const sizeBytes = snapshotSizeFromListing(listing.stdout, handle.artifactId);
    if (sizeBytes === null) {
      return { state: 'errored', reason: `Snapshot ${handle.artifactId} is not listed on the node` };
    }
    return { state: 'done', sizeBytes };
  }

  async delete(ref: ArtifactRef): Promise<void> {
    await this.clearSnapshot(ref.artifactId, ref.sourceId);
    this.logger.info(`Cleared Cassandra snapshot: ${ref.artifactId}`);
  }

  /**
   * Stop a running snapshot and clear whatever part of it was taken
   */
  async cancel(handle: AdapterHandle): Promise<void> {
    const job = this.jobs.get(handle.artifactId);
    if (!job) {
      return;
    }
    this.jobs.delete(handle.artifactId);

    if (!job.finished && !job.processError) {
      this.logger.warn(`Stopping nodetool snapshot for ${handle.artifactId}`);
      job.child.kill('SIGTERM');
      await job.exited;
    }
    await this.clearSnapshot(handle.artifactId, handle.extra?.keyspace ?? ALL_KEYSPACES);
  }

  /**
   * Check that nodetool can reach the node
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.nodetool(['status']);
      return true;
    } catch (error) {
      this.logger.error('Cassandra nodetool check failed', toError(error), {
        host: this.options.host ?? 'localhost',
      });
      return false;
    }
  }

  private async clearSnapshot(tag: string, keyspace: string): Promise<void> {
    await this.nodetool(['clearsnapshot', '-t', tag, ...keyspaceArgs(keyspace)]);
  }

  /**
   * Run nodetool to completion; a failed run throws
   */
  private async nodetool(args: string[]): Promise<ChildJob> {
    const job = await runChild(this.command(), [...this.connectionArgs(), ...args]);
    if (job.processError) {
      throw job.processError;
    }
    if (job.exitCode !== 0) {
      throw new Error(
        `nodetool ${args[0]} failed with exit code ${job.exitCode ?? -1}: ${outputTail(job.stderr)}`
      );
    }
    return job;
  }

  private connectionArgs(): string[] {
    const args: string[] = [];
    if (this.options.host) {
      args.push('-h', this.options.host);
    }
    if (this.options.port) {
      args.push('-p', String(this.options.port));
    }
    return args;
  }

  private command(): string {
    return this.options.nodetoolPath ?? 'nodetool';
  }
}
