import {
  RDSClient,
  CreateDBSnapshotCommand,
  CreateDBClusterSnapshotCommand,
  DescribeDBSnapshotsCommand,
  DescribeDBClusterSnapshotsCommand,
  DeleteDBSnapshotCommand,
  DeleteDBClusterSnapshotCommand,
} from '@aws-sdk/client-rds';
import { ArtifactKind, ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { SubmissionError, formatError, toError } from '../errors/LifecycleErrors';

const GIB = 1024 * 1024 * 1024;

const FAILED_STATUSES = ['failed', 'deleted'];

const NOT_FOUND_ERRORS = ['DBSnapshotNotFoundFault', 'DBClusterSnapshotNotFoundFault'];

export interface RdsSnapshotAdapterOptions {
  region: string;
}

interface SnapshotDescription {
  status: string;
  allocatedStorageGiB: number;
  engine?: string;
  encrypted?: boolean;
  arn?: string;
}

/**
 * Manual RDS instance snapshots and Aurora cluster snapshots.
 * Refs of kind Cluster use the cluster snapshot API, everything else the
 * instance snapshot API.
 */
export class RdsSnapshotAdapter implements BackendAdapter {
  readonly backend = 'rds';
  private readonly client: RDSClient;

  constructor(
    options: RdsSnapshotAdapterOptions,
    private readonly logger: Logger
  ) {
    this.client = new RDSClient({ region: options.region });
  }

  async submit(ref: ArtifactRef, signal?: AbortSignal): Promise<AdapterHandle> {
    const isCluster = ref.kind === ArtifactKind.CLUSTER;
    this.logger.info(
      `Creating manual snapshot for ${isCluster ? 'Aurora cluster' : 'RDS instance'}: ${ref.sourceId}`
    );

    let arn: string | undefined;
    try {
      if (isCluster) {
        const response = await this.client.send(
          new CreateDBClusterSnapshotCommand({
            DBClusterSnapshotIdentifier: ref.artifactId,
            DBClusterIdentifier: ref.sourceId,
          }),
          { abortSignal: signal }
        );
        arn = response.DBClusterSnapshot?.DBClusterSnapshotArn;
      } else {
        const response = await this.client.send(
          new CreateDBSnapshotCommand({
            DBSnapshotIdentifier: ref.artifactId,
            DBInstanceIdentifier: ref.sourceId,
          }),
          { abortSignal: signal }
        );
        arn = response.DBSnapshot?.DBSnapshotArn;
      }
    } catch (error) {
      throw new SubmissionError(
        `Failed to create snapshot ${ref.artifactId}: ${formatError(error)}`,
        ref,
        toError(error)
      );
    }

    return {
      artifactId: ref.artifactId,
      location: arn ?? ref.artifactId,
      extra: { sourceId: ref.sourceId, snapshotType: isCluster ? 'cluster' : 'instance' },
    };
  }

  async status(handle: AdapterHandle, signal?: AbortSignal): Promise<AdapterStatus> {
    const isCluster = handle.extra?.snapshotType === 'cluster';
    const snapshot = await this.describe(handle.artifactId, isCluster, signal);

    if (!snapshot) {
      return { state: 'errored', reason: `Snapshot ${handle.artifactId} not found` };
    }

    this.logger.debug(`Snapshot ${handle.artifactId} status: ${snapshot.status}`);

    if (snapshot.status === 'available') {
      const extra: Record<string, string> = {};
      if (snapshot.engine) {
        extra.engine = snapshot.engine;
      }
      if (snapshot.encrypted !== undefined) {
        extra.encrypted = String(snapshot.encrypted);
      }
      return {
        state: 'done',
        sizeBytes: snapshot.allocatedStorageGiB * GIB,
        location: snapshot.arn,
        extra,
      };
    }

    if (FAILED_STATUSES.includes(snapshot.status)) {
      return { state: 'errored', reason: `Snapshot ${handle.artifactId} is ${snapshot.status}` };
    }

    return { state: 'running' };
  }

  async delete(ref: ArtifactRef, signal?: AbortSignal): Promise<void> {
    const isCluster = ref.kind === ArtifactKind.CLUSTER;
    this.logger.info(`Deleting ${isCluster ? 'cluster' : 'instance'} snapshot: ${ref.artifactId}`);

    try {
      if (isCluster) {
        await this.client.send(
          new DeleteDBClusterSnapshotCommand({ DBClusterSnapshotIdentifier: ref.artifactId }),
          { abortSignal: signal }
        );
      } else {
        await this.client.send(
          new DeleteDBSnapshotCommand({ DBSnapshotIdentifier: ref.artifactId }),
          { abortSignal: signal }
        );
      }
    } catch (error) {
      if (error instanceof Error && NOT_FOUND_ERRORS.includes(error.name)) {
        this.logger.warn(`Snapshot ${ref.artifactId} already deleted`);
        return;
      }
      throw error;
    }
  }

  private async describe(
    snapshotId: string,
    isCluster: boolean,
    signal?: AbortSignal
  ): Promise<SnapshotDescription | null> {
    if (isCluster) {
      const response = await this.client.send(
        new DescribeDBClusterSnapshotsCommand({ DBClusterSnapshotIdentifier: snapshotId }),
        { abortSignal: signal }
      );
      const snapshot = response.DBClusterSnapshots?.[0];
      return snapshot
        ? {
            status: snapshot.Status ?? 'unknown',
            allocatedStorageGiB: snapshot.AllocatedStorage ?? 0,
            engine: snapshot.Engine,
            encrypted: snapshot.StorageEncrypted,
            arn: snapshot.DBClusterSnapshotArn,
          }
        : null;
    }

    const response = await this.client.send(
      new DescribeDBSnapshotsCommand({ DBSnapshotIdentifier: snapshotId }),
      { abortSignal: signal }
    );
    const snapshot = response.DBSnapshots?.[0];
    return snapshot
      ? {
          status: snapshot.Status ?? 'unknown',
          allocatedStorageGiB: snapshot.AllocatedStorage ?? 0,
          engine: snapshot.Engine,
          encrypted: snapshot.Encrypted,
          arn: snapshot.DBSnapshotArn,
        }
      : null;
  }
}
