import axios, { AxiosInstance } from 'axios';
import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { SubmissionError, formatError, toError } from '../errors/LifecycleErrors';

export interface ElasticsearchSnapshotAdapterOptions {
  url: string;
  repository: string;
  username?: string;
  password?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

interface SnapshotStatusResponse {
  snapshots?: {
    state?: string;
    stats?: { total?: { size_in_bytes?: number } };
  }[];
}

const ALL_INDICES = '*';

const FAILED_STATES = ['FAILED', 'ABORTED'];

/**
 * Snapshots of an Elasticsearch cluster into a registered repository.
 * A source id names the indices to include, or `*` for the whole cluster.
 */
export class ElasticsearchSnapshotAdapter implements BackendAdapter {
  readonly backend = 'elasticsearch';
  private readonly client: AxiosInstance;
  private readonly repository: string;

  constructor(
    options: ElasticsearchSnapshotAdapterOptions,
    private readonly logger: Logger
  ) {
    this.repository = encodeURIComponent(options.repository);
    this.client = axios.create({
      baseURL: options.url.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 30000,
      headers: { 'Content-Type': 'application/json' },
      auth:
        options.username && options.password
          ? { username: options.username, password: options.password }
          : undefined,
    });
  }

  async submit(ref: ArtifactRef, signal?: AbortSignal): Promise<AdapterHandle> {
    const body: Record<string, unknown> = {
      ignore_unavailable: true,
      include_global_state: true,
    };
    if (ref.sourceId !== ALL_INDICES) {
      body.indices = ref.sourceId;
    }

    this.logger.info(`Creating Elasticsearch snapshot ${ref.artifactId} for indices: ${ref.sourceId}`);

    try {
      await this.client.put(this.snapshotPath(ref.artifactId), body, {
        params: { wait_for_completion: false },
        signal,
      });
    } catch (error) {
      throw new SubmissionError(
        `Failed to create snapshot ${ref.artifactId}: ${describeHttpError(error)}`,
        ref,
        toError(error)
      );
    }

    return {
      artifactId: ref.artifactId,
      location: `${this.repository}/${ref.artifactId}`,
      extra: { repository: this.repository, indices: ref.sourceId },
    };
  }

  async status(handle: AdapterHandle, signal?: AbortSignal): Promise<AdapterStatus> {
    const response = await this.client.get<SnapshotStatusResponse>(
      `${this.snapshotPath(handle.artifactId)}/_status`,
      { signal }
    );

    const snapshot = response.data.snapshots?.[0];
    if (!snapshot) {
      return { state: 'errored', reason: `Snapshot ${handle.artifactId} not found in ${this.repository}` };
    }

    const state = snapshot.state ?? 'UNKNOWN';
    this.logger.debug(`Snapshot ${handle.artifactId} state: ${state}`);

    if (state === 'SUCCESS') {
      return { state: 'done', sizeBytes: snapshot.stats?.total?.size_in_bytes ?? 0 };
    }
    if (FAILED_STATES.includes(state)) {
      return { state: 'errored', reason: `Snapshot ${handle.artifactId} finished in state ${state}` };
    }
    return { state: 'running' };
  }

  async delete(ref: ArtifactRef, signal?: AbortSignal): Promise<void> {
    try {
      await this.client.delete(this.snapshotPath(ref.artifactId), { signal });
      this.logger.info(`Deleted Elasticsearch snapshot: ${ref.artifactId}`);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        this.logger.warn(`Snapshot ${ref.artifactId} already deleted`);
        return;
      }
      throw error;
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.get(`/_snapshot/${this.repository}`);
      return true;
    } catch (error) {
      this.logger.error(
        `Elasticsearch repository check failed: ${describeHttpError(error)}`,
        toError(error)
      );
      return false;
    }
  }

  private snapshotPath(artifactId: string): string {
    return `/_snapshot/${this.repository}/${encodeURIComponent(artifactId)}`;
  }
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    return `HTTP ${error.response.status}: ${JSON.stringify(error.response.data)}`;
  }
  return formatError(error);
}
