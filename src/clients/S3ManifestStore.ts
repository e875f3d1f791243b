import {
  S3Client,
  S3ClientConfig,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  HeadBucketCommand,
} from '@aws-sdk/client-s3';
import { ManifestEntry, ManifestFilter, ManifestStore } from '../interfaces/ManifestStore';
import { Logger } from '../interfaces/Logger';
import {
  DuplicateArtifactError,
  ManifestReadError,
  ManifestWriteError,
  formatError,
  toError,
} from '../errors/LifecycleErrors';
import { WriteLock } from '../utils/WriteLock';
import { sleep } from '../utils/abort';
import {
  compareEntries,
  decodeManifestEntry,
  encodeManifestEntry,
  entryFileName,
  matchesFilter,
} from './ManifestEntryCodec';

export interface S3ManifestStoreOptions {
  bucket: string;
  /** Key prefix for manifest objects, e.g. "manifest/" */
  prefix?: string;
  region?: string;
  /** Custom endpoint for S3-compatible services such as MinIO */
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
];

function httpStatus(error: unknown): number | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const metadata: unknown = Reflect.get(error, '$metadata');
  if (typeof metadata === 'object' && metadata !== null) {
    const status: unknown = Reflect.get(metadata, 'httpStatusCode');
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/** S3 answers a conditional write on an existing key with 412 */
function isPreconditionFailed(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'PreconditionFailed' || httpStatus(error) === 412)
  );
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' || error.name === 'NoSuchKey' || httpStatus(error) === 404)
  );
}

/**
 * Manifest kept in an S3 bucket, one JSON object per artifact.
 * A single conditional PutObject publishes an entry, so partial entries are
 * never visible and an existing entry is never replaced by another writer.
 */
export class S3ManifestStore implements ManifestStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly lock = new WriteLock();

  constructor(
    options: S3ManifestStoreOptions,
    private readonly logger: Logger
  ) {
    const clientConfig: S3ClientConfig = {
      region: options.region ?? 'us-east-1',
    };

    if (options.accessKeyId && options.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      };
    }

    // Required for MinIO and other S3-compatible services
    if (options.endpoint) {
      clientConfig.endpoint = options.endpoint;
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
    this.bucket = options.bucket;
    this.prefix = normalizePrefix(options.prefix ?? '');
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  async append(entry: ManifestEntry): Promise<void> {
    const artifactId = entry.ref.artifactId;
    const key = this.keyFor(artifactId);

    try {
      await this.lock.runExclusive(async () => {
        if (await this.objectExists(key)) {
          throw new DuplicateArtifactError(artifactId);
        }

        try {
          await this.withRetry(async () => {
            await this.client.send(
              new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: encodeManifestEntry(entry),
                ContentType: 'application/json',
                IfNoneMatch: '*',
              })
            );
          }, `write manifest entry ${key}`);
        } catch (error) {
          if (isPreconditionFailed(error)) {
            throw new DuplicateArtifactError(artifactId);
          }
          throw error;
        }
      });
    } catch (error) {
      if (error instanceof DuplicateArtifactError) {
        throw error;
      }
      throw new ManifestWriteError(
        `Failed to record manifest entry for ${artifactId}: ${formatError(error)}`,
        entry,
        toError(error)
      );
    }
  }

  async list(filter?: ManifestFilter): Promise<ManifestEntry[]> {
    return this.lock.runExclusive(async () => {
      const keys = await this.listKeys();
      const entries: ManifestEntry[] = [];

      for (const key of keys) {
        const entry = await this.readEntry(key);
        if (entry && matchesFilter(entry, filter)) {
          entries.push(entry);
        }
      }

      return entries.sort(compareEntries);
    });
  }

  async get(artifactId: string): Promise<ManifestEntry | undefined> {
    return this.readEntry(this.keyFor(artifactId));
  }

  async remove(artifactId: string): Promise<void> {
    const key = this.keyFor(artifactId);
    await this.lock.runExclusive(() =>
      this.withRetry(async () => {
        await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
      }, `delete manifest entry ${key}`)
    );
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error('S3 manifest bucket check failed', toError(error), { bucket: this.bucket });
      return false;
    }
  }

  private async listKeys(): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.withRetry(
        () =>
          this.client.send(
            new ListObjectsV2Command({
              Bucket: this.bucket,
              Prefix: this.prefix,
              ContinuationToken: continuationToken,
            })
          ),
        `list manifest entries under ${this.prefix}`
      );

      for (const object of response.Contents ?? []) {
        if (object.Key && object.Key.endsWith('.json')) {
          keys.push(object.Key);
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys;
  }

  private async readEntry(key: string): Promise<ManifestEntry | undefined> {
    let raw: string | undefined;
    try {
      raw = await this.withRetry(async () => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: key })
        );
        return response.Body?.transformToString('utf-8');
      }, `read manifest entry ${key}`);
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    if (raw === undefined) {
      throw new ManifestReadError(`Manifest object ${key} has no body`, key);
    }

    try {
      return decodeManifestEntry(raw);
    } catch (error) {
      throw new ManifestReadError(
        `Unreadable manifest entry ${key}: ${formatError(error)}`,
        key,
        toError(error)
      );
    }
  }

  private async objectExists(key: string): Promise<boolean> {
    try {
      await this.withRetry(
        () => this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key })),
        `check manifest entry ${key}`
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    let attempt = 1;

    for (;;) {
      try {
        return await operation();
      } catch (error) {
        if (this.isNonRetryableError(error) || attempt >= this.maxRetries) {
          throw error;
        }

        const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
        this.logger.warn(`Attempt ${attempt} failed for ${operationName}. Retrying in ${delay}ms...`, {
          error: formatError(error),
        });
        await sleep(delay);
        attempt++;
      }
    }
  }

  /**
   * Auth, permission and other 4xx errors will not go away on retry
   */
  private isNonRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }
    const status = httpStatus(error);
    return (
      NON_RETRYABLE_CODES.includes(error.name) ||
      (status !== undefined && status >= 400 && status < 500)
    );
  }

  private keyFor(artifactId: string): string {
    return `${this.prefix}${entryFileName(artifactId)}`;
  }
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}
