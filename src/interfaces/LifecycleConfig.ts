import { ArtifactKind } from './ArtifactRef';

export type BackendName =
  | 'rds'
  | 'elasticsearch'
  | 'postgres'
  | 'sqlite'
  | 'mongodb'
  | 'cassandra'
  | 'clickhouse';

export const BACKEND_NAMES: readonly BackendName[] = [
  'rds',
  'elasticsearch',
  'postgres',
  'sqlite',
  'mongodb',
  'cassandra',
  'clickhouse',
];

/**
 * Service configuration, loaded from the environment
 */
export interface LifecycleConfig {
  backend: BackendName;
  /** Source resources to back up on every run; `;`-separated in BACKUP_SOURCES */
  sources: string[];
  artifactKind: ArtifactKind;
  backupSchedule: string; // cron format
  retentionSchedule: string; // cron format

  pollIntervalMs: number;
  operationTimeoutMs: number;
  maxConsecutiveAdapterErrors: number;
  adapterCallTimeoutMs: number;

  /** Unset means keep every backup */
  retentionDays?: number;
  sweeperConcurrency: number;

  manifestDir: string;
  manifestS3Bucket?: string;
  manifestS3Prefix?: string;
  s3Url?: string;
  s3AccessKey?: string;
  s3SecretKey?: string;

  awsRegion: string;
  outputDir: string;
  postgresConnectionString?: string;
  elasticsearchUrl?: string;
  elasticsearchRepository?: string;
  elasticsearchUsername?: string;
  elasticsearchPassword?: string;
  mongodbUri?: string;
  cassandraHost?: string;
  cassandraJmxPort?: number;
  clickhouseHost?: string;
  clickhousePort?: number;
  clickhouseUser?: string;
  clickhousePassword?: string;

  logLevel?: string;
}
