import * as cron from 'node-cron';
import { ArtifactKind, isArtifactKind } from '../interfaces/ArtifactRef';
import { BACKEND_NAMES, BackendName, LifecycleConfig } from '../interfaces/LifecycleConfig';
import { LogLevel } from '../interfaces/Logger';
import { DEFAULT_POLL_INTERVALS } from '../clients/PollScheduler';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const DEFAULT_ARTIFACT_KINDS: Record<BackendName, ArtifactKind> = {
  rds: ArtifactKind.INSTANCE,
  elasticsearch: ArtifactKind.CLUSTER,
  postgres: ArtifactKind.DATABASE,
  sqlite: ArtifactKind.FILE,
  mongodb: ArtifactKind.DATABASE,
  cassandra: ArtifactKind.KEYSPACE,
  clickhouse: ArtifactKind.TABLE,
};

/** Separates BACKUP_SOURCES entries; commas stay inside a source id */
export const SOURCE_SEPARATOR = ';';

const SECRET_FIELDS: readonly (keyof LifecycleConfig)[] = [
  's3AccessKey',
  's3SecretKey',
  'postgresConnectionString',
  'elasticsearchPassword',
  'mongodbUri',
  'clickhousePassword',
];

type OptionalStringField =
  | 'manifestS3Bucket'
  | 'manifestS3Prefix'
  | 's3Url'
  | 's3AccessKey'
  | 's3SecretKey'
  | 'postgresConnectionString'
  | 'elasticsearchUrl'
  | 'elasticsearchRepository'
  | 'elasticsearchUsername'
  | 'elasticsearchPassword'
  | 'mongodbUri'
  | 'cassandraHost'
  | 'clickhouseHost'
  | 'clickhouseUser'
  | 'clickhousePassword';

function isBackendName(value: string): value is BackendName {
  return BACKEND_NAMES.some(name => name === value);
}

/**
 * Loads and validates service configuration from environment variables
 */
export class ConfigurationManager {
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): LifecycleConfig {
    const requiredVars = ['BACKUP_BACKEND', 'BACKUP_SOURCES', 'BACKUP_SCHEDULE'];
    const missingVars = requiredVars.filter(name => !env[name]);
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const backend = (env.BACKUP_BACKEND ?? '').toLowerCase();
    if (!isBackendName(backend)) {
      throw new ConfigurationError(
        `Invalid BACKUP_BACKEND: ${env.BACKUP_BACKEND}. Must be one of: ${BACKEND_NAMES.join(', ')}`,
        'BACKUP_BACKEND'
      );
    }

    const sources = (env.BACKUP_SOURCES ?? '')
      .split(SOURCE_SEPARATOR)
      .map(source => source.trim())
      .filter(source => source.length > 0);
    if (sources.length === 0) {
      throw new ConfigurationError('BACKUP_SOURCES must list at least one source', 'BACKUP_SOURCES');
    }

    const artifactKind = env.BACKUP_ARTIFACT_KIND ?? DEFAULT_ARTIFACT_KINDS[backend];
    if (!isArtifactKind(artifactKind)) {
      throw new ConfigurationError(
        `Invalid BACKUP_ARTIFACT_KIND: ${artifactKind}. Must be one of: ${Object.values(ArtifactKind).join(', ')}`,
        'BACKUP_ARTIFACT_KIND'
      );
    }

    const backupSchedule = this.parseCron(env, 'BACKUP_SCHEDULE', '');
    const retentionSchedule = this.parseCron(env, 'RETENTION_SCHEDULE', '0 3 * * *');

    const logLevel = env.LOG_LEVEL?.toLowerCase();
    if (logLevel !== undefined && !Object.values(LogLevel).some(level => level === logLevel)) {
      throw new ConfigurationError(
        `Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }

    const config: LifecycleConfig = {
      backend,
      sources,
      artifactKind,
      backupSchedule,
      retentionSchedule,
      pollIntervalMs: this.parseSeconds(env, 'POLL_INTERVAL_SECONDS', DEFAULT_POLL_INTERVALS[backend] / 1000),
      operationTimeoutMs: this.parseSeconds(env, 'OPERATION_TIMEOUT_SECONDS', 3600),
      maxConsecutiveAdapterErrors: this.parsePositiveInteger(env, 'MAX_CONSECUTIVE_ADAPTER_ERRORS', 3),
      adapterCallTimeoutMs: this.parseSeconds(env, 'ADAPTER_CALL_TIMEOUT_SECONDS', 30),
      sweeperConcurrency: this.parsePositiveInteger(env, 'SWEEPER_CONCURRENCY', 4),
      manifestDir: env.MANIFEST_DIR || './manifest',
      awsRegion: env.AWS_REGION || 'us-east-1',
      outputDir: env.BACKUP_OUTPUT_DIR || './backups',
    };

    if (env.RETENTION_DAYS !== undefined && env.RETENTION_DAYS !== '') {
      config.retentionDays = this.parseRetentionDays(env.RETENTION_DAYS);
    }
    if (logLevel !== undefined) {
      config.logLevel = logLevel;
    }

    // Optional properties are only set when present
    const optional: [OptionalStringField, string][] = [
      ['manifestS3Bucket', 'MANIFEST_S3_BUCKET'],
      ['manifestS3Prefix', 'MANIFEST_S3_PREFIX'],
      ['s3Url', 'S3_URL'],
      ['s3AccessKey', 'S3_ACCESS_KEY'],
      ['s3SecretKey', 'S3_SECRET_KEY'],
      ['postgresConnectionString', 'POSTGRES_CONNECTION_STRING'],
      ['elasticsearchUrl', 'ELASTICSEARCH_URL'],
      ['elasticsearchRepository', 'ELASTICSEARCH_REPOSITORY'],
      ['elasticsearchUsername', 'ELASTICSEARCH_USERNAME'],
      ['elasticsearchPassword', 'ELASTICSEARCH_PASSWORD'],
      ['mongodbUri', 'MONGODB_URI'],
      ['cassandraHost', 'CASSANDRA_HOST'],
      ['clickhouseHost', 'CLICKHOUSE_HOST'],
      ['clickhouseUser', 'CLICKHOUSE_USER'],
      ['clickhousePassword', 'CLICKHOUSE_PASSWORD'],
    ];
    for (const [field, variable] of optional) {
      const value = env[variable];
      if (value) {
        config[field] = value;
      }
    }

    if (env.CASSANDRA_JMX_PORT) {
      config.cassandraJmxPort = this.parsePositiveInteger(env, 'CASSANDRA_JMX_PORT', 7199);
    }
    if (env.CLICKHOUSE_PORT) {
      config.clickhousePort = this.parsePositiveInteger(env, 'CLICKHOUSE_PORT', 9000);
    }

    this.validateBackendRequirements(config);
    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: LifecycleConfig): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...config };
    for (const field of SECRET_FIELDS) {
      if (sanitized[field] !== undefined) {
        sanitized[field] = '[REDACTED]';
      }
    }
    return sanitized;
  }

  private static validateBackendRequirements(config: LifecycleConfig): void {
    if (config.backend === 'postgres' && !config.postgresConnectionString) {
      throw new ConfigurationError(
        'POSTGRES_CONNECTION_STRING is required for the postgres backend',
        'POSTGRES_CONNECTION_STRING'
      );
    }

    if (config.backend === 'mongodb' && !config.mongodbUri) {
      throw new ConfigurationError('MONGODB_URI is required for the mongodb backend', 'MONGODB_URI');
    }

    if (config.backend === 'clickhouse' && !config.clickhouseHost) {
      throw new ConfigurationError(
        'CLICKHOUSE_HOST is required for the clickhouse backend',
        'CLICKHOUSE_HOST'
      );
    }

    if (config.backend === 'elasticsearch') {
      if (!config.elasticsearchUrl) {
        throw new ConfigurationError(
          'ELASTICSEARCH_URL is required for the elasticsearch backend',
          'ELASTICSEARCH_URL'
        );
      }
      if (!config.elasticsearchRepository) {
        throw new ConfigurationError(
          'ELASTICSEARCH_REPOSITORY is required for the elasticsearch backend',
          'ELASTICSEARCH_REPOSITORY'
        );
      }
    }

    if (config.manifestS3Bucket && Boolean(config.s3AccessKey) !== Boolean(config.s3SecretKey)) {
      throw new ConfigurationError(
        'S3_ACCESS_KEY and S3_SECRET_KEY must be set together',
        config.s3AccessKey ? 'S3_SECRET_KEY' : 'S3_ACCESS_KEY'
      );
    }
  }

  private static parseCron(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
    const expression = (env[name] || fallback).trim();
    if (!cron.validate(expression)) {
      throw new ConfigurationError(
        `Invalid cron expression: ${expression}. Expected format: "minute hour day month day-of-week"`,
        name
      );
    }
    return expression;
  }

  private static parseRetentionDays(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigurationError(
        `Invalid RETENTION_DAYS: ${value}. Must be a non-negative integer`,
        'RETENTION_DAYS'
      );
    }
    return parsed;
  }

  private static parsePositiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const value = env[name];
    if (value === undefined || value === '') {
      return fallback;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigurationError(`Invalid ${name}: ${value}. Must be a positive integer`, name);
    }
    return parsed;
  }

  private static parseSeconds(env: NodeJS.ProcessEnv, name: string, fallbackSeconds: number): number {
    return this.parsePositiveInteger(env, name, fallbackSeconds) * 1000;
  }
}
