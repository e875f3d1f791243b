import { BackendAdapter } from '../interfaces/BackendAdapter';
import { LifecycleConfig } from '../interfaces/LifecycleConfig';
import { Logger } from '../interfaces/Logger';
import { ConfigurationError } from '../config/ConfigurationManager';
import { CassandraSnapshotAdapter } from './CassandraSnapshotAdapter';
import { ClickHouseExportAdapter } from './ClickHouseExportAdapter';
import { ElasticsearchSnapshotAdapter } from './ElasticsearchSnapshotAdapter';
import { MongoDumpAdapter } from './MongoDumpAdapter';
import { PgDumpAdapter } from './PgDumpAdapter';
import { RdsSnapshotAdapter } from './RdsSnapshotAdapter';
import { SqliteFileAdapter } from './SqliteFileAdapter';

/**
 * Build the adapter for the configured backend
 */
export function createAdapter(config: LifecycleConfig, logger: Logger): BackendAdapter {
  switch (config.backend) {
    case 'rds':
      return new RdsSnapshotAdapter({ region: config.awsRegion }, logger);

    case 'elasticsearch':
      if (!config.elasticsearchUrl || !config.elasticsearchRepository) {
        throw new ConfigurationError(
          'ELASTICSEARCH_URL and ELASTICSEARCH_REPOSITORY are required for the elasticsearch backend',
          'ELASTICSEARCH_URL'
        );
      }
      return new ElasticsearchSnapshotAdapter(
        {
          url: config.elasticsearchUrl,
          repository: config.elasticsearchRepository,
          username: config.elasticsearchUsername,
          password: config.elasticsearchPassword,
          timeoutMs: config.adapterCallTimeoutMs,
        },
        logger
      );

    case 'postgres':
      if (!config.postgresConnectionString) {
        throw new ConfigurationError(
          'POSTGRES_CONNECTION_STRING is required for the postgres backend',
          'POSTGRES_CONNECTION_STRING'
        );
      }
      return new PgDumpAdapter(
        { connectionString: config.postgresConnectionString, outputDir: config.outputDir },
        logger
      );

    case 'sqlite':
      return new SqliteFileAdapter({ outputDir: config.outputDir }, logger);

    case 'mongodb':
      if (!config.mongodbUri) {
        throw new ConfigurationError('MONGODB_URI is required for the mongodb backend', 'MONGODB_URI');
      }
      return new MongoDumpAdapter({ uri: config.mongodbUri, outputDir: config.outputDir }, logger);

    case 'cassandra':
      return new CassandraSnapshotAdapter(
        { host: config.cassandraHost, port: config.cassandraJmxPort },
        logger
      );

    case 'clickhouse':
      if (!config.clickhouseHost) {
        throw new ConfigurationError(
          'CLICKHOUSE_HOST is required for the clickhouse backend',
          'CLICKHOUSE_HOST'
        );
      }
      return new ClickHouseExportAdapter(
        {
          host: config.clickhouseHost,
          port: config.clickhousePort,
          user: config.clickhouseUser,
          password: config.clickhousePassword,
          outputDir: config.outputDir,
        },
        logger
      );
  }
}
