import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { AdapterRegistry } from './clients/AdapterRegistry';
import { BackupOrchestrator } from './clients/BackupOrchestrator';
import { CronScheduler } from './clients/CronScheduler';
import { FileManifestStore } from './clients/FileManifestStore';
import { OperationStateMachine } from './clients/OperationStateMachine';
import { RetentionSweeper } from './clients/RetentionSweeper';
import { S3ManifestStore } from './clients/S3ManifestStore';
import { createAdapter } from './adapters/createAdapter';
import { BackupJob } from './jobs/BackupJob';
import { RetentionJob } from './jobs/RetentionJob';
import { LifecycleConfig } from './interfaces/LifecycleConfig';
import { LogLevel } from './interfaces/Logger';
import { ManifestStore } from './interfaces/ManifestStore';
import { retentionDaysToPolicy, scopeByBackend } from './interfaces/RetentionSweeper';
import { toError } from './errors/LifecycleErrors';
import { sleep } from './utils/abort';

const SHUTDOWN_GRACE_MS = 2000;

export enum ExitCode {
  CONFIGURATION = 1,
  INITIALIZATION = 2,
  START = 3,
}

function toLogLevel(value: string | undefined): LogLevel {
  return Object.values(LogLevel).find(level => level === value) ?? LogLevel.INFO;
}

export function createManifestStore(config: LifecycleConfig, logger: Logger): ManifestStore {
  if (config.manifestS3Bucket) {
    return new S3ManifestStore(
      {
        bucket: config.manifestS3Bucket,
        prefix: config.manifestS3Prefix,
        region: config.awsRegion,
        endpoint: config.s3Url,
        accessKeyId: config.s3AccessKey,
        secretAccessKey: config.s3SecretKey,
      },
      logger
    );
  }
  return new FileManifestStore(config.manifestDir);
}

/**
 * Wires configuration, adapters, manifest and schedules into a running service
 */
class BackupLifecycleApplication {
  private logger: Logger;
  private readonly schedulers: CronScheduler[] = [];
  private isShuttingDown = false;

  constructor() {
    // Reconfigured once the configuration is loaded
    this.logger = Logger.createFromEnvironment();
  }

  async initialize(): Promise<void> {
    try {
      this.logger.info('Backup lifecycle service starting...');

      const config = ConfigurationManager.loadConfiguration();
      this.logger = new Logger(toLogLevel(config.logLevel));
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const adapters = new AdapterRegistry([createAdapter(config, this.logger)]);
      const store = createManifestStore(config, this.logger);
      const stateMachine = new OperationStateMachine(this.logger, {
        adapterCallTimeoutMs: config.adapterCallTimeoutMs,
      });
      const orchestrator = new BackupOrchestrator(
        stateMachine,
        store,
        adapters,
        {
          pollIntervalMs: config.pollIntervalMs,
          operationTimeoutMs: config.operationTimeoutMs,
          maxConsecutiveAdapterErrors: config.maxConsecutiveAdapterErrors,
        },
        this.logger
      );

      this.logger.info('Validating configuration and testing connections...');
      if (!(await orchestrator.validateConfiguration())) {
        throw new Error('Configuration validation failed');
      }

      this.schedulers.push(
        new CronScheduler(
          { cronExpression: config.backupSchedule, timezone: 'UTC' },
          new BackupJob(
            orchestrator,
            { backend: config.backend, kind: config.artifactKind, sources: config.sources },
            this.logger
          ),
          this.logger
        )
      );

      if (config.retentionDays !== undefined) {
        const sweeper = new RetentionSweeper(store, adapters, this.logger, {
          concurrency: config.sweeperConcurrency,
          deleteTimeoutMs: config.adapterCallTimeoutMs,
        });
        const policy = retentionDaysToPolicy(
          config.retentionDays,
          scopeByBackend(config.backend, config.artifactKind)
        );
        this.schedulers.push(
          new CronScheduler(
            { cronExpression: config.retentionSchedule, timezone: 'UTC' },
            new RetentionJob(sweeper, policy),
            this.logger
          )
        );
      } else {
        this.logger.info('RETENTION_DAYS not set, retention sweeps are disabled');
      }

      this.logger.info('Application initialized successfully');
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error, { field: error.field });
        process.exit(ExitCode.CONFIGURATION);
      }
      this.logger.error('Failed to initialize application', toError(error));
      process.exit(ExitCode.INITIALIZATION);
    }
  }

  start(): void {
    try {
      if (this.schedulers.length === 0) {
        throw new Error('Application not initialized. Call initialize() first.');
      }
      this.schedulers.forEach(scheduler => scheduler.start());
      this.logger.info('Backup lifecycle service started successfully');
    } catch (error) {
      this.logger.error('Failed to start application', toError(error));
      process.exit(ExitCode.START);
    }
  }

  /**
   * Stop the schedules; runs in progress are aborted and leave their
   * operations unrecorded
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');
    for (const scheduler of this.schedulers) {
      if (scheduler.isRunning()) {
        scheduler.stop();
      }
    }

    // Let aborted runs log their abandoned operations
    await sleep(SHUTDOWN_GRACE_MS);
    this.logger.info('Backup lifecycle service shutdown completed');
  }

  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT', 'SIGUSR2'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        void this.shutdown().then(() => process.exit(0));
      });
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
    });
  }
}

async function main(): Promise<void> {
  const app = new BackupLifecycleApplication();
  app.setupSignalHandlers();
  await app.initialize();
  app.start();
}

export { BackupLifecycleApplication, main };

export * from './errors/LifecycleErrors';
export * from './interfaces/ArtifactRef';
export * from './interfaces/BackendAdapter';
export * from './interfaces/BackupOrchestrator';
export * from './interfaces/ManifestStore';
export * from './interfaces/Operation';
export * from './interfaces/RetentionSweeper';
export { AdapterRegistry } from './clients/AdapterRegistry';
export { BackupOrchestrator, generateArtifactId, toManifestEntry } from './clients/BackupOrchestrator';
export { FileManifestStore } from './clients/FileManifestStore';
export { InMemoryManifestStore } from './clients/InMemoryManifestStore';
export { OperationStateMachine } from './clients/OperationStateMachine';
export { PollScheduler } from './clients/PollScheduler';
export { RetentionSweeper } from './clients/RetentionSweeper';
export { S3ManifestStore } from './clients/S3ManifestStore';
export { Logger } from './clients/Logger';
export { createAdapter } from './adapters/createAdapter';
export { CassandraSnapshotAdapter } from './adapters/CassandraSnapshotAdapter';
export { ClickHouseExportAdapter } from './adapters/ClickHouseExportAdapter';
export { ElasticsearchSnapshotAdapter } from './adapters/ElasticsearchSnapshotAdapter';
export { MongoDumpAdapter } from './adapters/MongoDumpAdapter';
export { PgDumpAdapter } from './adapters/PgDumpAdapter';
export { RdsSnapshotAdapter } from './adapters/RdsSnapshotAdapter';
export { SqliteFileAdapter } from './adapters/SqliteFileAdapter';
export { SubprocessBackupAdapter } from './adapters/SubprocessBackupAdapter';

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error starting application:', error);
    process.exit(ExitCode.INITIALIZATION);
  });
}
