import { ArtifactKind, ArtifactRef, createArtifactRef } from '../interfaces/ArtifactRef';
import { ScheduledJob } from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { BackupOrchestrator, generateArtifactId } from '../clients/BackupOrchestrator';
import { Clock, systemClock } from '../utils/abort';

export interface BackupJobConfig {
  backend: string;
  kind: ArtifactKind;
  sources: string[];
}

/**
 * Scheduled backup of every configured source
 */
export class BackupJob implements ScheduledJob {
  readonly name = 'backup';

  constructor(
    private readonly orchestrator: BackupOrchestrator,
    private readonly config: BackupJobConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  buildRefs(): ArtifactRef[] {
    const now = this.clock();
    return this.config.sources.map(sourceId =>
      createArtifactRef({
        sourceId,
        artifactId: generateArtifactId(sourceId, now),
        kind: this.config.kind,
        backend: this.config.backend,
      })
    );
  }

  async execute(signal: AbortSignal): Promise<void> {
    const refs = this.buildRefs();
    this.logger.info(`Starting backup of ${refs.length} source(s)`, {
      artifactIds: refs.map(ref => ref.artifactId),
    });

    const result = await this.orchestrator.runBackups(refs, signal);

    if (result.submissionFailures.length > 0 || result.abandoned.length > 0) {
      this.logger.warn('Backup run finished with problems', {
        submissionFailures: result.submissionFailures.map(failure => failure.error.message),
        abandoned: result.abandoned.map(operation => operation.ref.artifactId),
      });
    }
  }
}
