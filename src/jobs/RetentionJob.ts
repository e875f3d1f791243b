import { ScheduledJob } from '../interfaces/CronScheduler';
import { RetentionPolicy } from '../interfaces/RetentionSweeper';
import { RetentionSweeper } from '../clients/RetentionSweeper';

/**
 * Scheduled retention sweep with a fixed policy
 */
export class RetentionJob implements ScheduledJob {
  readonly name = 'retention';

  constructor(
    private readonly sweeper: RetentionSweeper,
    private readonly policy: RetentionPolicy
  ) {}

  async execute(signal: AbortSignal): Promise<void> {
    await this.sweeper.sweep(this.policy, signal);
  }
}
