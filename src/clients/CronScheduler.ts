import * as cron from 'node-cron';
import {
  CronScheduler as ICronScheduler,
  CronSchedulerConfig,
  ScheduledJob,
} from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { LifecycleError, formatError, toError } from '../errors/LifecycleErrors';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends LifecycleError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'CronSchedulerError';
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

const DEFAULT_MAX_RUN_MS = 24 * 60 * 60 * 1000;

/**
 * CronScheduler implementation using node-cron.
 * Runs one job per schedule, skips a trigger while the previous run is still
 * going, and aborts runs that exceed their time limit.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private isJobRunning = false;
  private runController: AbortController | null = null;

  constructor(
    private readonly config: CronSchedulerConfig,
    private readonly job: ScheduledJob,
    private readonly logger: Logger
  ) {}

  start(): void {
    if (this.task) {
      this.logger.warn(`CronScheduler for ${this.job.name} is already running`);
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => {
          this.logger.logScheduledExecution(this.job.name, this.config.cronExpression);
          void this.executeScheduledJob();
        },
        {
          scheduled: false,
          timezone,
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler for ${this.job.name}: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    this.logger.info(`Scheduled ${this.job.name} with expression: ${this.config.cronExpression} (timezone: ${timezone})`);

    if (this.config.runOnInit) {
      this.logger.info(`Running initial ${this.job.name} due to runOnInit configuration`);
      setImmediate(() => {
        void this.executeScheduledJob();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn(`CronScheduler for ${this.job.name} is not running`);
      return;
    }

    this.task.stop();
    this.task = null;
    this.runController?.abort();
    this.logger.info(`CronScheduler for ${this.job.name} stopped`);
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Run the job with overlap prevention. Never rejects: failures are logged.
   */
  async executeScheduledJob(): Promise<void> {
    if (this.isJobRunning) {
      this.logger.warn(`${this.job.name} is already running, skipping this scheduled execution`);
      return;
    }

    this.isJobRunning = true;
    const controller = new AbortController();
    this.runController = controller;
    const maxRunMs = this.config.maxRunMs ?? DEFAULT_MAX_RUN_MS;
    const timer = setTimeout(() => controller.abort(), maxRunMs);
    const startTime = Date.now();

    try {
      await this.job.execute(controller.signal);
      this.logger.info(`Scheduled ${this.job.name} completed in ${Date.now() - startTime}ms`);
    } catch (error) {
      this.logger.error(`Scheduled ${this.job.name} failed after ${Date.now() - startTime}ms`, toError(error), {
        cronExpression: this.config.cronExpression,
        aborted: controller.signal.aborted,
      });
    } finally {
      clearTimeout(timer);
      this.runController = null;
      this.isJobRunning = false;
    }
  }
}
