/**
 * A unit of work run on a cron schedule
 */
export interface ScheduledJob {
  /** Name used in logs, e.g. "backup" or "retention" */
  readonly name: string;

  /** Run the job once; the signal aborts when the run exceeds its time limit or on shutdown */
  execute(signal: AbortSignal): Promise<void>;
}

/**
 * Interface for cron-based job scheduling
 */
export interface CronScheduler {
  /** Start the cron scheduler with the configured expression */
  start(): void;

  /** Stop the cron scheduler and abort a run in progress */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;
}

/**
 * Configuration for the cron scheduler
 */
export interface CronSchedulerConfig {
  /** Cron expression for the job schedule */
  cronExpression: string;

  /** Timezone for cron execution (defaults to UTC) */
  timezone?: string;

  /** Whether to run immediately on start */
  runOnInit?: boolean;

  /** Abort a run that takes longer than this (defaults to 24 hours) */
  maxRunMs?: number;
}
