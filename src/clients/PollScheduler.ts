import { BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { Operation, isTerminalState } from '../interfaces/Operation';
import {
  PollSchedulerConfig,
  SchedulerRunResult,
  TerminalListener,
} from '../interfaces/PollScheduler';
import {
  AdapterTransientError,
  CancellationError,
  SchedulerTimeoutError,
  ValidationError,
  formatError,
  toError,
} from '../errors/LifecycleErrors';
import { Clock, sleep, systemClock } from '../utils/abort';
import { mapWithConcurrency } from '../utils/concurrency';
import { OperationStateMachine } from './OperationStateMachine';

interface TrackedOperation {
  operation: Operation;
  adapter: BackendAdapter;
  onTerminal?: TerminalListener;
}

const DEFAULT_POLL_CONCURRENCY = 8;

/**
 * Default polling cadence per backend, in milliseconds
 */
export const DEFAULT_POLL_INTERVALS: Readonly<Record<string, number>> = {
  rds: 60_000,
  elasticsearch: 30_000,
  postgres: 5_000,
  sqlite: 1_000,
  mongodb: 5_000,
  cassandra: 10_000,
  clickhouse: 5_000,
};

/**
 * Drives any number of tracked operations to a terminal state from a single
 * polling loop.
 *
 * Each tick handles every non-terminal operation once: operations past their
 * deadline are expired without another status call, the rest are polled with
 * bounded parallelism. An operation is never polled by two ticks at once.
 */
export class PollScheduler {
  private readonly tracked = new Map<Operation, TrackedOperation>();
  private readonly inFlight = new Set<Operation>();
  private terminal: Operation[] = [];
  private listenerErrors: Error[] = [];
  private readonly concurrency: number;

  constructor(
    private readonly stateMachine: OperationStateMachine,
    private readonly config: PollSchedulerConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {
    if (config.intervalMs <= 0) {
      throw new ValidationError('Poll interval must be positive', 'intervalMs');
    }
    if (config.timeoutMs <= 0) {
      throw new ValidationError('Operation timeout must be positive', 'timeoutMs');
    }
    if (config.maxConsecutiveAdapterErrors < 1) {
      throw new ValidationError(
        'maxConsecutiveAdapterErrors must be at least 1',
        'maxConsecutiveAdapterErrors'
      );
    }
    this.concurrency = config.concurrency ?? DEFAULT_POLL_CONCURRENCY;
  }

  /**
   * Add an operation to the work set
   */
  track(operation: Operation, adapter: BackendAdapter, onTerminal?: TerminalListener): void {
    if (this.tracked.has(operation)) {
      return;
    }
    this.tracked.set(operation, onTerminal ? { operation, adapter, onTerminal } : { operation, adapter });
  }

  /** Number of operations still tracked */
  get pendingCount(): number {
    return this.tracked.size;
  }

  /**
   * One polling pass over the work set
   */
  async tick(signal?: AbortSignal): Promise<void> {
    const candidates = [...this.tracked.values()].filter(
      entry => !this.inFlight.has(entry.operation)
    );

    await mapWithConcurrency(candidates, this.concurrency, entry => this.advance(entry, signal));
  }

  /**
   * Poll until every tracked operation is terminal or the signal aborts.
   * Operations still running on cancellation are returned as abandoned.
   */
  async run(signal?: AbortSignal): Promise<SchedulerRunResult> {
    await this.flushTerminal();

    while (this.tracked.size > 0 && !signal?.aborted) {
      try {
        await sleep(this.nextDelayMs(), signal);
      } catch (error) {
        if (error instanceof CancellationError) {
          break;
        }
        throw error;
      }
      await this.tick(signal);
    }

    const abandoned = await this.abandonRemaining();
    const terminal = this.terminal;
    this.terminal = [];

    const listenerErrors = this.listenerErrors;
    this.listenerErrors = [];
    if (listenerErrors.length > 0) {
      throw listenerErrors[0];
    }

    return { terminal, abandoned };
  }

  private async advance(entry: TrackedOperation, signal?: AbortSignal): Promise<void> {
    const { operation } = entry;

    if (!isTerminalState(operation.state)) {
      if (signal?.aborted) {
        return;
      }
      this.inFlight.add(operation);
      try {
        await this.step(entry, signal);
      } finally {
        this.inFlight.delete(operation);
      }
    }

    if (isTerminalState(operation.state)) {
      await this.complete(entry);
    }
  }

  private async step(entry: TrackedOperation, signal?: AbortSignal): Promise<void> {
    const { operation, adapter } = entry;
    const elapsedMs = this.clock().getTime() - operation.submittedAt.getTime();

    if (elapsedMs >= this.config.timeoutMs) {
      const timeout = new SchedulerTimeoutError(
        `Operation ${operation.ref.artifactId} did not finish within ${this.config.timeoutMs}ms`,
        operation.ref,
        this.config.timeoutMs
      );
      this.logger.warn(timeout.message, {
        operation: 'scheduler_timeout',
        artifactId: operation.ref.artifactId,
        elapsedMs,
      });
      this.stateMachine.expire(operation, this.config.timeoutMs);
      await this.cancel(entry);
      return;
    }

    // The submit-time poll may already have used up the error budget
    if (operation.consecutiveAdapterErrors >= this.config.maxConsecutiveAdapterErrors) {
      this.stateMachine.fail(operation, operation.lastAdapterError ?? 'Backend status unavailable');
      await this.cancel(entry);
      return;
    }

    try {
      await this.stateMachine.poll(operation, adapter, signal);
    } catch (error) {
      if (error instanceof CancellationError) {
        return;
      }
      if (!(error instanceof AdapterTransientError)) {
        throw error;
      }

      this.logger.logAdapterError(operation.ref, error, error.consecutiveErrors);
      if (error.consecutiveErrors >= this.config.maxConsecutiveAdapterErrors) {
        this.stateMachine.fail(operation, error.message);
        await this.cancel(entry);
      }
    }
  }

  /**
   * Delay before the next pass: one interval, cut short by the earliest
   * deadline among the tracked operations
   */
  private nextDelayMs(): number {
    const now = this.clock().getTime();
    let delay = this.config.intervalMs;
    for (const { operation } of this.tracked.values()) {
      const remaining = operation.submittedAt.getTime() + this.config.timeoutMs - now;
      delay = Math.min(delay, remaining);
    }
    return Math.max(0, delay);
  }

  /**
   * Ask the backend to stop work nobody will record. Failures are logged
   * and do not change the operation's outcome.
   */
  private async cancel({ operation, adapter }: TrackedOperation): Promise<void> {
    if (!adapter.cancel) {
      return;
    }
    try {
      await adapter.cancel(operation.handle);
    } catch (error) {
      this.logger.warn(`Failed to cancel backend work for ${operation.ref.artifactId}`, {
        operation: 'scheduler_cancel',
        error: formatError(error),
      });
    }
  }

  private async complete(entry: TrackedOperation): Promise<void> {
    // A concurrent tick may have finished this one already
    if (!this.tracked.delete(entry.operation)) {
      return;
    }
    this.terminal.push(entry.operation);

    if (!entry.onTerminal) {
      return;
    }
    try {
      await entry.onTerminal(entry.operation);
    } catch (error) {
      const listenerError = toError(error);
      this.logger.error('Terminal listener failed', listenerError, {
        artifactId: entry.operation.ref.artifactId,
      });
      this.listenerErrors.push(listenerError);
    }
  }

  private async flushTerminal(): Promise<void> {
    const done = [...this.tracked.values()].filter(entry => isTerminalState(entry.operation.state));
    for (const entry of done) {
      await this.complete(entry);
    }
  }

  private async abandonRemaining(): Promise<Operation[]> {
    const entries = [...this.tracked.values()];
    const abandoned = entries.map(entry => entry.operation);
    this.tracked.clear();

    for (const entry of entries) {
      await this.cancel(entry);
    }

    if (abandoned.length > 0) {
      this.logger.warn('Polling cancelled; operations abandoned with unknown outcome', {
        operation: 'scheduler_abandon',
        artifactIds: abandoned.map(op => op.ref.artifactId),
      });
    }
    return abandoned;
  }
}
