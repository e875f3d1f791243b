import { ArtifactRef, describeRef } from '../interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { Operation, OperationState, isTerminalState } from '../interfaces/Operation';
import {
  AdapterTransientError,
  CancellationError,
  InvalidStateError,
  SubmissionError,
  formatError,
  toError,
} from '../errors/LifecycleErrors';
import { Clock, systemClock, withTimeout } from '../utils/abort';

export interface OperationStateMachineOptions {
  /** Timeout for a single submit or status call */
  adapterCallTimeoutMs?: number;
  clock?: Clock;
}

const DEFAULT_ADAPTER_CALL_TIMEOUT_MS = 30_000;

/**
 * Drives a single backup operation from Submitted to a terminal state.
 *
 *   Submitted -> InProgress -> Success | Failed | TimedOut
 *
 * Terminal states are final: any further transition throws InvalidStateError.
 * Transient status failures never change the state; they bump
 * `consecutiveAdapterErrors` and are rethrown as AdapterTransientError so the
 * caller can decide when to give up.
 */
export class OperationStateMachine {
  private readonly callTimeoutMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly logger: Logger,
    options: OperationStateMachineOptions = {}
  ) {
    this.callTimeoutMs = options.adapterCallTimeoutMs ?? DEFAULT_ADAPTER_CALL_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Start a backup and poll it once.
   * Synchronous backends may come back already terminal.
   */
  async submit(ref: ArtifactRef, adapter: BackendAdapter, signal?: AbortSignal): Promise<Operation> {
    let handle: AdapterHandle;
    try {
      handle = await withTimeout(
        callSignal => adapter.submit(ref, callSignal),
        this.callTimeoutMs,
        `submit ${describeRef(ref)}`,
        signal
      );
    } catch (error) {
      if (error instanceof SubmissionError || error instanceof CancellationError) {
        throw error;
      }
      throw new SubmissionError(
        `Backend rejected backup request for ${describeRef(ref)}: ${formatError(error)}`,
        ref,
        toError(error)
      );
    }

    const now = this.clock();
    const operation: Operation = {
      ref,
      handle,
      state: OperationState.SUBMITTED,
      submittedAt: now,
      lastPolledAt: now,
      terminalAt: null,
      error: null,
      sizeBytes: null,
      consecutiveAdapterErrors: 0,
      lastAdapterError: null,
      location: handle.location,
      extra: { ...handle.extra },
    };

    this.logger.logOperationSubmitted(ref, handle.location);

    try {
      await this.poll(operation, adapter, signal);
    } catch (error) {
      if (error instanceof CancellationError) {
        // Submitted but never observed; the caller treats it as abandoned
        return operation;
      }
      if (!(error instanceof AdapterTransientError)) {
        throw error;
      }
      // Already counted on the operation; the scheduler carries on from here
      this.logger.logAdapterError(ref, error, operation.consecutiveAdapterErrors);
    }

    return operation;
  }

  /**
   * Ask the backend for the current status and apply the transition
   */
  async poll(operation: Operation, adapter: BackendAdapter, signal?: AbortSignal): Promise<Operation> {
    this.assertNotTerminal(operation, 'poll');

    let status: AdapterStatus;
    try {
      status = await withTimeout(
        callSignal => adapter.status(operation.handle, callSignal),
        this.callTimeoutMs,
        `status ${describeRef(operation.ref)}`,
        signal
      );
    } catch (error) {
      if (error instanceof CancellationError || signal?.aborted) {
        throw error instanceof CancellationError ? error : new CancellationError();
      }

      const cause = toError(error);
      operation.consecutiveAdapterErrors++;
      operation.lastAdapterError = cause.message;
      throw new AdapterTransientError(
        cause.message,
        operation.ref,
        operation.consecutiveAdapterErrors,
        cause
      );
    }

    const now = this.clock();
    operation.lastPolledAt = now;
    operation.consecutiveAdapterErrors = 0;
    operation.lastAdapterError = null;

    switch (status.state) {
      case 'running':
        operation.state = OperationState.IN_PROGRESS;
        this.logger.debug('Backup still running', {
          artifactId: operation.ref.artifactId,
          progress: status.progress,
        });
        break;
      case 'done':
        operation.sizeBytes = status.sizeBytes;
        if (status.location) {
          operation.location = status.location;
        }
        if (status.extra) {
          operation.extra = { ...operation.extra, ...status.extra };
        }
        this.finish(operation, OperationState.SUCCESS, null);
        break;
      case 'errored':
        this.finish(operation, OperationState.FAILED, status.reason);
        break;
    }

    return operation;
  }

  /**
   * Force an operation that ran past its deadline into TimedOut
   */
  expire(operation: Operation, timeoutMs: number): Operation {
    this.assertNotTerminal(operation, 'expire');
    this.finish(operation, OperationState.TIMED_OUT, `Operation exceeded timeout of ${timeoutMs}ms`);
    return operation;
  }

  /**
   * Force an operation into Failed, e.g. after too many status errors
   */
  fail(operation: Operation, reason: string): Operation {
    this.assertNotTerminal(operation, 'fail');
    this.finish(operation, OperationState.FAILED, reason);
    return operation;
  }

  private finish(operation: Operation, state: OperationState, error: string | null): void {
    operation.state = state;
    operation.error = error;
    operation.terminalAt = this.clock();
    this.logger.logOperationTerminal(operation);
  }

  private assertNotTerminal(operation: Operation, action: string): void {
    if (isTerminalState(operation.state)) {
      throw new InvalidStateError(
        `Cannot ${action} ${describeRef(operation.ref)}: operation is already ${operation.state}`
      );
    }
  }
}
