import { PollScheduler } from '../src/clients/PollScheduler';
import { OperationStateMachine } from '../src/clients/OperationStateMachine';
import { Operation, OperationState } from '../src/interfaces/Operation';
import { PollSchedulerConfig } from '../src/interfaces/PollScheduler';
import { AdapterStatus } from '../src/interfaces/BackendAdapter';
import { ValidationError } from '../src/errors/LifecycleErrors';
import { ManualClock, createMockAdapter, createMockLogger, makeRef } from './helpers/mocks';

describe('PollScheduler', () => {
  let clock: ManualClock;
  let logger: ReturnType<typeof createMockLogger>;
  let adapter: ReturnType<typeof createMockAdapter>;
  let machine: OperationStateMachine;
  let config: PollSchedulerConfig;

  const createScheduler = (overrides: Partial<PollSchedulerConfig> = {}): PollScheduler =>
    new PollScheduler(machine, { ...config, ...overrides }, logger, clock.now);

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new ManualClock();
    logger = createMockLogger();
    adapter = createMockAdapter();
    machine = new OperationStateMachine(logger, { clock: clock.now });
    config = { intervalMs: 1000, timeoutMs: 10000, maxConsecutiveAdapterErrors: 3 };
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('constructor', () => {
    it('should reject a non-positive interval', () => {
      expect(() => createScheduler({ intervalMs: 0 })).toThrow(ValidationError);
    });

    it('should reject a zero error budget', () => {
      expect(() => createScheduler({ maxConsecutiveAdapterErrors: 0 })).toThrow(
        'maxConsecutiveAdapterErrors must be at least 1'
      );
    });
  });

  describe('tick', () => {
    it('should drive an operation to Success and notify the listener once', async () => {
      const scheduler = createScheduler();
      const onTerminal = jest.fn();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter, onTerminal);

      adapter.status.mockResolvedValueOnce({ state: 'done', sizeBytes: 1048576 });
      clock.advance(1000);
      await scheduler.tick();
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.SUCCESS);
      expect(onTerminal).toHaveBeenCalledTimes(1);
      expect(onTerminal).toHaveBeenCalledWith(operation);
      expect(scheduler.pendingCount).toBe(0);
      expect(adapter.status).toHaveBeenCalledTimes(2);
    });

    it('should keep polling one tick before the timeout', async () => {
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      clock.advance(9000);
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.IN_PROGRESS);
      expect(adapter.status).toHaveBeenCalledTimes(2);
    });

    it('should expire an operation one tick past the timeout without polling it', async () => {
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      clock.advance(11000);
      await scheduler.tick();
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.TIMED_OUT);
      expect(operation.error).toBe('Operation exceeded timeout of 10000ms');
      expect(adapter.status).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Operation snap-001 did not finish within 10000ms',
        { operation: 'scheduler_timeout', artifactId: 'snap-001', elapsedMs: 11000 }
      );
    });

    it('should expire exactly at the timeout', async () => {
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      clock.advance(10000);
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.TIMED_OUT);
    });

    it('should fail an operation after the cap of consecutive status errors', async () => {
      adapter.status.mockRejectedValue(new Error('throttled'));
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      await scheduler.tick();
      expect(operation.state).toBe(OperationState.SUBMITTED);
      await scheduler.tick();
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.FAILED);
      expect(operation.error).toBe('throttled');
      expect(adapter.status).toHaveBeenCalledTimes(3);
      expect(logger.logAdapterError).toHaveBeenCalledTimes(3);
    });

    it('should honour an error budget already spent at submission', async () => {
      adapter.status.mockRejectedValue(new Error('unreachable'));
      const scheduler = createScheduler({ maxConsecutiveAdapterErrors: 1 });
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      await scheduler.tick();

      expect(operation.state).toBe(OperationState.FAILED);
      expect(operation.error).toBe('unreachable');
      expect(adapter.status).toHaveBeenCalledTimes(1);
    });

    it('should never poll the same operation from two overlapping ticks', async () => {
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      let release: (status: AdapterStatus) => void = () => undefined;
      adapter.status.mockImplementationOnce(
        () =>
          new Promise<AdapterStatus>(resolve => {
            release = resolve;
          })
      );

      const first = scheduler.tick();
      const second = scheduler.tick();
      await second;
      release({ state: 'done', sizeBytes: 5 });
      await first;

      expect(adapter.status).toHaveBeenCalledTimes(2);
      expect(operation.state).toBe(OperationState.SUCCESS);
    });

    it('should poll independent operations in the same tick', async () => {
      const scheduler = createScheduler({ concurrency: 2 });
      const operations: Operation[] = [];
      for (const id of ['snap-a', 'snap-b', 'snap-c']) {
        const operation = await machine.submit(makeRef(id), adapter);
        scheduler.track(operation, adapter);
        operations.push(operation);
      }
      adapter.status.mockResolvedValue({ state: 'done', sizeBytes: 1 });

      await scheduler.tick();

      expect(operations.map(op => op.state)).toEqual([
        OperationState.SUCCESS,
        OperationState.SUCCESS,
        OperationState.SUCCESS,
      ]);
      expect(scheduler.pendingCount).toBe(0);
    });
  });

  describe('cancel', () => {
    it('should cancel backend work for an expired operation', async () => {
      adapter.cancel = jest.fn().mockResolvedValue(undefined);
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      clock.advance(10000);
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.TIMED_OUT);
      expect(adapter.cancel).toHaveBeenCalledTimes(1);
      expect(adapter.cancel).toHaveBeenCalledWith(operation.handle);
    });

    it('should cancel backend work once the error cap fails an operation', async () => {
      adapter.cancel = jest.fn().mockResolvedValue(undefined);
      adapter.status.mockRejectedValue(new Error('throttled'));
      const scheduler = createScheduler({ maxConsecutiveAdapterErrors: 2 });
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      await scheduler.tick();

      expect(operation.state).toBe(OperationState.FAILED);
      expect(adapter.cancel).toHaveBeenCalledWith(operation.handle);
    });

    it('should not cancel operations the backend finished', async () => {
      adapter.cancel = jest.fn().mockResolvedValue(undefined);
      adapter.status.mockResolvedValue({ state: 'errored', reason: 'disk full' });
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      await scheduler.run();

      expect(operation.state).toBe(OperationState.FAILED);
      expect(adapter.cancel).not.toHaveBeenCalled();
    });

    it('should keep the outcome when cancelling fails', async () => {
      adapter.cancel = jest.fn().mockRejectedValue(new Error('no such process'));
      const scheduler = createScheduler();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      clock.advance(10000);
      await scheduler.tick();

      expect(operation.state).toBe(OperationState.TIMED_OUT);
      expect(logger.warn).toHaveBeenCalledWith('Failed to cancel backend work for snap-001', {
        operation: 'scheduler_cancel',
        error: 'Error: no such process',
      });
    });
  });

  describe('run', () => {
    it('should sleep and tick until every operation is terminal', async () => {
      const scheduler = createScheduler({ intervalMs: 1 });
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);
      adapter.status
        .mockResolvedValueOnce({ state: 'running' })
        .mockResolvedValueOnce({ state: 'done', sizeBytes: 1048576 });

      const result = await scheduler.run();

      expect(result.terminal).toEqual([operation]);
      expect(result.abandoned).toEqual([]);
      expect(operation.sizeBytes).toBe(1048576);
      expect(adapter.status).toHaveBeenCalledTimes(3);
    });

    it('should enforce a timeout shorter than the poll interval', async () => {
      jest.useFakeTimers();
      const realClockMachine = new OperationStateMachine(logger);
      const scheduler = new PollScheduler(
        realClockMachine,
        { intervalMs: 60000, timeoutMs: 500, maxConsecutiveAdapterErrors: 3 },
        logger
      );
      const operation = await realClockMachine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);

      const pending = scheduler.run();
      await jest.advanceTimersByTimeAsync(500);
      const result = await pending;

      expect(result.terminal).toEqual([operation]);
      expect(operation.state).toBe(OperationState.TIMED_OUT);
      expect(adapter.status).toHaveBeenCalledTimes(1);
    });

    it('should report operations that were already terminal when tracked', async () => {
      adapter.status.mockResolvedValue({ state: 'done', sizeBytes: 7 });
      const scheduler = createScheduler();
      const onTerminal = jest.fn();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter, onTerminal);

      const result = await scheduler.run();

      expect(result.terminal).toEqual([operation]);
      expect(onTerminal).toHaveBeenCalledTimes(1);
      expect(adapter.status).toHaveBeenCalledTimes(1);
    });

    it('should abandon running operations when cancelled', async () => {
      const scheduler = createScheduler({ intervalMs: 60000 });
      const onTerminal = jest.fn();
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter, onTerminal);
      const controller = new AbortController();

      const pending = scheduler.run(controller.signal);
      controller.abort();
      const result = await pending;

      expect(result.abandoned).toEqual([operation]);
      expect(result.terminal).toEqual([]);
      expect(operation.state).toBe(OperationState.IN_PROGRESS);
      expect(onTerminal).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        'Polling cancelled; operations abandoned with unknown outcome',
        { operation: 'scheduler_abandon', artifactIds: ['snap-001'] }
      );
    });

    it('should cancel backend work for abandoned operations', async () => {
      adapter.cancel = jest.fn().mockResolvedValue(undefined);
      const scheduler = createScheduler({ intervalMs: 60000 });
      const operation = await machine.submit(makeRef(), adapter);
      scheduler.track(operation, adapter);
      const controller = new AbortController();
      controller.abort();

      const result = await scheduler.run(controller.signal);

      expect(result.abandoned).toEqual([operation]);
      expect(adapter.cancel).toHaveBeenCalledWith(operation.handle);
    });

    it('should rethrow the first listener error after finishing the run', async () => {
      adapter.status.mockResolvedValue({ state: 'done', sizeBytes: 1 });
      const scheduler = createScheduler();
      const listenerError = new Error('manifest unavailable');
      const first = await machine.submit(makeRef('snap-a'), adapter);
      const second = await machine.submit(makeRef('snap-b'), adapter);
      const onTerminal = jest.fn().mockRejectedValueOnce(listenerError);
      scheduler.track(first, adapter, onTerminal);
      scheduler.track(second, adapter, onTerminal);

      await expect(scheduler.run()).rejects.toBe(listenerError);
      expect(onTerminal).toHaveBeenCalledTimes(2);
      expect(logger.error).toHaveBeenCalledWith('Terminal listener failed', listenerError, {
        artifactId: 'snap-a',
      });
    });
  });
});
