import { OperationStateMachine } from '../src/clients/OperationStateMachine';
import { OperationState } from '../src/interfaces/Operation';
import {
  AdapterTransientError,
  CancellationError,
  InvalidStateError,
  SubmissionError,
} from '../src/errors/LifecycleErrors';
import { ManualClock, createMockAdapter, createMockLogger, makeRef } from './helpers/mocks';

describe('OperationStateMachine', () => {
  let clock: ManualClock;
  let logger: ReturnType<typeof createMockLogger>;
  let adapter: ReturnType<typeof createMockAdapter>;
  let machine: OperationStateMachine;

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new ManualClock();
    logger = createMockLogger();
    adapter = createMockAdapter();
    machine = new OperationStateMachine(logger, { clock: clock.now });
  });

  describe('submit', () => {
    it('should create an operation and poll it once', async () => {
      const ref = makeRef();

      const operation = await machine.submit(ref, adapter);

      expect(adapter.submit).toHaveBeenCalledTimes(1);
      expect(adapter.status).toHaveBeenCalledTimes(1);
      expect(operation.state).toBe(OperationState.IN_PROGRESS);
      expect(operation.location).toBe('loc/snap-001');
      expect(operation.submittedAt.toISOString()).toBe('2024-01-15T12:00:00.000Z');
      expect(logger.logOperationSubmitted).toHaveBeenCalledWith(ref, 'loc/snap-001');
    });

    it('should return a terminal operation for synchronous backends', async () => {
      adapter.status.mockResolvedValue({ state: 'done', sizeBytes: 42 });

      const operation = await machine.submit(makeRef(), adapter);

      expect(operation.state).toBe(OperationState.SUCCESS);
      expect(operation.sizeBytes).toBe(42);
      expect(operation.terminalAt).not.toBeNull();
    });

    it('should wrap backend rejections in SubmissionError', async () => {
      adapter.submit.mockRejectedValue(new Error('SnapshotAlreadyExists'));

      await expect(machine.submit(makeRef(), adapter)).rejects.toThrow(
        'Backend rejected backup request for rds:db1/snap-001: Error: SnapshotAlreadyExists'
      );
      expect(adapter.status).not.toHaveBeenCalled();
    });

    it('should pass SubmissionError through unchanged', async () => {
      const ref = makeRef();
      const rejection = new SubmissionError('quota exceeded', ref);
      adapter.submit.mockRejectedValue(rejection);

      await expect(machine.submit(ref, adapter)).rejects.toBe(rejection);
    });

    it('should count a failed first status call and still return the operation', async () => {
      adapter.status.mockRejectedValue(new Error('connection reset'));

      const operation = await machine.submit(makeRef(), adapter);

      expect(operation.state).toBe(OperationState.SUBMITTED);
      expect(operation.consecutiveAdapterErrors).toBe(1);
      expect(operation.lastAdapterError).toBe('connection reset');
      expect(logger.logAdapterError).toHaveBeenCalledWith(
        operation.ref,
        expect.any(AdapterTransientError),
        1
      );
    });

    it('should reject with CancellationError when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(machine.submit(makeRef(), adapter, controller.signal)).rejects.toBeInstanceOf(
        CancellationError
      );
      expect(adapter.submit).not.toHaveBeenCalled();
    });

    it('should treat a submit call that exceeds its timeout as a rejection', async () => {
      machine = new OperationStateMachine(logger, { clock: clock.now, adapterCallTimeoutMs: 5 });
      adapter.submit.mockImplementation(() => new Promise(() => undefined));

      await expect(machine.submit(makeRef(), adapter)).rejects.toThrow(
        'Backend rejected backup request for rds:db1/snap-001: CallTimeoutError: submit rds:db1/snap-001 timed out after 5ms'
      );
    });
  });

  describe('poll', () => {
    it('should record size, location and extra on success', async () => {
      const operation = await machine.submit(makeRef(), adapter);
      clock.advance(1000);
      adapter.status.mockResolvedValue({
        state: 'done',
        sizeBytes: 1048576,
        location: 'arn:aws:rds:snapshot:snap-001',
        extra: { engine: 'postgres' },
      });

      await machine.poll(operation, adapter);

      expect(operation.state).toBe(OperationState.SUCCESS);
      expect(operation.sizeBytes).toBe(1048576);
      expect(operation.location).toBe('arn:aws:rds:snapshot:snap-001');
      expect(operation.extra).toEqual({ engine: 'postgres' });
      expect(operation.terminalAt?.toISOString()).toBe('2024-01-15T12:00:01.000Z');
      expect(logger.logOperationTerminal).toHaveBeenCalledWith(operation);
    });

    it('should move to Failed with the backend reason', async () => {
      const operation = await machine.submit(makeRef(), adapter);
      adapter.status.mockResolvedValue({ state: 'errored', reason: 'storage full' });

      await machine.poll(operation, adapter);

      expect(operation.state).toBe(OperationState.FAILED);
      expect(operation.error).toBe('storage full');
    });

    it('should reset the error counter after a successful status call', async () => {
      adapter.status.mockRejectedValueOnce(new Error('timeout'));
      const operation = await machine.submit(makeRef(), adapter);
      expect(operation.consecutiveAdapterErrors).toBe(1);

      await machine.poll(operation, adapter);

      expect(operation.consecutiveAdapterErrors).toBe(0);
      expect(operation.lastAdapterError).toBeNull();
      expect(operation.state).toBe(OperationState.IN_PROGRESS);
    });

    it('should throw AdapterTransientError carrying the running count', async () => {
      const operation = await machine.submit(makeRef(), adapter);
      adapter.status.mockRejectedValue(new Error('throttled'));

      await expect(machine.poll(operation, adapter)).rejects.toMatchObject({
        name: 'AdapterTransientError',
        consecutiveErrors: 1,
        message: 'throttled',
      });
      await expect(machine.poll(operation, adapter)).rejects.toMatchObject({ consecutiveErrors: 2 });
      expect(operation.state).toBe(OperationState.IN_PROGRESS);
    });

    it('should refuse to poll a terminal operation', async () => {
      adapter.status.mockResolvedValue({ state: 'done', sizeBytes: 1 });
      const operation = await machine.submit(makeRef(), adapter);

      await expect(machine.poll(operation, adapter)).rejects.toThrow(InvalidStateError);
      expect(adapter.status).toHaveBeenCalledTimes(1);
    });
  });

  describe('expire and fail', () => {
    it('should move a running operation to TimedOut', async () => {
      const operation = await machine.submit(makeRef(), adapter);

      machine.expire(operation, 3600000);

      expect(operation.state).toBe(OperationState.TIMED_OUT);
      expect(operation.error).toBe('Operation exceeded timeout of 3600000ms');
    });

    it('should throw InvalidStateError for transitions out of a terminal state', async () => {
      const operation = await machine.submit(makeRef(), adapter);
      machine.fail(operation, 'gave up');

      expect(() => machine.expire(operation, 10)).toThrow(
        'Cannot expire rds:db1/snap-001: operation is already Failed'
      );
      expect(() => machine.fail(operation, 'again')).toThrow(InvalidStateError);
      expect(operation.error).toBe('gave up');
    });
  });
});
