import { CallTimeoutError, sleep, withTimeout } from '../src/utils/abort';
import { mapWithConcurrency } from '../src/utils/concurrency';
import { WriteLock } from '../src/utils/WriteLock';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isExistingFile, isMissingFile } from '../src/utils/fsErrors';
import { CancellationError } from '../src/errors/LifecycleErrors';

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60000, controller.signal)).rejects.toThrow(CancellationError);
  });

  it('should reject when the signal aborts mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toThrow(CancellationError);
  });
});

describe('withTimeout', () => {
  it('should resolve with the call result', async () => {
    await expect(withTimeout(async () => 'ok', 1000, 'status')).resolves.toBe('ok');
  });

  it('should pass through call failures', async () => {
    await expect(
      withTimeout(async () => Promise.reject(new Error('throttled')), 1000, 'status')
    ).rejects.toThrow('throttled');
  });

  it('should reject a synchronous throw', async () => {
    await expect(
      withTimeout(
        () => {
          throw new Error('bad input');
        },
        1000,
        'status'
      )
    ).rejects.toThrow('bad input');
  });

  it('should time out and abort the call signal', async () => {
    let received: AbortSignal | undefined;

    const error = await withTimeout(
      signal => {
        received = signal;
        return new Promise<never>(() => undefined);
      },
      5,
      'status of snap-001'
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CallTimeoutError);
    expect(error).toMatchObject({ message: 'status of snap-001 timed out after 5ms', timeoutMs: 5 });
    expect(received?.aborted).toBe(true);
  });

  it('should reject with CancellationError when the outer signal aborts', async () => {
    const controller = new AbortController();
    let received: AbortSignal | undefined;

    const pending = withTimeout(
      signal => {
        received = signal;
        return new Promise<never>(() => undefined);
      },
      60000,
      'delete',
      controller.signal
    );
    controller.abort();

    await expect(pending).rejects.toThrow(CancellationError);
    expect(received?.aborted).toBe(true);
  });

  it('should not call fn when the outer signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = jest.fn(async () => 'ok');

    await expect(withTimeout(fn, 1000, 'submit', controller.signal)).rejects.toThrow(
      CancellationError
    );
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order and cap calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(delay);
      inFlight--;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20', '3:5']);
    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('WriteLock', () => {
  it('should run critical sections one at a time in call order', async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    const section = (name: string, delay: number) =>
      lock.runExclusive(async () => {
        events.push(`${name}:start`);
        await sleep(delay);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section('a', 10), section('b', 1)]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should release the lock when a section fails', async () => {
    const lock = new WriteLock();

    await expect(lock.runExclusive(async () => Promise.reject(new Error('disk full')))).rejects.toThrow(
      'disk full'
    );
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('isMissingFile', () => {
  it('should match ENOENT errors only', () => {
    expect(isMissingFile(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isMissingFile(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isMissingFile('ENOENT')).toBe(false);
  });

  it('should recognise errors raised by fs itself', async () => {
    const error = await fs
      .stat(path.join(os.tmpdir(), 'backup-lifecycle-no-such-file'))
      .catch((caught: unknown) => caught);

    expect(isMissingFile(error)).toBe(true);
  });

  it('should recognise plain objects carrying a code', () => {
    expect(isMissingFile({ code: 'ENOENT' })).toBe(true);
    expect(isExistingFile({ code: 'EEXIST' })).toBe(true);
    expect(isExistingFile(null)).toBe(false);
  });
});
