import { ChildProcess, SpawnOptions, spawn } from 'child_process';

const MAX_STDERR_LENGTH = 4000;
const MAX_STDOUT_LENGTH = 1024 * 1024;

/**
 * A started child process and what it has reported so far
 */
export interface ChildJob {
  readonly child: ChildProcess;
  exitCode: number | null;
  finished: boolean;
  stdout: string;
  /** Tail of stderr */
  stderr: string;
  /** Set when the process failed after it had started */
  processError?: Error;
  /** Settles once the process has exited or failed */
  readonly exited: Promise<void>;
}

export interface StartChildOptions {
  /** Keep stdout in `ChildJob.stdout`; otherwise it is discarded */
  captureStdout?: boolean;
  onStderr?: (chunk: string) => void;
}

/**
 * Spawn a process and resolve once it is running.
 * Rejects with the spawn error when the executable cannot be started.
 */
export function startChild(
  command: string,
  args: string[],
  options: StartChildOptions = {}
): Promise<ChildJob> {
  return new Promise((resolve, reject) => {
    let markExited: () => void = () => undefined;
    const exited = new Promise<void>(done => {
      markExited = done;
    });

    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', options.captureStdout ? 'pipe' : 'ignore', 'pipe'],
      env: { ...process.env },
    };
    const child = spawn(command, args, spawnOptions);
    const job: ChildJob = { child, exitCode: null, finished: false, stdout: '', stderr: '', exited };
    let spawned = false;

    child.stdout?.on('data', (data: Buffer) => {
      job.stdout = (job.stdout + data.toString()).slice(-MAX_STDOUT_LENGTH);
    });

    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      job.stderr = (job.stderr + chunk).slice(-MAX_STDERR_LENGTH);
      options.onStderr?.(chunk);
    });

    child.once('spawn', () => {
      spawned = true;
      resolve(job);
    });

    child.once('error', error => {
      if (!spawned) {
        reject(error);
        return;
      }
      job.processError = error;
      markExited();
    });

    child.once('close', code => {
      job.exitCode = code;
      job.finished = true;
      markExited();
    });
  });
}

/**
 * Run a process to completion, capturing its output
 */
export async function runChild(command: string, args: string[]): Promise<ChildJob> {
  const job = await startChild(command, args, { captureStdout: true });
  await job.exited;
  return job;
}

/**
 * Last non-empty part of a process's stderr, for error messages
 */
export function outputTail(output: string, length = 2000): string {
  return output.trim().slice(-length);
}
