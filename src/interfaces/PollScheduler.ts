import { Operation } from './Operation';

/**
 * Configuration for the poll scheduler
 */
export interface PollSchedulerConfig {
  /** Delay between polling passes */
  intervalMs: number;

  /** Maximum time from submission to a terminal state */
  timeoutMs: number;

  /** Status failures in a row after which an operation is marked Failed */
  maxConsecutiveAdapterErrors: number;

  /** Maximum number of status calls in flight during one pass */
  concurrency?: number;
}

/**
 * Called once for every operation that reaches a terminal state
 */
export type TerminalListener = (operation: Operation) => Promise<void> | void;

export interface SchedulerRunResult {
  /** Operations that reached Success, Failed or TimedOut */
  terminal: Operation[];

  /** Operations left in flight because the run was cancelled; outcome unknown */
  abandoned: Operation[];
}
