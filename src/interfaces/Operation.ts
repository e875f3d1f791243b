import { ArtifactRef } from './ArtifactRef';
import { AdapterHandle } from './BackendAdapter';

export enum OperationState {
  SUBMITTED = 'Submitted',
  IN_PROGRESS = 'InProgress',
  SUCCESS = 'Success',
  FAILED = 'Failed',
  TIMED_OUT = 'TimedOut',
}

export const TERMINAL_STATES: ReadonlySet<OperationState> = new Set([
  OperationState.SUCCESS,
  OperationState.FAILED,
  OperationState.TIMED_OUT,
]);

export function isTerminalState(state: OperationState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * In-memory record of one submitted backup.
 * Only the OperationStateMachine mutates it.
 */
export interface Operation {
  readonly ref: ArtifactRef;
  readonly handle: AdapterHandle;
  state: OperationState;
  readonly submittedAt: Date;
  lastPolledAt: Date;
  terminalAt: Date | null;
  error: string | null;
  sizeBytes: number | null;
  /** Status calls that failed in a row; reset by any successful status call */
  consecutiveAdapterErrors: number;
  /** Message of the most recent failed status call */
  lastAdapterError: string | null;
  location: string;
  extra: Record<string, string>;
}
