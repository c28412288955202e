import type { StreamEvent } from '../../models';

/**
 * Lifecycle of one streamed batch
 */
export enum StreamStateType {
  START = 'start',
  RUNNING = 'running',
  COMPLETED = 'completed',
  ABORTED = 'aborted'
}

/**
 * Allowed transitions; completed and aborted are terminal
 */
export const STREAM_TRANSITIONS: Readonly<Record<StreamStateType, readonly StreamStateType[]>> = {
  [StreamStateType.START]: [StreamStateType.RUNNING, StreamStateType.ABORTED],
  [StreamStateType.RUNNING]: [StreamStateType.COMPLETED, StreamStateType.ABORTED],
  [StreamStateType.COMPLETED]: [],
  [StreamStateType.ABORTED]: []
};

/**
 * Outcome of writing one event; a failed write is ordinary flow, not an exception
 */
export type WriteOutcome = { ok: true } | { ok: false; reason: string };

/**
 * Long-lived response channel events are written to
 */
export interface IStreamChannel {
  /**
   * Write one event. Must resolve, never reject.
   */
  write(event: StreamEvent): Promise<WriteOutcome>;
}

/**
 * Why a stream ended early
 */
export type AbortReason = 'disconnected' | 'lookup-failed';

/**
 * Summary returned once a stream has reached a terminal state
 */
export interface IStreamOutcome {
  state: StreamStateType.COMPLETED | StreamStateType.ABORTED;
  completed: number;
  total: number;
  reason?: AbortReason;
  /** Channel failure or lookup error message behind an abort */
  detail?: string;
}
