import { toWireResult } from '../../models';
import type { StreamEvent } from '../../models';
import type { ILookupClient } from '../strategy/ILookupClient';
import { StreamStateType, STREAM_TRANSITIONS } from './IStreamState';
import type { IStreamChannel, IStreamOutcome, AbortReason } from './IStreamState';

/**
 * Streaming Responder - checks candidates one by one and reports each result as it lands
 *
 * start -> running -> completed | aborted
 *
 * A failed write means the consumer went away: the responder stops quietly.
 * A failed lookup is reported with an `error` event and ends the stream;
 * results already written are never retracted.
 */
export class StreamingResponder {
  private state: StreamStateType = StreamStateType.START;
  private stateHistory: Array<{
    from: StreamStateType;
    to: StreamStateType;
    timestamp: Date;
  }> = [];

  constructor(
    private readonly client: ILookupClient,
    private readonly channel: IStreamChannel
  ) {}

  /**
   * Get current state
   */
  getState(): StreamStateType {
    return this.state;
  }

  /**
   * Get state transition history
   * @returns Copy of the recorded transitions
   */
  getStateHistory(): Array<{ from: StreamStateType; to: StreamStateType; timestamp: Date }> {
    return [...this.stateHistory];
  }

  /**
   * Stream lookups for a prepared candidate sequence
   * @param candidates - Candidate domains in the order they must be checked
   * @returns Terminal outcome
   */
  async run(candidates: readonly string[]): Promise<IStreamOutcome> {
    if (this.state !== StreamStateType.START) {
      throw new Error(`Streaming responder already used (state: ${this.state})`);
    }

    const total = candidates.length;
    let completed = 0;
    const unregistered: string[] = [];

    const started = await this.emit({ type: 'start', total });
    if (!started.ok) {
      return this.abort('disconnected', completed, total, started.reason);
    }
    this.transitionTo(StreamStateType.RUNNING);

    for (const domain of candidates) {
      let event: StreamEvent;
      try {
        const result = await this.client.lookup(domain);
        completed += 1;
        if (!result.isRegistered) {
          unregistered.push(result.domain);
        }
        event = { type: 'result', ...toWireResult(result), completed, total };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        // The stream is over either way; a failed write here changes nothing
        await this.emit({ type: 'error', error: message, completed, total });
        return this.abort('lookup-failed', completed, total, message);
      }

      const written = await this.emit(event);
      if (!written.ok) {
        return this.abort('disconnected', completed, total, written.reason);
      }
    }

    const finished = await this.emit({ type: 'complete', total, completed, unregistered });
    if (!finished.ok) {
      return this.abort('disconnected', completed, total, finished.reason);
    }
    this.transitionTo(StreamStateType.COMPLETED);
    return { state: StreamStateType.COMPLETED, completed, total };
  }

  private emit(event: StreamEvent) {
    return this.channel.write(event);
  }

  private abort(reason: AbortReason, completed: number, total: number, detail: string): IStreamOutcome {
    this.transitionTo(StreamStateType.ABORTED);
    return { state: StreamStateType.ABORTED, completed, total, reason, detail };
  }

  private transitionTo(next: StreamStateType): void {
    if (!STREAM_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid stream state transition from ${this.state} to ${next}`);
    }
    this.stateHistory.push({ from: this.state, to: next, timestamp: new Date() });
    this.state = next;
  }
}
