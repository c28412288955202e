import type http from 'http';
import type { StreamEvent } from '../models';
import type { IStreamChannel, WriteOutcome } from '../patterns/state/IStreamState';

/**
 * Stream channel writing one JSON record per line to an HTTP response
 */
export class NdjsonChannel implements IStreamChannel {
  private closed = false;
  private readonly closedPromise: Promise<WriteOutcome>;

  constructor(private readonly res: http.ServerResponse) {
    this.closedPromise = new Promise(resolve => {
      res.once('close', () => {
        this.closed = true;
        resolve({ ok: false, reason: 'connection closed by client' });
      });
    });
  }

  /**
   * Send the status line and headers for an event stream
   */
  open(): void {
    this.res.writeHead(200, {
      'Content-Type': 'application/x-ndjson; charset=utf-8',
      'Cache-Control': 'no-cache',
      'X-Content-Type-Options': 'nosniff'
    });
  }

  write(event: StreamEvent): Promise<WriteOutcome> {
    if (this.closed || this.res.destroyed || this.res.writableEnded) {
      return Promise.resolve({ ok: false, reason: 'connection closed by client' });
    }

    const written = new Promise<WriteOutcome>(resolve => {
      this.res.write(`${JSON.stringify(event)}\n`, error => {
        resolve(error ? { ok: false, reason: error.message } : { ok: true });
      });
    });

    // A write to a dropped socket may never flush; the close event settles it instead
    return Promise.race([written, this.closedPromise]);
  }

  /**
   * End the response after the terminal event
   */
  close(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}
