import type { ServerResponse } from 'http';

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

export type SseEventName = 'start' | 'chunk' | 'complete' | 'error';

/**
 * One named event: `event:` line, JSON `data:` line, blank line.
 */
export function formatSseEvent(event: SseEventName, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Writes named events to an HTTP response and waits for the socket to drain
 * before accepting more, so the producer runs at the client's pace.
 * `onDisconnect` runs once if the client goes away before the response ends.
 */
export class SseWriter {
  private clientGone = false;

  constructor(
    private readonly res: ServerResponse,
    onDisconnect?: () => void
  ) {
    res.on('close', () => {
      if (!res.writableFinished) {
        this.clientGone = true;
        onDisconnect?.();
      }
    });
  }

  get closed(): boolean {
    return this.clientGone || this.res.destroyed;
  }

  open(): void {
    this.res.writeHead(200, SSE_HEADERS);
    this.res.flushHeaders();
  }

  async send(event: SseEventName, data: unknown): Promise<void> {
    if (this.closed) {
      return;
    }
    if (!this.res.write(formatSseEvent(event, data))) {
      await this.waitForDrain();
    }
  }

  end(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.res.off('drain', done);
        this.res.off('close', done);
        resolve();
      };
      this.res.once('drain', done);
      this.res.once('close', done);
    });
  }
}
