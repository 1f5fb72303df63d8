import type { Response } from 'express';
import type { SessionChannel } from '../sessions/session-manager.js';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

/** Session channel over an open `text/event-stream` response. */
export class SseChannel implements SessionChannel {
  constructor(private readonly res: Response) {}

  send(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.res.writableEnded || this.res.destroyed) {
        reject(new Error('event stream already closed'));
        return;
      }
      this.res.write(frame, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(): void {
    if (!this.res.writableEnded) this.res.end();
  }
}
