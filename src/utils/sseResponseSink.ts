/**
 * Adapts an Express response into a StreamSession `EventSink`.
 */

import type { Response } from 'express';
import type { EventSink } from '../services/notification/streamSession';

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  // Stops nginx from buffering the stream
  'X-Accel-Buffering': 'no',
};

export function createSseResponseSink(res: Response): EventSink {
  res.status(200);
  for (const [name, value] of Object.entries(SSE_HEADERS)) {
    res.setHeader(name, value);
  }
  res.flushHeaders();

  return {
    write(chunk: string): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (res.writableEnded || res.destroyed) {
          reject(new Error('Response stream is closed'));
          return;
        }
        res.write(chunk, (err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      });
    },
    end(): void {
      if (!res.writableEnded) {
        res.end();
      }
    },
    onClose(listener: () => void): void {
      res.on('close', listener);
    },
  };
}
