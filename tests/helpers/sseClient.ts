/**
 * Minimal SSE client over node:http for end-to-end stream tests.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import type { Server } from 'http';

export function serverPort(server: Server): number {
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

export class SseClient {
  readonly frames: Array<Record<string, unknown>> = [];
  statusCode = 0;
  contentType = '';
  private buffer = '';
  private pending: Array<{ index: number; resolve: (frame: Record<string, unknown>) => void }> = [];
  private cursor = 0;
  private request: http.ClientRequest | null = null;

  /** Resolves once response headers have arrived. */
  connect(port: number, path = '/api/reports/stream'): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const req = http.get({ host: '127.0.0.1', port, path }, (res) => {
        this.statusCode = res.statusCode ?? 0;
        this.contentType = String(res.headers['content-type'] ?? '');
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => this.onData(chunk));
        // Tearing the connection down aborts the response
        res.on('error', () => undefined);
        resolve();
      });
      req.on('error', reject);
      this.request = req;
    });
  }

  /** Next unread `data:` frame, waiting for it if needed. */
  next(): Promise<Record<string, unknown>> {
    const index = this.cursor;
    this.cursor += 1;
    const frame = this.frames[index];
    if (frame) return Promise.resolve(frame);
    return new Promise((resolve) => this.pending.push({ index, resolve }));
  }

  close(): void {
    this.request?.destroy();
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const raw = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      if (raw.startsWith('data: ')) {
        this.frames.push(JSON.parse(raw.slice('data: '.length)));
      }
      boundary = this.buffer.indexOf('\n\n');
    }
    const ready = this.pending.filter((p) => p.index < this.frames.length);
    this.pending = this.pending.filter((p) => p.index >= this.frames.length);
    for (const p of ready) {
      const frame = this.frames[p.index];
      if (frame) p.resolve(frame);
    }
  }
}
