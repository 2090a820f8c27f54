// cli/watch.ts — WebSocket client that streams a live arena's messages

import WebSocket from 'ws';
import type { ViewerMessage } from '../src/types/index.js';

export function parseViewerMessage(data: string): ViewerMessage | null {
  const parsed: unknown = JSON.parse(data);
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null;

  if (parsed.type === 'arena') {
    return parsed as ViewerMessage;
  }
  if (parsed.type === 'frame' && 'circles' in parsed && Array.isArray(parsed.circles)) {
    return parsed as ViewerMessage;
  }
  return null;
}

export class FrameWatcher {
  private ws: WebSocket | null = null;

  constructor(
    private readonly serverUrl: string,
    private readonly onMessage: (msg: ViewerMessage) => void,
  ) {}

  connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.serverUrl);
      this.ws = ws;

      ws.on('open', () => {
        process.stderr.write(`Connected to ${this.serverUrl}\n`);
        resolve();
      });

      ws.on('message', (data: Buffer | string) => {
        let msg: ViewerMessage | null;
        try {
          msg = parseViewerMessage(data.toString());
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Ignoring malformed message: ${reason}\n`);
          return;
        }
        if (msg) this.onMessage(msg);
      });

      ws.on('error', (err: Error) => reject(err));
    });
  }

  close(): void {
    this.ws?.close();
    this.ws = null;
  }
}
