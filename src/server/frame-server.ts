// server/frame-server.ts — Live viewer: HTTP page + WebSocket frame broadcast
// Acts as the simulation's render sink: clear() opens a frame, drawCircle()
// records into it, present() ships it to every connected viewer.

import { createServer, type Server as HttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { WebSocketServer, WebSocket } from 'ws';
import type { Color, FrameCircle, RenderSink, Tick, ViewerMessage } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface FrameServerOptions {
  port: number;
  arenaWidth: number;
  arenaHeight: number;
  fps: number;
}

function resolveViewerPath(): string {
  // Alongside this module when run from source
  const sameDirPath = resolve(__dirname, 'viewer.html');
  if (existsSync(sameDirPath)) return sameDirPath;

  // From the bundle at dist/src/server/, back to the project's sources
  const srcPath = resolve(__dirname, '..', '..', '..', 'src', 'server', 'viewer.html');
  if (existsSync(srcPath)) return srcPath;

  return '';
}

export class FrameServer implements RenderSink {
  private options: FrameServerOptions;
  private httpServer: HttpServer;
  private wss: WebSocketServer;
  private viewerHtml: string;

  private frame: FrameCircle[] = [];
  private frameTick: Tick = 0;

  constructor(options: FrameServerOptions) {
    this.options = options;

    const htmlPath = resolveViewerPath();
    if (htmlPath) {
      this.viewerHtml = readFileSync(htmlPath, 'utf-8');
    } else {
      console.error('[ARENA] viewer.html not found, serving a placeholder page');
      this.viewerHtml = '<html><body><h1>Viewer not found</h1></body></html>';
    }

    this.httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
      this.handleHttpRequest(req, res);
    });

    this.wss = new WebSocketServer({ server: this.httpServer, path: '/ws' });
    this.wss.on('connection', (ws: WebSocket) => {
      this.send(ws, {
        type: 'arena',
        width: this.options.arenaWidth,
        height: this.options.arenaHeight,
        fps: this.options.fps,
      });
    });
  }

  listen(): Promise<void> {
    return new Promise((resolvePromise, reject) => {
      const onError = (err: Error): void => {
        console.error(`[ARENA] Frame server failed to start on port ${this.options.port}: ${err.message}`);
        reject(err);
      };
      this.httpServer.once('error', onError);
      this.httpServer.listen(this.options.port, () => {
        this.httpServer.off('error', onError);
        resolvePromise();
      });
    });
  }

  get viewerCount(): number {
    return this.wss.clients.size;
  }

  // --- RenderSink ---

  clear(): void {
    this.frame = [];
  }

  drawCircle(x: number, y: number, width: number, height: number, color: Color): void {
    this.frame.push({ x, y, width, height, color });
  }

  present(): void {
    this.frameTick++;
    const msg: ViewerMessage = { type: 'frame', tick: this.frameTick, circles: this.frame };
    const data = JSON.stringify(msg);
    for (const ws of this.wss.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    }
  }

  // ---

  close(): Promise<void> {
    for (const ws of this.wss.clients) {
      ws.terminate();
    }
    return new Promise((resolvePromise, reject) => {
      this.wss.close(() => {
        this.httpServer.close((err?: Error) => (err ? reject(err) : resolvePromise()));
      });
    });
  }

  private send(ws: WebSocket, msg: ViewerMessage): void {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
  }

  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    const urlPath = (req.url ?? '').split('?')[0];

    if (urlPath === '/' || urlPath === '/index.html') {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(this.viewerHtml);
    } else {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not found');
    }
  }
}
