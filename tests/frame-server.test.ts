// tests/frame-server.test.ts — Tests for the live frame server (real ports, in process)

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import { FrameServer } from '../src/server/frame-server.js';
import { ManualScheduler } from '../src/server/scheduler.js';
import { createArena } from '../src/server/arena.js';
import { loadConfig } from '../src/server/config.js';
import { FrameWatcher } from '../cli/watch.js';
import type { ViewerMessage } from '../src/types/index.js';

let portCounter = 19600;
function nextPort(): number {
  return portCounter++;
}

/**
 * Buffers every message from the moment the socket is created so nothing
 * is lost before a test starts waiting.
 */
class TestViewer {
  readonly ws: WebSocket;
  private buffer: ViewerMessage[] = [];
  private waiters: Array<(msg: ViewerMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on('message', (data: Buffer | string) => {
      const msg = JSON.parse(data.toString()) as ViewerMessage;
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.buffer.push(msg);
      }
    });
  }

  nextMessage(): Promise<ViewerMessage> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    return new Promise((resolve) => {
      this.ws.on('close', () => resolve());
      this.ws.close();
    });
  }
}

describe('FrameServer', () => {
  let server: FrameServer;
  let port: number;
  const viewers: TestViewer[] = [];

  function connect(): TestViewer {
    const viewer = new TestViewer(`ws://localhost:${port}/ws`);
    viewers.push(viewer);
    return viewer;
  }

  beforeEach(async () => {
    port = nextPort();
    server = new FrameServer({ port, arenaWidth: 400, arenaHeight: 300, fps: 30 });
    await server.listen();
  });

  afterEach(async () => {
    await Promise.all(viewers.splice(0).map((v) => v.close()));
    await server.close();
  });

  it('greets a viewer with the arena description', async () => {
    const viewer = connect();
    expect(await viewer.nextMessage()).toEqual({ type: 'arena', width: 400, height: 300, fps: 30 });
  });

  it('broadcasts each presented frame', async () => {
    const viewer = connect();
    await viewer.nextMessage();

    server.clear();
    server.drawCircle(1, 2, 10, 10, 'red');
    server.drawCircle(5, 6, 20, 20, 'blue');
    server.present();

    expect(await viewer.nextMessage()).toEqual({
      type: 'frame',
      tick: 1,
      circles: [
        { x: 1, y: 2, width: 10, height: 10, color: 'red' },
        { x: 5, y: 6, width: 20, height: 20, color: 'blue' },
      ],
    });
  });

  it('starts every frame empty after clear()', async () => {
    const viewer = connect();
    await viewer.nextMessage();

    server.clear();
    server.drawCircle(1, 1, 4, 4, 'red');
    server.present();
    server.clear();
    server.present();

    await viewer.nextMessage();
    expect(await viewer.nextMessage()).toEqual({ type: 'frame', tick: 2, circles: [] });
  });

  it('serves the viewer page over HTTP', async () => {
    const res = await fetch(`http://localhost:${port}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<canvas id="arena"');
  });

  it('returns 404 for unknown paths', async () => {
    const res = await fetch(`http://localhost:${port}/nope`);
    expect(res.status).toBe(404);
  });

  it('acts as the render sink of a running simulation', async () => {
    const viewer = connect();
    await viewer.nextMessage();

    const config = loadConfig({ entityCount: 3, arenaWidth: 400, arenaHeight: 300 }, {});
    const scheduler = new ManualScheduler();
    const { loop, entities } = createArena(config, server, scheduler);
    loop.start();
    scheduler.runNext();
    loop.stop();

    const msg = await viewer.nextMessage();
    expect(msg.type).toBe('frame');
    if (msg.type === 'frame') {
      expect(msg.circles).toEqual(
        entities.map((e) => ({ x: e.x, y: e.y, width: e.width, height: e.height, color: e.color })),
      );
    }
  });

  it('streams to the CLI watcher', async () => {
    const received: ViewerMessage[] = [];
    const watcher = new FrameWatcher(`ws://localhost:${port}/ws`, (msg) => received.push(msg));
    await watcher.connect();

    await expect.poll(() => received.length).toBe(1);
    expect(received[0]).toEqual({ type: 'arena', width: 400, height: 300, fps: 30 });

    watcher.close();
  });
});
