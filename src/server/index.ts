// server/index.ts — Live server entry point
// Wire: config → arena → frame server (render sink) → wall-clock loop
// Graceful shutdown on SIGINT/SIGTERM

import { loadConfig } from './config.js';
import { createArena } from './arena.js';
import { FrameServer } from './frame-server.js';
import { TimerScheduler } from './scheduler.js';
import { DEFAULT_PORT } from '../shared/constants.js';

// --- CLI arg parsing (simple, no commander needed for server) ---

function parseArgs(): { port: number; seed?: number; count?: number; fps?: number } {
  const args = process.argv.slice(2);
  let port = DEFAULT_PORT;
  let seed: number | undefined;
  let count: number | undefined;
  let fps: number | undefined;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--port':
        port = Number(args[++i]);
        break;
      case '--seed':
        seed = Number(args[++i]);
        break;
      case '--count':
        count = Number(args[++i]);
        break;
      case '--fps':
        fps = Number(args[++i]);
        break;
    }
  }

  return { port, seed, count, fps };
}

async function main(): Promise<void> {
  const { port, seed, count, fps } = parseArgs();
  const config = loadConfig({ seed, entityCount: count, fps });

  const frameServer = new FrameServer({
    port,
    arenaWidth: config.arenaWidth,
    arenaHeight: config.arenaHeight,
    fps: config.fps,
  });
  await frameServer.listen();

  const { loop, entities } = createArena(config, frameServer, new TimerScheduler());

  const shutdown = (code: number): void => {
    console.log('[ARENA] Shutting down...');
    loop.stop();
    frameServer.close().then(
      () => process.exit(code),
      (err: unknown) => {
        console.error(`[ARENA] Error closing frame server: ${String(err)}`);
        process.exit(1);
      },
    );
  };

  loop.setErrorHandler(() => shutdown(1));

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));

  loop.start();

  console.log(
    `[ARENA] ${entities.length} circles in ${config.arenaWidth}x${config.arenaHeight} ` +
      `at ${config.fps} fps (every ${loop.frameDurationMs}ms), seed=${config.seed}`,
  );
  console.log(`[ARENA] Viewer: http://localhost:${port}/`);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`[ARENA] Failed to start: ${msg}`);
  process.exit(1);
});
