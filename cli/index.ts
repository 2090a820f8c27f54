#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../src/server/config.js';
import { runHeadless } from './headless.js';
import { FrameWatcher } from './watch.js';

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return n;
}

const program = new Command();

program
  .name('bounce-arena')
  .description('Bouncing circles in a rectangular arena')
  .version('0.1.0');

program
  .command('simulate')
  .description('Run the simulation headless on a virtual clock and print JSON lines')
  .option('--ticks <n>', 'Number of ticks to run', parseInteger, 600)
  .option('--every <n>', 'Report state every N ticks', parseInteger, 60)
  .option('--seed <n>', 'Random seed', parseInteger)
  .option('--count <n>', 'Number of circles', parseInteger)
  .option('--fps <n>', 'Frames per second', parseInteger)
  .option('--width <px>', 'Arena width', parseNumber)
  .option('--height <px>', 'Arena height', parseNumber)
  .action(
    (opts: {
      ticks: number;
      every: number;
      seed?: number;
      count?: number;
      fps?: number;
      width?: number;
      height?: number;
    }) => {
      if (opts.ticks < 0 || opts.every < 1) {
        process.stderr.write('--ticks must be >= 0 and --every must be >= 1\n');
        process.exit(1);
      }

      try {
        const config = loadConfig({
          seed: opts.seed,
          entityCount: opts.count,
          fps: opts.fps,
          arenaWidth: opts.width,
          arenaHeight: opts.height,
        });
        runHeadless(config, { ticks: opts.ticks, every: opts.every });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        process.stderr.write(`[ARENA] ${msg}\n`);
        process.exit(1);
      }
    },
  );

program
  .command('watch')
  .description('Stream frames from a running arena server as JSON lines')
  .option('--server <url>', 'Frame server WebSocket URL', 'ws://localhost:8080/ws')
  .action(async (opts: { server: string }) => {
    const watcher = new FrameWatcher(opts.server, (msg) => {
      process.stdout.write(JSON.stringify(msg) + '\n');
    });

    const shutdown = (): void => {
      process.stderr.write('Shutting down...\n');
      watcher.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    try {
      await watcher.connect();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Failed to connect: ${msg}\n`);
      process.exit(1);
    }
  });

program.parse();
