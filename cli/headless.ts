// cli/headless.ts — Deterministic run on a virtual clock
//
// stdout format: one JSON object per line
//   { "type": "tick", "tick": 60, "bouncesX": 1, "bouncesY": 0, "entities": [...] }
//   { "type": "done", "ticks": 600, "frames": 600, "simulatedMs": 9600 }

import type { EntitySnapshot, SimulationConfig, Tick } from '../src/types/index.js';
import { createArena } from '../src/server/arena.js';
import { ManualScheduler } from '../src/server/scheduler.js';
import { FrameRecorder } from '../src/pipeline/renderer.js';

export type HeadlessLine =
  | { type: 'tick'; tick: Tick; bouncesX: number; bouncesY: number; entities: EntitySnapshot[] }
  | { type: 'done'; ticks: number; frames: number; simulatedMs: number };

export interface HeadlessOptions {
  ticks: number;
  /** Report every N ticks. The last tick is always reported. */
  every: number;
}

export function writeLine(line: HeadlessLine): void {
  process.stdout.write(JSON.stringify(line) + '\n');
}

export function runHeadless(
  config: SimulationConfig,
  options: HeadlessOptions,
  write: (line: HeadlessLine) => void = writeLine,
): EntitySnapshot[] {
  const scheduler = new ManualScheduler();
  const recorder = new FrameRecorder();
  const { loop, entities } = createArena(config, recorder, scheduler);

  loop.setTickListener((result) => {
    if (result.tick % options.every === 0 || result.tick === options.ticks) {
      write({
        type: 'tick',
        tick: result.tick,
        bouncesX: result.bouncesX,
        bouncesY: result.bouncesY,
        entities: entities.map((e) => e.snapshot()),
      });
    }
  });

  loop.start();
  while (loop.tick < options.ticks && scheduler.runNext()) {
    // each runNext() fires exactly one scheduled tick
  }
  loop.stop();

  write({ type: 'done', ticks: loop.tick, frames: recorder.frames, simulatedMs: scheduler.now });
  return entities.map((e) => e.snapshot());
}
