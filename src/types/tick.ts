// types/tick.ts — Tick input/output types

import type { Tick } from './core.js';

export type LoopState = 'idle' | 'running' | 'stopped';

export interface TickResult {
  tick: Tick;
  /** Entities whose vx flipped this tick. */
  bouncesX: number;
  /** Entities whose vy flipped this tick. */
  bouncesY: number;
  elapsedMs: number;
}
