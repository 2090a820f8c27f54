// types/render.ts — Host collaborators: render sink + one-shot scheduler

import type { Color } from './entity.js';

/**
 * Paints one frame. Called once with clear(), then once per entity in
 * collection order, then present() if the sink implements it.
 * The sink must not keep references to anything it is handed.
 */
export interface RenderSink {
  clear(): void;
  drawCircle(x: number, y: number, width: number, height: number, color: Color): void;
  present?(): void;
}

export type TimerHandle = number;

export interface Scheduler {
  scheduleOnce(delayMs: number, callback: () => void): TimerHandle;
  cancel(handle: TimerHandle): void;
}
