// types/protocol.ts — Frame server → viewer messages

import type { Tick } from './core.js';
import type { Color } from './entity.js';

/** One drawCircle() call as sent over the wire. */
export interface FrameCircle {
  x: number;
  y: number;
  width: number;
  height: number;
  color: Color;
}

export type ViewerMessage =
  | { type: 'arena'; width: number; height: number; fps: number }
  | { type: 'frame'; tick: Tick; circles: FrameCircle[] };
