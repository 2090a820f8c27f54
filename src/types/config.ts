// types/config.ts — Simulation configuration

import type { Range } from './core.js';
import type { Color } from './entity.js';

export interface SimulationConfig {
  fps: number;
  arenaWidth: number;
  arenaHeight: number;
  entityCount: number;
  sizeRange: Range;
  speedRange: Range;
  palette: readonly Color[];
  seed: number;
}
