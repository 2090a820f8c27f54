// shared/constants.ts — Simulation defaults

import type { Range } from '../types/core.js';
import type { Color } from '../types/entity.js';

export const DEFAULT_FPS = 60;
export const DEFAULT_ARENA_WIDTH = 800;
export const DEFAULT_ARENA_HEIGHT = 800;
export const DEFAULT_ENTITY_COUNT = 10;
export const DEFAULT_SEED = 42;

export const DEFAULT_SIZE_RANGE: Range = [20, 80];
export const DEFAULT_SPEED_RANGE: Range = [-400, 400];

export const DEFAULT_PALETTE: readonly Color[] = [
  'red',
  'orange',
  'yellow',
  'green',
  'blue',
  'purple',
  'pink',
];

export const DEFAULT_PORT = 8080;
