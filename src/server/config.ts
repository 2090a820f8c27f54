// server/config.ts — SimulationConfig defaults + env var loading + validation

import type { Range, SimulationConfig } from '../types/index.js';
import {
  DEFAULT_ARENA_HEIGHT,
  DEFAULT_ARENA_WIDTH,
  DEFAULT_ENTITY_COUNT,
  DEFAULT_FPS,
  DEFAULT_PALETTE,
  DEFAULT_SEED,
  DEFAULT_SIZE_RANGE,
  DEFAULT_SPEED_RANGE,
} from '../shared/constants.js';
import { ValidationError } from '../shared/errors.js';
import { requireFinite, requirePositive } from '../shared/utils.js';

export const DEFAULTS: SimulationConfig = {
  fps: DEFAULT_FPS,
  arenaWidth: DEFAULT_ARENA_WIDTH,
  arenaHeight: DEFAULT_ARENA_HEIGHT,
  entityCount: DEFAULT_ENTITY_COUNT,
  sizeRange: DEFAULT_SIZE_RANGE,
  speedRange: DEFAULT_SPEED_RANGE,
  palette: DEFAULT_PALETTE,
  seed: DEFAULT_SEED,
};

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

const CONFIG_KEYS: readonly (keyof SimulationConfig)[] = [
  'fps',
  'arenaWidth',
  'arenaHeight',
  'entityCount',
  'sizeRange',
  'speedRange',
  'palette',
  'seed',
];

const ENV_VARS: ReadonlyArray<[string, 'fps' | 'arenaWidth' | 'arenaHeight' | 'entityCount' | 'seed']> = [
  ['ARENA_FPS', 'fps'],
  ['ARENA_WIDTH', 'arenaWidth'],
  ['ARENA_HEIGHT', 'arenaHeight'],
  ['ARENA_ENTITY_COUNT', 'entityCount'],
  ['ARENA_SEED', 'seed'],
];

function assignDefined<K extends keyof SimulationConfig>(
  target: Partial<SimulationConfig>,
  key: K,
  value: SimulationConfig[K] | undefined,
): void {
  if (value !== undefined) target[key] = value;
}

/**
 * Precedence: explicit overrides > ARENA_* env vars > DEFAULTS.
 */
export function loadConfig(
  overrides: Partial<SimulationConfig> = {},
  env: Env = process.env,
): SimulationConfig {
  const config: SimulationConfig = { ...DEFAULTS };

  for (const [name, key] of ENV_VARS) {
    const value = envNumber(env, name);
    if (value !== undefined) config[key] = value;
  }

  // Unset CLI flags arrive as undefined and must not clobber env or defaults
  const explicit: Partial<SimulationConfig> = {};
  for (const key of CONFIG_KEYS) {
    assignDefined(explicit, key, overrides[key]);
  }
  Object.assign(config, explicit);

  validateConfig(config);
  return config;
}

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(field, `expected an integer >= ${min}, got ${value}`);
  }
}

function requireRange(field: string, range: Range): void {
  requireFinite(`${field}[0]`, range[0]);
  requireFinite(`${field}[1]`, range[1]);
  if (range[0] > range[1]) {
    throw new ValidationError(field, `min ${range[0]} is greater than max ${range[1]}`);
  }
}

export function validateConfig(config: SimulationConfig): void {
  requireInteger('fps', config.fps, 1);
  requirePositive('arenaWidth', config.arenaWidth);
  requirePositive('arenaHeight', config.arenaHeight);
  requireInteger('entityCount', config.entityCount, 0);
  requireInteger('seed', config.seed, 0);

  requireRange('sizeRange', config.sizeRange);
  requirePositive('sizeRange[0]', config.sizeRange[0]);
  requireRange('speedRange', config.speedRange);

  if (config.palette.length === 0) {
    throw new ValidationError('palette', 'must contain at least one color');
  }
}
