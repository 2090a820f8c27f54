// tests/config.test.ts — Tests for loadConfig / validateConfig

import { describe, it, expect } from 'vitest';
import { DEFAULTS, loadConfig, validateConfig } from '../src/server/config.js';
import { ValidationError } from '../src/shared/errors.js';
import type { SimulationConfig } from '../src/types/index.js';

describe('loadConfig', () => {
  it('returns the defaults with no env and no overrides', () => {
    const config = loadConfig({}, {});

    expect(config.fps).toBe(60);
    expect(config.arenaWidth).toBe(800);
    expect(config.arenaHeight).toBe(800);
    expect(config.entityCount).toBe(10);
    expect(config.sizeRange).toEqual([20, 80]);
    expect(config.speedRange).toEqual([-400, 400]);
    expect(config.palette).toHaveLength(7);
    expect(config.seed).toBe(42);
  });

  it('reads ARENA_* environment variables', () => {
    const config = loadConfig({}, {
      ARENA_FPS: '30',
      ARENA_WIDTH: '640',
      ARENA_HEIGHT: '480',
      ARENA_ENTITY_COUNT: '25',
      ARENA_SEED: '7',
    });

    expect(config).toMatchObject({
      fps: 30,
      arenaWidth: 640,
      arenaHeight: 480,
      entityCount: 25,
      seed: 7,
    });
  });

  it('ignores blank environment variables', () => {
    expect(loadConfig({}, { ARENA_FPS: '  ' }).fps).toBe(60);
  });

  it('lets explicit overrides win over the environment', () => {
    expect(loadConfig({ fps: 120 }, { ARENA_FPS: '30' }).fps).toBe(120);
  });

  it('does not let undefined overrides clobber the environment', () => {
    expect(loadConfig({ fps: undefined }, { ARENA_FPS: '30' }).fps).toBe(30);
  });

  it('accepts range and palette overrides', () => {
    const config = loadConfig({ sizeRange: [10, 10], speedRange: [0, 5], palette: ['#fff'] }, {});
    expect(config.sizeRange).toEqual([10, 10]);
    expect(config.speedRange).toEqual([0, 5]);
    expect(config.palette).toEqual(['#fff']);
  });

  it('rejects a non-numeric environment value', () => {
    expect(() => loadConfig({}, { ARENA_WIDTH: 'wide' })).toThrow(ValidationError);
  });

  it('does not mutate DEFAULTS', () => {
    loadConfig({ fps: 10 }, { ARENA_SEED: '3' });
    expect(DEFAULTS.fps).toBe(60);
    expect(DEFAULTS.seed).toBe(42);
  });
});

const BAD_VALUES: Array<[string, Partial<SimulationConfig>]> = [
  ['fps', { fps: 0 }],
  ['fps', { fps: 59.5 }],
  ['arenaWidth', { arenaWidth: -1 }],
  ['arenaHeight', { arenaHeight: Infinity }],
  ['entityCount', { entityCount: 2.5 }],
  ['entityCount', { entityCount: -1 }],
  ['sizeRange', { sizeRange: [80, 20] }],
  ['sizeRange[0]', { sizeRange: [0, 20] }],
  ['speedRange[1]', { speedRange: [0, NaN] }],
  ['palette', { palette: [] }],
];

describe('validateConfig', () => {
  for (const [field, patch] of BAD_VALUES) {
    it(`rejects a bad ${field} (${JSON.stringify(patch)})`, () => {
      let caught: unknown;
      try {
        validateConfig({ ...DEFAULTS, ...patch });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ field });
    });
  }

  it('accepts the defaults', () => {
    expect(() => validateConfig(DEFAULTS)).not.toThrow();
  });
});
