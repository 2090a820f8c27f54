// sim/factory.ts — Random circle factory + initial population

import type { ArenaBounds, Color, EntityId, Range, SimulationConfig } from '../types/index.js';
import { ValidationError } from '../shared/errors.js';
import { Circle } from './entity.js';
import { pick, uniform, type RandomSource } from './rng.js';

export interface RandomCircleOptions {
  arena: ArenaBounds;
  sizeRange: Range;
  speedRange: Range;
  palette: readonly Color[];
  id?: EntityId;
}

/**
 * Samples width, vx, vy, color, then lets the constructor place the circle.
 * The draw order is fixed so a seeded source always yields the same circle.
 */
export function createRandomCircle(options: RandomCircleOptions, rng: RandomSource): Circle {
  if (options.palette.length === 0) {
    throw new ValidationError('palette', 'must contain at least one color');
  }

  const [minSize, maxSize] = options.sizeRange;
  const [minSpeed, maxSpeed] = options.speedRange;

  const size = uniform(rng, minSize, maxSize);
  const vx = uniform(rng, minSpeed, maxSpeed);
  const vy = uniform(rng, minSpeed, maxSpeed);
  const color = pick(rng, options.palette);

  return new Circle(
    {
      id: options.id,
      velocity: [vx, vy],
      width: size,
      height: size,
      color,
      arenaWidth: options.arena.width,
      arenaHeight: options.arena.height,
    },
    rng,
  );
}

export function populateArena(config: SimulationConfig, rng: RandomSource): Circle[] {
  const arena: ArenaBounds = { width: config.arenaWidth, height: config.arenaHeight };
  const circles: Circle[] = [];

  for (let id = 0; id < config.entityCount; id++) {
    circles.push(
      createRandomCircle(
        {
          arena,
          sizeRange: config.sizeRange,
          speedRange: config.speedRange,
          palette: config.palette,
          id,
        },
        rng,
      ),
    );
  }

  return circles;
}
