// sim/entity.ts — Movable bodies and the circle variant

import type {
  BodyInit,
  Color,
  EntityId,
  EntityKind,
  EntitySnapshot,
  RenderSink,
  Vec2,
} from '../types/index.js';
import { isFiniteVec2 } from '../types/index.js';
import { InvalidBoundsError, ShapeConstraintError, ValidationError } from '../shared/errors.js';
import { requireFinite, requirePositive } from '../shared/utils.js';
import { mathRandom, uniform, type RandomSource } from './rng.js';

/**
 * Axis-aligned moving box. Position is the top-left corner of the bounding
 * box, velocity is in pixels per second.
 */
export class Body {
  readonly id: EntityId;
  readonly width: number;
  readonly height: number;
  readonly color: Color;

  private position: Vec2;
  private velocity: Vec2;

  constructor(init: BodyInit, rng: RandomSource = mathRandom) {
    this.width = requirePositive('width', init.width);
    this.height = requirePositive('height', init.height);
    requirePositive('arenaWidth', init.arenaWidth);
    requirePositive('arenaHeight', init.arenaHeight);

    if (!isFiniteVec2(init.velocity)) {
      throw new ValidationError('velocity', 'expected exactly two finite numbers');
    }

    this.id = init.id ?? 0;
    this.color = init.color;
    this.velocity = [init.velocity[0], init.velocity[1]];
    this.position = [
      placeAxis('x', init.x, this.width, init.arenaWidth, rng),
      placeAxis('y', init.y, this.height, init.arenaHeight, rng),
    ];
  }

  get x(): number {
    return this.position[0];
  }

  get y(): number {
    return this.position[1];
  }

  getPosition(): Vec2 {
    return [this.position[0], this.position[1]];
  }

  setPosition(x: number, y: number): void {
    requireFinite('x', x);
    requireFinite('y', y);
    this.position = [x, y];
  }

  getVelocity(): Vec2 {
    return [this.velocity[0], this.velocity[1]];
  }

  setVelocity(velocity: readonly number[]): void {
    if (!isFiniteVec2(velocity)) {
      throw new ValidationError('velocity', 'expected exactly two finite numbers');
    }
    this.velocity = [velocity[0], velocity[1]];
  }

  /** position += velocity * dt */
  advance(dt: number): void {
    requireFinite('dt', dt);
    if (dt < 0) {
      throw new ValidationError('dt', `expected a non-negative step, got ${dt}`);
    }
    this.position = [
      this.position[0] + this.velocity[0] * dt,
      this.position[1] + this.velocity[1] * dt,
    ];
  }
}

function placeAxis(
  axis: 'x' | 'y',
  given: number | undefined,
  size: number,
  arenaSize: number,
  rng: RandomSource,
): number {
  if (given !== undefined) return requireFinite(axis, given);
  if (size > arenaSize) {
    throw new InvalidBoundsError(axis, size, arenaSize);
  }
  return uniform(rng, 0, arenaSize - size);
}

function requireSquare(init: BodyInit): BodyInit {
  requirePositive('width', init.width);
  requirePositive('height', init.height);
  if (init.width !== init.height) {
    throw new ShapeConstraintError(init.width, init.height);
  }
  return init;
}

export class Circle extends Body {
  readonly kind = 'circle' satisfies EntityKind;

  constructor(init: BodyInit, rng?: RandomSource) {
    super(requireSquare(init), rng);
  }

  get radius(): number {
    return this.width / 2;
  }

  get center(): Vec2 {
    const r = this.radius;
    return [this.x + r, this.y + r];
  }

  draw(sink: RenderSink): void {
    sink.drawCircle(this.x, this.y, this.width, this.height, this.color);
  }

  snapshot(): EntitySnapshot {
    return {
      id: this.id,
      kind: this.kind,
      position: this.getPosition(),
      velocity: this.getVelocity(),
      width: this.width,
      height: this.height,
      color: this.color,
    };
  }
}

/** Every entity variant the simulation knows how to move and draw. */
export type Entity = Circle;
