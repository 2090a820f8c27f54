// shared/errors.ts — Error taxonomy

export class ArenaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A circle was constructed with width !== height. */
export class ShapeConstraintError extends ArenaError {
  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    super(`Circle requires width === height (got ${width}x${height})`);
  }
}

/** An entity is larger than the arena along an axis it must be placed on. */
export class InvalidBoundsError extends ArenaError {
  constructor(
    readonly axis: 'x' | 'y',
    readonly size: number,
    readonly arenaSize: number,
  ) {
    super(`Size ${size} exceeds arena ${axis === 'x' ? 'width' : 'height'} ${arenaSize}`);
  }
}

export class ValidationError extends ArenaError {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

/** Illegal simulation loop transition. */
export class SimulationStateError extends ArenaError {}
