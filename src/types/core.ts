// types/core.ts — Fundamental types

export type EntityId = number;
export type Tick = number;

/** (x, y) or (vx, vy). Always handed out as a fresh array. */
export type Vec2 = [number, number];

/** Inclusive [min, max] sampling range. */
export type Range = readonly [number, number];

export interface ArenaBounds {
  width: number;
  height: number;
}

export function isFiniteVec2(value: unknown): value is Vec2 {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}
