// types/entity.ts — Entity construction records

import type { EntityId, Vec2 } from './core.js';

export type EntityKind = 'circle';

/** Any display value the render sink understands (a CSS color name, hex, ...). */
export type Color = string;

export interface BodyInit {
  velocity: readonly number[];
  width: number;
  height: number;
  color: Color;
  arenaWidth: number;
  arenaHeight: number;
  /** Left edge. `undefined` means "place randomly"; 0 is a real position. */
  x?: number;
  /** Top edge. `undefined` means "place randomly"; 0 is a real position. */
  y?: number;
  id?: EntityId;
}

export interface EntitySnapshot {
  id: EntityId;
  kind: EntityKind;
  position: Vec2;
  velocity: Vec2;
  width: number;
  height: number;
  color: Color;
}
