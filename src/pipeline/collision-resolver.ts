// pipeline/collision-resolver.ts — Arena edge bounces + pairwise hook

import type { ArenaBounds } from '../types/index.js';
import type { Body, Entity } from '../sim/entity.js';

export interface EdgeFlips {
  x: boolean;
  y: boolean;
}

/**
 * Called once per entity per tick with the whole collection.
 * Must not mutate anything unless it is a real entity-entity resolver.
 */
export type PairwiseCheck = (entity: Entity, all: readonly Entity[]) => void;

export const noopPairwiseCheck: PairwiseCheck = () => {};

/**
 * Negates each velocity component whose axis touches or crosses an arena
 * edge. Axes are independent, so a corner flips both.
 *
 * Runs before advance() so the reversed velocity is applied in the same
 * frame. A body that has overshot an edge by more than one frame of motion
 * flips again on the next check and jitters there until it comes back.
 */
export function edgeCollisionCheck(entity: Body, arenaWidth: number, arenaHeight: number): EdgeFlips {
  const flips: EdgeFlips = {
    x: entity.x <= 0 || entity.x + entity.width >= arenaWidth,
    y: entity.y <= 0 || entity.y + entity.height >= arenaHeight,
  };

  if (flips.x || flips.y) {
    const [vx, vy] = entity.getVelocity();
    entity.setVelocity([flips.x ? -vx : vx, flips.y ? -vy : vy]);
  }

  return flips;
}

/**
 * CollisionResolver binds the arena bounds and the pairwise strategy used
 * by the simulation loop.
 */
export class CollisionResolver {
  private arena: ArenaBounds;
  private pairwise: PairwiseCheck;

  constructor(arena: ArenaBounds, pairwise: PairwiseCheck = noopPairwiseCheck) {
    this.arena = arena;
    this.pairwise = pairwise;
  }

  resolveEdges(entity: Entity): EdgeFlips {
    return edgeCollisionCheck(entity, this.arena.width, this.arena.height);
  }

  entityPairwiseCheck(entity: Entity, all: readonly Entity[]): void {
    this.pairwise(entity, all);
  }
}
