// server/arena.ts — Wire: config → seeded population → collision resolver → loop

import type { RenderSink, Scheduler, SimulationConfig } from '../types/index.js';
import type { Entity } from '../sim/entity.js';
import { SeededRng } from '../sim/rng.js';
import { populateArena } from '../sim/factory.js';
import { CollisionResolver, noopPairwiseCheck, type PairwiseCheck } from '../pipeline/collision-resolver.js';
import { SimulationLoop } from './simulation-loop.js';

export interface Arena {
  config: SimulationConfig;
  entities: readonly Entity[];
  loop: SimulationLoop;
}

export function createArena(
  config: SimulationConfig,
  sink: RenderSink,
  scheduler: Scheduler,
  pairwise: PairwiseCheck = noopPairwiseCheck,
): Arena {
  const rng = new SeededRng(config.seed);
  const entities = populateArena(config, rng);

  const loop = new SimulationLoop(entities, sink, scheduler, config);
  loop.setCollisionResolver(
    new CollisionResolver({ width: config.arenaWidth, height: config.arenaHeight }, pairwise),
  );

  return { config, entities: loop.entities, loop };
}
