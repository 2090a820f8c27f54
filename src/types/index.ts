// types/index.ts — Barrel export

export type { EntityId, Tick, Vec2, Range, ArenaBounds } from './core.js';
export { isFiniteVec2 } from './core.js';

export type {
  EntityKind,
  Color,
  BodyInit,
  EntitySnapshot,
} from './entity.js';

export type {
  RenderSink,
  TimerHandle,
  Scheduler,
} from './render.js';

export type {
  LoopState,
  TickResult,
} from './tick.js';

export type { SimulationConfig } from './config.js';

export type { FrameCircle, ViewerMessage } from './protocol.js';
