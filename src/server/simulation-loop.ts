// server/simulation-loop.ts — The heartbeat: fixed-rate collide → advance → render

import type {
  LoopState,
  RenderSink,
  Scheduler,
  SimulationConfig,
  Tick,
  TickResult,
  TimerHandle,
} from '../types/index.js';
import type { Entity } from '../sim/entity.js';
import { CollisionResolver } from '../pipeline/collision-resolver.js';
import { renderFrame } from '../pipeline/renderer.js';
import { SimulationStateError } from '../shared/errors.js';
import { frameDurationMs, requirePositive } from '../shared/utils.js';

export type LoopTiming = Pick<SimulationConfig, 'fps' | 'arenaWidth' | 'arenaHeight'>;
export type TickListener = (result: TickResult) => void;
export type LoopErrorHandler = (err: unknown, tick: Tick) => void;

export class SimulationLoop {
  readonly entities: readonly Entity[];
  readonly fps: number;
  /** Scheduled interval. Rounded, so fps=60 ticks every 16 ms while dt stays 1/60 s. */
  readonly frameDurationMs: number;
  readonly dt: number;

  private sink: RenderSink;
  private scheduler: Scheduler;
  private collisions: CollisionResolver;
  private tickListener: TickListener | null = null;
  private errorHandler: LoopErrorHandler | null = null;

  private loopState: LoopState = 'idle';
  private pending: TimerHandle | null = null;
  private tickCount: Tick = 0;

  constructor(entities: readonly Entity[], sink: RenderSink, scheduler: Scheduler, timing: LoopTiming) {
    this.fps = requirePositive('fps', timing.fps);
    // Fixed population: later pushes to the caller's array never reach the loop
    this.entities = [...entities];
    this.sink = sink;
    this.scheduler = scheduler;
    this.frameDurationMs = frameDurationMs(this.fps);
    this.dt = 1 / this.fps;
    this.collisions = new CollisionResolver({ width: timing.arenaWidth, height: timing.arenaHeight });
  }

  get state(): LoopState {
    return this.loopState;
  }

  get tick(): Tick {
    return this.tickCount;
  }

  setCollisionResolver(resolver: CollisionResolver): void {
    this.collisions = resolver;
  }

  setTickListener(listener: TickListener): void {
    this.tickListener = listener;
  }

  /** Without a handler, a failed tick rethrows from the timer callback. */
  setErrorHandler(handler: LoopErrorHandler): void {
    this.errorHandler = handler;
  }

  start(): void {
    if (this.loopState !== 'idle') {
      throw new SimulationStateError(`Cannot start a loop that is ${this.loopState}`);
    }
    this.loopState = 'running';
    this.scheduleNext();
  }

  /** Terminal. A stopped loop never ticks again; build a new one instead. */
  stop(): void {
    if (this.pending !== null) {
      this.scheduler.cancel(this.pending);
      this.pending = null;
    }
    this.loopState = 'stopped';
  }

  processTick(): TickResult {
    if (this.loopState === 'stopped') {
      throw new SimulationStateError('Cannot tick a stopped loop');
    }

    const startTime = performance.now();
    const tick = ++this.tickCount;
    let bouncesX = 0;
    let bouncesY = 0;

    try {
      // 1. Collide, then advance, per entity in creation order
      for (const entity of this.entities) {
        const flips = this.collisions.resolveEdges(entity);
        if (flips.x) bouncesX++;
        if (flips.y) bouncesY++;
        this.collisions.entityPairwiseCheck(entity, this.entities);
        entity.advance(this.dt);
      }

      // 2. Paint
      renderFrame(this.entities, this.sink);

      const elapsedMs = performance.now() - startTime;
      if (elapsedMs > this.frameDurationMs) {
        console.warn(`[ARENA] Tick ${tick} took ${elapsedMs.toFixed(1)}ms, over the ${this.frameDurationMs}ms frame`);
      }

      const result: TickResult = { tick, bouncesX, bouncesY, elapsedMs };
      this.tickListener?.(result);
      return result;
    } catch (err) {
      this.stop();
      throw err;
    }
  }

  private scheduleNext(): void {
    this.pending = this.scheduler.scheduleOnce(this.frameDurationMs, () => this.onTimer());
  }

  private onTimer(): void {
    this.pending = null;
    if (this.loopState !== 'running') return;

    try {
      this.processTick();
    } catch (err) {
      this.stop();
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`[ARENA] Simulation stopped at tick ${this.tickCount}: ${msg}`);
      if (!this.errorHandler) throw err;
      this.errorHandler(err, this.tickCount);
      return;
    }

    // 3. Next frame, unless a listener stopped us
    if (this.loopState === 'running') {
      this.scheduleNext();
    }
  }
}
