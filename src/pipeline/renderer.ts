// pipeline/renderer.ts — Frame painting: clear, draw each entity, present

import type { Color, FrameCircle, RenderSink } from '../types/index.js';
import type { Entity } from '../sim/entity.js';

export function drawEntity(entity: Entity, sink: RenderSink): void {
  switch (entity.kind) {
    case 'circle':
      entity.draw(sink);
      break;
  }
}

/** Later entities paint over earlier ones. */
export function renderFrame(entities: readonly Entity[], sink: RenderSink): void {
  sink.clear();
  for (const entity of entities) {
    drawEntity(entity, sink);
  }
  sink.present?.();
}

/** In-memory sink that keeps the most recently presented frame. */
export class FrameRecorder implements RenderSink {
  frames = 0;
  lastFrame: FrameCircle[] = [];
  private current: FrameCircle[] = [];

  clear(): void {
    this.current = [];
  }

  drawCircle(x: number, y: number, width: number, height: number, color: Color): void {
    this.current.push({ x, y, width, height, color });
  }

  present(): void {
    this.lastFrame = this.current;
    this.frames++;
  }
}
