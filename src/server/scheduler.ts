// server/scheduler.ts — One-shot timer backends for the simulation loop

import type { Scheduler, TimerHandle } from '../types/index.js';

/** Wall-clock scheduler backed by setTimeout. */
export class TimerScheduler implements Scheduler {
  private timers: Map<TimerHandle, ReturnType<typeof setTimeout>> = new Map();
  private nextHandle: TimerHandle = 1;

  scheduleOnce(delayMs: number, callback: () => void): TimerHandle {
    const handle = this.nextHandle++;
    const timer = setTimeout(() => {
      this.timers.delete(handle);
      callback();
    }, delayMs);
    this.timers.set(handle, timer);
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timer = this.timers.get(handle);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(handle);
    }
  }

  get pending(): number {
    return this.timers.size;
  }
}

interface ManualTask {
  handle: TimerHandle;
  dueAt: number;
  callback: () => void;
}

/**
 * Virtual clock. Nothing fires until advance() or runNext() is called, so
 * tests and the headless CLI can step the loop without real delays.
 */
export class ManualScheduler implements Scheduler {
  private tasks: ManualTask[] = [];
  private nextHandle: TimerHandle = 1;
  now = 0;

  scheduleOnce(delayMs: number, callback: () => void): TimerHandle {
    const handle = this.nextHandle++;
    this.tasks.push({ handle, dueAt: this.now + delayMs, callback });
    return handle;
  }

  cancel(handle: TimerHandle): void {
    this.tasks = this.tasks.filter((task) => task.handle !== handle);
  }

  get pending(): number {
    return this.tasks.length;
  }

  /** Fires the earliest task, moving the clock to its due time. */
  runNext(): boolean {
    const task = this.takeEarliest();
    if (!task) return false;
    this.now = Math.max(this.now, task.dueAt);
    task.callback();
    return true;
  }

  /** Moves the clock forward, firing everything that comes due on the way. */
  advance(ms: number): number {
    const until = this.now + ms;
    let fired = 0;

    for (;;) {
      const next = this.peekEarliest();
      if (!next || next.dueAt > until) break;
      this.runNext();
      fired++;
    }

    this.now = until;
    return fired;
  }

  private peekEarliest(): ManualTask | undefined {
    let earliest: ManualTask | undefined;
    for (const task of this.tasks) {
      if (!earliest || task.dueAt < earliest.dueAt) earliest = task;
    }
    return earliest;
  }

  private takeEarliest(): ManualTask | undefined {
    const task = this.peekEarliest();
    if (task) this.tasks = this.tasks.filter((t) => t !== task);
    return task;
  }
}
