// shared/utils.ts — Numeric helpers

import { ValidationError } from './errors.js';

export function frameDurationMs(fps: number): number {
  return Math.round(1000 / fps);
}

export function requireFinite(field: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(field, `expected a finite number, got ${String(value)}`);
  }
  return value;
}

export function requirePositive(field: string, value: number): number {
  requireFinite(field, value);
  if (value <= 0) {
    throw new ValidationError(field, `expected a positive number, got ${value}`);
  }
  return value;
}
