import type { Vector2 } from '@/types/game';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function distance(a: Vector2, b: Vector2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

// Uniform in [min, max)
export function randomRange(min: number, max: number): number {
  return min + Math.random() * (max - min);
}
