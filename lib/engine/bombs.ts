import type { Bomb, Drone } from '@/types/game';
import { generateId } from './context';
import { clamp } from './math';

/**
 * Bomb released at the drone's current position. Radius and fall time are
 * copied, so upgrades bought while it falls do not change it.
 */
export function createBomb(drone: Drone): Bomb {
  return {
    id: generateId('bomb'),
    position: { x: drone.position.x, y: drone.position.y },
    tLeft: drone.stats.bombFallTime,
    fallTime: drone.stats.bombFallTime,
    radius: drone.stats.bombRadius,
  };
}

export function updateBomb(bomb: Bomb, dt: number): void {
  bomb.tLeft -= dt;
}

export function isBombImpacted(bomb: Bomb): boolean {
  return bomb.tLeft <= 0;
}

// 1 at release, 0 at impact
export function getBombAltitude(bomb: Bomb): number {
  if (bomb.fallTime <= 0) return 0;
  return clamp(bomb.tLeft / bomb.fallTime, 0, 1);
}
