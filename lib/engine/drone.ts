import type { Bounds, Drone, GameConfig, MovementIntent, Vector2 } from '@/types/game';
import { DEFAULT_CONFIG } from '@/types/game';
import { clamp } from './math';

export function createDrone(position: Vector2, config: GameConfig = DEFAULT_CONFIG): Drone {
  return {
    position: { x: position.x, y: position.y },
    heading: 0,
    stats: {
      speed: config.droneSpeed,
      reloadTime: config.droneReloadTime,
      bombRadius: config.bombRadius,
      bombFallTime: config.bombFallTime,
    },
    reloadLeft: 0,
  };
}

export function canDrop(drone: Drone): boolean {
  return drone.reloadLeft <= 0;
}

export function tickReload(drone: Drone, dt: number): void {
  drone.reloadLeft = Math.max(0, drone.reloadLeft - dt);
}

export function startReload(drone: Drone): void {
  drone.reloadLeft = drone.stats.reloadTime;
}

export function moveDrone(
  drone: Drone,
  intent: MovementIntent,
  bounds: Bounds,
  dt: number,
  config: GameConfig = DEFAULT_CONFIG
): void {
  const length = Math.hypot(intent.x, intent.y);
  if (length > 0) {
    const dx = intent.x / length;
    const dy = intent.y / length;
    drone.heading = Math.atan2(dy, dx);
    drone.position.x += dx * drone.stats.speed * dt;
    drone.position.y += dy * drone.stats.speed * dt;
  }

  const margin = config.droneMargin;
  drone.position.x = clamp(drone.position.x, bounds.left + margin, bounds.right - margin);
  drone.position.y = clamp(drone.position.y, bounds.top + margin, bounds.bottom - margin);
}

/**
 * Movement intent from held keys (WASD / arrows). An active touch stick
 * takes precedence over the keyboard.
 */
export function getMovementIntent(keys: Set<string>, stick?: MovementIntent | null): MovementIntent {
  if (stick) return { x: stick.x, y: stick.y };

  let x = 0;
  let y = 0;
  if (keys.has('d') || keys.has('arrowright')) x += 1;
  if (keys.has('a') || keys.has('arrowleft')) x -= 1;
  if (keys.has('s') || keys.has('arrowdown')) y += 1;
  if (keys.has('w') || keys.has('arrowup')) y -= 1;
  return { x, y };
}
