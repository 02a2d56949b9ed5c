import type { Bounds, GameConfig, Target, TargetKind } from '@/types/game';
import { DEFAULT_CONFIG, SCORE_TABLE, TARGET_CONFIGS } from '@/types/game';
import { generateId } from './context';
import { randomRange } from './math';

const DEFAULT_TARGET_RADIUS = 12;

const TARGET_RADII: Partial<Record<string, number>> = Object.fromEntries(
  SCORE_TABLE.map(kind => [kind, TARGET_CONFIGS[kind].radius])
);

export function getTargetRadius(kind: string): number {
  return TARGET_RADII[kind] ?? DEFAULT_TARGET_RADIUS;
}

function pickTargetKind(): TargetKind {
  const index = Math.min(SCORE_TABLE.length - 1, Math.floor(Math.random() * SCORE_TABLE.length));
  return SCORE_TABLE[index];
}

export function spawnTarget(area: Bounds, config: GameConfig = DEFAULT_CONFIG): Target {
  const kind = pickTargetKind();
  const { points, color } = TARGET_CONFIGS[kind];
  const radius = getTargetRadius(kind);

  const x = randomRange(area.left + radius, area.right - radius);
  const y = randomRange(area.top + radius, area.bottom - radius);
  const speed = randomRange(config.targetMinSpeed, config.targetMaxSpeed);
  const angle = randomRange(0, Math.PI * 2);

  return {
    id: generateId('target'),
    kind,
    points,
    color,
    position: { x, y },
    velocity: {
      x: Math.cos(angle) * speed,
      y: Math.sin(angle) * speed,
    },
    radius,
  };
}

export function updateTarget(target: Target, dt: number, bounds: Bounds): void {
  target.position.x += target.velocity.x * dt;
  target.position.y += target.velocity.y * dt;

  // Bounce off each edge independently; a corner can flip both axes
  if (target.position.x - target.radius < bounds.left) {
    target.position.x = bounds.left + target.radius;
    target.velocity.x *= -1;
  }
  if (target.position.x + target.radius > bounds.right) {
    target.position.x = bounds.right - target.radius;
    target.velocity.x *= -1;
  }
  if (target.position.y - target.radius < bounds.top) {
    target.position.y = bounds.top + target.radius;
    target.velocity.y *= -1;
  }
  if (target.position.y + target.radius > bounds.bottom) {
    target.position.y = bounds.bottom - target.radius;
    target.velocity.y *= -1;
  }
}

/**
 * Tops the list up to `count` in place. Returns only the newly spawned targets.
 */
export function maintainPopulation(
  targets: Target[],
  area: Bounds,
  count: number,
  config: GameConfig = DEFAULT_CONFIG
): Target[] {
  const spawned: Target[] = [];
  while (targets.length < count) {
    const target = spawnTarget(area, config);
    targets.push(target);
    spawned.push(target);
  }
  return spawned;
}
