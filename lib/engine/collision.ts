import type { Bomb, GameEvent, Target } from '@/types/game';
import { distance } from './math';

export function isTargetInBlast(bomb: Bomb, target: Target): boolean {
  // Touching counts as a hit
  return distance(bomb.position, target.position) <= bomb.radius + target.radius;
}

export function resolveImpacts(
  impacted: Bomb[],
  targets: Target[]
): {
  survivors: Target[];
  destroyed: Target[];
  events: GameEvent[];
  pointsEarned: number;
} {
  const destroyed: Target[] = [];
  const destroyedIds = new Set<string>();
  const events: GameEvent[] = [];
  let pointsEarned = 0;

  // Bombs resolve in drop order, so an earlier bomb claims a shared target
  for (const bomb of impacted) {
    events.push({
      type: 'impact',
      position: { x: bomb.position.x, y: bomb.position.y },
      radius: bomb.radius,
    });

    for (const target of targets) {
      if (destroyedIds.has(target.id)) continue;
      if (!isTargetInBlast(bomb, target)) continue;

      destroyedIds.add(target.id);
      destroyed.push(target);
      pointsEarned += target.points;
      events.push({
        type: 'target_destroyed',
        kind: target.kind,
        points: target.points,
        position: { x: target.position.x, y: target.position.y },
      });
    }
  }

  const survivors = destroyed.length > 0
    ? targets.filter(t => !destroyedIds.has(t.id))
    : targets;

  return { survivors, destroyed, events, pointsEarned };
}
