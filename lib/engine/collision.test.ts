import { describe, expect, it } from 'vitest';
import type { Bomb, Target, TargetKind } from '@/types/game';
import { TARGET_CONFIGS } from '@/types/game';
import { isTargetInBlast, resolveImpacts } from './collision';

function makeTarget(id: string, kind: TargetKind, x: number, y: number): Target {
  const { points, color, radius } = TARGET_CONFIGS[kind];
  return { id, kind, points, color, position: { x, y }, velocity: { x: 0, y: 0 }, radius };
}

function makeBomb(id: string, x: number, y: number, radius = 42): Bomb {
  return { id, position: { x, y }, tLeft: 0, fallTime: 0.55, radius };
}

describe('collision', () => {
  describe('isTargetInBlast', () => {
    it('counts exact contact as a hit', () => {
      const bomb = makeBomb('b1', 0, 0, 5);
      const target = makeTarget('t1', 'scout', 15, 0);
      expect(isTargetInBlast(bomb, target)).toBe(true);
    });

    it('misses just past contact', () => {
      const bomb = makeBomb('b1', 0, 0, 5);
      const target = makeTarget('t1', 'scout', 15.01, 0);
      expect(isTargetInBlast(bomb, target)).toBe(false);
    });

    it('uses straight-line distance', () => {
      const bomb = makeBomb('b1', 0, 0, 40);
      expect(isTargetInBlast(bomb, makeTarget('t1', 'scout', 30, 40))).toBe(true);
      expect(isTargetInBlast(bomb, makeTarget('t2', 'scout', 31, 40))).toBe(false);
    });
  });

  describe('resolveImpacts', () => {
    it('lets one bomb destroy every target in range', () => {
      const scout = makeTarget('t1', 'scout', 100, 100);
      const tent = makeTarget('t2', 'tent', 120, 100);
      const vehicle = makeTarget('t3', 'vehicle', 300, 300);

      const result = resolveImpacts([makeBomb('b1', 100, 100)], [scout, tent, vehicle]);

      expect(result.destroyed).toEqual([scout, tent]);
      expect(result.survivors).toEqual([vehicle]);
      expect(result.pointsEarned).toBe(30);
      expect(result.events).toEqual([
        { type: 'impact', position: { x: 100, y: 100 }, radius: 42 },
        { type: 'target_destroyed', kind: 'scout', points: 10, position: { x: 100, y: 100 } },
        { type: 'target_destroyed', kind: 'tent', points: 20, position: { x: 120, y: 100 } },
      ]);
    });

    it('awards a shared target to the first bomb only', () => {
      const ammo = makeTarget('t1', 'ammo', 100, 100);

      const result = resolveImpacts(
        [makeBomb('b1', 90, 100), makeBomb('b2', 110, 100)],
        [ammo]
      );

      expect(result.destroyed).toEqual([ammo]);
      expect(result.pointsEarned).toBe(50);
      expect(result.events.map(e => e.type)).toEqual(['impact', 'target_destroyed', 'impact']);
      expect(result.events[0]).toEqual({ type: 'impact', position: { x: 90, y: 100 }, radius: 42 });
    });

    it('returns the original list when nothing is hit', () => {
      const targets = [makeTarget('t1', 'scout', 300, 300)];
      const result = resolveImpacts([makeBomb('b1', 0, 0)], targets);

      expect(result.survivors).toBe(targets);
      expect(result.destroyed).toEqual([]);
      expect(result.pointsEarned).toBe(0);
      expect(result.events).toEqual([{ type: 'impact', position: { x: 0, y: 0 }, radius: 42 }]);
    });
  });
});
