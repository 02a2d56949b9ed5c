import { describe, expect, it } from 'vitest';
import { createBounds } from './state';
import {
  canDrop,
  createDrone,
  getMovementIntent,
  moveDrone,
  startReload,
  tickReload,
} from './drone';

describe('drone', () => {
  describe('createDrone', () => {
    it('starts with default stats and a loaded bomb bay', () => {
      const drone = createDrone({ x: 100, y: 50 });

      expect(drone.position).toEqual({ x: 100, y: 50 });
      expect(drone.heading).toBe(0);
      expect(drone.stats).toEqual({ speed: 240, reloadTime: 1.2, bombRadius: 42, bombFallTime: 0.55 });
      expect(drone.reloadLeft).toBe(0);
      expect(canDrop(drone)).toBe(true);
    });
  });

  describe('reload', () => {
    it('becomes ready once the full reload time has elapsed', () => {
      const drone = createDrone({ x: 0, y: 0 });
      startReload(drone);
      expect(drone.reloadLeft).toBe(1.2);
      expect(canDrop(drone)).toBe(false);

      tickReload(drone, 0.6);
      expect(canDrop(drone)).toBe(false);
      tickReload(drone, 0.6);
      expect(canDrop(drone)).toBe(true);
    });

    it('stays blocked when less than the reload time has elapsed', () => {
      const drone = createDrone({ x: 0, y: 0 });
      startReload(drone);

      tickReload(drone, 0.6);
      tickReload(drone, 0.5);

      expect(drone.reloadLeft).toBeCloseTo(0.1);
      expect(canDrop(drone)).toBe(false);
    });

    it('never counts below zero', () => {
      const drone = createDrone({ x: 0, y: 0 });
      startReload(drone);
      tickReload(drone, 5);
      expect(drone.reloadLeft).toBe(0);
    });
  });

  describe('moveDrone', () => {
    const bounds = createBounds(0, 0, 1000, 1000);

    it('moves along the intent at full speed', () => {
      const drone = createDrone({ x: 500, y: 500 });
      moveDrone(drone, { x: 1, y: 0 }, bounds, 0.5);

      expect(drone.position).toEqual({ x: 620, y: 500 });
      expect(drone.heading).toBe(0);
    });

    it('normalizes diagonal intent', () => {
      const drone = createDrone({ x: 500, y: 500 });
      moveDrone(drone, { x: 1, y: 1 }, bounds, 1);

      expect(drone.position.x).toBeCloseTo(500 + 240 / Math.SQRT2);
      expect(drone.position.y).toBeCloseTo(500 + 240 / Math.SQRT2);
      expect(drone.heading).toBeCloseTo(Math.PI / 4);
    });

    it('keeps heading and position on zero intent', () => {
      const drone = createDrone({ x: 500, y: 500 });
      drone.heading = 1;
      moveDrone(drone, { x: 0, y: 0 }, bounds, 1);

      expect(drone.heading).toBe(1);
      expect(drone.position).toEqual({ x: 500, y: 500 });
    });

    it('clamps to the playfield inset by the margin', () => {
      const drone = createDrone({ x: 500, y: 500 });
      moveDrone(drone, { x: -1, y: 0 }, bounds, 10);
      expect(drone.position.x).toBe(10);

      moveDrone(drone, { x: 0, y: 1 }, bounds, 10);
      expect(drone.position.y).toBe(990);
    });
  });

  describe('getMovementIntent', () => {
    it('combines held keys', () => {
      expect(getMovementIntent(new Set(['d', 'w']))).toEqual({ x: 1, y: -1 });
      expect(getMovementIntent(new Set(['arrowleft', 'arrowdown']))).toEqual({ x: -1, y: 1 });
    });

    it('cancels opposing keys', () => {
      expect(getMovementIntent(new Set(['a', 'd']))).toEqual({ x: 0, y: 0 });
    });

    it('prefers the touch stick over keys', () => {
      expect(getMovementIntent(new Set(['d']), { x: 0, y: 0.5 })).toEqual({ x: 0, y: 0.5 });
    });
  });
});
