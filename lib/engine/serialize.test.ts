import { describe, expect, it } from 'vitest';
import { createBounds, newSession } from './state';
import { requestDrop } from './update';
import { serializeForRender } from './serialize';

describe('serializeForRender', () => {
  it('flattens drone stats and reload state', () => {
    const state = newSession(createBounds(0, 0, 400, 300));
    const view = serializeForRender(state);

    expect(view.drone).toEqual({
      position: { x: 200, y: 150 },
      heading: 0,
      reloadLeft: 0,
      canDrop: true,
      speed: 240,
      reloadTime: 1.2,
      bombRadius: 42,
      bombFallTime: 0.55,
    });
    expect(view.targets).toHaveLength(10);
  });

  it('reports bomb altitude', () => {
    const state = newSession(createBounds(0, 0, 400, 300));
    requestDrop(state);
    state.bombs[0].tLeft = 0.11;

    const view = serializeForRender(state);
    expect(view.bombs).toHaveLength(1);
    expect(view.bombs[0].altitude).toBeCloseTo(0.2);
    expect(view.drone.canDrop).toBe(false);
  });

  it('is detached from the live state', () => {
    const state = newSession(createBounds(0, 0, 400, 300));
    const view = serializeForRender(state);

    state.drone.position.x = 5;
    state.targets[0].position.y = -1;
    state.upgradeLevels.speed = 3;
    state.targets.pop();

    expect(view.drone.position.x).toBe(200);
    expect(view.targets[0].position.y).not.toBe(-1);
    expect(view.upgradeLevels.speed).toBe(0);
    expect(view.targets).toHaveLength(10);
  });
});
