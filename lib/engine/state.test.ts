import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '@/types/game';
import {
  closeUpgradeMenu,
  createBounds,
  getBoundsCenter,
  isMenuOpen,
  newSession,
  toggleUpgradeMenu,
} from './state';

describe('state', () => {
  it('builds bounds from origin and size', () => {
    expect(createBounds(10, 20, 100, 50)).toEqual({ left: 10, top: 20, right: 110, bottom: 70 });
    expect(getBoundsCenter(createBounds(10, 20, 100, 50))).toEqual({ x: 60, y: 45 });
  });

  it('starts a session with a centered drone and a full population', () => {
    const state = newSession(createBounds(0, 0, 400, 300));

    expect(state.drone.position).toEqual({ x: 200, y: 150 });
    expect(state.targets).toHaveLength(10);
    expect(state.bombs).toEqual([]);
    expect(state.score).toBe(0);
    expect(state.upgradeLevels).toEqual({ speed: 0, reload: 0, radius: 0 });
    expect(state.mode).toBe('playing');
    expect(state.elapsed).toBe(0);
    expect(state.bombsDropped).toBe(0);
  });

  it('honours a custom population', () => {
    const state = newSession(createBounds(0, 0, 400, 300), { ...DEFAULT_CONFIG, targetPopulation: 3 });
    expect(state.targets).toHaveLength(3);
  });

  it('toggles between playing and the upgrade menu', () => {
    const state = newSession(createBounds(0, 0, 400, 300));

    expect(toggleUpgradeMenu(state)).toBe('upgrade_menu');
    expect(isMenuOpen(state)).toBe(true);
    expect(toggleUpgradeMenu(state)).toBe('playing');

    toggleUpgradeMenu(state);
    closeUpgradeMenu(state);
    expect(isMenuOpen(state)).toBe(false);
  });
});
