import type { Bounds, GameConfig, GameMode, SimulationState, Target, Vector2 } from '@/types/game';
import { DEFAULT_CONFIG } from '@/types/game';
import { createDrone } from './drone';
import { spawnTarget } from './targets';

export function createBounds(x: number, y: number, width: number, height: number): Bounds {
  return { left: x, top: y, right: x + width, bottom: y + height };
}

export function getBoundsCenter(bounds: Bounds): Vector2 {
  return {
    x: (bounds.left + bounds.right) / 2,
    y: (bounds.top + bounds.bottom) / 2,
  };
}

export function newSession(bounds: Bounds, config: GameConfig = DEFAULT_CONFIG): SimulationState {
  const targets: Target[] = [];
  for (let i = 0; i < config.targetPopulation; i++) {
    targets.push(spawnTarget(bounds, config));
  }

  return {
    bounds: { ...bounds },
    drone: createDrone(getBoundsCenter(bounds), config),
    bombs: [],
    targets,
    score: 0,
    upgradeLevels: { speed: 0, reload: 0, radius: 0 },
    mode: 'playing',
    elapsed: 0,
    bombsDropped: 0,
    targetsDestroyed: 0,
    totalPointsEarned: 0,
  };
}

export function toggleUpgradeMenu(state: SimulationState): GameMode {
  state.mode = state.mode === 'playing' ? 'upgrade_menu' : 'playing';
  return state.mode;
}

export function closeUpgradeMenu(state: SimulationState): void {
  state.mode = 'playing';
}

export function isMenuOpen(state: SimulationState): boolean {
  return state.mode === 'upgrade_menu';
}
