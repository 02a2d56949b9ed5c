import type {
  Bomb,
  GameConfig,
  GameEvent,
  SimulationState,
  TickInput,
} from '@/types/game';
import { DEFAULT_CONFIG } from '@/types/game';
import { canDrop, moveDrone, startReload, tickReload } from './drone';
import { createBomb, isBombImpacted, updateBomb } from './bombs';
import { maintainPopulation, updateTarget } from './targets';
import { resolveImpacts } from './collision';
import { serializeForRender, type RenderState } from './serialize';

export interface TickResult {
  view: RenderState;
  events: GameEvent[];
  scoreGained: number;
}

/**
 * Release a bomb if the drone is reloaded and the menu is closed.
 * Returns the emitted events; empty means the request was ignored.
 */
export function requestDrop(state: SimulationState): GameEvent[] {
  const { drone } = state;
  if (state.mode !== 'playing' || !canDrop(drone)) return [];

  const bomb = createBomb(drone);
  state.bombs.push(bomb);
  startReload(drone);
  state.bombsDropped++;

  return [{ type: 'drop', position: { x: bomb.position.x, y: bomb.position.y } }];
}

export function summarizeImpacts(impactCount: number, destroyedCount: number): GameEvent | null {
  if (destroyedCount > 1) return { type: 'combo', count: destroyedCount };
  if (destroyedCount === 1) return { type: 'hit' };
  if (impactCount > 0) return { type: 'miss' };
  return null;
}

export function tick(
  state: SimulationState,
  dt: number,
  input: TickInput,
  config: GameConfig = DEFAULT_CONFIG
): TickResult {
  const events: GameEvent[] = [];
  const playing = state.mode === 'playing';

  // Input is handled before the world advances, so a fresh bomb counts down this tick
  if (input.dropRequested && playing) {
    events.push(...requestDrop(state));
  }

  if (playing) {
    moveDrone(state.drone, input.move, state.bounds, dt, config);
  }

  // Reload keeps running while the upgrade menu is open
  tickReload(state.drone, dt);

  for (const target of state.targets) {
    updateTarget(target, dt, state.bounds);
  }

  for (const bomb of state.bombs) {
    updateBomb(bomb, dt);
  }

  const impacted: Bomb[] = [];
  const falling: Bomb[] = [];
  for (const bomb of state.bombs) {
    if (isBombImpacted(bomb)) impacted.push(bomb);
    else falling.push(bomb);
  }
  state.bombs = falling;

  let scoreGained = 0;
  if (impacted.length > 0) {
    const { survivors, destroyed, events: impactEvents, pointsEarned } =
      resolveImpacts(impacted, state.targets);
    state.targets = survivors;
    state.score += pointsEarned;
    state.targetsDestroyed += destroyed.length;
    state.totalPointsEarned += pointsEarned;
    scoreGained = pointsEarned;
    events.push(...impactEvents);

    const summary = summarizeImpacts(impacted.length, destroyed.length);
    if (summary) events.push(summary);
  }

  maintainPopulation(state.targets, state.bounds, config.targetPopulation, config);

  state.elapsed += dt;

  return {
    view: serializeForRender(state),
    events,
    scoreGained,
  };
}
