import type { GameConfig, SimulationState } from '@/types/game';
import { DEFAULT_CONFIG } from '@/types/game';
import { createBounds, getBoundsCenter, newSession } from './state';
import { tick } from './update';
import { FIXED_DT } from './timestep';

export interface AutopilotOptions {
  seconds?: number;
  frames?: number; // 0 = no frame limit
  width?: number;
  height?: number;
  dt?: number;
  config?: GameConfig;
}

export interface AutopilotReport {
  frames: number;
  elapsed: number;
  bombsDropped: number;
  targetsDestroyed: number;
  score: number;
  targetCount: number;
  state: SimulationState;
}

/**
 * Headless run: the drone flies an ellipse around the playfield center and
 * drops whenever the clock's tenths land on a multiple of 6. Used as a smoke
 * check that the loop keeps every invariant over many ticks.
 */
export function runAutopilot(options: AutopilotOptions = {}): AutopilotReport {
  const {
    seconds = 0.75,
    frames = 0,
    width = 420,
    height = 360,
    dt = FIXED_DT,
    config = { ...DEFAULT_CONFIG, targetPopulation: 5 },
  } = options;

  const state = newSession(createBounds(0, 0, width, height), config);
  const center = getBoundsCenter(state.bounds);
  const duration = Math.max(0.01, seconds);

  let t = 0;
  let frame = 0;
  while (t < duration && (frames <= 0 || frame < frames)) {
    t += dt;
    frame++;

    const angle = t * 1.2;
    state.drone.position.x = center.x + Math.cos(angle) * 120;
    state.drone.position.y = center.y + Math.sin(angle) * 80;
    state.drone.heading = angle;

    tick(state, dt, {
      move: { x: 0, y: 0 },
      dropRequested: Math.floor(t * 10) % 6 === 0,
    }, config);
  }

  return {
    frames: frame,
    elapsed: state.elapsed,
    bombsDropped: state.bombsDropped,
    targetsDestroyed: state.targetsDestroyed,
    score: state.score,
    targetCount: state.targets.length,
    state,
  };
}
