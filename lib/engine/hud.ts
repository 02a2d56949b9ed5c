import type { Drone } from '@/types/game';
import { SCORE_TABLE, TARGET_CONFIGS } from '@/types/game';
import type { RenderState } from './serialize';

export interface HudLine {
  label: string;
  value: string;
}

export function formatReload(drone: Pick<Drone, 'reloadLeft'>): string {
  if (drone.reloadLeft <= 0) return 'READY';
  return `${drone.reloadLeft.toFixed(2)}s`;
}

export function getStatLines(view: RenderState): HudLine[] {
  const { drone } = view;
  return [
    { label: 'Drop (Space)', value: formatReload(drone) },
    { label: 'Speed', value: drone.speed.toFixed(0) },
    { label: 'Reload', value: `${drone.reloadTime.toFixed(2)}s` },
    { label: 'Radius', value: drone.bombRadius.toFixed(0) },
    { label: 'Fall time', value: `${drone.bombFallTime.toFixed(2)}s` },
  ];
}

// Targets destroyed per bomb dropped
export function getKillsPerBomb(view: RenderState): number {
  if (view.bombsDropped === 0) return 0;
  return view.targetsDestroyed / view.bombsDropped;
}

export function getSessionLines(view: RenderState): HudLine[] {
  return [
    { label: 'Bombs', value: String(view.bombsDropped) },
    { label: 'Destroyed', value: String(view.targetsDestroyed) },
    { label: 'Per bomb', value: getKillsPerBomb(view).toFixed(2) },
    { label: 'Earned', value: String(view.totalPointsEarned) },
  ];
}

export function getScoreTableLines(): Array<HudLine & { color: string }> {
  return SCORE_TABLE.map(kind => ({
    label: TARGET_CONFIGS[kind].name,
    value: String(TARGET_CONFIGS[kind].points),
    color: TARGET_CONFIGS[kind].color,
  }));
}
