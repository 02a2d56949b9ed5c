import { describe, expect, it } from 'vitest';
import { createBounds, newSession } from './state';
import { serializeForRender } from './serialize';
import { formatReload, getKillsPerBomb, getScoreTableLines, getSessionLines, getStatLines } from './hud';

describe('hud', () => {
  it('formats reload as READY or remaining seconds', () => {
    expect(formatReload({ reloadLeft: 0 })).toBe('READY');
    expect(formatReload({ reloadLeft: 0.456 })).toBe('0.46s');
  });

  it('lists drone stats', () => {
    const view = serializeForRender(newSession(createBounds(0, 0, 400, 300)));

    expect(getStatLines(view)).toEqual([
      { label: 'Drop (Space)', value: 'READY' },
      { label: 'Speed', value: '240' },
      { label: 'Reload', value: '1.20s' },
      { label: 'Radius', value: '42' },
      { label: 'Fall time', value: '0.55s' },
    ]);
  });

  it('summarizes the session', () => {
    const state = newSession(createBounds(0, 0, 400, 300));
    expect(getKillsPerBomb(serializeForRender(state))).toBe(0);

    state.bombsDropped = 4;
    state.targetsDestroyed = 3;
    state.totalPointsEarned = 170;

    expect(getSessionLines(serializeForRender(state))).toEqual([
      { label: 'Bombs', value: '4' },
      { label: 'Destroyed', value: '3' },
      { label: 'Per bomb', value: '0.75' },
      { label: 'Earned', value: '170' },
    ]);
  });

  it('lists the score table in spawn order', () => {
    expect(getScoreTableLines()).toEqual([
      { label: 'Scout', value: '10', color: '#39ff14' },
      { label: 'Tent', value: '20', color: '#e4ff1a' },
      { label: 'Ammo Dump', value: '50', color: '#00f0ff' },
      { label: 'Vehicle', value: '100', color: '#ff2d6a' },
    ]);
  });
});
