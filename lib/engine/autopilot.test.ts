import { describe, expect, it } from 'vitest';
import { FIXED_DT } from './timestep';
import { runAutopilot } from './autopilot';

describe('runAutopilot', () => {
  it('flies a short headless session without breaking invariants', () => {
    const report = runAutopilot();
    const { state } = report;

    expect(report.frames).toBeGreaterThan(80);
    expect(report.elapsed).toBeCloseTo(report.frames * FIXED_DT);
    expect(report.targetCount).toBe(5);
    expect(report.bombsDropped).toBe(1);
    expect(state.bombs).toHaveLength(0);
    expect(report.score).toBe(state.totalPointsEarned);

    for (const t of state.targets) {
      expect(t.position.x).toBeGreaterThanOrEqual(t.radius);
      expect(t.position.x).toBeLessThanOrEqual(420 - t.radius);
      expect(t.position.y).toBeGreaterThanOrEqual(t.radius);
      expect(t.position.y).toBeLessThanOrEqual(360 - t.radius);
    }
  });

  it('stops at the frame limit', () => {
    const report = runAutopilot({ seconds: 5, frames: 10 });
    expect(report.frames).toBe(10);
    expect(report.bombsDropped).toBe(1);
    expect(report.state.bombs).toHaveLength(1);
  });
});
