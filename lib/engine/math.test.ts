import { afterEach, describe, expect, it, vi } from 'vitest';
import { clamp, distance, randomRange } from './math';

describe('math', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('clamps into the closed range', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-1, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });

  it('measures euclidean distance', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    expect(distance({ x: 1, y: 1 }, { x: 1, y: 1 })).toBe(0);
  });

  it('scales Math.random into the requested range', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(randomRange(10, 20)).toBe(15);
  });

  it('includes the lower end', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(randomRange(25, 65)).toBe(25);
  });
});
