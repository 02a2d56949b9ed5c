import * as THREE from 'three';
import { describe, expect, it } from 'vitest';
import { TARGET_CONFIGS } from '@/types/game';
import { COLORS, getThreeColor } from './colors';

describe('colors', () => {
  it('reuses one instance per hex value', () => {
    expect(getThreeColor(COLORS.field)).toBe(getThreeColor(COLORS.field));
    expect(getThreeColor(COLORS.field)).not.toBe(getThreeColor(COLORS.grid));
  });

  it('converts target colors', () => {
    const hex = TARGET_CONFIGS.vehicle.color;
    expect(getThreeColor(hex).equals(new THREE.Color(hex))).toBe(true);
  });

  it('only carries the scene colors the renderer draws', () => {
    expect(Object.keys(COLORS)).toEqual(['field', 'grid', 'orange', 'white']);
  });
});
