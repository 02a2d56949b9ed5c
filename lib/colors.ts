import * as THREE from 'three';
import { SCORE_TABLE, TARGET_CONFIGS } from '@/types/game';

// Scene colors not tied to a target kind
export const COLORS = {
  field: '#1e1e1e',
  grid: '#2a2a2a',
  orange: '#ff6b1a',
  white: '#fafafa',
};

const colorCache = new Map<string, THREE.Color>();

// Shared instances; callers must not mutate them
export function getThreeColor(hex: string): THREE.Color {
  let cached = colorCache.get(hex);
  if (!cached) {
    cached = new THREE.Color(hex);
    colorCache.set(hex, cached);
  }
  return cached;
}

SCORE_TABLE.forEach(kind => getThreeColor(TARGET_CONFIGS[kind].color));
