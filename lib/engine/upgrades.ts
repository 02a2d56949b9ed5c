import type { DroneStats, SimulationState, UpgradeKind, UpgradeLevels, UpgradeResult } from '@/types/game';
import { UPGRADE_CONFIGS, UPGRADE_KINDS } from '@/types/game';

export interface UpgradeOption {
  kind: UpgradeKind;
  hotkey: string;
  name: string;
  description: string;
  icon: string;
  color: string;
  level: number;
  cost: number;
  affordable: boolean;
  capped: boolean;
}

// Linear growth: base, 2x base, 3x base...
export function upgradeCost(levels: UpgradeLevels, kind: UpgradeKind): number {
  return UPGRADE_CONFIGS[kind].baseCost * (1 + levels[kind]);
}

export function isUpgradeCapped(stats: DroneStats, kind: UpgradeKind): boolean {
  const { limit } = UPGRADE_CONFIGS[kind];
  switch (kind) {
    case 'speed':
      return stats.speed >= limit;
    case 'reload':
      return stats.reloadTime <= limit;
    case 'radius':
      return stats.bombRadius >= limit;
    default: {
      const unknown: never = kind;
      return unknown;
    }
  }
}

export function applyUpgradeEffect(stats: DroneStats, kind: UpgradeKind): void {
  const { step, limit } = UPGRADE_CONFIGS[kind];
  switch (kind) {
    case 'speed':
      stats.speed = Math.min(limit, stats.speed + step);
      break;
    case 'reload':
      stats.reloadTime = Math.max(limit, stats.reloadTime - step);
      break;
    case 'radius':
      stats.bombRadius = Math.min(limit, stats.bombRadius + step);
      break;
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown upgrade: ${String(unknown)}`);
    }
  }
}

/**
 * Spend score on one level of `kind`. Past the stat cap the purchase still
 * goes through and only the level moves.
 */
export function requestUpgrade(state: SimulationState, kind: UpgradeKind): UpgradeResult {
  const cost = upgradeCost(state.upgradeLevels, kind);
  if (state.score < cost) {
    return { status: 'insufficient_funds', kind, cost, score: state.score };
  }

  state.score -= cost;
  state.upgradeLevels[kind] += 1;
  applyUpgradeEffect(state.drone.stats, kind);

  return {
    status: 'applied',
    kind,
    level: state.upgradeLevels[kind],
    cost,
    score: state.score,
  };
}

function getUpgradeDescription(kind: UpgradeKind, stats: DroneStats): string {
  const { step, limit } = UPGRADE_CONFIGS[kind];
  switch (kind) {
    case 'speed':
      return `${stats.speed.toFixed(0)} → ${Math.min(limit, stats.speed + step).toFixed(0)} px/s`;
    case 'reload':
      return `${stats.reloadTime.toFixed(2)}s → ${Math.max(limit, stats.reloadTime - step).toFixed(2)}s`;
    case 'radius':
      return `${stats.bombRadius.toFixed(0)} → ${Math.min(limit, stats.bombRadius + step).toFixed(0)} px`;
    default: {
      const unknown: never = kind;
      return unknown;
    }
  }
}

export function getUpgradeOptions(state: SimulationState): UpgradeOption[] {
  const { stats } = state.drone;
  return UPGRADE_KINDS.map(kind => {
    const config = UPGRADE_CONFIGS[kind];
    const cost = upgradeCost(state.upgradeLevels, kind);
    return {
      kind,
      hotkey: config.hotkey,
      name: config.name,
      description: getUpgradeDescription(kind, stats),
      icon: config.icon,
      color: config.color,
      level: state.upgradeLevels[kind],
      cost,
      affordable: state.score >= cost,
      capped: isUpgradeCapped(stats, kind),
    };
  });
}

export function getUpgradeKindForHotkey(key: string): UpgradeKind | null {
  return UPGRADE_KINDS.find(kind => UPGRADE_CONFIGS[kind].hotkey === key) ?? null;
}
