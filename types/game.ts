// Game Types for Drop Zone

export interface Vector2 {
  x: number;
  y: number;
}

export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface DroneStats {
  speed: number; // px/s
  reloadTime: number; // seconds
  bombRadius: number; // px
  bombFallTime: number; // seconds until impact
}

export interface Drone {
  position: Vector2;
  heading: number; // radians
  stats: DroneStats;
  reloadLeft: number;
}

export interface Bomb {
  id: string;
  position: Vector2;
  tLeft: number;
  fallTime: number;
  radius: number;
}

export type TargetKind = 'scout' | 'tent' | 'ammo' | 'vehicle';

export interface Target {
  id: string;
  kind: TargetKind;
  points: number;
  color: string;
  position: Vector2;
  velocity: Vector2;
  radius: number;
}

export type UpgradeKind = 'speed' | 'reload' | 'radius';

export type UpgradeLevels = Record<UpgradeKind, number>;

export type GameMode = 'playing' | 'upgrade_menu';

export interface SimulationState {
  bounds: Bounds;
  drone: Drone;
  bombs: Bomb[];
  targets: Target[];
  score: number;
  upgradeLevels: UpgradeLevels;
  mode: GameMode;
  elapsed: number;
  // Stats tracking
  bombsDropped: number;
  targetsDestroyed: number;
  totalPointsEarned: number;
}

// Raw movement direction; normalized by the engine
export interface MovementIntent {
  x: number;
  y: number;
}

export interface TickInput {
  move: MovementIntent;
  dropRequested: boolean;
}

export type GameEvent =
  | { type: 'drop'; position: Vector2 }
  | { type: 'impact'; position: Vector2; radius: number }
  | { type: 'target_destroyed'; kind: TargetKind; points: number; position: Vector2 }
  | { type: 'hit' }
  | { type: 'combo'; count: number }
  | { type: 'miss' };

export type UpgradeResult =
  | { status: 'applied'; kind: UpgradeKind; level: number; cost: number; score: number }
  | { status: 'insufficient_funds'; kind: UpgradeKind; cost: number; score: number };

export interface GameConfig {
  droneSpeed: number;
  droneReloadTime: number;
  bombRadius: number;
  bombFallTime: number;
  droneMargin: number;
  targetPopulation: number;
  targetMinSpeed: number;
  targetMaxSpeed: number;
}

export const DEFAULT_CONFIG: GameConfig = {
  droneSpeed: 240,
  droneReloadTime: 1.2,
  bombRadius: 42,
  bombFallTime: 0.55, // timing window: drop a little ahead of the target
  droneMargin: 10,
  targetPopulation: 10,
  targetMinSpeed: 25,
  targetMaxSpeed: 65,
};

export const TARGET_CONFIGS: Record<TargetKind, {
  name: string;
  points: number;
  radius: number;
  color: string;
}> = {
  scout: {
    name: 'Scout',
    points: 10,
    radius: 10,
    color: '#39ff14',
  },
  tent: {
    name: 'Tent',
    points: 20,
    radius: 14,
    color: '#e4ff1a',
  },
  ammo: {
    name: 'Ammo Dump',
    points: 50,
    radius: 12,
    color: '#00f0ff',
  },
  vehicle: {
    name: 'Vehicle',
    points: 100,
    radius: 18,
    color: '#ff2d6a',
  },
};

// Spawn picks uniformly from this list, not weighted by points
export const SCORE_TABLE: TargetKind[] = ['scout', 'tent', 'ammo', 'vehicle'];

export const UPGRADE_CONFIGS: Record<UpgradeKind, {
  name: string;
  hotkey: string;
  baseCost: number;
  step: number;
  limit: number;
  icon: string;
  color: string;
}> = {
  speed: {
    name: 'Speed +',
    hotkey: '1',
    baseCost: 120,
    step: 35,
    limit: 520, // max px/s
    icon: '⚡',
    color: '#e4ff1a',
  },
  reload: {
    name: 'Reload -',
    hotkey: '2',
    baseCost: 140,
    step: 0.12,
    limit: 0.25, // min seconds
    icon: '⏱️',
    color: '#00f0ff',
  },
  radius: {
    name: 'Radius +',
    hotkey: '3',
    baseCost: 160,
    step: 6,
    limit: 110, // max px
    icon: '💥',
    color: '#ff6b1a',
  },
};

export const UPGRADE_KINDS: UpgradeKind[] = ['speed', 'reload', 'radius'];
