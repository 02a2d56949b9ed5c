import type {
  Bounds,
  GameMode,
  SimulationState,
  TargetKind,
  UpgradeLevels,
  Vector2,
} from '@/types/game';
import { canDrop } from './drone';
import { getBombAltitude } from './bombs';

export interface RenderState {
  readonly bounds: Readonly<Bounds>;
  readonly drone: {
    readonly position: Readonly<Vector2>;
    readonly heading: number;
    readonly reloadLeft: number;
    readonly canDrop: boolean;
    readonly speed: number;
    readonly reloadTime: number;
    readonly bombRadius: number;
    readonly bombFallTime: number;
  };
  readonly bombs: ReadonlyArray<{
    readonly id: string;
    readonly position: Readonly<Vector2>;
    readonly radius: number;
    readonly altitude: number;
  }>;
  readonly targets: ReadonlyArray<{
    readonly id: string;
    readonly kind: TargetKind;
    readonly position: Readonly<Vector2>;
    readonly radius: number;
    readonly color: string;
    readonly points: number;
  }>;
  readonly score: number;
  readonly mode: GameMode;
  readonly upgradeLevels: Readonly<UpgradeLevels>;
  readonly elapsed: number;
  readonly bombsDropped: number;
  readonly targetsDestroyed: number;
  readonly totalPointsEarned: number;
}

// Detached copy: renderers can hold it across ticks without seeing mutation
export function serializeForRender(state: SimulationState): RenderState {
  const { drone } = state;
  return {
    bounds: { ...state.bounds },
    drone: {
      position: { x: drone.position.x, y: drone.position.y },
      heading: drone.heading,
      reloadLeft: drone.reloadLeft,
      canDrop: canDrop(drone),
      speed: drone.stats.speed,
      reloadTime: drone.stats.reloadTime,
      bombRadius: drone.stats.bombRadius,
      bombFallTime: drone.stats.bombFallTime,
    },
    bombs: state.bombs.map(b => ({
      id: b.id,
      position: { x: b.position.x, y: b.position.y },
      radius: b.radius,
      altitude: getBombAltitude(b),
    })),
    targets: state.targets.map(t => ({
      id: t.id,
      kind: t.kind,
      position: { x: t.position.x, y: t.position.y },
      radius: t.radius,
      color: t.color,
      points: t.points,
    })),
    score: state.score,
    mode: state.mode,
    upgradeLevels: { ...state.upgradeLevels },
    elapsed: state.elapsed,
    bombsDropped: state.bombsDropped,
    targetsDestroyed: state.targetsDestroyed,
    totalPointsEarned: state.totalPointsEarned,
  };
}
