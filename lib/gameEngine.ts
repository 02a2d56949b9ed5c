export { clamp, distance } from './engine/math';
export { createDrone, canDrop, tickReload, startReload, moveDrone, getMovementIntent } from './engine/drone';
export { createBomb, updateBomb, isBombImpacted, getBombAltitude } from './engine/bombs';
export { spawnTarget, updateTarget, getTargetRadius, maintainPopulation } from './engine/targets';
export { resolveImpacts, isTargetInBlast } from './engine/collision';
export {
  newSession,
  createBounds,
  getBoundsCenter,
  toggleUpgradeMenu,
  closeUpgradeMenu,
  isMenuOpen,
} from './engine/state';
export { tick, requestDrop, summarizeImpacts } from './engine/update';
export type { TickResult } from './engine/update';
export {
  requestUpgrade,
  upgradeCost,
  getUpgradeOptions,
  getUpgradeKindForHotkey,
  isUpgradeCapped,
} from './engine/upgrades';
export type { UpgradeOption } from './engine/upgrades';
export { serializeForRender } from './engine/serialize';
export type { RenderState } from './engine/serialize';
export {
  FIXED_DT,
  createAccumulator,
  advanceAccumulator,
  sanitizeFrameMs,
} from './engine/timestep';
export type { AccumulatorState } from './engine/timestep';
export { createBanner, bannerForEvents, updateBanner } from './engine/messages';
export type { MessageBanner, MessageCategory } from './engine/messages';
export { formatReload, getStatLines, getSessionLines, getScoreTableLines } from './engine/hud';
export type { HudLine } from './engine/hud';
export { runAutopilot } from './engine/autopilot';
