// Fixed timestep accumulator
// Wall-clock frame time is sanitized here, at the boundary, and split into
// FIXED_DT-second ticks. The simulation itself trusts the dt it receives.

export const FIXED_DT = 1 / 120; // seconds per tick (120Hz)
export const FIXED_MS = 1000 * FIXED_DT;
export const MAX_FRAME_MS = 100; // spiral-of-death cap

export interface AccumulatorState {
  accumulator: number;
  lastTimestamp: number;
}

export function createAccumulator(timestamp: number): AccumulatorState {
  return {
    accumulator: 0,
    lastTimestamp: timestamp,
  };
}

/** NaN, negative and oversized deltas (tab switches, clock skew) clamp into [0, MAX_FRAME_MS]. */
export function sanitizeFrameMs(elapsedMs: number): number {
  if (!Number.isFinite(elapsedMs) || elapsedMs < 0) return 0;
  return Math.min(elapsedMs, MAX_FRAME_MS);
}

/**
 * Advance the accumulator by real elapsed ms.
 * Returns how many fixed-rate ticks to run this frame.
 */
export function advanceAccumulator(
  acc: AccumulatorState,
  timestamp: number,
): { acc: AccumulatorState; tickCount: number } {
  const elapsed = sanitizeFrameMs(timestamp - acc.lastTimestamp);

  let accumulator = acc.accumulator + elapsed;
  let tickCount = 0;

  while (accumulator >= FIXED_MS) {
    accumulator -= FIXED_MS;
    tickCount++;
  }

  return {
    acc: { accumulator, lastTimestamp: timestamp },
    tickCount,
  };
}
