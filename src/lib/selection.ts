import {
  LANDING_JITTER,
  MIN_SPIN_LOOPS,
  ROW_HEIGHT,
  SPIN_MAX_SECONDS,
  SPIN_MIN_SECONDS,
  TARGET_SCROLL_ROWS,
} from './constants';
import { randomInt, randomRange, type RandomSource } from './random';
import type { Listing, SpinPlan } from '../types';

/** Full passes through the listing before landing: at least 100 rows and at least 3 loops. */
export function spinLoops(length: number): number {
  return Math.max(MIN_SPIN_LOOPS, Math.ceil(TARGET_SCROLL_ROWS / length));
}

/**
 * Picks the winner uniformly and computes where the reel has to stop.
 * Draws winner index, then duration, then jitter. Returns null for an empty listing.
 */
export function planSpin(listing: Listing, random: RandomSource): SpinPlan | null {
  const length = listing.length;
  if (length === 0) return null;

  const winnerIndex = randomInt(random, length);
  const durationSeconds = randomRange(random, SPIN_MIN_SECONDS, SPIN_MAX_SECONDS);
  const jitter = randomRange(random, -LANDING_JITTER, LANDING_JITTER);

  const loops = spinLoops(length);
  const virtualTargetRow = loops * length + winnerIndex;

  return Object.freeze({
    winner: listing[winnerIndex],
    winnerIndex,
    loops,
    virtualTargetRow,
    durationSeconds,
    startOffset: 0,
    targetOffset: virtualTargetRow * ROW_HEIGHT + jitter,
  });
}
