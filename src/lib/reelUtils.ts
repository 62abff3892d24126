// ─── Reel geometry & easing ──────────────────────────────
// Pure helpers shared by the spin scheduler and the reel component.

import {
  BRAKING_POWER,
  REEL_TAIL_ROWS,
  REEL_VIEWPORT_HEIGHT,
  ROW_HEIGHT,
  TARGET_SCROLL_ROWS,
} from './constants';
import { spinLoops } from './selection';
import type { Listing, ServerRecord } from '../types';

// ─── Easing ──────────────────────────────────────────────

/**
 * Slot-machine braking: very fast start, long decelerating tail.
 * Derivative at t=0 equals BRAKING_POWER.
 */
export function brakingEase(t: number): number {
  if (t >= 1) return 1;
  return 1 - Math.pow(1 - t, BRAKING_POWER);
}

// ─── Virtual rows ────────────────────────────────────────

/** Index of the virtual row whose centre band contains `offset`. */
export function virtualRowAt(offset: number): number {
  return Math.floor((offset + ROW_HEIGHT / 2) / ROW_HEIGHT);
}

/**
 * How many times the listing is repeated so the reel never runs dry mid-spin.
 * Covers the farthest landing pass (`spinLoops + 1`) plus two spare passes.
 */
export function reelRepetitions(length: number): number {
  if (length <= 0) return 0;
  const passes = Math.max(Math.ceil((TARGET_SCROLL_ROWS + REEL_TAIL_ROWS) / length), spinLoops(length) + 1);
  return passes + 2;
}

export interface ReelRow {
  key: string;
  virtualIndex: number;
  server: ServerRecord;
}

export function buildReelRows(listing: Listing): ReelRow[] {
  const reps = reelRepetitions(listing.length);
  const rows: ReelRow[] = [];
  for (let rep = 0; rep < reps; rep++) {
    listing.forEach((server, i) => {
      const virtualIndex = rep * listing.length + i;
      rows.push({ key: `row-${virtualIndex}`, virtualIndex, server });
    });
  }
  return rows;
}

// ─── Viewport ────────────────────────────────────────────

/** Distance from the viewport top to the top of the row sitting under the marker. */
export function reelCenterOffset(viewportHeight: number = REEL_VIEWPORT_HEIGHT): number {
  return viewportHeight / 2 - ROW_HEIGHT / 2;
}

export function reelTranslateY(offset: number, viewportHeight: number = REEL_VIEWPORT_HEIGHT): number {
  return reelCenterOffset(viewportHeight) - offset;
}
