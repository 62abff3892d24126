import { SETTLE_EPSILON } from './constants';
import { brakingEase, virtualRowAt } from './reelUtils';
import type { RoulettePhase, SpinPlan } from '../types';

/** Mutable per-spin state, advanced in place once per frame. */
export interface AnimationState {
  phase: RoulettePhase;
  elapsed: number;
  currentOffset: number;
  /** -1 until the first row is crossed. */
  lastCrossedRow: number;
}

export function createAnimationState(): AnimationState {
  return { phase: 'idle', elapsed: 0, currentOffset: 0, lastCrossedRow: -1 };
}

export function resetAnimation(anim: AnimationState): void {
  anim.phase = 'spinning';
  anim.elapsed = 0;
  anim.currentOffset = 0;
  anim.lastCrossedRow = -1;
}

function markCrossedRows(anim: AnimationState): number {
  const row = virtualRowAt(anim.currentOffset);
  if (row <= anim.lastCrossedRow) return 0;
  const crossed = row - anim.lastCrossedRow;
  anim.lastCrossedRow = row;
  return crossed;
}

function settle(anim: AnimationState, plan: SpinPlan): void {
  anim.currentOffset = plan.targetOffset;
  anim.phase = 'settled';
}

/**
 * Frame tick. Moves the reel to where the braking curve puts it after
 * `elapsedSeconds` and returns how many virtual rows passed the marker since
 * the previous tick. Does nothing unless the state is spinning.
 */
export function advanceSpin(anim: AnimationState, plan: SpinPlan, elapsedSeconds: number): number {
  if (anim.phase !== 'spinning') return 0;

  anim.elapsed = Math.max(0, elapsedSeconds);
  const t = anim.elapsed / plan.durationSeconds;

  if (t >= 1) {
    settle(anim, plan);
  } else {
    const next = plan.startOffset + (plan.targetOffset - plan.startOffset) * brakingEase(t);
    if (Math.abs(plan.targetOffset - next) < SETTLE_EPSILON) {
      settle(anim, plan);
    } else {
      anim.currentOffset = next;
    }
  }

  return markCrossedRows(anim);
}
