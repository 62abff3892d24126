import {
  DEFAULT_MAX_PLAYERS,
  DEFAULT_MIN_PLAYERS,
  PLAYER_RANGE_MAX,
  PLAYER_RANGE_MIN,
} from './constants';
import type { Listing, PlayerRange, RoulettePhase, ServerRecord, SpinPlan } from '../types';

export interface RouletteState {
  phase: RoulettePhase;
  range: PlayerRange;
  servers: Listing;
  /** True until the first fetch starts and whenever the range changes afterwards. */
  stale: boolean;
  plan: SpinPlan | null;
  winner: ServerRecord | null;
}

export type RouletteAction =
  | { type: 'setMinPlayers'; value: number }
  | { type: 'setMaxPlayers'; value: number }
  | { type: 'fetchStarted' }
  | { type: 'fetchCompleted'; servers: Listing }
  | { type: 'spinStarted'; plan: SpinPlan }
  | { type: 'spinSettled' };

export function createInitialRouletteState(
  range: PlayerRange = { min: DEFAULT_MIN_PLAYERS, max: DEFAULT_MAX_PLAYERS },
): RouletteState {
  return {
    phase: 'idle',
    range,
    servers: [],
    stale: true,
    plan: null,
    winner: null,
  };
}

export function clampPlayers(value: number): number {
  if (!Number.isFinite(value)) return PLAYER_RANGE_MIN;
  return Math.min(PLAYER_RANGE_MAX, Math.max(PLAYER_RANGE_MIN, Math.round(value)));
}

export function canRefresh(state: RouletteState): boolean {
  return state.phase !== 'loading';
}

export function canSpin(state: RouletteState): boolean {
  return (
    !state.stale &&
    state.phase !== 'loading' &&
    state.phase !== 'spinning' &&
    state.servers.length > 0
  );
}

export function rouletteReducer(state: RouletteState, action: RouletteAction): RouletteState {
  switch (action.type) {
    case 'setMinPlayers': {
      const min = clampPlayers(action.value);
      const max = Math.max(min, state.range.max);
      if (min === state.range.min && max === state.range.max) return state;
      return { ...state, range: { min, max }, stale: true };
    }
    case 'setMaxPlayers': {
      const max = clampPlayers(action.value);
      const min = Math.min(max, state.range.min);
      if (min === state.range.min && max === state.range.max) return state;
      return { ...state, range: { min, max }, stale: true };
    }
    case 'fetchStarted': {
      if (!canRefresh(state)) return state;
      return { ...state, phase: 'loading', servers: [], plan: null, winner: null, stale: false };
    }
    case 'fetchCompleted': {
      // Applied even if the range moved on meanwhile; `stale` already asks for another fetch.
      if (state.phase !== 'loading') return { ...state, servers: action.servers };
      return {
        ...state,
        servers: action.servers,
        phase: action.servers.length === 0 ? 'settled' : 'idle',
      };
    }
    case 'spinStarted': {
      if (!canSpin(state)) return state;
      return { ...state, phase: 'spinning', plan: action.plan, winner: null };
    }
    case 'spinSettled': {
      if (state.phase !== 'spinning' || !state.plan) return state;
      return { ...state, phase: 'settled', winner: state.plan.winner };
    }
  }
}
