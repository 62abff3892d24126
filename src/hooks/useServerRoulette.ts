import { useCallback, useEffect, useReducer, useRef, useState, type RefObject } from 'react';
import { advanceSpin, createAnimationState, resetAnimation } from '../lib/animation';
import { createClickPlayer, openWebAudioClick, type ClickOutput, type ClickPlayer } from '../lib/clickAudio';
import { synthesizeClick } from '../lib/clickSynth';
import { CLICK_DURATION_MS, CLICK_SAMPLE_RATE } from '../lib/constants';
import { mathRandom, type RandomSource } from '../lib/random';
import { reelTranslateY } from '../lib/reelUtils';
import {
  canRefresh,
  canSpin,
  createInitialRouletteState,
  rouletteReducer,
  type RouletteState,
} from '../lib/rouletteState';
import { planSpin } from '../lib/selection';
import { fetchServerListing } from '../lib/serverList/api';
import type { Listing, PlayerRange } from '../types';

export interface FrameScheduler {
  request: (callback: () => void) => number;
  cancel: (id: number) => void;
}

export interface UseServerRouletteOptions {
  random?: RandomSource;
  fetchListing?: (range: PlayerRange) => Promise<Listing>;
  /** Milliseconds, monotonic. */
  now?: () => number;
  frames?: FrameScheduler;
  openClickOutput?: (samples: Float32Array, sampleRate: number) => ClickOutput | null;
}

export interface ServerRouletteApi {
  state: RouletteState;
  canSpin: boolean;
  canRefresh: boolean;
  soundAvailable: boolean;
  muted: boolean;
  /** Reel scroll offset at render time; the spin loop moves the track directly between renders. */
  reelOffset: number;
  reelTrackRef: RefObject<HTMLDivElement>;
  setMinPlayers: (value: number) => void;
  setMaxPlayers: (value: number) => void;
  refresh: () => void;
  spin: () => void;
  copyWinnerName: () => Promise<boolean>;
  toggleMuted: () => void;
}

const browserFrames: FrameScheduler = {
  request: (callback) => requestAnimationFrame(() => callback()),
  cancel: (id) => cancelAnimationFrame(id),
};

const browserNow = () => performance.now();

export function useServerRoulette(options: UseServerRouletteOptions = {}): ServerRouletteApi {
  const [state, dispatch] = useReducer(rouletteReducer, undefined, () => createInitialRouletteState());
  const [soundAvailable, setSoundAvailable] = useState(false);
  const [muted, setMuted] = useState(false);

  // Refs so callbacks stay stable and the frame loop never re-subscribes
  const optionsRef = useRef(options);
  optionsRef.current = options;
  const stateRef = useRef(state);
  stateRef.current = state;

  const animRef = useRef(createAnimationState());
  const clickRef = useRef<ClickPlayer | null>(null);
  const fetchInFlightRef = useRef(false);
  const reelTrackRef = useRef<HTMLDivElement>(null);

  // ─── Click sound: synthesized once, replayed per row ──
  useEffect(() => {
    const open = optionsRef.current.openClickOutput ?? openWebAudioClick;
    const samples = synthesizeClick(CLICK_SAMPLE_RATE, CLICK_DURATION_MS, optionsRef.current.random ?? mathRandom);
    const output = open(samples, CLICK_SAMPLE_RATE);
    const player = createClickPlayer(output);
    clickRef.current = player;
    setSoundAvailable(player.available);

    return () => {
      clickRef.current = null;
      output?.close();
    };
  }, []);

  // ─── Spin loop ───────────────────────────────────────
  useEffect(() => {
    const plan = state.plan;
    if (state.phase !== 'spinning' || !plan) return;

    const now = optionsRef.current.now ?? browserNow;
    const frames = optionsRef.current.frames ?? browserFrames;
    const anim = animRef.current;
    const startedAt = now();
    let frameId = 0;
    let active = true;

    const loop = () => {
      if (!active) return;
      const crossed = advanceSpin(anim, plan, (now() - startedAt) / 1000);

      const track = reelTrackRef.current;
      if (track) track.style.transform = `translateY(${reelTranslateY(anim.currentOffset)}px)`;
      if (crossed > 0) clickRef.current?.play();

      if (anim.phase === 'settled') {
        dispatch({ type: 'spinSettled' });
        return;
      }
      frameId = frames.request(loop);
    };

    frameId = frames.request(loop);
    return () => {
      active = false;
      frames.cancel(frameId);
    };
  }, [state.phase, state.plan]);

  // ─── Intents ─────────────────────────────────────────
  const setMinPlayers = useCallback((value: number) => {
    dispatch({ type: 'setMinPlayers', value });
  }, []);

  const setMaxPlayers = useCallback((value: number) => {
    dispatch({ type: 'setMaxPlayers', value });
  }, []);

  const refresh = useCallback(() => {
    if (fetchInFlightRef.current || !canRefresh(stateRef.current)) return;
    fetchInFlightRef.current = true;

    const anim = animRef.current;
    anim.phase = 'idle';
    anim.currentOffset = 0;
    dispatch({ type: 'fetchStarted' });

    const fetchListing = optionsRef.current.fetchListing ?? fetchServerListing;
    void fetchListing(stateRef.current.range)
      .then((servers) => {
        dispatch({ type: 'fetchCompleted', servers });
      })
      .catch((error: unknown) => {
        console.error('[Roulette] Server list fetch failed', {
          message: error instanceof Error ? error.message : String(error),
        });
        dispatch({ type: 'fetchCompleted', servers: [] });
      })
      .finally(() => {
        fetchInFlightRef.current = false;
      });
  }, []);

  const spin = useCallback(() => {
    const current = stateRef.current;
    if (!canSpin(current)) return;
    const plan = planSpin(current.servers, optionsRef.current.random ?? mathRandom);
    if (!plan) return;
    resetAnimation(animRef.current);
    dispatch({ type: 'spinStarted', plan });
  }, []);

  const copyWinnerName = useCallback(async (): Promise<boolean> => {
    const winner = stateRef.current.winner;
    if (!winner) return false;

    const clipboard: Clipboard | undefined = typeof navigator !== 'undefined' ? navigator.clipboard : undefined;
    if (!clipboard) {
      console.warn('[Roulette] Clipboard unavailable');
      return false;
    }
    try {
      await clipboard.writeText(winner.name);
      return true;
    } catch (error: unknown) {
      console.warn('[Roulette] Copy failed', {
        message: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }, []);

  const toggleMuted = useCallback(() => {
    const next = !muted;
    clickRef.current?.setMuted(next);
    setMuted(next);
  }, [muted]);

  return {
    state,
    canSpin: canSpin(state),
    canRefresh: canRefresh(state),
    soundAvailable,
    muted,
    reelOffset: animRef.current.currentOffset,
    reelTrackRef,
    setMinPlayers,
    setMaxPlayers,
    refresh,
    spin,
    copyWinnerName,
    toggleMuted,
  };
}
