import {
  CLICK_DURATION_MS,
  CLICK_GAIN,
  CLICK_SAMPLE_RATE,
  CLICK_SMOOTHING,
} from './constants';
import { mathRandom, randomRange, type RandomSource } from './random';

/**
 * Short percussive click: low-passed white noise under a quadratic decay.
 * Generated once at startup and replayed for every row crossing.
 */
export function synthesizeClick(
  sampleRate: number = CLICK_SAMPLE_RATE,
  durationMs: number = CLICK_DURATION_MS,
  random: RandomSource = mathRandom,
): Float32Array {
  const n = Math.floor((sampleRate * durationMs) / 1000);
  const samples = new Float32Array(n);
  let last = 0;

  for (let i = 0; i < n; i++) {
    const raw = randomRange(random, -1, 1);
    const filtered = last * CLICK_SMOOTHING + raw * (1 - CLICK_SMOOTHING);
    last = filtered;
    const decay = Math.pow(1 - i / n, 2);
    samples[i] = filtered * decay * CLICK_GAIN;
  }

  return samples;
}
