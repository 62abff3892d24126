/** Uniform source in [0, 1). Everything random in the engine draws from one of these. */
export type RandomSource = () => number;

export const mathRandom: RandomSource = () => Math.random();

/**
 * Deterministic mulberry32 generator. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Replays `values` in order, wrapping around. Values must already be in [0, 1).
 */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new Error("sequence must not be empty");
  for (const v of values) {
    if (!(v >= 0 && v < 1)) throw new Error(`sequence value out of range: ${v}`);
  }
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}

/** Integer in [0, maxExclusive). */
export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.min(Math.floor(random() * maxExclusive), maxExclusive - 1);
}

/** Float in [min, max). */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}
