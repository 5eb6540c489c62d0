/** Source of uniform numbers in [0, 1). Swapped out to make patrol jitter repeatable. */
export interface RandomSource {
  next(): number;
}

export const MATH_RANDOM: RandomSource = { next: () => Math.random() };

/** Mulberry32. Enough for gameplay jitter. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Always returns the same value; tests use 0.5 to cancel symmetric jitter */
export function fixedRandom(value: number): RandomSource {
  return { next: () => value };
}

export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}
