/**
 * Random draw source used by every simulation step.
 *
 * The dynamics never call Math.random directly; they take a RandomSource so a
 * seeded or scripted source can drive them in tests.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * Linear congruential generator; deterministic for a given seed.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return {
    next() {
      state = (Math.imul(1664525, state) + 1013904223) >>> 0;
      return state / 4294967296;
    },
  };
};

/**
 * Replays a fixed list of draws, cycling when exhausted.
 */
export const createScriptedRandom = (draws: readonly number[]): RandomSource => {
  if (draws.length === 0) {
    throw new Error('Scripted random source needs at least one draw');
  }
  let index = 0;
  return {
    next() {
      const value = draws[index % draws.length];
      index += 1;
      return value;
    },
  };
};

/** Float in [min, max) */
export const uniform = (rng: RandomSource, min: number, max: number): number =>
  min + rng.next() * (max - min);

/** Integer in [min, max], both inclusive */
export const randomInt = (rng: RandomSource, min: number, max: number): number =>
  min + Math.floor(rng.next() * (max - min + 1));

export const chance = (rng: RandomSource, probability: number): boolean => rng.next() < probability;

export const pick = <T>(rng: RandomSource, items: readonly T[]): T => {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(rng.next() * items.length))];
};

/**
 * Picks `count` distinct items (partial Fisher-Yates on a copy).
 */
export const sample = <T>(rng: RandomSource, items: readonly T[], count: number): T[] => {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i += 1) {
    const j = i + Math.floor(rng.next() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
};
