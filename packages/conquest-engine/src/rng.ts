// ── Internal: seed hashing + PRNG core ───────────────────────────────

/**
 * cyrb53-style hash of a string seed, reduced to a 53-bit integer.
 * String seeds start the generator from this value.
 */
function hashSeed(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;
  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);
  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/** splitmix32 step, mapped to [0, 1). */
function splitmix32(state: number): number {
  state = (state + 0x9e3779b9) | 0;
  let t = state ^ (state >>> 16);
  t = Math.imul(t, 0x21f0aaad);
  t ^= t >>> 15;
  t = Math.imul(t, 0x735a2d97);
  t ^= t >>> 15;
  return (t >>> 0) / 4294967296;
}

// ── Public API ───────────────────────────────────────────────────────

export interface RngState {
  readonly seed: string | number;
  readonly index: number;
}

/**
 * Source of every random decision the engine makes: region shuffling at
 * setup, card types, dice and bot choices. Always passed in explicitly.
 */
export interface Rng {
  /** Return an integer in [min, max] (inclusive). */
  nextInt(min: number, max: number): number;
  /** Fisher-Yates shuffle (returns a new array). */
  shuffle<T>(array: readonly T[]): T[];
  /** Uniformly choose one element of a non-empty array. */
  pick<T>(array: readonly T[]): T;
  /** Roll `count` six-sided dice, returning sorted descending. */
  rollDice(count: number): number[];
}

export interface SeededRng extends Rng {
  /** Current position, enough to recreate the generator. */
  readonly state: RngState;
  /** Return a float in [0, 1). */
  next(): number;
}

function withHelpers(nextInt: (min: number, max: number) => number): Rng {
  return {
    nextInt,

    shuffle<T>(array: readonly T[]): T[] {
      const out = array.slice();
      for (let i = out.length - 1; i > 0; i--) {
        const j = nextInt(0, i);
        const tmp = out[i]!;
        out[i] = out[j]!;
        out[j] = tmp;
      }
      return out;
    },

    pick<T>(array: readonly T[]): T {
      if (array.length === 0) {
        throw new RangeError("Cannot pick from an empty array");
      }
      return array[nextInt(0, array.length - 1)]!;
    },

    rollDice(count: number): number[] {
      const rolls: number[] = [];
      for (let i = 0; i < count; i++) {
        rolls.push(nextInt(1, 6));
      }
      return rolls.sort((a, b) => b - a);
    },
  };
}

/**
 * Create a deterministic generator. The same seed and index always yield
 * the same sequence, so whole games replay exactly.
 */
export function createRng(seed: string | number, startIndex = 0): SeededRng {
  const base = typeof seed === "string" ? hashSeed(seed) : seed;
  let index = startIndex;

  const next = (): number => splitmix32((base + index++) | 0);
  const helpers = withHelpers((min, max) => min + Math.floor(next() * (max - min + 1)));

  return {
    ...helpers,
    get state(): RngState {
      return { seed, index };
    },
    next,
  };
}

/**
 * Replays a fixed list of integers, one per `nextInt` call. Useful to force
 * dice or card types. Throws once exhausted or when a value falls outside
 * the requested range.
 */
export function createSequenceRng(values: readonly number[]): Rng & { readonly remaining: number } {
  let cursor = 0;
  const helpers = withHelpers((min, max) => {
    if (cursor >= values.length) {
      throw new RangeError(`Sequence exhausted after ${values.length} values`);
    }
    const value = values[cursor++]!;
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new RangeError(`Sequence value ${value} outside [${min}, ${max}]`);
    }
    return value;
  });

  return {
    ...helpers,
    get remaining(): number {
      return values.length - cursor;
    },
  };
}
