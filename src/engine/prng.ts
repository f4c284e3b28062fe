// Mulberry32 seeded PRNG: deterministic, no side effects.
// All randomness in the resolution engine must go through this module.

import type { PRNG } from '@/engine/types';

// ---------------------------------------------------------------------------
// FNV-1a hash: converts an arbitrary string seed to a uint32
// ---------------------------------------------------------------------------

export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5; // FNV offset basis (32-bit)
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Derives an independent uint32 seed from a base seed and a salt (e.g. a round number). */
export function mixSeed(base: number, salt: number): number {
  let x = ((base >>> 0) ^ 0x9e3779b9) + (salt | 0);
  x ^= x << 13;
  x ^= x >>> 17;
  x ^= x << 5;
  return x >>> 0;
}

// ---------------------------------------------------------------------------
// Mulberry32 core step
// Returns [float in [0,1), next state]
// ---------------------------------------------------------------------------

function mulberry32Step(state: number): [number, number] {
  let s = (state + 0x6d2b79f5) >>> 0;
  s = Math.imul(s ^ (s >>> 15), s | 1) >>> 0;
  s ^= s + Math.imul(s ^ (s >>> 7), s | 61);
  s = (s ^ (s >>> 14)) >>> 0;
  const next = s / 0x100000000;
  return [next, (state + 0x6d2b79f5) >>> 0];
}

// ---------------------------------------------------------------------------
// PRNG factory
// ---------------------------------------------------------------------------

export function createPRNG(seed: number): PRNG {
  let currentState: number = seed >>> 0;

  const prng: PRNG = {
    next(): number {
      const [value, nextState] = mulberry32Step(currentState);
      currentState = nextState;
      return value;
    },

    nextInt(min: number, max: number): number {
      // inclusive on both ends
      return min + Math.floor(this.next() * (max - min + 1));
    },

    fork(): PRNG {
      // Consumes one draw so successive forks get distinct streams
      const salt = Math.floor(this.next() * 0x100000000);
      return createPRNG(mixSeed(currentState, salt));
    },

    get state(): number {
      return currentState;
    },
  };

  return prng;
}

export function createPRNGFromSeed(seed: string): PRNG {
  return createPRNG(hashSeed(seed));
}

/** Accepts either a numeric seed or a string to be hashed. */
export function seedToNumber(seed: number | string): number {
  return typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
}

// ---------------------------------------------------------------------------
// Draw helpers
// ---------------------------------------------------------------------------

/** True with probability p. p <= 0 never fires, p >= 1 always does. */
export function chance(p: number, prng: PRNG): boolean {
  return prng.next() < p;
}

export function pick<T>(items: readonly T[], prng: PRNG): T {
  if (items.length === 0) {
    throw new Error('pick: items array must not be empty');
  }
  return items[prng.nextInt(0, items.length - 1)];
}

/** Draws up to `count` distinct items, in draw order. */
export function sample<T>(items: readonly T[], count: number, prng: PRNG): T[] {
  const pool = [...items];
  const out: T[] = [];
  while (out.length < count && pool.length > 0) {
    const idx = prng.nextInt(0, pool.length - 1);
    out.push(pool[idx]);
    pool.splice(idx, 1);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Weighted random selection
// ---------------------------------------------------------------------------

export function weightedChoice<T>(
  items: Array<{ value: T; weight: number }>,
  prng: PRNG,
): T {
  if (items.length === 0) {
    throw new Error('weightedChoice: items array must not be empty');
  }

  const totalWeight = items.reduce((sum, item) => sum + item.weight, 0);
  if (totalWeight <= 0) {
    throw new Error('weightedChoice: total weight must be positive');
  }

  let roll = prng.next() * totalWeight;

  for (const item of items) {
    roll -= item.weight;
    if (roll <= 0) {
      return item.value;
    }
  }

  // Fallback to last item (handles floating-point rounding)
  return items[items.length - 1].value;
}
