/**
 * Randomness helpers
 *
 * All quiz randomness flows through an injectable RandomSource so a seed
 * reproduces the same quiz.
 */

/**
 * Returns a float in [0, 1), like Math.random
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Hash a string using djb2 algorithm
 * Returns an 8-character hex string
 */
export function hashString(str: string): string {
  let hash = 5381;

  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) + hash + char; // hash * 33 + char
    hash = hash & hash; // Convert to 32-bit integer
  }

  return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a seeded random number generator (mulberry32)
 * https://github.com/bryc/code/blob/master/jshash/PRNGs.md#mulberry32
 *
 * String seeds are hashed first, so "42" and 42 give different sequences.
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let t = (typeof seed === 'number' ? seed : Number.parseInt(hashString(seed), 16)) >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random integer in [0, max)
 */
export function randomInt(random: RandomSource, max: number): number {
  return Math.min(max - 1, Math.floor(random() * max));
}

/**
 * Shuffled copy of an array (Fisher-Yates)
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Uniform sample of `count` items without replacement (partial Fisher-Yates)
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource,
): T[] {
  if (count > items.length) {
    throw new RangeError(`Cannot sample ${count} items from ${items.length}`);
  }

  const pool = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + randomInt(random, pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

/**
 * Random base-36 token, e.g. for session ids
 */
export function randomToken(random: RandomSource, length = 6): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += randomInt(random, 36).toString(36);
  }
  return token;
}
