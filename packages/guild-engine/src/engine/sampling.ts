/**
 * Source of uniform numbers in [0, 1). Injected so tests can replay draws.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export const pickIndex = (length: number, random: RandomSource): number =>
  Math.min(length - 1, Math.floor(random() * length));

export const sampleOne = <T>(items: readonly T[], random: RandomSource): T | undefined => {
  if (items.length === 0) return undefined;
  if (items.length === 1) return items[0];
  return items[pickIndex(items.length, random)];
};

/**
 * Draws `count` members without replacement (partial Fisher-Yates on a copy).
 */
export const sampleDistinct = <T>(items: readonly T[], count: number, random: RandomSource): T[] => {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));
  for (let i = 0; i < take; i += 1) {
    const j = i + pickIndex(pool.length - i, random);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
};

export const randomInt = (min: number, max: number, random: RandomSource): number =>
  min + pickIndex(max - min + 1, random);
