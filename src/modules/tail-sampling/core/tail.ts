import type { RandomSource } from './random.js';
import type { Triple } from '../../kg-stats/index.js';

/**
 * Entities seen at most `maxFrequency` times, in first-seen order.
 */
export const findTailEntities = (
  entityFreq: ReadonlyMap<string, number>,
  maxFrequency: number
): string[] => {
  const tail: string[] = [];
  for (const [entity, count] of entityFreq) {
    if (count <= maxFrequency) {
      tail.push(entity);
    }
  }
  return tail;
};

export const touchesAny = (triple: Triple, entities: ReadonlySet<string>): boolean =>
  entities.has(triple.subject) || entities.has(triple.object);

/**
 * Uniform sample of `size` items without replacement (partial Fisher-Yates).
 * When there are no more than `size` items, all of them are returned in
 * their original order.
 */
export const sampleWithoutReplacement = <T>(
  items: readonly T[],
  size: number,
  random: RandomSource
): T[] => {
  if (items.length <= size) {
    return [...items];
  }

  const pool = [...items];
  for (let i = 0; i < size; i++) {
    const j = i + random.nextInt(pool.length - i);
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) break;
    pool[i] = picked;
    pool[j] = current;
  }

  return pool.slice(0, Math.max(0, size));
};
