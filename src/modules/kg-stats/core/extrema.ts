/**
 * Optional-aware extrema.
 *
 * An absent side never takes part in the comparison: the present value is
 * adopted as is. Min and max bounds are combined independently, so a value
 * that carries a range always lands both of its bounds in an empty target.
 */

export type Comparator<T> = (a: T, b: T) => number;

export const compareNumbers: Comparator<number> = (a, b) => a - b;

export const pickMin = <T>(a: T | null, b: T | null, compare: Comparator<T>): T | null => {
  if (a === null) return b;
  if (b === null) return a;
  return compare(b, a) < 0 ? b : a;
};

export const pickMax = <T>(a: T | null, b: T | null, compare: Comparator<T>): T | null => {
  if (a === null) return b;
  if (b === null) return a;
  return compare(b, a) > 0 ? b : a;
};
