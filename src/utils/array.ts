/*
 * Array utilities.
 */

import assert from 'utils/assert.ts'

/*
 * Fill an array with `n` copies of `val`.
 */
export function array_fill<T>(n: number, val: T): T[] {
  const a : T[] = [];
  a.length = n;
  return a.fill(val);
}

/*
 * Pick a uniformly random element of the nonempty `arr`.
 *
 * `rng` must return values in [0, 1), like Math.random.
 */
export function array_choose<T>(
  arr: readonly T[],
  rng: () => number = Math.random,
): T {
  assert(arr.length > 0, 'array_choose: empty array');
  return arr[Math.floor(rng() * arr.length)];
}
