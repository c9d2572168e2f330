/*
 * The base sequence: 1, 2, 3, 5, 8, ...
 *
 * Every pile in the game is a multiset of these values, so the sequence is
 * consulted constantly; values are cached as they are discovered and the
 * cache only ever grows.
 */

import assert from 'utils/assert.ts'

export class Sequence {
  // values[i] is the ith element of the sequence
  private readonly values: number[] = [1, 2];
  // inverse of `values`
  private readonly indices: Map<number, number> = new Map([[1, 0], [2, 1]]);

  /*
   * Number of values cached so far.
   */
  get size(): number { return this.values.length; }

  /*
   * Value at index `i`.
   */
  value(i: number): number {
    assert(Number.isInteger(i) && i >= 0, 'Sequence.value: bad index', i);
    while (i >= this.values.length) this.push();
    return this.values[i];
  }

  /*
   * Index of `v` in the sequence, or null if `v` is not a member.
   *
   * Only safe integers are looked up; past 2^53 the cached values are no
   * longer exact.
   */
  index_of(v: number): null | number {
    if (!Number.isSafeInteger(v)) return null;
    this.extend_to(v);
    return this.indices.get(v) ?? null;
  }

  /*
   * Grow the cache until it reaches at least `bound`.
   */
  extend_to(bound: number): void {
    while (this.values[this.values.length - 1] < bound) this.push();
  }

  private push(): void {
    const n = this.values.length;
    const v = this.values[n - 1] + this.values[n - 2];
    this.values.push(v);
    this.indices.set(v, n);
  }
}
