/*
 * Pile states.
 *
 * A state is a multiset of base sequence indices, stored densely: state[i] is
 * the number of copies of the ith value in the pile.  States are never
 * mutated; every rewrite produces a fresh array.
 */

export type State = readonly number[];

/*
 * Map key for a state.  Distinguishes lengths, so [1] and [1,0] differ.
 */
export function key(state: State): string {
  return state.join(',');
}

export function same(l: State, r: State): boolean {
  return l.length === r.length && l.every((count, i) => count === r[i]);
}

/*
 * Whether `state` is in Zeckendorf form: no repeated values and no two
 * consecutive ones.  Final states admit no moves.
 */
export function is_final(state: State): boolean {
  let last = 0;
  for (const count of state) {
    if (count > 1 || (count > 0 && last > 0)) return false;
    last = count;
  }
  return true;
}

/*
 * Total number of units in the pile.
 */
export function units(state: State): number {
  return state.reduce((sum, count) => sum + count, 0);
}

/*
 * Sum of count * 2^i over the pile.
 *
 * Carry-ups and consecutive merges lower the unit count; re-splits and
 * duplicate merges keep it and raise the weight (by 1 and by 2^(i-2)
 * respectively).  So (units, -weight) strictly decreases on every move.
 */
export function weight(state: State): number {
  return state.reduce((sum, count, i) => sum + count * 2 ** i, 0);
}

/*
 * Whether a move from `from` to `to` strictly decreases (units, -weight).
 */
export function descends(from: State, to: State): boolean {
  const du = units(to) - units(from);
  return du < 0 || (du === 0 && weight(to) > weight(from));
}
