/*
 * Rewrite rules.
 *
 * Each rule trades some values in the pile for others of the same total, by
 * way of the identity value(i) + value(i+1) = value(i+2):
 *
 *    carry-up            1 + 1 = 2
 *    re-split            2 + 2 = 1 + 3
 *    merge-duplicate     v(i) + v(i) = v(i-2) + v(i+1)     (i >= 2)
 *    merge-consecutive   v(i) + v(i+1) = v(i+2)
 *
 * Every firing of every rule is a separate move, so one state may have many
 * moves, some of which lead to the same place.
 */

import type { State } from 'lib/fib/state.ts'

import { array_fill } from 'utils/array.ts'
import { range } from 'utils/iterable.ts'

import assert from 'utils/assert.ts'

export enum Rule {
  CARRY_UP = 'carry-up',
  RESPLIT = 're-split',
  MERGE_DUPLICATE = 'merge-duplicate',
  MERGE_CONSECUTIVE = 'merge-consecutive',
}

export type Move = {
  rule: Rule;
  // lowest index consumed by the firing
  index: number;
  state: State;
};

/*
 * Apply a list of [index, delta] adjustments to a copy of `state`, growing it
 * at the tail if needed.
 */
function rewrite(state: State, deltas: [number, number][]): State {
  const top = Math.max(...deltas.map(([i]) => i));
  const out = top < state.length
    ? [...state]
    : [...state, ...array_fill(top + 1 - state.length, 0)];

  for (const [i, delta] of deltas) {
    out[i] += delta;
    assert(out[i] >= 0, 'rewrite: negative count', state, deltas);
  }
  return out;
}

/*
 * All moves from `state`, in rule order and then index order.
 */
export function evolve(state: State): Move[] {
  const moves: Move[] = [];

  if (state[0] >= 2) {
    moves.push({
      rule: Rule.CARRY_UP,
      index: 0,
      state: rewrite(state, [[0, -2], [1, 1]]),
    });
  }

  if (state.length > 1 && state[1] >= 2) {
    moves.push({
      rule: Rule.RESPLIT,
      index: 1,
      state: rewrite(state, [[1, -2], [0, 1], [2, 1]]),
    });
  }

  for (const i of range(2, state.length)) {
    if (state[i] < 2) continue;
    moves.push({
      rule: Rule.MERGE_DUPLICATE,
      index: i,
      state: rewrite(state, [[i, -2], [i - 2, 1], [i + 1, 1]]),
    });
  }

  for (const i of range(0, state.length - 1)) {
    if (state[i] === 0 || state[i + 1] === 0) continue;
    moves.push({
      rule: Rule.MERGE_CONSECUTIVE,
      index: i,
      state: rewrite(state, [[i, -1], [i + 1, -1], [i + 2, 1]]),
    });
  }

  return moves;
}
