/*
 * Retrograde analysis.
 *
 * A state is losing for the player to move iff none of its moves leads to a
 * losing state; final states, having no moves, are losing.  Solving is then a
 * single pass over the graph in which every state comes after all of its
 * successors.
 */

import type { StateGraph } from 'lib/fib/graph.ts'
import { State, key } from 'lib/fib/state.ts'

import assert from 'utils/assert.ts'

enum Mark {
  OPEN,  // on the current DFS path
  DONE,  // emitted
}

/*
 * Every node of `graph`, each after all of its successors.
 *
 * Iterative DFS post-order, started from each node in discovery order and
 * following successors in move order.  Meeting an OPEN node means a cycle,
 * which the rules cannot produce.
 */
export function retrograde_order(graph: StateGraph): State[] {
  const marks: Map<string, Mark> = new Map();
  const order: State[] = [];

  for (const start of graph.nodes()) {
    if (marks.has(key(start))) continue;

    marks.set(key(start), Mark.OPEN);
    // each frame walks its successors with a cursor
    const stack: {state: State, succ: State[], next: number}[] = [
      {state: start, succ: graph.successors(start), next: 0},
    ];

    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (top.next === top.succ.length) {
        stack.pop();
        marks.set(key(top.state), Mark.DONE);
        order.push(top.state);
        continue;
      }
      const child = top.succ[top.next++];

      const mark = marks.get(key(child));
      assert(mark !== Mark.OPEN, 'retrograde_order: cycle', child);
      if (mark === Mark.DONE) continue;

      marks.set(key(child), Mark.OPEN);
      stack.push({state: child, succ: graph.successors(child), next: 0});
    }
  }
  return order;
}

/*
 * Every node of `graph`, each before all of its successors.
 */
export function topological_order(graph: StateGraph): State[] {
  return retrograde_order(graph).reverse();
}

export class Strategy {
  private constructor(
    // good replies for each state, keyed by state key
    private readonly replies_: Map<string, State[]>,
  ) {}

  static solve(graph: StateGraph): Strategy {
    const replies: Map<string, State[]> = new Map();

    for (const state of retrograde_order(graph)) {
      replies.set(key(state), graph.successors(state).filter(child => {
        const r = replies.get(key(child));
        assert(r !== undefined, 'Strategy: successor not yet solved', child);
        return r.length === 0;
      }));
    }
    return new Strategy(replies);
  }

  /*
   * Moves from `state` that leave the opponent in a losing state.
   */
  replies(state: State): readonly State[] {
    const r = this.replies_.get(key(state));
    assert(r !== undefined, 'Strategy: unknown state', state);
    return r;
  }

  is_losing(state: State): boolean {
    return this.replies(state).length === 0;
  }

  is_winning(state: State): boolean {
    return !this.is_losing(state);
  }
}
