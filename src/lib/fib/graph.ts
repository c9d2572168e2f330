/*
 * Reachability graph of a game.
 *
 * Nodes are every state reachable from the root; each non-final node carries
 * its moves in the order the rules produce them.  Final states are nodes with
 * no moves.
 */

import { State, key, is_final, descends } from 'lib/fib/state.ts'
import { Move, evolve } from 'lib/fib/rules.ts'

import assert from 'utils/assert.ts'
import log from 'utils/logger.ts'
import * as options from 'options.ts'

export class StateGraph {
  // all nodes, in discovery order; nodes_[0] is the root
  private readonly nodes_: State[] = [];
  // moves out of each node, keyed by state key
  private readonly moves_: Map<string, Move[]> = new Map();

  private constructor() {}

  /*
   * Explore everything reachable from `root`.
   *
   * Terminates because every move strictly decreases (units, -weight); see
   * descends() in state.ts.
   */
  static build(root: State): StateGraph {
    const graph = new StateGraph();
    graph.add(root);

    const pending: State[] = [root];

    let s: State | undefined;
    while ((s = pending.pop()) !== undefined) {
      if (is_final(s)) continue;

      const moves = evolve(s);
      graph.moves_.set(key(s), moves);

      for (const {state: child} of moves) {
        if (options.debug) {
          assert(descends(s, child), 'StateGraph: move does not descend', s, child);
        }
        if (graph.has(child)) continue;

        graph.add(child);
        if (!is_final(child)) pending.push(child);
      }
    }

    log.debug('state graph built', {
      root: key(root),
      nodes: graph.size,
      edges: graph.edge_count,
    });
    return graph;
  }

  private add(state: State): void {
    this.nodes_.push(state);
    this.moves_.set(key(state), []);
  }

  get root(): State { return this.nodes_[0]; }
  get size(): number { return this.nodes_.length; }

  get edge_count(): number {
    let count = 0;
    for (const moves of this.moves_.values()) count += moves.length;
    return count;
  }

  nodes(): readonly State[] {
    return this.nodes_;
  }

  has(state: State): boolean {
    return this.moves_.has(key(state));
  }

  moves(state: State): readonly Move[] {
    const moves = this.moves_.get(key(state));
    assert(moves !== undefined, 'StateGraph: unknown state', state);
    return moves;
  }

  successors(state: State): State[] {
    return this.moves(state).map(m => m.state);
  }
}
