/*
 * A fully solved game, as consumed by the session.
 */

import { Sequence } from 'lib/fib/sequence.ts'
import { State, is_final } from 'lib/fib/state.ts'
import {
  initial_state, parse, render, evaluate
} from 'lib/fib/codec.ts'
import { StateGraph } from 'lib/fib/graph.ts'
import { Strategy } from 'lib/fib/strategy.ts'
import type { GameError } from 'lib/fib/errors.ts'

import type { Result } from 'utils/result.ts'

export class FibGame {
  readonly seq: Sequence = new Sequence();
  readonly graph: StateGraph;
  readonly strategy: Strategy;

  constructor(readonly n: number) {
    this.graph = StateGraph.build(initial_state(n));
    this.strategy = Strategy.solve(this.graph);
  }

  initial_state(): State {
    return this.graph.root;
  }

  is_terminal(state: State): boolean {
    return is_final(state);
  }

  contains(state: State): boolean {
    return this.graph.has(state);
  }

  successors(state: State): State[] {
    return this.graph.successors(state);
  }

  strategy_for(state: State): readonly State[] {
    return this.strategy.replies(state);
  }

  /*
   * Whether the player to move from `state` loses against best play.
   */
  is_losing(state: State): boolean {
    return this.strategy.is_losing(state);
  }

  /*
   * Whether whoever moves first from the initial pile can force a win.
   */
  first_player_wins(): boolean {
    return !this.is_losing(this.initial_state());
  }

  parse_move(text: string): Result<State, GameError> {
    return parse(this.seq, text);
  }

  render(state: State): string {
    return render(this.seq, state);
  }

  value(state: State): number {
    return evaluate(this.seq, state);
  }
}
