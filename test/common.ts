import type { Terminal } from 'session.ts'
import { StateGraph } from 'lib/fib/graph.ts'
import { initial_state } from 'lib/fib/codec.ts'
import type { State } from 'lib/fib/state.ts'

/*
 * Terminal fed from a fixed list of inputs; everything said or asked is
 * recorded in `lines`, in order.
 */
export class ScriptedTerminal implements Terminal {
  lines: string[] = [];

  constructor(private readonly inputs: string[] = []) {}

  ask = async (prompt: string): Promise<null | string> => {
    this.lines.push(prompt);
    return this.inputs.shift() ?? null;
  };

  say = (line: string): void => {
    this.lines.push(line);
  };
}

export const rng = (v: number) => () => v;

export function graph_of(n: number): StateGraph {
  return StateGraph.build(initial_state(n));
}

export function* edges(graph: StateGraph): Generator<[State, State]> {
  for (const s of graph.nodes()) {
    for (const c of graph.successors(s)) yield [s, c];
  }
}
