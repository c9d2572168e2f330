/*
 * Interactive session: a human plays first against the solved strategy.
 *
 * All I/O goes through a Terminal so that the session can be driven from a
 * readline interface or from a script.
 */

import type { FibGame } from 'lib/fib/game.ts'
import { State, same } from 'lib/fib/state.ts'

import { array_choose } from 'utils/array.ts'
import * as options from 'options.ts'

import assert from 'utils/assert.ts'

export interface Terminal {
  // prompt for a line of input; null on end of input
  ask: (prompt: string) => Promise<null | string>;
  say: (line: string) => void;
}

export enum Outcome {
  HUMAN_WINS = 'human-wins',
  MACHINE_WINS = 'machine-wins',
  ABORTED = 'aborted',
}

export type SessionOptions = {
  // uniform [0, 1) source for picking among good replies
  rng?: () => number;
  // position to start from instead of the initial pile
  start?: State;
};

/*
 * Label for the `i`th move: a, b, ..., z, aa, ab, ...
 */
export function move_key(i: number): string {
  const alpha = options.move_keys;
  let out = '';
  for (let n = i + 1; n > 0; n = Math.floor((n - 1) / alpha.length)) {
    out = alpha[(n - 1) % alpha.length] + out;
  }
  return out;
}

/*
 * Ask until the human picks one of `moves`, either by key or by typing out
 * the values of the resulting pile.
 */
async function choose_move(
  game: FibGame,
  term: Terminal,
  moves: State[],
): Promise<null | State> {
  const keys = moves.map((_, i) => move_key(i));

  while (true) {
    const input = await term.ask(`your turn [${keys.join('/')}]: `);
    if (input === null) return null;

    const k = keys.indexOf(input.trim());
    if (k !== -1) return moves[k];

    const parsed = game.parse_move(input);
    if ('ok' in parsed) {
      const match = moves.find(m => same(m, parsed.ok));
      if (match !== undefined) return match;
    }
    term.say('  invalid move, try again!');
  }
}

export async function play(
  game: FibGame,
  term: Terminal,
  opts: SessionOptions = {},
): Promise<Outcome> {
  const rng = opts.rng ?? Math.random;
  let state = opts.start ?? game.initial_state();
  assert(game.contains(state), 'play: start is not reachable', state);

  term.say(`starting a game with n=${game.n}`);
  term.say('');

  if (game.is_losing(state)) {
    term.say("heads up, you're gonna lose!");
    term.say('');
  }

  while (true) {
    if (game.is_terminal(state)) {
      term.say('ha! i win!');
      return Outcome.MACHINE_WINS;
    }
    term.say(`current state: ${game.render(state)}`);

    const moves = game.successors(state);
    let move: State;

    if (moves.length === 1) {
      move = moves[0];
      term.say(`your only move is: ${game.render(move)}`);
    } else {
      term.say('your available moves:');
      moves.forEach((m, i) => {
        term.say(`  [${move_key(i)}]: ${game.render(m)}`);
      });

      const chosen = await choose_move(game, term, moves);
      if (chosen === null) return Outcome.ABORTED;
      move = chosen;
      term.say(`you chose: ${game.render(move)}`);
    }

    if (game.is_terminal(move)) {
      term.say("you win, i can't move!");
      return Outcome.HUMAN_WINS;
    }

    const responses = game.strategy_for(move);
    if (responses.length === 0) {
      term.say('i surrender!');
      return Outcome.HUMAN_WINS;
    }

    state = array_choose(responses, rng);
    term.say(`i respond: ${game.render(state)}`);
    term.say('');
  }
}
