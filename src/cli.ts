/*
 * command-line driver
 *
 *    fibgame <n> [--from "<values>"]
 *
 * app.ts wires this to the process; everything here takes its argv and
 * streams explicitly.
 */

import * as readline from 'readline'

import { FibGame } from 'lib/fib/game.ts'
import { Count } from 'lib/fib/codec.ts'
import type { State } from 'lib/fib/state.ts'
import { Terminal, Outcome, play } from 'session.ts'

import { decode } from 'utils/decode.ts'
import { Result, Ok, Err } from 'utils/result.ts'

import * as options from 'options.ts'
import log from 'utils/logger.ts'

export const usage = 'usage: fibgame <n> [--from "<values>"]';

export type Args = {
  n: number;
  from: null | string;
};

export function parse_args(argv: string[]): Result<Args, string> {
  const positional: string[] = [];
  let from: null | string = null;

  for (let i = 0; i < argv.length; ++i) {
    if (argv[i] === '--from') {
      if (i + 1 >= argv.length) return Err('--from needs a value');
      from = argv[++i];
    } else {
      positional.push(argv[i]);
    }
  }
  if (positional.length !== 1) return Err(usage);

  const n = decode(Count, positional[0]);
  if ('err' in n) return Err(`bad pile size: ${n.err}`);
  if (n.ok > options.max_n) {
    return Err(`pile size must be at most ${options.max_n}`);
  }
  return Ok({n: n.ok, from});
}

/*
 * Solve the game named by `args` and find where play starts.
 */
export function setup(
  args: Args,
): Result<{game: FibGame, start: State}, string> {
  const game = new FibGame(args.n);
  if (args.from === null) {
    return Ok({game, start: game.initial_state()});
  }

  const parsed = game.parse_move(args.from);
  if ('err' in parsed) {
    return Err(`bad --from position: ${parsed.err.msg}`);
  }
  if (!game.contains(parsed.ok)) {
    return Err(
      `position ${game.render(parsed.ok)} is not reachable from ${args.n}`
    );
  }
  return Ok({game, start: parsed.ok});
}

/*
 * Terminal over a readline interface.  Questions pending when input closes
 * resolve to null.
 */
export function stdio_terminal(
  rl: readline.Interface,
  output: NodeJS.WritableStream,
): Terminal {
  let closed = false;
  const waiting: ((line: null | string) => void)[] = [];

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    ask: (prompt: string) => new Promise((resolve) => {
      if (closed) return resolve(null);
      waiting.push(resolve);
      rl.question(prompt, (line: string) => {
        waiting.splice(waiting.indexOf(resolve), 1);
        resolve(line);
      });
    }),
    say: (line: string) => { output.write(line + '\n'); },
  };
}

/*
 * Run a whole session; resolves to the process exit code.
 */
export async function main(
  argv: string[],
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<number> {
  const args = parse_args(argv);
  if ('err' in args) {
    log.error(args.err);
    return 2;
  }

  const ready = setup(args.ok);
  if ('err' in ready) {
    log.error(ready.err);
    return 2;
  }
  const {game, start} = ready.ok;

  const rl = readline.createInterface({input, output});

  try {
    const outcome: Outcome = await play(
      game, stdio_terminal(rl, output), {start}
    );
    log.debug('game over', {n: game.n, outcome});
  } finally {
    rl.close();
  }
  return 0;
}
