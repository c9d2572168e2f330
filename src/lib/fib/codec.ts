/*
 * Conversions between piles and text.
 *
 * Moves are typed as the values of the pile they produce, e.g. "1 1 3" for
 * [2, 0, 1].  Decoding goes through io-ts so that malformed input surfaces as
 * an ordinary failure rather than an exception.
 */

import { pipe } from 'fp-ts/lib/function'
import { Either, isLeft } from 'fp-ts/lib/Either'
import * as D from 'io-ts/lib/Decoder'

import type { Sequence } from 'lib/fib/sequence.ts'
import type { State } from 'lib/fib/state.ts'
import {
  GameError, MalformedMoveError, UnknownValueError
} from 'lib/fib/errors.ts'

import { array_fill } from 'utils/array.ts'
import { decode } from 'utils/decode.ts'
import { Result, Ok, Err } from 'utils/result.ts'

import assert from 'utils/assert.ts'

///////////////////////////////////////////////////////////////////////////////
/*
 * decoders.
 */

/*
 * non-negative integer that a double holds exactly
 */
const NaturalFromString: D.Decoder<string, number> = {
  decode: (s: string) => /^\d+$/.test(s) && Number.isSafeInteger(Number(s))
    ? D.success(Number(s))
    : D.failure<number>(s, 'a non-negative safe integer'),
};

/*
 * whitespace-separated list of non-negative integers; at least one
 */
export const Values: D.Decoder<unknown, number[]> = pipe(
  D.string,
  D.parse((s: string): Either<D.DecodeError, string[]> => {
    const tokens = s.trim().split(/\s+/).filter(tok => tok.length > 0);
    return tokens.length > 0
      ? D.success(tokens)
      : D.failure(s, 'at least one value');
  }),
  D.parse((tokens: string[]): Either<D.DecodeError, number[]> => {
    const out: number[] = [];
    for (const tok of tokens) {
      const r = NaturalFromString.decode(tok);
      if (isLeft(r)) return r;
      out.push(r.right);
    }
    return D.success(out);
  }),
);

/*
 * a starting pile size
 */
export const Count: D.Decoder<unknown, number> = pipe(
  D.string,
  D.parse((s: string) => NaturalFromString.decode(s.trim())),
  D.refine((n: number): n is number => n > 0, 'a positive integer'),
);

///////////////////////////////////////////////////////////////////////////////

/*
 * Starting pile of `n` units, i.e., n copies of the smallest value.
 *
 * This is deliberately not the Zeckendorf decomposition of `n`; that only
 * appears at the end of play.
 */
export function initial_state(n: number): State {
  assert(Number.isInteger(n) && n > 0, 'initial_state: bad pile size', n);
  return [n];
}

/*
 * Parse a move typed as a list of values.
 *
 * Fails on malformed text or on any value outside the sequence; there are no
 * partial results.
 */
export function parse(seq: Sequence, text: string): Result<State, GameError> {
  const decoded = decode(Values, text);
  if ('err' in decoded) {
    return Err(new MalformedMoveError(decoded.err));
  }

  const state: number[] = [];
  for (const v of decoded.ok) {
    const i = seq.index_of(v);
    if (i === null) return Err(UnknownValueError.from(v));

    if (i >= state.length) {
      state.push(...array_fill(i + 1 - state.length, 0));
    }
    state[i] += 1;
  }
  return Ok(state);
}

/*
 * Stringify a pile as its values, smallest first.
 */
export function render(seq: Sequence, state: State): string {
  const out: number[] = [];
  state.forEach((count, i) => {
    out.push(...array_fill(count, seq.value(i)));
  });
  return out.join(' ');
}

/*
 * Value represented by the pile.
 */
export function evaluate(seq: Sequence, state: State): number {
  return state.reduce((sum, count, i) => sum + count * seq.value(i), 0);
}
