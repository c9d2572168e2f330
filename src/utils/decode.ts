/*
 * interface for interacting with decode results.
 *
 * io-ts just leaks its fp-ts representations; this hides them again.
 */

import { pipe } from 'fp-ts/lib/function'
import { fold } from 'fp-ts/lib/Either'

import * as D from 'io-ts/lib/Decoder'

import { Result, Ok, Err } from 'utils/result.ts'

export function on_decode<I, A, R1, R2>(
  decoder: D.Decoder<I, A>,
  input: I,
  onsuccess: (value: A) => R1,
  onfail: (err: D.DecodeError) => R2,
): R1 | R2 {
  return pipe(decoder.decode(input), fold(
    (e: D.DecodeError): R1 | R2 => onfail(e),
    (v: A): R1 | R2 => onsuccess(v)
  ));
}

/*
 * decode `input`, drawing any failure into a human-readable message
 */
export function decode<I, A>(
  decoder: D.Decoder<I, A>,
  input: I,
): Result<A, string> {
  return on_decode(
    decoder,
    input,
    (v: A) => Ok<A, string>(v),
    (e: D.DecodeError) => Err<A, string>(D.draw(e)),
  );
}
