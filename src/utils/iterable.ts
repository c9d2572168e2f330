/*
 * Iterable utilities.
 */

export function* range(start: number, end: number): Generator<number, void> {
  for (let i = start; i < end; ++i) yield i;
}
