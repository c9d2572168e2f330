/*
 * Recoverable game errors.
 *
 * These are returned, never thrown; broken invariants go through assert
 * instead.
 */

export class GameError {
  constructor(readonly msg?: string) {}
  toString(): string { return `${this.constructor.name}: ${this.msg}`; }
}
export class MalformedMoveError extends GameError {
  constructor(msg?: string) { super(msg); }
}
export class UnknownValueError extends GameError {
  static from(value: number) {
    return new UnknownValueError(`${value} is not in the sequence`);
  }
  constructor(msg?: string) { super(msg); }
}
