import { Sequence } from 'lib/fib/sequence.ts'
import {
  Count, initial_state, parse, render, evaluate
} from 'lib/fib/codec.ts'
import {
  MalformedMoveError, UnknownValueError
} from 'lib/fib/errors.ts'

import { decode } from 'utils/decode.ts'
import { assertOk, assertErr } from 'utils/result.ts'

import {expect} from 'chai'

describe('codec', () => {
  const seq = new Sequence();

  it('starts from a pile of ones', () => {
    expect(initial_state(1)).to.deep.equal([1]);
    expect(initial_state(4)).to.deep.equal([4]);
    expect(() => initial_state(0)).to.throw();
    expect(() => initial_state(2.5)).to.throw();
  });

  it('renders values in increasing order', () => {
    expect(render(seq, [1, 0, 1])).to.equal('1 3');
    expect(render(seq, [3])).to.equal('1 1 1');
    expect(render(seq, [2, 0, 1])).to.equal('1 1 3');
    expect(render(seq, [0, 0, 0, 1])).to.equal('5');
  });

  it('evaluates piles', () => {
    expect(evaluate(seq, [4])).to.equal(4);
    expect(evaluate(seq, [2, 0, 1])).to.equal(5);
    expect(evaluate(seq, [1, 0, 0, 1])).to.equal(6);
  });

  it('parses values into a pile', () => {
    const state = assertOk(parse(seq, '3 1'));
    expect(state).to.deep.equal([1, 0, 1]);
    expect(render(seq, state)).to.equal('1 3');

    expect(assertOk(parse(seq, '  2   2 '))).to.deep.equal([0, 2]);
    expect(assertOk(parse(seq, '5'))).to.deep.equal([0, 0, 0, 1]);
  });

  it('rejects values outside the sequence', () => {
    let err = assertErr(parse(seq, '4'));
    expect(err).to.be.an.instanceof(UnknownValueError);
    expect(err.msg).to.equal('4 is not in the sequence');

    err = assertErr(parse(seq, '1 2 0'));
    expect(err).to.be.an.instanceof(UnknownValueError);
    expect(err.msg).to.equal('0 is not in the sequence');
  });

  it('rejects malformed text', () => {
    for (const text of ['', '   ', '1 x', '-1', '2.5', '1,2']) {
      expect(assertErr(parse(seq, text)))
        .to.be.an.instanceof(MalformedMoveError);
    }
  });

  it('only accepts values a double holds exactly', () => {
    const huge = '1' + '0'.repeat(400);
    expect(assertErr(parse(seq, huge)))
      .to.be.an.instanceof(MalformedMoveError);
    expect(assertErr(parse(seq, '23416728348467685')))
      .to.be.an.instanceof(MalformedMoveError);

    // largest member below 2^53 is value(76)
    const state = assertOk(parse(seq, '8944394323791464'));
    expect(state).to.have.length(77);
    expect(state[76]).to.equal(1);

    const err = assertErr(parse(seq, '8944394323791465'));
    expect(err).to.be.an.instanceof(UnknownValueError);
  });

  it('decodes pile sizes', () => {
    expect(assertOk(decode(Count, '12'))).to.equal(12);
    expect(assertOk(decode(Count, ' 7 '))).to.equal(7);
    assertErr(decode(Count, '0'));
    assertErr(decode(Count, 'abc'));
    assertErr(decode(Count, 5));
    assertErr(decode(Count, '9007199254740993'));
  });
});
