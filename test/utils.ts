import { array_fill, array_choose } from 'utils/array.ts'
import { range } from 'utils/iterable.ts'
import {
  Ok, Err, fold, isOk, isErr, assertOk, assertErr
} from 'utils/result.ts'

import {expect} from 'chai'

describe('array utilities', () => {
  it('fills arrays', () => {
    expect(array_fill(3, 0)).to.deep.equal([0, 0, 0]);
    expect(array_fill(0, 7)).to.deep.equal([]);
  });

  it('chooses by rng', () => {
    const arr = ['x', 'y', 'z'];
    expect(array_choose(arr, () => 0)).to.equal('x');
    expect(array_choose(arr, () => 0.5)).to.equal('y');
    expect(array_choose(arr, () => 0.999)).to.equal('z');
    expect(() => array_choose([], () => 0)).to.throw();
  });

  it('ranges', () => {
    expect([...range(2, 5)]).to.deep.equal([2, 3, 4]);
    expect([...range(3, 3)]).to.be.empty;
  });
});

describe('Result', () => {
  it('folds both ways', () => {
    const ok = Ok<number, string>(3);
    const err = Err<number, string>('nope');

    expect(fold(ok, v => v + 1, e => e.length)).to.equal(4);
    expect(fold(err, v => v + 1, e => e.length)).to.equal(4);

    expect(isOk(ok)).to.be.true;
    expect(isErr(err)).to.be.true;
    expect(assertOk(ok)).to.equal(3);
    expect(assertErr(err)).to.equal('nope');
    expect(() => assertOk(err)).to.throw();
    expect(() => assertErr(ok)).to.throw();
  });
});
