import { expect } from 'chai';
import { createSymbolTable, type SymbolTable } from './ast';
import { parseClause } from './parse';
import { isVariant, shapeKey } from './variant';

describe('variant.ts', () => {
  let st: SymbolTable;

  beforeEach(() => {
    st = createSymbolTable();
  });

  const variant = (a: string, b: string): boolean =>
    isVariant(parseClause(a, st), parseClause(b, st));

  it('should accept clauses that differ only in variable names', () => {
    expect(variant('p(X, Y) | q(Y)', 'q(B) | p(A, B)')).to.be.true;
  });

  it('should reject clauses that share variables differently', () => {
    expect(variant('p(X, X)', 'p(X, Y)')).to.be.false;
  });

  it('should reject clauses that share variables differently across literals', () => {
    expect(variant('p(X) | q(X)', 'p(X) | q(Y)')).to.be.false;
    expect(variant('p(X) | q(Y)', 'p(X) | q(X)')).to.be.false;
    expect(variant('p(X) | q(X)', 'p(Y) | q(Y)')).to.be.true;
  });

  it('should find the pairing when literals have the same shape', () => {
    const a = parseClause('p(X, Y) | p(Y, Y)', st);
    const b = parseClause('p(B, B) | p(A, B)', st);
    expect(shapeKey(a)).to.equal(shapeKey(b));
    expect(isVariant(a, b)).to.be.true;
  });

  it('should not treat a variable and a constant as equivalent', () => {
    expect(variant('p(a)', 'p(X)')).to.be.false;
  });

  it('should respect polarity', () => {
    expect(variant('p(X)', '!p(X)')).to.be.false;
  });

  it('should compare clause sizes', () => {
    expect(variant('p(X) | p(Y)', 'p(X)')).to.be.false;
  });

  it('should give every variant the same shape key', () => {
    const a = parseClause('!man(X) | mortal(X)', st);
    const b = parseClause('mortal(Z) | !man(Z)', st);
    expect(shapeKey(a)).to.equal(shapeKey(b));
    expect(shapeKey(a)).to.not.equal(
      shapeKey(parseClause('!man(socrates) | mortal(X)', st))
    );
  });
});
