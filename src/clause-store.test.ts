import { expect } from 'chai';
import { createSymbolTable, getVars, type SymbolTable } from './ast';
import { ClauseStore } from './clause-store';
import { parseClause } from './parse';
import { renderClause } from './resolution';

describe('clause-store.ts', () => {
  let st: SymbolTable;
  let store: ClauseStore;

  beforeEach(() => {
    st = createSymbolTable();
    store = new ClauseStore(st);
  });

  it('should initialize empty', () => {
    expect(store.size()).to.equal(0);
    expect(store.all()).to.deep.equal([]);
  });

  it('should insert new clauses and report them as new', () => {
    expect(store.insert(parseClause('!man(X) | mortal(X)', st))).to.be.true;
    expect(store.insert(parseClause('man(socrates)', st))).to.be.true;
    expect(store.size()).to.equal(2);
    expect(store.all().map((c) => c.id)).to.deep.equal([0, 1]);
  });

  it('should ignore alpha-equivalent duplicates', () => {
    store.insert(parseClause('!man(X) | mortal(X)', st));
    const duplicate = parseClause('mortal(Y) | !man(Y)', st);

    expect(store.contains(duplicate)).to.be.true;
    expect(store.insert(duplicate)).to.be.false;
    expect(store.size()).to.equal(1);
  });

  it('should keep clauses that are not alpha-equivalent', () => {
    store.insert(parseClause('!man(X) | mortal(X)', st));
    const other = parseClause('!man(X) | mortal(Y)', st);

    expect(store.contains(other)).to.be.false;
    expect(store.insert(other)).to.be.true;
    expect(store.size()).to.equal(2);
  });

  it('should hand out snapshots that later insertions do not change', () => {
    store.insert(parseClause('greek(socrates)', st));
    const snapshot = store.all();
    store.insert(parseClause('philosopher(socrates)', st));

    expect(snapshot.length).to.equal(1);
    expect(store.all().length).to.equal(2);
  });

  it('should store clauses with fresh variables', () => {
    const clause = parseClause('!man(X) | mortal(X)', st);
    store.insert(clause);

    const stored = store.get(0);
    expect(stored).to.not.be.undefined;
    if (stored) {
      expect(getVars(stored.atoms[0])).to.not.deep.equal(
        getVars(clause.atoms[0])
      );
      expect(renderClause(stored, st)).to.equal('¬man(X_1) ∨ mortal(X_1)');
    }
  });

  it('should record parents', () => {
    store.insert(parseClause('man(socrates)', st));
    store.insert(parseClause('!man(socrates)', st));
    store.insert({ atoms: [], negated: [] }, [0, 1]);
    expect(store.get(0)?.parents).to.be.undefined;
    expect(store.get(2)?.parents).to.deep.equal([0, 1]);
  });

  it('should store the empty clause once', () => {
    const empty = { atoms: [], negated: [] };
    expect(store.insert(empty)).to.be.true;
    expect(store.contains({ atoms: [], negated: [] })).to.be.true;
    expect(store.insert({ atoms: [], negated: [] })).to.be.false;
  });
});
