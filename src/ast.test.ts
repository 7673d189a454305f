import { expect } from 'chai';
import {
  add,
  construct,
  createSymbolTable,
  equal,
  freshVar,
  getVars,
  lookup,
  MalformedClauseError,
  NodeKind,
  SymbolKind,
  UnresolvedSymbolError,
} from './ast';

describe('ast.ts', () => {
  describe('symbol table', () => {
    it('should return the existing entry when a symbol is added twice', () => {
      const st = createSymbolTable();
      const a = Symbol('a');
      const first = add(st, SymbolKind.Const, a);
      const second = add(st, SymbolKind.Const, a);
      expect(second).to.equal(first);
      expect(st.consts.length).to.equal(1);
    });

    it('should keep symbols with the same name distinct', () => {
      const st = createSymbolTable();
      const x1 = add(st, SymbolKind.Var, Symbol('X'));
      const x2 = add(st, SymbolKind.Var, Symbol('X'));
      expect(x1.idx).to.equal(0);
      expect(x2.idx).to.equal(1);
    });

    it('should reject a relation reused with a different arity', () => {
      const st = createSymbolTable();
      const man = Symbol('man');
      add(st, SymbolKind.Rel, man, 1);
      expect(() => add(st, SymbolKind.Rel, man, 2))
        .to.throw(MalformedClauseError)
        .with.property(
          'message',
          "relation 'man' used with arity 2 but was declared with arity 1"
        );
    });

    it('should throw when looking up a missing symbol', () => {
      const st = createSymbolTable();
      expect(() => lookup(SymbolKind.Rel, 3, st)).to.throw(
        UnresolvedSymbolError
      );
    });
  });

  describe('freshVar', () => {
    it('should name fresh variables after their base', () => {
      const st = createSymbolTable();
      const x = add(st, SymbolKind.Var, Symbol('X'));
      const x1 = freshVar(st, x);
      expect(lookup(SymbolKind.Var, x1.idx, st).symbol.description).to.equal(
        'X_1'
      );

      const x2 = freshVar(st, lookup(SymbolKind.Var, x1.idx, st));
      expect(lookup(SymbolKind.Var, x2.idx, st).symbol.description).to.equal(
        'X_2'
      );
    });
  });

  describe('construct', () => {
    it('should build atoms and literals through the symbol table', () => {
      const st = createSymbolTable();
      const x = Symbol('X');
      const lit = construct(st, (f) =>
        f.neg(f.atom(Symbol('greek'), f.var(x)))
      );
      expect(lit.negated).to.be.true;
      expect(lit.atom.kind).to.equal(NodeKind.Atom);
      expect(lit.atom.args).to.deep.equal([{ kind: NodeKind.Var, idx: 0 }]);
      expect(st.rels[0].arity).to.equal(1);
    });
  });

  describe('equal and getVars', () => {
    it('should compare atoms structurally', () => {
      const st = createSymbolTable();
      const p = Symbol('p');
      const a = Symbol('a');
      const x = Symbol('X');
      const [l, r, s] = construct(st, (f) => [
        f.atom(p, f.var(x), f.const(a)),
        f.atom(p, f.var(x), f.const(a)),
        f.atom(p, f.const(a), f.const(a)),
      ]);
      expect(equal(l, r)).to.be.true;
      expect(equal(l, s)).to.be.false;
    });

    it('should list distinct variables in order of first occurrence', () => {
      const st = createSymbolTable();
      const [x, y] = [Symbol('X'), Symbol('Y')];
      const atom = construct(st, (f) =>
        f.atom(Symbol('p'), f.var(y), f.const(Symbol('a')), f.var(x), f.var(y))
      );
      expect(getVars(atom)).to.deep.equal([0, 1]);
    });
  });
});
