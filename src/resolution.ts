import {
  type Atom,
  equal,
  freshVar,
  type Literal,
  lookup,
  NodeKind,
  SymbolKind,
  type SymbolTable,
  type Term,
  type Var,
} from './ast';
import { apply, matchComplementary, type Substitution } from './unify';
import { renderLiteral } from './parse';

/**
 * A clause represents a disjunction of atomic formulas or their negations.
 * The clause with no atoms is the empty clause, i.e. falsehood.
 */
export type Clause = {
  atoms: Atom[];
  negated: boolean[];
};

/**
 * Builds a clause from a list of literals, dropping duplicates.
 */
export function clauseOf(literals: Literal[]): Clause {
  return removeDuplicates(
    literals.map((l) => l.atom),
    literals.map((l) => l.negated)
  );
}

/**
 * Returns the i'th literal of a clause.
 */
export function literalAt(clause: Clause, i: number): Literal {
  return { atom: clause.atoms[i], negated: clause.negated[i] };
}

export function isEmpty(clause: Clause): boolean {
  return clause.atoms.length === 0;
}

/**
 * A possible resolution between an atom in one clause and a negative of the
 * same atom in another clause. A resolution is just a unification of the two
 * atoms, ignoring the negative.
 */
export type Resolution = {
  left: Clause;
  leftIdx: number;
  right: Clause;
  rightIdx: number;
  sub: Substitution;
};

/**
 * Returns true if some literal of `a` has the same relation as some literal
 * of `b` with opposite polarity. This is a necessary condition for the two
 * clauses to resolve, and doesn't need the clauses to be standardised apart.
 */
export function mayResolve(a: Clause, b: Clause): boolean {
  for (const [i, atomA] of a.atoms.entries()) {
    for (const [j, atomB] of b.atoms.entries()) {
      if (atomA.idx === atomB.idx && a.negated[i] !== b.negated[j]) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Returns a list of valid resolutions between the two clauses, ordered by
 * the left literal and then the right literal.
 */
export function getResolutions(a: Clause, b: Clause): Resolution[] {
  const res: Resolution[] = [];
  for (let i = 0; i < a.atoms.length; i++) {
    for (let j = 0; j < b.atoms.length; j++) {
      const sub = matchComplementary(literalAt(a, i), literalAt(b, j));
      if (sub) {
        res.push({ left: a, leftIdx: i, right: b, rightIdx: j, sub });
      }
    }
  }
  return res;
}

/**
 * Removes duplicate literals from a clause.
 */
function removeDuplicates(atoms: Atom[], negated: boolean[]): Clause {
  const uniqueAtoms: Atom[] = [];
  const uniqueNegated: boolean[] = [];

  for (let i = 0; i < atoms.length; i++) {
    let isDuplicate = false;
    for (let j = 0; j < uniqueAtoms.length; j++) {
      if (negated[i] === uniqueNegated[j] && equal(atoms[i], uniqueAtoms[j])) {
        isDuplicate = true;
        break;
      }
    }

    if (!isDuplicate) {
      uniqueAtoms.push(atoms[i]);
      uniqueNegated.push(negated[i]);
    }
  }

  return { atoms: uniqueAtoms, negated: uniqueNegated };
}

/**
 * Applies a resolution to create a new clause. The new clause contains atoms
 * from both clauses (except the unified atoms) with the substitution applied,
 * left clause first.
 *
 * Resolving a clause against itself, or on literals that the substitution
 * doesn't make complementary, is a bug in the caller and throws.
 */
export function resolve(resolution: Resolution): Clause {
  const { left, leftIdx, right, rightIdx, sub } = resolution;

  if (left === right) {
    throw new Error(`cannot resolve a clause with itself`);
  }
  const l = apply(sub, left.atoms[leftIdx]);
  const r = apply(sub, right.atoms[rightIdx]);
  if (left.negated[leftIdx] === right.negated[rightIdx] || !equal(l, r)) {
    throw new Error(
      `literals ${leftIdx} and ${rightIdx} are not complementary under the given substitution`
    );
  }

  const atoms: Atom[] = [];
  const negated: boolean[] = [];
  for (let i = 0; i < left.atoms.length; i++) {
    if (i !== leftIdx) {
      atoms.push(apply(sub, left.atoms[i]));
      negated.push(left.negated[i]);
    }
  }
  for (let i = 0; i < right.atoms.length; i++) {
    if (i !== rightIdx) {
      atoms.push(apply(sub, right.atoms[i]));
      negated.push(right.negated[i]);
    }
  }

  return removeDuplicates(atoms, negated);
}

/**
 * Returns a copy of the clause with every variable replaced by a fresh one.
 */
export function standardize(clause: Clause, st: SymbolTable): Clause {
  const renaming: Map<number, Var> = new Map();
  const rename = (t: Term): Term => {
    if (t.kind !== NodeKind.Var) return t;
    let fresh = renaming.get(t.idx);
    if (!fresh) {
      fresh = freshVar(st, lookup(SymbolKind.Var, t.idx, st));
      renaming.set(t.idx, fresh);
    }
    return fresh;
  };

  return {
    atoms: clause.atoms.map((atom) => ({ ...atom, args: atom.args.map(rename) })),
    negated: [...clause.negated],
  };
}

/**
 * Renames both clauses so they share no variables, with each other or with
 * anything else in the symbol table.
 */
export function standardizeApart(
  a: Clause,
  b: Clause,
  st: SymbolTable
): [Clause, Clause] {
  return [standardize(a, st), standardize(b, st)];
}

/**
 * Renders a clause as a human-readable string.
 */
export function renderClause(clause: Clause, st: SymbolTable): string {
  if (clause.atoms.length === 0) {
    return '⊥'; // empty clause
  }

  return clause.atoms
    .map((atom, i) => renderLiteral({ atom, negated: clause.negated[i] }, st))
    .join(' ∨ ');
}
