import { type Atom, equal, type Literal, NodeKind, type Term } from './ast';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Represents a mapping from variables to terms.
 */
export type Substitution = Map<number, Term>;

/**
 * Follows variable bindings in `sub` until reaching a constant or an unbound
 * variable.
 */
export function walk(sub: Substitution, t: Term): Term {
  let current = t;
  let next = current.kind === NodeKind.Var ? sub.get(current.idx) : undefined;
  while (next !== undefined) {
    current = next;
    next = current.kind === NodeKind.Var ? sub.get(current.idx) : undefined;
  }
  return current;
}

/**
 * Applies a substitution to the variables in a term or atom.
 */
export function apply(sub: Substitution, f: Term): Term;
export function apply(sub: Substitution, f: Atom): Atom;
export function apply(sub: Substitution, f: Term | Atom): Term | Atom {
  if (f.kind === NodeKind.Atom) {
    return { ...f, args: f.args.map((arg) => walk(sub, arg)) };
  }
  return walk(sub, f);
}

/**
 * Returns the most general substitution making each of the pairs of input
 * terms equal to each other. Terms are only ever variables or constants, so
 * this never needs an occurs-check: a binding can't contain the variable it
 * binds.
 *
 * Extends `sub` if given, without mutating it.
 */
export function unify(
  terms: [Term, Term][],
  sub: Substitution = new Map()
): Substitution | undefined {
  const result: Substitution = new Map(sub);

  for (const [l, r] of terms) {
    const left = walk(result, l);
    const right = walk(result, r);
    if (equal(left, right)) continue;

    if (left.kind === NodeKind.Var) {
      result.set(left.idx, right);
    } else if (right.kind === NodeKind.Var) {
      result.set(right.idx, left);
    } else {
      return undefined; // distinct constants
    }
  }

  // Resolve chains like X -> Y -> c so callers can substitute in one step:
  for (const [idx, term] of result) {
    result.set(idx, walk(result, term));
  }

  return result;
}

/**
 * Friendly wrapper around `unify` for Atoms.
 */
export function unifyAtoms(a: Atom, b: Atom): Substitution | undefined {
  if (a.idx != b.idx) return undefined;
  if (a.args.length != b.args.length) return undefined;

  const pairs: [Term, Term][] = [];
  for (let i = 0; i < a.args.length; i++) {
    pairs.push([a.args[i], b.args[i]]);
  }

  return unify(pairs);
}

/**
 * Decides whether two literals are complementary, i.e. have the same relation
 * and arity, opposite polarity and unifiable arguments. The clauses owning
 * the literals must already have been standardised apart, otherwise a
 * variable shared by accident would be bound on both sides at once.
 */
export function matchComplementary(
  a: Literal,
  b: Literal
): Substitution | undefined {
  if (a.negated === b.negated) return undefined;
  if (a.atom.idx !== b.atom.idx) return undefined;
  if (a.atom.args.length !== b.atom.args.length) return undefined;

  const sub = unifyAtoms(a.atom, b.atom);
  if (sub) {
    debugLogger.trace(
      LogComponent.UNIFY,
      `Complementary literals on relation ${a.atom.idx} with ${sub.size} bindings`
    );
  }
  return sub;
}
