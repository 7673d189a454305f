import { type Atom, NodeKind } from './ast';
import type { Clause } from './resolution';

/**
 * Key for a literal that ignores variable names: relation, polarity and
 * argument shape, with variables numbered locally by first occurrence so that
 * `p(X, X)` and `p(X, Y)` still differ.
 */
function shapeOf(atom: Atom, negated: boolean): string {
  const local: number[] = [];
  const args = atom.args.map((t) => {
    if (t.kind === NodeKind.Const) return `c${t.idx}`;
    if (!local.includes(t.idx)) local.push(t.idx);
    return `?${local.indexOf(t.idx)}`;
  });
  return `${negated ? '-' : '+'}${atom.idx}(${args.join(',')})`;
}

/**
 * Returns a key that is invariant under renaming of variables: the sorted
 * literal shapes of the clause. Alpha-equivalent clauses always share a key,
 * but clauses sharing a key may still differ in how variables are shared
 * between literals, which `isVariant` decides.
 */
export function shapeKey(clause: Clause): string {
  return clause.atoms
    .map((atom, i) => shapeOf(atom, clause.negated[i]))
    .sort()
    .join('|');
}

/**
 * Extends a bijective variable renaming so that `a` maps onto `b`. Returns
 * the new pair of maps, or null if the atoms can't be made equal by renaming.
 */
function matchAtoms(
  a: Atom,
  b: Atom,
  aToB: Map<number, number>,
  bToA: Map<number, number>
): [Map<number, number>, Map<number, number>] | null {
  if (a.idx !== b.idx) return null;
  if (a.args.length !== b.args.length) return null;

  const forward = new Map(aToB);
  const backward = new Map(bToA);
  for (let k = 0; k < a.args.length; k++) {
    const s = a.args[k];
    const t = b.args[k];
    if (s.kind === NodeKind.Const || t.kind === NodeKind.Const) {
      if (s.kind !== t.kind || s.idx !== t.idx) return null;
      continue;
    }

    const mappedS = forward.get(s.idx);
    const mappedT = backward.get(t.idx);
    if (mappedS === undefined && mappedT === undefined) {
      forward.set(s.idx, t.idx);
      backward.set(t.idx, s.idx);
    } else if (mappedS !== t.idx || mappedT !== s.idx) {
      return null;
    }
  }

  return [forward, backward];
}

/**
 * Returns true if the two clauses are equal up to a consistent renaming of
 * variables (alpha-equivalence). Both clauses are assumed to be free of
 * duplicate literals, so equivalence needs a one-to-one pairing of literals.
 */
export function isVariant(a: Clause, b: Clause): boolean {
  if (a.atoms.length !== b.atoms.length) return false;

  const used: boolean[] = b.atoms.map(() => false);

  // Backtracking search for a pairing of literals with a consistent renaming:
  const matchLiterals = (
    aIndex: number,
    aToB: Map<number, number>,
    bToA: Map<number, number>
  ): boolean => {
    if (aIndex >= a.atoms.length) {
      return true;
    }

    for (let bIndex = 0; bIndex < b.atoms.length; bIndex++) {
      if (used[bIndex]) continue;
      if (a.negated[aIndex] !== b.negated[bIndex]) continue;

      const maps = matchAtoms(a.atoms[aIndex], b.atoms[bIndex], aToB, bToA);
      if (!maps) continue;

      used[bIndex] = true;
      if (matchLiterals(aIndex + 1, ...maps)) {
        return true;
      }
      used[bIndex] = false;
    }

    return false;
  };

  return matchLiterals(0, new Map(), new Map());
}
