import {
  lookup,
  MalformedClauseError,
  NodeKind,
  SymbolKind,
  type SymbolTable,
} from './ast';
import {
  type Clause,
  getResolutions,
  isEmpty,
  mayResolve,
  renderClause,
  resolve,
  standardizeApart,
} from './resolution';
import { ClauseStore } from './clause-store';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * States of a proof attempt. Every attempt starts out `Searching` and ends in
 * one of the other two.
 */
export enum ProofState {
  Searching = 'searching',
  ProvedEmpty = 'proved-empty',
  SaturatedNoProof = 'saturated-no-proof',
}

/**
 * A resolution that added a new clause to the store. All fields other than
 * `round` are store ids.
 */
export type ResolutionStep = {
  round: number;
  left: number;
  right: number;
  resolvent: number;
};

export type ProofResult = {
  state: ProofState;
  /** Every step that produced a new clause, in the order they happened. */
  steps: ResolutionStep[];
  /** Number of rounds started, including the last one. */
  rounds: number;
  store: ClauseStore;
};

/**
 * Checks that every atom in the clause uses its relation with the declared
 * arity, and that every symbol it mentions exists.
 */
export function validateClause(clause: Clause, st: SymbolTable): void {
  for (const atom of clause.atoms) {
    const rel = lookup(SymbolKind.Rel, atom.idx, st);
    if (rel.arity !== atom.args.length) {
      throw new MalformedClauseError(
        rel.symbol.description ?? `r${rel.idx}`,
        rel.arity,
        atom.args.length
      );
    }
    for (const arg of atom.args) {
      if (arg.kind === NodeKind.Var) lookup(SymbolKind.Var, arg.idx, st);
      else lookup(SymbolKind.Const, arg.idx, st);
    }
  }
}

/**
 * Runs one round of resolution over a snapshot of the store. Every pair of
 * distinct clauses in the snapshot is tried, in insertion order; clauses added
 * during the round are only paired up in the next one. Pairs of clauses that
 * both have ids below `frontier` were resolved in an earlier round and are
 * skipped.
 */
function runRound(
  store: ClauseStore,
  st: SymbolTable,
  round: number,
  frontier: number,
  steps: ResolutionStep[]
): ProofState {
  const snapshot = store.all();
  let progress = false;

  debugLogger.debug(
    LogComponent.PROVER,
    `Round ${round}: ${snapshot.length} clauses`
  );

  for (let i = 0; i < snapshot.length; i++) {
    for (let j = Math.max(i + 1, frontier); j < snapshot.length; j++) {
      const left = snapshot[i];
      const right = snapshot[j];
      if (!mayResolve(left, right)) continue;

      const [a, b] = standardizeApart(left, right, st);
      for (const resolution of getResolutions(a, b)) {
        const resolvent = resolve(resolution);
        if (!store.insert(resolvent, [left.id, right.id])) continue;

        progress = true;
        const step: ResolutionStep = {
          round,
          left: left.id,
          right: right.id,
          resolvent: store.size() - 1,
        };
        steps.push(step);

        debugLogger.logClause(
          LogComponent.RESOLUTION,
          LogLevel.DEBUG,
          `Resolved #${left.id}[${resolution.leftIdx}] with #${right.id}[${resolution.rightIdx}] into`,
          { id: step.resolvent },
          () => renderClause(resolvent, st)
        );

        if (isEmpty(resolvent)) {
          return ProofState.ProvedEmpty;
        }
      }
    }
  }

  return progress ? ProofState.Searching : ProofState.SaturatedNoProof;
}

/**
 * Attempts a refutation of the given clauses, which should include the
 * negation of the goal. Resolves clauses pairwise, round by round, until the
 * empty clause is derived or a round adds nothing new. Without factoring or
 * subsumption, resolvents of clauses with several variables can keep growing,
 * e.g. under a transitivity rule, in which case this never returns.
 *
 * Throws a `MalformedClauseError` if a seed uses a relation with the wrong
 * arity.
 */
export function saturate(seeds: Clause[], st: SymbolTable): ProofResult {
  for (const seed of seeds) validateClause(seed, st);

  const store = new ClauseStore(st);
  for (const seed of seeds) store.insert(seed);

  debugLogger.info(
    LogComponent.PROVER,
    `Starting proof attempt with ${store.size()} distinct seed clauses`
  );

  const steps: ResolutionStep[] = [];
  let rounds = 0;
  let state = store.all().some(isEmpty)
    ? ProofState.ProvedEmpty
    : ProofState.Searching;

  let frontier = 0;
  while (state === ProofState.Searching) {
    rounds++;
    const size = store.size();
    state = runRound(store, st, rounds, frontier, steps);
    frontier = size;
  }

  debugLogger.info(
    LogComponent.PROVER,
    `Finished in state ${state} after ${rounds} rounds with ${store.size()} clauses`
  );
  return { state, steps, rounds, store };
}

/**
 * The outcome of a finished proof attempt as reported to users.
 */
export function verdict(result: ProofResult): 'proved' | 'not-proved' {
  return result.state === ProofState.ProvedEmpty ? 'proved' : 'not-proved';
}

/**
 * Returns the steps that the empty clause was derived from, in the order they
 * were taken, leaving out everything the search tried along the way. Returns
 * an empty list if the attempt didn't derive the empty clause.
 */
export function proofOf(result: ProofResult): ResolutionStep[] {
  if (result.state !== ProofState.ProvedEmpty) return [];

  const byResolvent: Map<number, ResolutionStep> = new Map();
  for (const step of result.steps) byResolvent.set(step.resolvent, step);

  const needed: Set<number> = new Set();
  const visit = (id: number): void => {
    const step = byResolvent.get(id);
    if (!step || needed.has(id)) return;
    needed.add(id);
    visit(step.left);
    visit(step.right);
  };

  const empty = result.store.all().find(isEmpty);
  if (empty) visit(empty.id);

  return result.steps.filter((step) => needed.has(step.resolvent));
}

/**
 * Renders a step as `[round] #l <clause> + #r <clause> => #id <clause>`.
 */
export function renderStep(
  step: ResolutionStep,
  store: ClauseStore,
  st: SymbolTable
): string {
  const show = (id: number): string => {
    const clause = store.get(id);
    return clause ? `#${id} ${renderClause(clause, st)}` : `#${id}`;
  };

  const resolvent = store.get(step.resolvent);
  const suffix =
    resolvent && isEmpty(resolvent) ? ' (empty clause derived)' : '';
  return `[${step.round}] ${show(step.left)} + ${show(step.right)} => ${show(step.resolvent)}${suffix}`;
}
