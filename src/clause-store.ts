import type { SymbolTable } from './ast';
import { type Clause, renderClause, standardize } from './resolution';
import { isVariant, shapeKey } from './variant';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * A clause that has been accepted into a store.
 */
export interface StoredClause extends Clause {
  /** Insertion index, unique within the store. */
  id: number;

  /** Renaming-invariant key used to bucket candidates for variant checks. */
  key: string;

  /** Ids of the two clauses this one was resolved from, if any. */
  parents?: [number, number];
}

/**
 * The working set of clauses for one proof attempt. Clauses are only ever
 * added, never removed, and the store never holds two clauses that are equal
 * up to renaming of variables.
 */
export class ClauseStore {
  private clauses: StoredClause[] = [];

  /**
   * Stored clauses bucketed by `shapeKey`. Alpha-equivalent clauses always
   * land in the same bucket, so a lookup only needs full variant checks
   * against the members of one bucket:
   */
  private buckets: Map<string, StoredClause[]> = new Map();

  constructor(private readonly st: SymbolTable) {}

  /**
   * Returns true if an alpha-equivalent clause is already stored.
   */
  contains(clause: Clause): boolean {
    return this.find(clause, shapeKey(clause)) !== undefined;
  }

  /**
   * Stores a copy of the clause with fresh variables, unless an
   * alpha-equivalent clause is already stored. Returns whether the clause
   * was new.
   */
  insert(clause: Clause, parents?: [number, number]): boolean {
    const key = shapeKey(clause);
    const existing = this.find(clause, key);
    if (existing) {
      debugLogger.logClause(
        LogComponent.STORE,
        LogLevel.TRACE,
        `Skipped duplicate of clause`,
        existing,
        () => renderClause(clause, this.st)
      );
      return false;
    }

    const stored: StoredClause = {
      ...standardize(clause, this.st),
      id: this.clauses.length,
      key,
    };
    if (parents) stored.parents = parents;

    this.clauses.push(stored);
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(stored);
    } else {
      this.buckets.set(key, [stored]);
    }

    debugLogger.logClause(
      LogComponent.STORE,
      LogLevel.DEBUG,
      `Inserted clause`,
      stored,
      () => renderClause(stored, this.st)
    );
    return true;
  }

  /**
   * Returns a snapshot of the stored clauses in insertion order. Clauses
   * inserted later don't show up in a snapshot that's already been taken.
   */
  all(): readonly StoredClause[] {
    return [...this.clauses];
  }

  get(id: number): StoredClause | undefined {
    return this.clauses[id];
  }

  size(): number {
    return this.clauses.length;
  }

  private find(clause: Clause, key: string): StoredClause | undefined {
    const bucket = this.buckets.get(key);
    return bucket?.find((candidate) => isVariant(candidate, clause));
  }
}
