/**
 * Types of nodes in the function-free clause syntax:
 */
export const enum NodeKind {
  Var, // variable term X
  Const, // constant term c
  Atom, // atomic formula R(t_1, ..., t_n) for n-ary relation R
}

/** Variable term with symbol table index. */
export type Var = { kind: NodeKind.Var; idx: number };

/** Constant term with symbol table index. */
export type Const = { kind: NodeKind.Const; idx: number };

/** Atomic formula with relation symbol index and argument terms. */
export type Atom = { kind: NodeKind.Atom; idx: number; args: Term[] };

/**
 * Represents a term. There are no function symbols, so a term is always
 * either a variable or a constant.
 */
export type Term = Var | Const;

/**
 * An atom together with its polarity.
 */
export type Literal = { atom: Atom; negated: boolean };

/**
 * Types of symbols in the language:
 */
export const enum SymbolKind {
  Var, // variable symbol X
  Const, // constant symbol c
  Rel, // relation symbol R
}

/** Variable symbol entry with index. */
export type VarSymbol = { kind: SymbolKind.Var; symbol: symbol; idx: number };

/** Constant symbol entry with index. */
export type ConstSymbol = {
  kind: SymbolKind.Const;
  symbol: symbol;
  idx: number;
};

/** Relation symbol entry with arity and index. */
export type RelSymbol = {
  kind: SymbolKind.Rel;
  symbol: symbol;
  arity: number;
  idx: number;
};

/**
 * Represents an entry in a symbol table.
 */
export type SymbolEntry = VarSymbol | ConstSymbol | RelSymbol;

/**
 * Maps variables, constants and relations to their symbols and metadata.
 * Uses symbols instead of strings, so two variables named `X` in different
 * clauses are still different variables.
 */
export type SymbolTable = {
  vars: VarSymbol[];
  consts: ConstSymbol[];
  rels: RelSymbol[];
  varToIdx: Map<symbol, number>;
  constToIdx: Map<symbol, number>;
  relToIdx: Map<symbol, number>;
};

/**
 * Represents a failure to look up a symbol in a symbol table.
 */
export class UnresolvedSymbolError extends Error {
  constructor(
    public readonly kind: SymbolKind,
    public readonly idx: number
  ) {
    super(`symbol ${kind}/${idx} could not be found in the given symbol table`);
    this.name = 'UnresolvedSymbolError';
  }
}

/**
 * Represents a literal whose arity disagrees with the arity its relation was
 * first declared with.
 */
export class MalformedClauseError extends Error {
  constructor(
    public readonly relation: string,
    public readonly expectedArity: number,
    public readonly actualArity: number,
    public readonly line?: number
  ) {
    const where = line === undefined ? '' : `line ${line}: `;
    super(
      `${where}relation '${relation}' used with arity ${actualArity} but was declared with arity ${expectedArity}`
    );
    this.name = 'MalformedClauseError';
  }
}

/**
 * Looks up a symbol by kind and index and throws if it's not found.
 */
export function lookup(
  kind: SymbolKind.Var,
  idx: number,
  st: SymbolTable
): VarSymbol;
export function lookup(
  kind: SymbolKind.Const,
  idx: number,
  st: SymbolTable
): ConstSymbol;
export function lookup(
  kind: SymbolKind.Rel,
  idx: number,
  st: SymbolTable
): RelSymbol;
export function lookup(
  kind: SymbolKind,
  idx: number,
  st: SymbolTable
): SymbolEntry {
  let res: SymbolEntry | undefined;
  switch (kind) {
    case SymbolKind.Var:
      res = st.vars[idx];
      break;
    case SymbolKind.Const:
      res = st.consts[idx];
      break;
    case SymbolKind.Rel:
      res = st.rels[idx];
      break;
    default: {
      const _exhaustive: never = kind;
      throw new Error(_exhaustive);
    }
  }

  if (res == null) {
    throw new UnresolvedSymbolError(kind, idx);
  }
  return res;
}

/**
 * Creates an empty symbol table with initialized caching maps.
 */
export function createSymbolTable(): SymbolTable {
  return {
    vars: [],
    consts: [],
    rels: [],
    varToIdx: new Map(),
    constToIdx: new Map(),
    relToIdx: new Map(),
  };
}

/**
 * Add a symbol to the given symbol table. If the symbol is already present
 * the existing entry is returned. A relation that is already present with a
 * different arity is rejected with a `MalformedClauseError`.
 */
export function add(
  st: SymbolTable,
  kind: SymbolKind.Var,
  symbol: symbol
): VarSymbol;
export function add(
  st: SymbolTable,
  kind: SymbolKind.Const,
  symbol: symbol
): ConstSymbol;
export function add(
  st: SymbolTable,
  kind: SymbolKind.Rel,
  symbol: symbol,
  arity: number
): RelSymbol;
export function add(
  st: SymbolTable,
  kind: SymbolKind,
  symbol: symbol,
  arity?: number
): SymbolEntry {
  switch (kind) {
    case SymbolKind.Var: {
      const existing = st.varToIdx.get(symbol);
      if (existing !== undefined) return st.vars[existing];
      const entry: VarSymbol = { kind, symbol, idx: st.vars.length };
      st.vars.push(entry);
      st.varToIdx.set(symbol, entry.idx);
      return entry;
    }
    case SymbolKind.Const: {
      const existing = st.constToIdx.get(symbol);
      if (existing !== undefined) return st.consts[existing];
      const entry: ConstSymbol = { kind, symbol, idx: st.consts.length };
      st.consts.push(entry);
      st.constToIdx.set(symbol, entry.idx);
      return entry;
    }
    case SymbolKind.Rel: {
      if (arity == null) {
        throw new Error(`expected relation symbol to have an arity`);
      }
      const existing = st.relToIdx.get(symbol);
      if (existing !== undefined) {
        const rel = st.rels[existing];
        if (rel.arity !== arity) {
          throw new MalformedClauseError(
            symbol.description ?? `R${rel.idx}`,
            rel.arity,
            arity
          );
        }
        return rel;
      }
      const entry: RelSymbol = { kind, symbol, arity, idx: st.rels.length };
      st.rels.push(entry);
      st.relToIdx.set(symbol, entry.idx);
      return entry;
    }
    default: {
      const _exhaustive: never = kind;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Adds a brand new variable to the symbol table, named after `base` with a
 * numeric suffix. Any suffix already on `base` is replaced, so repeated
 * renaming doesn't grow names without bound.
 */
export function freshVar(st: SymbolTable, base: VarSymbol): Var {
  const stem = (base.symbol.description ?? 'X').replace(/_\d+$/, '');
  const entry = add(st, SymbolKind.Var, Symbol(`${stem}_${st.vars.length}`));
  return { kind: NodeKind.Var, idx: entry.idx };
}

export type NodeConstructor<T> = (fns: {
  var: (sym: symbol) => Var;
  const: (sym: symbol) => Const;
  atom: (sym: symbol, ...args: Term[]) => Atom;
  pos: (atom: Atom) => Literal;
  neg: (atom: Atom) => Literal;
}) => T;

/**
 * Higher-level constructor for nodes that works with Symbols natively and
 * handles the symbol table for you. Mostly useful in tests, where going
 * through the parser would hide what's being built.
 */
export function construct<T>(st: SymbolTable, nc: NodeConstructor<T>): T {
  return nc({
    var: (sym: symbol) => {
      const entry = add(st, SymbolKind.Var, sym);
      return { kind: NodeKind.Var, idx: entry.idx };
    },
    const: (sym: symbol) => {
      const entry = add(st, SymbolKind.Const, sym);
      return { kind: NodeKind.Const, idx: entry.idx };
    },
    atom: (sym: symbol, ...args: Term[]) => {
      const entry = add(st, SymbolKind.Rel, sym, args.length);
      return { kind: NodeKind.Atom, idx: entry.idx, args };
    },
    pos: (atom: Atom) => ({ atom, negated: false }),
    neg: (atom: Atom) => ({ atom, negated: true }),
  });
}

/**
 * Returns the distinct variables of an atom in order of first occurrence.
 */
export function getVars(f: Atom): number[] {
  const vars: number[] = [];
  for (const arg of f.args) {
    if (arg.kind === NodeKind.Var && !vars.includes(arg.idx)) {
      vars.push(arg.idx);
    }
  }
  return vars;
}

/**
 * Returns true if the given terms or atoms are equal syntactically.
 */
export function equal(f: Atom | Term, g: Atom | Term): boolean {
  switch (f.kind) {
    case NodeKind.Var:
      if (g.kind != NodeKind.Var) return false;
      return f.idx == g.idx;
    case NodeKind.Const:
      if (g.kind != NodeKind.Const) return false;
      return f.idx == g.idx;
    case NodeKind.Atom:
      if (g.kind != NodeKind.Atom) return false;
      return (
        f.idx == g.idx &&
        f.args.length == g.args.length &&
        f.args.every((sub, i) => equal(sub, g.args[i]))
      );
    default: {
      const _exhaustive: never = f;
      throw new Error(_exhaustive);
    }
  }
}
