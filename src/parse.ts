import {
  add,
  type Atom,
  type Literal,
  lookup,
  MalformedClauseError,
  NodeKind,
  type RelSymbol,
  type SymbolEntry,
  SymbolKind,
  type SymbolTable,
  type Term,
  type Var,
} from './ast';
import { type Clause, clauseOf } from './resolution';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Token types for the lexer.
 */
export enum TokenKind {
  IDENTIFIER = 'IDENTIFIER',

  NOT = 'NOT', // ! ¬
  OR = 'OR', // | ∨
  AND = 'AND', // & ∧ (goals only)
  QUERY = 'QUERY', // ?-

  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )
  COMMA = 'COMMA', // ,

  EOF = 'EOF',
}

export interface Token {
  kind: TokenKind;
  value: string;
  pos: number;
}

export class Lexer {
  private pos = 0;
  private current = '';
  constructor(private readonly input: string) {
    this.advance();
  }

  private advance(): void {
    this.current =
      this.pos < this.input.length ? this.input.charAt(this.pos++) : '';
  }
  private peek(): string {
    return this.pos < this.input.length ? this.input.charAt(this.pos) : '';
  }
  private skipWs(): void {
    while (this.current && /\s/.test(this.current)) this.advance();
  }

  private readIdentifier(): string {
    let out = '';
    while (this.current && /[A-Za-z0-9_]/.test(this.current)) {
      out += this.current;
      this.advance();
    }
    return out;
  }

  public nextToken(): Token {
    this.skipWs();
    if (!this.current) return { kind: TokenKind.EOF, value: '', pos: this.pos };
    const start = this.pos - 1;

    switch (this.current) {
      case '(':
        this.advance();
        return { kind: TokenKind.LPAREN, value: '(', pos: start };
      case ')':
        this.advance();
        return { kind: TokenKind.RPAREN, value: ')', pos: start };
      case ',':
        this.advance();
        return { kind: TokenKind.COMMA, value: ',', pos: start };
      case '!':
      case '¬':
        this.advance();
        return {
          kind: TokenKind.NOT,
          value: this.input.charAt(start),
          pos: start,
        };
      case '|':
      case '∨':
        this.advance();
        return {
          kind: TokenKind.OR,
          value: this.input.charAt(start),
          pos: start,
        };
      case '&':
      case '∧':
        this.advance();
        return {
          kind: TokenKind.AND,
          value: this.input.charAt(start),
          pos: start,
        };
    }

    if (this.current === '?' && this.peek() === '-') {
      this.advance();
      this.advance();
      return { kind: TokenKind.QUERY, value: '?-', pos: start };
    }

    if (/[A-Za-z_]/.test(this.current)) {
      return {
        kind: TokenKind.IDENTIFIER,
        value: this.readIdentifier(),
        pos: start,
      };
    }

    throw new Error(
      `Unexpected character '${this.current}' at position ${start}`
    );
  }
}

/**
 * Parses a single line of clause syntax. Constants and relations are shared
 * through the symbol table, but variables are scoped to the line: `X` on one
 * line and `X` on another are different variables.
 */
export class Parser {
  private current = 0;
  private readonly tokens: Token[] = [];
  private readonly bindings: Map<string, SymbolEntry> = new Map();
  private readonly vars: Map<string, Var> = new Map();

  constructor(
    lexer: Lexer,
    private readonly st: SymbolTable,
    private readonly line?: number
  ) {
    let t;
    do {
      t = lexer.nextToken();
      this.tokens.push(t);
    } while (t.kind !== TokenKind.EOF);

    // existing bindings for constants and relations
    for (const entry of [...st.consts, ...st.rels]) {
      const name = entry.symbol.description;
      if (name !== undefined && !this.bindings.has(name)) {
        this.bindings.set(name, entry);
      }
    }
  }

  private peek(): Token {
    return (
      this.tokens[this.current] ?? {
        kind: TokenKind.EOF,
        value: '',
        pos: this.tokens.at(-1)?.pos ?? -1,
      }
    );
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== TokenKind.EOF) this.current++;
    return tok;
  }

  private match(...k: TokenKind[]): boolean {
    return k.includes(this.peek().kind);
  }

  private error(message: string): Error {
    return new Error(
      this.line === undefined ? message : `line ${this.line}: ${message}`
    );
  }

  private expect(kind: TokenKind): Token {
    if (!this.match(kind))
      throw this.error(`Expected ${kind} at ${this.peek().pos}`);
    return this.advance();
  }

  private expectBinding(
    name: string,
    kind: SymbolKind.Const | SymbolKind.Rel
  ): SymbolEntry | undefined {
    const b = this.bindings.get(name);
    if (!b) return undefined;
    if (b.kind !== kind)
      throw this.error(
        `Identifier ${name} already bound as different symbol kind`
      );
    return b;
  }

  private expectEnd(): void {
    if (this.peek().kind !== TokenKind.EOF)
      throw this.error(
        `Unexpected '${this.peek().value}' at ${this.peek().pos}`
      );
  }

  /**
   * Parses `l1 | l2 | ...` into a list of literals.
   */
  public parseClause(): Literal[] {
    const literals = [this.parseLiteral()];
    while (this.match(TokenKind.OR)) {
      this.advance();
      literals.push(this.parseLiteral());
    }
    this.expectEnd();
    return literals;
  }

  /**
   * Parses `?- l1 & l2 & ...` into the list of goal literals.
   */
  public parseGoal(): Literal[] {
    this.expect(TokenKind.QUERY);
    const literals = [this.parseLiteral()];
    while (this.match(TokenKind.AND)) {
      this.advance();
      literals.push(this.parseLiteral());
    }
    this.expectEnd();
    return literals;
  }

  private parseLiteral(): Literal {
    if (this.match(TokenKind.NOT)) {
      this.advance();
      const inner = this.parseLiteral();
      return { atom: inner.atom, negated: !inner.negated };
    }
    return { atom: this.parseAtom(), negated: false };
  }

  private parseAtom(): Atom {
    const nameTok = this.expect(TokenKind.IDENTIFIER);
    const id = nameTok.value;
    if (looksLikeVariable(id)) {
      throw this.error(`Expected relation at ${nameTok.pos}, found variable ${id}`);
    }

    const args: Term[] = [];
    if (this.match(TokenKind.LPAREN)) {
      this.advance();
      if (!this.match(TokenKind.RPAREN)) {
        args.push(this.parseTerm());
        while (this.match(TokenKind.COMMA)) {
          this.advance();
          args.push(this.parseTerm());
        }
      }
      this.expect(TokenKind.RPAREN);
    }

    let rel: RelSymbol;
    const bound = this.expectBinding(id, SymbolKind.Rel);
    if (bound && bound.kind === SymbolKind.Rel) {
      if (bound.arity !== args.length) {
        throw new MalformedClauseError(id, bound.arity, args.length, this.line);
      }
      rel = bound;
    } else {
      rel = add(this.st, SymbolKind.Rel, Symbol(id), args.length);
      this.bindings.set(id, rel);
    }
    return { kind: NodeKind.Atom, idx: rel.idx, args };
  }

  private parseTerm(): Term {
    const tok = this.expect(TokenKind.IDENTIFIER);
    const id = tok.value;
    if (this.match(TokenKind.LPAREN)) {
      throw this.error(`Function terms are not supported (at ${tok.pos})`);
    }

    if (looksLikeVariable(id)) {
      let v = this.vars.get(id);
      if (!v) {
        const entry = add(this.st, SymbolKind.Var, Symbol(id));
        v = { kind: NodeKind.Var, idx: entry.idx };
        this.vars.set(id, v);
      }
      return v;
    }

    const bound = this.expectBinding(id, SymbolKind.Const);
    if (bound) return { kind: NodeKind.Const, idx: bound.idx };

    const c = add(this.st, SymbolKind.Const, Symbol(id));
    this.bindings.set(id, c);
    return { kind: NodeKind.Const, idx: c.idx };
  }
}

/**
 * Parses a single clause into the given symbol table.
 */
export function parseClause(input: string, st: SymbolTable): Clause {
  return clauseOf(new Parser(new Lexer(input), st).parseClause());
}

/**
 * Parses a goal line and returns its negation as a clause: the goal
 * `?- a & b` becomes `¬a ∨ ¬b`.
 */
export function parseNegatedGoal(input: string, st: SymbolTable): Clause {
  return negateGoal(new Parser(new Lexer(input), st).parseGoal());
}

function negateGoal(goal: Literal[]): Clause {
  return clauseOf(goal.map((l) => ({ atom: l.atom, negated: !l.negated })));
}

export type KnowledgeBase = {
  /** Clauses stated directly in the knowledge base. */
  clauses: Clause[];

  /** Negations of the goals, one clause per goal line. */
  negatedGoals: Clause[];
};

/**
 * Parses a knowledge base: one clause or goal per line, `#` starts a comment.
 */
export function parseKnowledgeBase(
  input: string,
  st: SymbolTable
): KnowledgeBase {
  const kb: KnowledgeBase = { clauses: [], negatedGoals: [] };

  for (const [i, raw] of input.split(/\r?\n/).entries()) {
    const text = raw.replace(/#.*$/, '').trim();
    if (!text) continue;

    const parser = new Parser(new Lexer(text), st, i + 1);
    if (text.startsWith('?-')) {
      kb.negatedGoals.push(negateGoal(parser.parseGoal()));
    } else {
      kb.clauses.push(clauseOf(parser.parseClause()));
    }
  }

  debugLogger.info(
    LogComponent.PARSE,
    `Parsed ${kb.clauses.length} clauses and ${kb.negatedGoals.length} goals`
  );
  return kb;
}

export function renderTerm(t: Term, st: SymbolTable): string {
  switch (t.kind) {
    case NodeKind.Var:
      return lookup(SymbolKind.Var, t.idx, st).symbol.description ?? `V${t.idx}`;
    case NodeKind.Const:
      return (
        lookup(SymbolKind.Const, t.idx, st).symbol.description ?? `c${t.idx}`
      );
  }
}

export function renderAtom(atom: Atom, st: SymbolTable): string {
  const rel =
    lookup(SymbolKind.Rel, atom.idx, st).symbol.description ?? `r${atom.idx}`;
  return atom.args.length
    ? `${rel}(${atom.args.map((a) => renderTerm(a, st)).join(', ')})`
    : rel;
}

export function renderLiteral(l: Literal, st: SymbolTable): string {
  return `${l.negated ? '¬' : ''}${renderAtom(l.atom, st)}`;
}

/**
 * Return `true` if the identifier names a variable: by convention those
 * start with an upper-case letter or an underscore.
 */
function looksLikeVariable(name: string): boolean {
  return /^[A-Z_]/.test(name);
}
