#!/usr/bin/env node

import { readFileSync } from 'fs';
import * as path from 'path';
import { createSymbolTable, MalformedClauseError } from './ast';
import { parseKnowledgeBase } from './parse';
import { renderClause } from './resolution';
import { proofOf, renderStep, saturate, verdict } from './prover';

export const DEFAULT_KNOWLEDGE_BASE = path.join(
  __dirname,
  '..',
  'knowledge',
  'socrates.kb'
);

function usage(): string {
  return `Usage: refute [COMMAND] [OPTIONS] [FILE]

COMMANDS:
  prove                Run a resolution refutation on FILE (default)
  help                 Show this help message

OPTIONS:
  --without-goals      Leave out the negated goals, i.e. only saturate the
                       knowledge base itself
  --proof              Only print the steps the empty clause was derived
                       from, instead of every step taken
  -q, --quiet          Only print the verdict
  -h, --help           Show help message

Without FILE the bundled knowledge base is used:
  ${DEFAULT_KNOWLEDGE_BASE}

KNOWLEDGE BASE SYNTAX (one clause per line, # starts a comment):
  Clause:             !man(X) | mortal(X)    or  ¬man(X) ∨ mortal(X)
  Fact:               greek(socrates)
  Goal:               ?- mortal(socrates) & thinker(socrates)
  Variables start with an upper-case letter or _, everything else is a
  constant. Variables are local to their line.`;
}

/**
 * Runs the command line with the given arguments, writing output through
 * `out` and errors through `err`. Returns the exit code.
 */
export function run(
  args: string[],
  out: (line: string) => void = (line) => console.log(line),
  err: (line: string) => void = (line) => console.error(line)
): number {
  if (args.includes('-h') || args.includes('--help') || args[0] === 'help') {
    out(usage());
    return 0;
  }

  const quiet = args.includes('-q') || args.includes('--quiet');
  const withoutGoals = args.includes('--without-goals');
  const proofOnly = args.includes('--proof');
  const positional = args.filter((a) => !a.startsWith('-'));
  if (positional[0] === 'prove') positional.shift();

  const unknown = args.find(
    (a) =>
      a.startsWith('-') && !['-q', '--quiet', '--without-goals', '--proof'].includes(a)
  );
  if (unknown !== undefined || positional.length > 1) {
    err(`Error: Unrecognised argument '${unknown ?? positional[1]}'`);
    err('Use "refute help" for usage information');
    return 1;
  }

  const file = positional[0] ?? DEFAULT_KNOWLEDGE_BASE;

  try {
    const st = createSymbolTable();
    const kb = parseKnowledgeBase(readFileSync(file, 'utf8'), st);
    const seeds = withoutGoals
      ? kb.clauses
      : [...kb.clauses, ...kb.negatedGoals];

    const result = saturate(seeds, st);

    if (!quiet) {
      out('Clauses:');
      for (const clause of result.store.all().filter((c) => !c.parents)) {
        out(`  #${clause.id} ${renderClause(clause, st)}`);
      }
      out('');
      out('Resolution:');
      const steps = proofOnly ? proofOf(result) : result.steps;
      for (const step of steps) {
        out(`  ${renderStep(step, result.store, st)}`);
      }
      out('');
    }
    out(verdict(result));
    return 0;
  } catch (error) {
    if (error instanceof MalformedClauseError) {
      err(`Malformed clause in ${file}: ${error.message}`);
    } else {
      err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exit(run(process.argv.slice(2)));
}
