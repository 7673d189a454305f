import { expect } from 'chai';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { run } from './cli';

describe('cli.ts', () => {
  const runCapturing = (args: string[]) => {
    const out: string[] = [];
    const err: string[] = [];
    const code = run(
      args,
      (line) => out.push(line),
      (line) => err.push(line)
    );
    return { code, out, err };
  };

  it('should prove the bundled knowledge base', () => {
    const { code, out } = runCapturing([]);
    expect(code).to.equal(0);
    expect(out[0]).to.equal('Clauses:');
    expect(out[1]).to.equal('  #0 ¬man(X_3) ∨ mortal(X_3)');
    expect(out[6]).to.equal('  #5 ¬mortal(socrates)');
    expect(out).to.include(
      '  [2] #7 ¬man(socrates) + #8 man(socrates) => #12 ⊥ (empty clause derived)'
    );
    expect(out[out.length - 1]).to.equal('proved');
  });

  it('should print only the proof with --proof', () => {
    const { code, out } = runCapturing(['prove', '--proof']);
    expect(code).to.equal(0);
    expect(out.slice(out.indexOf('Resolution:'))).to.deep.equal([
      'Resolution:',
      '  [1] #0 ¬man(X_3) ∨ mortal(X_3) + #5 ¬mortal(socrates) => #7 ¬man(socrates)',
      '  [1] #1 ¬greek(X_4) ∨ man(X_4) + #3 greek(socrates) => #8 man(socrates)',
      '  [2] #7 ¬man(socrates) + #8 man(socrates) => #12 ⊥ (empty clause derived)',
      '',
      'proved',
    ]);
  });

  it('should not prove anything without the goals', () => {
    const { code, out } = runCapturing(['--without-goals', '--quiet']);
    expect(code).to.equal(0);
    expect(out).to.deep.equal(['not-proved']);
  });

  it('should print usage for help', () => {
    const { code, out } = runCapturing(['help']);
    expect(code).to.equal(0);
    expect(out[0]).to.match(/^Usage: refute/);
  });

  it('should reject unknown options', () => {
    const { code, err } = runCapturing(['--bogus']);
    expect(code).to.equal(1);
    expect(err[0]).to.equal("Error: Unrecognised argument '--bogus'");
  });

  describe('with a knowledge base on disk', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'refute-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read the given file', () => {
      const file = path.join(dir, 'rain.kb');
      writeFileSync(file, 'rains\n!rains | wet\n?- wet\n');
      const { code, out } = runCapturing(['-q', file]);
      expect(code).to.equal(0);
      expect(out).to.deep.equal(['proved']);
    });

    it('should fail on malformed clauses', () => {
      const file = path.join(dir, 'bad.kb');
      writeFileSync(file, 'man(socrates)\nman(socrates, plato)\n');
      const { code, out, err } = runCapturing([file]);
      expect(code).to.equal(1);
      expect(out).to.deep.equal([]);
      expect(err).to.deep.equal([
        `Malformed clause in ${file}: line 2: relation 'man' used with arity 2 but was declared with arity 1`,
      ]);
    });

    it('should fail on missing files', () => {
      const { code, err } = runCapturing([path.join(dir, 'missing.kb')]);
      expect(code).to.equal(1);
      expect(err[0]).to.match(/^Error: ENOENT/);
    });
  });
});
