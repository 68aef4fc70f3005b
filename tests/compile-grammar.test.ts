import path from 'node:path';
import {
  GrammarCompilationError,
  compileGrammar,
  compileGrammarFromFile,
  isPeggyError,
  resolveGrammarPath,
} from '../src/grammar/index.js';

const durations = `
Duration = value:Number unit:Unit { return value * unit; }
Number = digits:$[0-9]+ { return parseInt(digits, 10); }
Unit = "ms" { return 1; } / "s" { return 1000; }
`;

describe('compileGrammar', () => {
  test('compiles a grammar into a working parser', () => {
    const parser = compileGrammar(durations);
    expect(parser.grammarSource).toBe('inline');
    expect(parser.parse('5s')).toBe(5000);
    expect(parser.parse('250ms')).toBe(250);
  });

  test('syntax errors of the generated parser carry a location', () => {
    const parser = compileGrammar(durations);
    let caught: unknown;
    try {
      parser.parse('5 s');
    } catch (error: unknown) {
      caught = error;
    }
    expect(isPeggyError(caught)).toBe(true);
    if (isPeggyError(caught)) expect(caught.location.start).toMatchObject({ line: 1, column: 2 });
  });

  test('wraps grammar errors with the grammar source', () => {
    const compile = () => compileGrammar('Start = Missing', { grammarSource: 'broken.peg' });
    expect(compile).toThrow(GrammarCompilationError);
    expect(compile).toThrow(/^Grammar compilation failed \(broken\.peg:1:\d+\): /);
    expect(compile).toThrow('Rule "Missing" is not defined');
  });

  test('loads the bundled Cadence grammar from disk', () => {
    const grammarPath = resolveGrammarPath([
      path.resolve(__dirname, 'missing.peg'),
      path.resolve(__dirname, '../src/grammar/cadence.peg'),
    ]);
    const parser = compileGrammarFromFile(grammarPath, { allowedStartRules: ['Spec'] });
    expect(parser.grammarSource).toBe('cadence.peg');
    expect(parser.parse('input a: Int64')).toMatchObject({ type: 'Spec' });
  });

  test('reports every place it looked for a grammar', () => {
    expect(() => resolveGrammarPath(['/nowhere/a.peg', '/nowhere/b.peg'])).toThrow(
      'Grammar not found. Looked in:\n  - /nowhere/a.peg\n  - /nowhere/b.peg'
    );
  });
});
