import { checkSource } from '../src/cadence/analyze.js';
import {
  describeError,
  formatDiagnostic,
  formatDiagnostics,
  formatSummary,
  getLocationFromOffset,
  highlightSnippet,
} from '../src/utils/index.js';

const source = 'input a: Int64 @ 1Hz\noutput b := a + c';

describe('Diagnostic formatting', () => {
  test('renders a diagnostic with its source line and a summary', () => {
    const { diagnostics } = checkSource(source);
    expect(formatDiagnostics(diagnostics, source, { useColors: false, file: 'monitor.cdc' })).toBe(
      [
        "error[UndeclaredStream]: Undeclared stream 'c'",
        '  --> monitor.cdc:2:17',
        '2 | output b := a + c',
        '  | ' + ' '.repeat(16) + '^',
        '',
        '1 error',
      ].join('\n')
    );
  });

  test('lists related locations as notes', () => {
    const { diagnostics } = checkSource('input a: Int64\ninput a: Bool\noutput b := a', { warnUnusedInputs: false });
    expect(diagnostics).toHaveLength(1);
    expect(formatDiagnostic(diagnostics[0], undefined, { useColors: false })).toBe(
      [
        "error[DuplicateDeclaration]: Stream 'a' is declared more than once",
        '  --> 2:7',
        "  note: 'a' is first declared here (1:7-1:8)",
      ].join('\n')
    );
  });

  test('colors the severity when asked to', () => {
    const { diagnostics } = checkSource(source);
    const rendered = formatDiagnostic(diagnostics[0], source, { useColors: true, snippet: false });
    expect(rendered.split('\n')[0]).toBe("\u001b[31m\u001b[1merror\u001b[22m\u001b[39m[UndeclaredStream]: Undeclared stream 'c'");
  });

  test('summarizes counts', () => {
    const { diagnostics } = checkSource('input unused: Int64\ninput a: Int64\noutput b := a + c');
    expect(formatSummary(diagnostics, false)).toBe('1 error, 1 warning');
    expect(formatSummary([], false)).toBe('no problems found');
    expect(formatDiagnostics([], source, { useColors: false })).toBe('no problems found');
  });

  test('highlights a range with surrounding lines', () => {
    const location = { start: { line: 2, column: 2, offset: 5 }, end: { line: 2, column: 4, offset: 7 } };
    expect(highlightSnippet('one\ntwo\nthree', location, { useColor: false })).toBe(
      ['1 | one', '2 | two', '  |  ^^', '3 | three'].join('\n')
    );
    const outside = { start: { line: 9, column: 1, offset: 0 }, end: { line: 9, column: 2, offset: 0 } };
    expect(highlightSnippet('one', outside, { useColor: false })).toBe('');
  });

  test('converts offsets to lines and columns', () => {
    expect(getLocationFromOffset('ab\ncd', 4)).toEqual({ line: 2, column: 2 });
    expect(getLocationFromOffset('ab\ncd', 0)).toEqual({ line: 1, column: 1 });
  });

  test('describes anything thrown', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('Unknown error');
  });
});
