import { DiagnosticCollector } from '../src/cadence/diagnostics.js';

const at = (offset: number) => ({
  start: { line: 1, column: offset + 1, offset },
  end: { line: 1, column: offset + 2, offset: offset + 1 },
});

describe('DiagnosticCollector', () => {
  test('counts by kind and tells errors from warnings', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.warning('UnusedStream', "Input stream 'a' is never used", at(0));
    expect(diagnostics.hasErrors()).toBe(false);
    diagnostics.error('UndeclaredStream', "Undeclared stream 'b'", at(4));
    diagnostics.error('UndeclaredStream', "Undeclared stream 'c'", at(8));
    expect(diagnostics.hasErrors()).toBe(true);
    expect(diagnostics.count('UndeclaredStream')).toBe(2);
    expect(diagnostics.count('IllegalCycle')).toBe(0);
  });

  test('sorts errors first, then by position, then by reporting order', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.warning('UnusedStream', 'w', at(0));
    diagnostics.error('TypeMismatch', 'late', at(9));
    diagnostics.error('UnitMismatch', 'first', at(3));
    diagnostics.error('TypeMismatch', 'second', at(3));
    expect(diagnostics.sorted().map(d => d.message)).toEqual(['first', 'second', 'late', 'w']);
    expect(diagnostics.getDiagnostics().map(d => d.message)).toEqual(['w', 'late', 'first', 'second']);
  });

  test('fills in defaults for what a report leaves out', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.error('IllegalCycle', 'loop');
    expect(diagnostics.getDiagnostics()).toEqual([
      {
        severity: 'error',
        code: 'IllegalCycle',
        message: 'loop',
        location: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 1, offset: 0 } },
        streams: [],
        source: 'cadence',
      },
    ]);
  });
});
