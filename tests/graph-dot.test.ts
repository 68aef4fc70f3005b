import { checkSource } from '../src/cadence/analyze.js';
import { formatPacing, streamGraphToDot } from '../src/cadence/graph-dot.js';
import { Rational } from '../src/cadence/rational.js';

describe('Graphviz export', () => {
  test('renders streams and the references between them', () => {
    const result = checkSource('input a: Int64 @ 1Hz\noutput b := a.offset(by: -1).defaults(to: 0) + a\ntrigger b > 3');
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(streamGraphToDot(result.program).split('\n')).toEqual([
      'digraph CadenceStreams {',
      '  rankdir=LR;',
      '  s0 [shape=box, label="a: Int64\\n@ 1Hz"];',
      '  s1 [shape=ellipse, label="b: Int64\\n@ 1Hz"];',
      '  s2 [shape=octagon, label="trigger#0: Bool\\n@ 1Hz"];',
      '  s0 -> s1 [label="-1", style=dashed];',
      '  s0 -> s1 [label="now"];',
      '  s1 -> s2 [label="now"];',
      '}',
    ]);
  });

  test('formats both kinds of pacing', () => {
    const names = ['left', 'right'];
    const nameOf = (id: number) => names[id];
    expect(formatPacing({ kind: 'periodic', frequency: Rational.of(1, 4) }, nameOf)).toBe('@ 0.25Hz');
    expect(formatPacing({ kind: 'event', activation: [[0, 1]] }, nameOf)).toBe('@ left & right');
  });
});
