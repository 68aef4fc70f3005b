import { resolveAnalysisConfig, type AnalysisConfig } from '../src/cadence/config.js';
import { DiagnosticCollector } from '../src/cadence/diagnostics.js';
import { formatPacing } from '../src/cadence/graph-dot.js';
import { lowerSpec } from '../src/cadence/lower.js';
import { analyzePacing, frequenciesCompatible } from '../src/cadence/pacing.js';
import { parseCadence } from '../src/cadence/parser.js';
import { Rational } from '../src/cadence/rational.js';

const pace = (source: string, overrides: Partial<AnalysisConfig> = {}) => {
  const parsed = parseCadence(source);
  if (!parsed.success) throw new Error(parsed.diagnostic.message);
  const diagnostics = new DiagnosticCollector();
  const config = resolveAnalysisConfig({ warnUnusedInputs: false, ...overrides });
  const { graph } = lowerSpec(parsed.spec, diagnostics, config);
  const { pacings } = analyzePacing(graph, diagnostics, config);
  const pacingOf = (name: string): string | undefined => {
    const node = graph.lookup(name);
    const pacing = node ? pacings.get(node.id) : undefined;
    return pacing ? formatPacing(pacing, id => graph.nameOf(id)) : undefined;
  };
  return { pacingOf, diagnostics: diagnostics.getDiagnostics() };
};

const problems = (source: string, overrides: Partial<AnalysisConfig> = {}) =>
  pace(source, overrides).diagnostics.map(d => [d.code, d.message]);

describe('Pacing inference', () => {
  test('frequency compatibility follows the configured policy', () => {
    const ten = Rational.of(10);
    expect(frequenciesCompatible(ten, Rational.of(5), 'integer-multiple')).toBe(true);
    expect(frequenciesCompatible(Rational.of(5), ten, 'integer-multiple')).toBe(true);
    expect(frequenciesCompatible(ten, Rational.of(3), 'integer-multiple')).toBe(false);
    expect(frequenciesCompatible(ten, Rational.of(5), 'equal')).toBe(false);
    expect(frequenciesCompatible(ten, Rational.of(10), 'equal')).toBe(true);
  });

  test('inherits the faster of two compatible periodic clocks', () => {
    const { pacingOf, diagnostics } = pace('input a: Int64 @ 10Hz\ninput b: Int64 @ 5Hz\noutput s := a + b');
    expect(diagnostics).toEqual([]);
    expect(pacingOf('a')).toBe('@ 10Hz');
    expect(pacingOf('s')).toBe('@ 10Hz');
  });

  test('does not depend on operand or declaration order', () => {
    expect(pace('input a: Int64 @ 10Hz\ninput b: Int64 @ 5Hz\noutput s := b + a').pacingOf('s')).toBe('@ 10Hz');
    expect(pace('output s := b + a\ninput a: Int64 @ 10Hz\ninput b: Int64 @ 5Hz').pacingOf('s')).toBe('@ 10Hz');
  });

  test('rejects periodic clocks that are not integer multiples', () => {
    const { pacingOf, diagnostics } = pace('input a: Int64 @ 10Hz\ninput b: Int64 @ 3Hz\noutput s := a + b');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['IncompatibleFrequency', "'s' cannot combine 10Hz with 'b' at 3Hz"],
    ]);
    // The first dependency's clock stands in, so readers of `s` are not reported again.
    expect(pacingOf('s')).toBe('@ 10Hz');
  });

  test('the equal policy rejects multiples too', () => {
    expect(problems('input a: Int64 @ 10Hz\ninput b: Int64 @ 5Hz\noutput s := a + b', { frequencyPolicy: 'equal' })).toEqual([
      ['IncompatibleFrequency', "'s' cannot combine 10Hz with 'b' at 5Hz"],
    ]);
  });

  test('combines event-driven clocks by the configured rule', () => {
    const source = 'input a: Int64\ninput b: Int64\noutput s := a + b';
    expect(pace(source).pacingOf('s')).toBe('@ a | b');
    expect(pace(source, { eventCombination: 'all' }).pacingOf('s')).toBe('@ a & b');
  });

  test('rejects mixing periodic and event-driven clocks', () => {
    expect(problems('input p: Int64 @ 1Hz\ninput e: Int64\noutput m := p + e')).toEqual([
      ['InconsistentPacing', "'m' mixes 1Hz with 'e' on events of e; annotate its pacing and use hold()"],
    ]);
  });

  test('an annotation with hold() reads across clocks', () => {
    const { pacingOf, diagnostics } = pace(
      'input p: Int64 @ 1Hz\ninput e: Int64\noutput m @ 1Hz := p + e.hold().defaults(to: 0)'
    );
    expect(diagnostics).toEqual([]);
    expect(pacingOf('m')).toBe('@ 1Hz');
  });

  test('an annotated periodic stream must match what it reads', () => {
    expect(problems('input a: Int64 @ 3Hz\noutput s @ 10Hz := a')).toEqual([
      ['IncompatibleFrequency', "'s' runs at 10Hz but reads 'a' at 3Hz"],
    ]);
    expect(problems('input e: Int64\noutput s @ 2Hz := e')).toEqual([
      [
        'InconsistentPacing',
        "'s' is paced by 2Hz but reads 'e', which is paced by events of e; use hold() to read across clocks",
      ],
    ]);
  });

  test('an activation must guarantee its current dependencies', () => {
    expect(problems('input a: Int64\ninput b: Int64\noutput x @ a := a + b')).toEqual([
      [
        'InconsistentPacing',
        "'x' is evaluated on events of a but 'b' is only available on events of b; read it with hold() or tighten the activation",
      ],
    ]);
    const { pacingOf, diagnostics } = pace('input a: Int64\ninput b: Int64\noutput x @ (a & b) := a + b');
    expect(diagnostics).toEqual([]);
    expect(pacingOf('x')).toBe('@ a & b');
  });

  test('activations naming outputs expand to their clocks', () => {
    const { pacingOf, diagnostics } = pace('input a: Int64\ninput b: Int64\noutput s := a + b\noutput t @ s := s');
    expect(diagnostics).toEqual([]);
    expect(pacingOf('t')).toBe('@ a | b');
  });

  test('activations may not name periodic streams', () => {
    const { pacingOf, diagnostics } = pace('input p: Int64 @ 1Hz\noutput q @ p := p');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['InconsistentPacing', "Activation of 'q' names 'p', which is not event-driven (1Hz)"],
    ]);
    expect(pacingOf('q')).toBe('@ 1Hz');
  });

  test('an activation may not name a stream clocked by the annotated one', () => {
    const { pacingOf, diagnostics } = pace('input a: Int64\noutput x @ y := a\noutput y := x');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['InconsistentPacing', "Activation of 'x' names 'y', whose clock depends on 'x'"],
    ]);
    expect(pacingOf('y')).toBeUndefined();
  });

  test('a stream reading nothing at the current instant needs an annotation', () => {
    const { pacingOf, diagnostics } = pace('input a: Int64\noutput c := a.offset(by: -1).defaults(to: 0)\noutput d := c + 1');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['InconsistentPacing', "'c' reads no stream at its current value, so it has no clock; add a pacing annotation"],
    ]);
    expect(pacingOf('c')).toBeUndefined();
    expect(pacingOf('d')).toBeUndefined();
  });

  test('lookahead needs the same clock and can be disabled', () => {
    const base = 'input a: Int64 @ 1Hz\noutput f @ 1Hz := a.offset(by: 1).defaults(to: 0)';
    expect(problems(base)).toEqual([]);
    expect(problems(base, { allowLookahead: false })).toEqual([
      ['IllegalLookahead', "'f' reads 'a' ahead in time, which is disabled"],
    ]);
    expect(problems('input a: Int64 @ 1Hz\noutput g @ 2Hz := a.offset(by: 1).defaults(to: 0)')).toEqual([
      ['IllegalLookahead', "'g' (2Hz) can only look ahead into streams on the same clock, but 'a' is on 1Hz"],
    ]);
  });
});
