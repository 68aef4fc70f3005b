import { resolveAnalysisConfig } from '../src/cadence/config.js';
import { DiagnosticCollector } from '../src/cadence/diagnostics.js';
import { lowerSpec } from '../src/cadence/lower.js';
import { parseCadence } from '../src/cadence/parser.js';
import { checkTypes } from '../src/cadence/type-check.js';
import { formatStreamType } from '../src/cadence/types.js';

const typeCheck = (source: string) => {
  const parsed = parseCadence(source);
  if (!parsed.success) throw new Error(parsed.diagnostic.message);
  const diagnostics = new DiagnosticCollector();
  const { graph, functions } = lowerSpec(parsed.spec, diagnostics, resolveAnalysisConfig({ warnUnusedInputs: false }));
  const { streamTypes } = checkTypes(graph, functions, diagnostics);
  const typeOf = (name: string): string | undefined => {
    const node = graph.lookup(name);
    const type = node ? streamTypes.get(node.id) : undefined;
    return type ? formatStreamType(type) : undefined;
  };
  return { typeOf, diagnostics: diagnostics.getDiagnostics() };
};

const problems = (source: string) => typeCheck(source).diagnostics.map(d => [d.code, d.message]);

describe('Type inference', () => {
  test('infers types of unannotated streams', () => {
    const { typeOf, diagnostics } = typeCheck(`
input a: Float64
input n: Int32
output double := a * 2.0
output total := n + 1
output flag := a > 1.5 && n == 3
output previous := n.offset(by: -1)
output tuple := (n, flag)
output second := tuple.1
output literal := 5
output ratio := 1.5
`);
    expect(diagnostics).toEqual([]);
    expect(typeOf('double')).toBe('Float64');
    expect(typeOf('total')).toBe('Int32');
    expect(typeOf('flag')).toBe('Bool');
    expect(typeOf('previous')).toBe('Option<Int32>');
    expect(typeOf('tuple')).toBe('(Int32, Bool)');
    expect(typeOf('second')).toBe('Bool');
    expect(typeOf('literal')).toBe('Int64');
    expect(typeOf('ratio')).toBe('Float64');
  });

  test('tracks units through arithmetic', () => {
    const { typeOf, diagnostics } = typeCheck(`
input elapsed: Float64[s]
input rate: Float64[Hz]
output cycles := elapsed * rate
output twice := elapsed + elapsed
output per := 1.0 / elapsed
output area := elapsed.aggregate(over: 10s, using: integral)
output late := elapsed > 5s
`);
    expect(diagnostics).toEqual([]);
    expect(typeOf('cycles')).toBe('Float64');
    expect(typeOf('twice')).toBe('Float64[s]');
    expect(typeOf('per')).toBe('Float64[Hz]');
    expect(typeOf('area')).toBe('Float64[s^2]');
    expect(typeOf('late')).toBe('Bool');
  });

  test('reports unit mismatches', () => {
    expect(
      problems(`
input elapsed: Float64[s]
input rate: Float64[Hz]
output bad := elapsed + rate
output wrong: Float64[ms] := rate
output cmp := elapsed > 5.0
`)
    ).toEqual([
      ['UnitMismatch', 'Cannot add a duration value and a frequency value'],
      ['UnitMismatch', "Stream 'wrong' is declared as a duration value but its expression is a frequency value"],
      ['UnitMismatch', 'Cannot compare a duration value and a dimensionless value'],
    ]);
  });

  test('reports type mismatches', () => {
    expect(
      problems(`
input a: Int64
input s: String
output x: Bool := a
output y := a + s
output z := if a then 1 else 2
output w := !a
trigger a
`)
    ).toEqual([
      ['TypeMismatch', "Stream 'x' is declared as Bool but its expression has type Int64"],
      ['TypeMismatch', "Operands of '+' have different types: Int64 and String"],
      ['TypeMismatch', 'Condition of if-then-else must be Bool, found Int64'],
      ['TypeMismatch', "Operator '!' needs a Bool operand, found Int64"],
      ['TypeMismatch', 'Trigger condition must be Bool, found Int64'],
    ]);
  });

  test('checks defaults against optional values', () => {
    const { typeOf, diagnostics } = typeCheck(`
input a: Int64
output fine := a.offset(by: -1).defaults(to: 0)
output bad := a.defaults(to: 0)
output mismatched := a.offset(by: -1).defaults(to: true)
`);
    expect(typeOf('fine')).toBe('Int64');
    expect(diagnostics.map(d => d.message)).toEqual([
      'defaults(to:) needs an optional value, found Int64',
      'Default value has type Bool but the stream yields Int64',
    ]);
  });

  test('reports projections out of range or out of non-tuples', () => {
    expect(problems('input a: Int64\noutput t := (a, a)\noutput bad := t.2\noutput other := a.0')).toEqual([
      ['TypeMismatch', 'Tuple of 2 elements has no field 2'],
      ['TypeMismatch', 'Cannot project field 0 out of Int64'],
    ]);
  });

  test('checks calls against their signatures', () => {
    const { typeOf, diagnostics } = typeCheck(`
import math
input a: Float64
input n: Int64
input d: Float64[s]
output r := sqrt(a)
output m := max(n, 3)
output bad := sqrt(n)
output arity := abs(a, a)
output u := sqrt(d)
output keep := abs(d)
`);
    expect(typeOf('r')).toBe('Float64');
    expect(typeOf('m')).toBe('Int64');
    expect(typeOf('keep')).toBe('Float64[s]');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['TypeMismatch', "Argument 1 of 'sqrt' must be float, found Int64"],
      ['TypeMismatch', "Function 'abs' takes 1 argument but 2 were given"],
      ['UnitMismatch', "Argument 1 of 'sqrt' must be dimensionless, found a duration value"],
    ]);
  });

  test('types window aggregations', () => {
    const { typeOf, diagnostics } = typeCheck(`
input a: Float64[s]
input f: Bool
output c := a.aggregate(over: 5s, using: count)
output mean := a.aggregate(over: 5s, using: avg)
output total := a.aggregate(over: 5s, using: sum)
output bad := f.aggregate(over: 5s, using: sum)
output prod := a.aggregate(over: 5s, using: product)
`);
    expect(typeOf('c')).toBe('UInt64');
    expect(typeOf('mean')).toBe('Option<Float64>[s]');
    expect(typeOf('total')).toBe('Float64[s]');
    expect(diagnostics.map(d => [d.code, d.message])).toEqual([
      ['TypeMismatch', "Window operation 'sum' needs a numeric stream, found Bool"],
      ['UnitMismatch', "Window operation 'product' needs a dimensionless stream, found a duration value"],
    ]);
  });

  test('asks for an annotation when nothing pins a type down', () => {
    const { typeOf, diagnostics } = typeCheck('output x := x.offset(by: -1).defaults(to: x)');
    expect(typeOf('x')).toBeUndefined();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: 'AmbiguousType',
      message: "Cannot infer the type of stream 'x'; add a type annotation",
      location: { start: { line: 1, column: 8 } },
    });
  });

  test('a failed use leaves the declaration of what it reads intact', () => {
    const { typeOf, diagnostics } = typeCheck('input a: Float64[s]\noutput b := a + c\noutput d := a');
    expect(diagnostics.map(d => d.code)).toEqual(['UndeclaredStream']);
    expect(typeOf('a')).toBe('Float64[s]');
    expect(typeOf('d')).toBe('Float64[s]');
  });
});
