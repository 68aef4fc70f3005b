import { SnapshotOrderError, Unifier, type Lattice } from '../src/cadence/unifier.js';

// `null` is an unbound variable; numbers only merge with themselves.
const exact: Lattice<number | null> = {
  merge: (left, right) => {
    if (left === null) return { ok: true, value: right };
    if (right === null || left === right) return { ok: true, value: left };
    return { ok: false };
  },
  equals: (left, right) => left === right,
};

describe('Unifier', () => {
  test('unifying with the same value twice is a no-op', () => {
    const table = new Unifier(exact);
    const a = table.newVar(null);
    expect(table.unifyValue(a, 1).ok).toBe(true);
    expect(table.unifyValue(a, 1).ok).toBe(true);
    expect(table.probe(a)).toBe(1);
    expect(table.size).toBe(1);
  });

  test('propagates values through classes', () => {
    const table = new Unifier(exact);
    const a = table.newVar(null);
    const b = table.newVar(null);
    const c = table.newVar(7);
    expect(table.unify(a, b).ok).toBe(true);
    expect(table.unify(b, c).ok).toBe(true);
    expect(table.probe(a)).toBe(7);
    expect(table.equivalent(a, c)).toBe(true);
  });

  test('a conflict leaves both classes untouched', () => {
    const table = new Unifier(exact);
    const a = table.newVar(1);
    const b = table.newVar(2);
    const result = table.unify(a, b);
    expect(result).toEqual({ ok: false, conflict: { left: 1, right: 2 } });
    expect(table.equivalent(a, b)).toBe(false);
    expect(table.probe(a)).toBe(1);
    expect(table.probe(b)).toBe(2);
  });

  test('rollback restores lookups exactly', () => {
    const table = new Unifier(exact);
    const a = table.newVar(null);
    const b = table.newVar(null);
    const c = table.newVar(null);
    const d = table.newVar(null);
    table.unify(a, b);
    table.unify(c, d);
    const roots = [a, b, c, d].map(id => table.find(id));

    const mark = table.snapshot();
    table.unify(a, c);
    table.unifyValue(d, 3);
    table.newVar(4);
    [a, b, c, d].forEach(id => table.find(id));
    expect(table.probe(b)).toBe(3);
    table.rollback(mark);

    expect([a, b, c, d].map(id => table.find(id))).toEqual(roots);
    expect(table.equivalent(a, c)).toBe(false);
    expect(table.probe(a)).toBeNull();
    expect(table.probe(d)).toBeNull();
    expect(table.size).toBe(4);
  });

  test('an enclosing snapshot can undo a committed inner one', () => {
    const table = new Unifier(exact);
    const a = table.newVar(null);
    const outer = table.snapshot();
    const inner = table.snapshot();
    table.unifyValue(a, 5);
    table.commit(inner);
    expect(table.probe(a)).toBe(5);
    table.rollback(outer);
    expect(table.probe(a)).toBeNull();
  });

  test('snapshots must close innermost first', () => {
    const table = new Unifier(exact);
    const first = table.snapshot();
    table.snapshot();
    expect(() => table.commit(first)).toThrow(SnapshotOrderError);
  });

  test('unknown variables are rejected', () => {
    const table = new Unifier(exact);
    expect(() => table.find(3)).toThrow(RangeError);
  });
});
