/**
 * Union-find over inference variables with tentative bindings.
 *
 * The table is generic over the value lattice: the type checker stores value
 * types and units, the pacing analyzer stores clocks. Values are combined by
 * `Lattice.merge`, which may itself unify nested variables of the same table
 * (tuple elements, option payloads); a failing merge rolls every nested step
 * back, so `unify` either succeeds completely or leaves the table untouched.
 *
 * While at least one snapshot is open, every write is recorded in an undo
 * log, including the writes done by path compression. `rollback` replays the
 * log backwards, which restores `find` and `probe` results exactly.
 */

export type VarId = number;

export type MergeResult<V> = { ok: true; value: V } | { ok: false };

export interface Lattice<V> {
  merge(left: V, right: V): MergeResult<V>;
  equals(left: V, right: V): boolean;
}

export interface Conflict<V> {
  left: V;
  right: V;
}

export type UnifyResult<V> = { ok: true } | { ok: false; conflict: Conflict<V> };

export interface Mark {
  readonly depth: number;
  readonly logLength: number;
}

type UndoEntry<V> =
  | { kind: 'new-var' }
  | { kind: 'parent'; id: VarId; previous: VarId }
  | { kind: 'rank'; id: VarId; previous: number }
  | { kind: 'value'; id: VarId; previous: V };

export class SnapshotOrderError extends Error {
  constructor(expected: number, found: number) {
    super(`Snapshot closed out of order: expected depth ${expected}, found ${found}`);
  }
}

export class Unifier<V> {
  private readonly parents: VarId[] = [];
  private readonly ranks: number[] = [];
  private readonly values: V[] = [];
  private readonly undoLog: UndoEntry<V>[] = [];
  private openSnapshots = 0;

  constructor(private readonly lattice: Lattice<V>) {}

  get size(): number {
    return this.parents.length;
  }

  newVar(initial: V): VarId {
    const id = this.parents.length;
    this.parents.push(id);
    this.ranks.push(0);
    this.values.push(initial);
    this.record({ kind: 'new-var' });
    return id;
  }

  find(id: VarId): VarId {
    this.requireVar(id);
    let root = id;
    while (this.parents[root] !== root) {
      root = this.parents[root];
    }
    let current = id;
    while (this.parents[current] !== root) {
      const next = this.parents[current];
      this.setParent(current, root);
      current = next;
    }
    return root;
  }

  /** Best-known binding of the variable's class; may still be partially unresolved. */
  probe(id: VarId): V {
    return this.values[this.find(id)];
  }

  equivalent(a: VarId, b: VarId): boolean {
    return this.find(a) === this.find(b);
  }

  unify(a: VarId, b: VarId): UnifyResult<V> {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return { ok: true };

    const left = this.values[rootA];
    const right = this.values[rootB];
    const mark = this.snapshot();
    // Link first so nested merges that reach the same pair terminate.
    const root = this.link(rootA, rootB);
    const merged = this.lattice.merge(left, right);
    if (!merged.ok) {
      this.rollback(mark);
      return { ok: false, conflict: { left, right } };
    }
    this.setValue(this.find(root), merged.value);
    this.commit(mark);
    return { ok: true };
  }

  unifyValue(id: VarId, value: V): UnifyResult<V> {
    const root = this.find(id);
    const current = this.values[root];
    if (this.lattice.equals(current, value)) return { ok: true };

    const mark = this.snapshot();
    const merged = this.lattice.merge(current, value);
    if (!merged.ok) {
      this.rollback(mark);
      return { ok: false, conflict: { left: current, right: value } };
    }
    this.setValue(this.find(root), merged.value);
    this.commit(mark);
    return { ok: true };
  }

  snapshot(): Mark {
    this.openSnapshots++;
    return { depth: this.openSnapshots, logLength: this.undoLog.length };
  }

  rollback(mark: Mark): void {
    this.closeSnapshot(mark);
    while (this.undoLog.length > mark.logLength) {
      const entry = this.undoLog.pop();
      if (!entry) break;
      switch (entry.kind) {
        case 'new-var':
          this.parents.pop();
          this.ranks.pop();
          this.values.pop();
          break;
        case 'parent':
          this.parents[entry.id] = entry.previous;
          break;
        case 'rank':
          this.ranks[entry.id] = entry.previous;
          break;
        case 'value':
          this.values[entry.id] = entry.previous;
          break;
      }
    }
  }

  /** Keeps everything done since `mark`; an enclosing snapshot can still undo it. */
  commit(mark: Mark): void {
    this.closeSnapshot(mark);
    if (this.openSnapshots === 0) {
      this.undoLog.length = 0;
    }
  }

  private link(a: VarId, b: VarId): VarId {
    const rankA = this.ranks[a];
    const rankB = this.ranks[b];
    if (rankA < rankB) {
      this.setParent(a, b);
      return b;
    }
    this.setParent(b, a);
    if (rankA === rankB) {
      this.record({ kind: 'rank', id: a, previous: rankA });
      this.ranks[a] = rankA + 1;
    }
    return a;
  }

  private setParent(id: VarId, parent: VarId): void {
    this.record({ kind: 'parent', id, previous: this.parents[id] });
    this.parents[id] = parent;
  }

  private setValue(id: VarId, value: V): void {
    this.record({ kind: 'value', id, previous: this.values[id] });
    this.values[id] = value;
  }

  private record(entry: UndoEntry<V>): void {
    if (this.openSnapshots > 0) {
      this.undoLog.push(entry);
    }
  }

  private closeSnapshot(mark: Mark): void {
    if (mark.depth !== this.openSnapshots) {
      throw new SnapshotOrderError(this.openSnapshots, mark.depth);
    }
    this.openSnapshots--;
  }

  private requireVar(id: VarId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.parents.length) {
      throw new RangeError(`Unknown unification variable ${id}`);
    }
  }
}
