import type { Location } from '../utils/index.js';
import { activationStreams, activationsEqual, allOf, anyOf, formatActivation, implies, streamActivation, type Activation } from './activation.js';
import type { AnalysisConfig } from './config.js';
import type { DiagnosticCollector } from './diagnostics.js';
import type { StreamGraph, StreamNode } from './graph.js';
import type { Pacing, Reference, StreamId } from './ir.js';
import type { Rational } from './rational.js';
import { Unifier, type Lattice, type MergeResult } from './unifier.js';
import { formatFrequency } from './units.js';

/** Value of a stream's clock variable while pacing is inferred. */
export type Clock =
  | { kind: 'unknown' }
  | { kind: 'periodic'; frequency: Rational }
  | { kind: 'event'; activation: Activation }
  | { kind: 'error' };

export interface PacingResult {
  /** Clock of every stream whose pacing was determined. */
  pacings: Map<StreamId, Pacing>;
}

/**
 * Whether a stream clocked at one frequency may synchronously read a stream
 * clocked at the other.
 */
export function frequenciesCompatible(a: Rational, b: Rational, policy: AnalysisConfig['frequencyPolicy']): boolean {
  if (a.equals(b)) return true;
  if (policy === 'equal') return false;
  const faster = a.max(b);
  const slower = faster === a ? b : a;
  return faster.isMultipleOf(slower);
}

export function clocksEqual(a: Clock, b: Clock): boolean {
  if (a.kind === 'periodic' && b.kind === 'periodic') return a.frequency.equals(b.frequency);
  if (a.kind === 'event' && b.kind === 'event') return activationsEqual(a.activation, b.activation);
  return a.kind === b.kind;
}

export function clockLattice(config: AnalysisConfig): Lattice<Clock> {
  const ok = (value: Clock): MergeResult<Clock> => ({ ok: true, value });
  return {
    merge(left, right) {
      if (left.kind === 'error' || right.kind === 'unknown') return ok(left);
      if (right.kind === 'error' || left.kind === 'unknown') return ok(right);
      if (left.kind === 'periodic' && right.kind === 'periodic') {
        if (!frequenciesCompatible(left.frequency, right.frequency, config.frequencyPolicy)) return { ok: false };
        return ok(left.frequency.compare(right.frequency) >= 0 ? left : right);
      }
      if (left.kind === 'event' && right.kind === 'event') {
        const activation =
          config.eventCombination === 'all' ? allOf(left.activation, right.activation) : anyOf(left.activation, right.activation);
        return ok({ kind: 'event', activation });
      }
      return { ok: false };
    },
    equals: clocksEqual,
  };
}

/**
 * Assigns every stream its clock.
 *
 * Inputs carry their clock; outputs and triggers take an annotation or
 * combine the clocks of what they read at the current instant. Each stream
 * is inferred inside a snapshot of the clock table, so a conflict leaves
 * nothing half-merged behind.
 */
export function analyzePacing(graph: StreamGraph, diagnostics: DiagnosticCollector, config: AnalysisConfig): PacingResult {
  return new PacingAnalyzer(graph, diagnostics, config).analyze();
}

class PacingAnalyzer {
  private readonly clocks: Unifier<Clock>;
  private readonly state = new Map<StreamId, 'active' | 'done'>();
  /** Streams being inferred, each with how it was reached from the one below. */
  private readonly inferring: Array<{ id: StreamId; viaActivation: boolean }> = [];

  constructor(
    private readonly graph: StreamGraph,
    private readonly diagnostics: DiagnosticCollector,
    private readonly config: AnalysisConfig
  ) {
    this.clocks = new Unifier(clockLattice(config));
    for (let i = 0; i < graph.size; i++) {
      this.clocks.newVar({ kind: 'unknown' });
    }
  }

  analyze(): PacingResult {
    for (const node of this.graph.streams()) {
      this.infer(node.id);
    }
    this.checkLookaheads();

    const pacings = new Map<StreamId, Pacing>();
    for (const node of this.graph.streams()) {
      const clock = this.clockOf(node.id);
      switch (clock.kind) {
        case 'periodic':
          pacings.set(node.id, { kind: 'periodic', frequency: clock.frequency });
          break;
        case 'event':
          pacings.set(node.id, { kind: 'event', activation: clock.activation });
          break;
        default:
          break;
      }
    }
    return { pacings };
  }

  private clockOf(id: StreamId): Clock {
    return this.clocks.probe(id);
  }

  private describe(clock: Clock): string {
    switch (clock.kind) {
      case 'periodic':
        return formatFrequency(clock.frequency);
      case 'event':
        return `events of ${formatActivation(clock.activation, id => this.graph.nameOf(id))}`;
      default:
        return 'an unresolved clock';
    }
  }

  private synchronousDependencies(node: StreamNode): Reference[] {
    return this.graph.dependenciesOf(node.id).filter(ref => ref.offset.kind === 'current');
  }

  private infer(id: StreamId, viaActivation = false): void {
    const state = this.state.get(id);
    if (state === 'active') {
      this.reportCircularActivation(id, viaActivation);
      return;
    }
    if (state === 'done') return;
    this.state.set(id, 'active');
    this.inferring.push({ id, viaActivation });
    const node = this.graph.stream(id);

    // Clocks this one depends on come first. A dependency still marked
    // active lies on a cycle: the graph analysis reports cycles of reads,
    // reportCircularActivation those through an activation.
    for (const ref of this.synchronousDependencies(node)) {
      this.infer(ref.source);
    }
    if (node.pacingAnnotation?.kind === 'event') {
      for (const stream of activationStreams(node.pacingAnnotation.activation)) {
        this.infer(stream, true);
      }
    }
    this.inferring.pop();

    const mark = this.clocks.snapshot();
    const clock = this.determine(node);
    if (clock.kind === 'error') {
      // Drop whatever was merged before the conflict.
      this.clocks.rollback(mark);
      this.clocks.unifyValue(id, this.placeholder(node));
    } else {
      this.clocks.unifyValue(id, clock);
      this.clocks.commit(mark);
    }
    this.state.set(id, 'done');
  }

  /**
   * `id` was reached again while its own clock is still open. When the loop
   * passes through an activation, the annotated stream names a stream whose
   * clock needs its own.
   */
  private reportCircularActivation(id: StreamId, closingViaActivation: boolean): void {
    const start = this.inferring.findIndex(frame => frame.id === id);
    if (start < 0) return;
    const loop = this.inferring.slice(start);
    // The edge into loop[i + 1] leaves loop[i]; the closing edge leaves the last frame.
    const edges = loop.map((frame, i) => ({
      from: frame.id,
      to: i + 1 < loop.length ? loop[i + 1].id : id,
      viaActivation: i + 1 < loop.length ? loop[i + 1].viaActivation : closingViaActivation,
    }));
    const activation = edges.find(edge => edge.viaActivation);
    if (!activation) return;

    const annotated = this.graph.stream(activation.from);
    this.diagnostics.error(
      'InconsistentPacing',
      `Activation of '${annotated.name}' names '${this.graph.nameOf(activation.to)}', whose clock depends on '${annotated.name}'`,
      annotated.pacingAnnotation?.location ?? annotated.nameLocation ?? annotated.location,
      { streams: [annotated.id, activation.to] }
    );
  }

  /** Clock bound when inference failed: the first dependency's, or an error marker. */
  private placeholder(node: StreamNode): Clock {
    const first = this.synchronousDependencies(node)[0];
    const clock = first ? this.clockOf(first.source) : { kind: 'error' as const };
    return clock.kind === 'periodic' || clock.kind === 'event' ? clock : { kind: 'error' };
  }

  private determine(node: StreamNode): Clock {
    const annotation = node.pacingAnnotation;

    if (node.kind === 'input') {
      return annotation?.kind === 'periodic'
        ? { kind: 'periodic', frequency: annotation.frequency }
        : { kind: 'event', activation: streamActivation(node.id) };
    }

    if (annotation) {
      const written: Clock =
        annotation.kind === 'periodic'
          ? { kind: 'periodic', frequency: annotation.frequency }
          : { kind: 'event', activation: annotation.activation };
      const declared = this.annotatedClock(node, written, annotation.location);
      if (declared.kind === 'error') return declared;
      this.checkAgainstDependencies(node, declared, annotation.location);
      return declared;
    }

    return this.inferFromDependencies(node);
  }

  /**
   * Activation annotations may name outputs; they are replaced by the
   * activation those outputs fire on.
   */
  private annotatedClock(node: StreamNode, clock: Clock, location?: Location): Clock {
    if (clock.kind !== 'event') return clock;
    const conjunctions: Activation[] = [];
    for (const conjunction of clock.activation) {
      const parts: Activation[] = [];
      for (const stream of conjunction) {
        const referenced = this.clockOf(stream);
        if (referenced.kind === 'event') {
          parts.push(referenced.activation);
          continue;
        }
        if (referenced.kind === 'error') return referenced;
        this.diagnostics.error(
          'InconsistentPacing',
          `Activation of '${node.name}' names '${this.graph.nameOf(stream)}', which is not event-driven (${this.describe(referenced)})`,
          location,
          { streams: [node.id, stream] }
        );
        return { kind: 'error' };
      }
      conjunctions.push(allOf(...parts));
    }
    return { kind: 'event', activation: anyOf(...conjunctions) };
  }

  private checkAgainstDependencies(node: StreamNode, declared: Clock, location?: Location): void {
    for (const ref of this.synchronousDependencies(node)) {
      const dependency = this.clockOf(ref.source);
      const name = this.graph.nameOf(ref.source);
      const streams = [node.id, ref.source];
      const at = ref.location ?? location;

      if (dependency.kind === 'periodic' && declared.kind === 'periodic') {
        if (!frequenciesCompatible(declared.frequency, dependency.frequency, this.config.frequencyPolicy)) {
          this.diagnostics.error(
            'IncompatibleFrequency',
            `'${node.name}' runs at ${formatFrequency(declared.frequency)} but reads '${name}' at ${formatFrequency(dependency.frequency)}`,
            at,
            { streams }
          );
        }
      } else if (dependency.kind === 'event' && declared.kind === 'event') {
        if (!implies(declared.activation, dependency.activation)) {
          this.diagnostics.error(
            'InconsistentPacing',
            `'${node.name}' is evaluated on ${this.describe(declared)} but '${name}' is only available on ${this.describe(dependency)}; read it with hold() or tighten the activation`,
            at,
            { streams }
          );
        }
      } else if (dependency.kind === 'periodic' || dependency.kind === 'event') {
        this.diagnostics.error(
          'InconsistentPacing',
          `'${node.name}' is paced by ${this.describe(declared)} but reads '${name}', which is paced by ${this.describe(dependency)}; use hold() to read across clocks`,
          at,
          { streams }
        );
      }
    }
  }

  private inferFromDependencies(node: StreamNode): Clock {
    const dependencies = this.synchronousDependencies(node).map(ref => ({ ref, clock: this.clockOf(ref.source) }));

    // Unknown clocks only remain on cycles, which are reported on their own.
    if (dependencies.some(entry => entry.clock.kind === 'error' || entry.clock.kind === 'unknown')) return { kind: 'error' };
    if (dependencies.length === 0) {
      this.diagnostics.error(
        'InconsistentPacing',
        `'${node.name}' reads no stream at its current value, so it has no clock; add a pacing annotation`,
        node.nameLocation ?? node.location,
        { streams: [node.id] }
      );
      return { kind: 'error' };
    }

    // Fastest first, so the merged frequency never has to grow.
    const ordered = [...dependencies].sort((a, b) => {
      if (a.clock.kind === 'periodic' && b.clock.kind === 'periodic') return b.clock.frequency.compare(a.clock.frequency);
      return 0;
    });

    for (const { ref, clock: dependency } of ordered) {
      const current = this.clockOf(node.id);
      if (this.clocks.unifyValue(node.id, dependency).ok) continue;

      const name = this.graph.nameOf(ref.source);
      const streams = [node.id, ref.source];
      if (current.kind === 'periodic' && dependency.kind === 'periodic') {
        this.diagnostics.error(
          'IncompatibleFrequency',
          `'${node.name}' cannot combine ${formatFrequency(current.frequency)} with '${name}' at ${formatFrequency(dependency.frequency)}`,
          ref.location ?? node.location,
          { streams }
        );
      } else {
        this.diagnostics.error(
          'InconsistentPacing',
          `'${node.name}' mixes ${this.describe(current)} with '${name}' on ${this.describe(dependency)}; annotate its pacing and use hold()`,
          ref.location ?? node.location,
          { streams }
        );
      }
      return { kind: 'error' };
    }
    return this.clockOf(node.id);
  }

  private checkLookaheads(): void {
    for (const ref of this.graph.references()) {
      if (ref.offset.kind !== 'lookahead') continue;
      const reader = this.graph.stream(ref.target);
      const name = this.graph.nameOf(ref.source);
      const streams = [ref.target, ref.source];
      if (!this.config.allowLookahead) {
        this.diagnostics.error('IllegalLookahead', `'${reader.name}' reads '${name}' ahead in time, which is disabled`, ref.location, {
          streams,
        });
        continue;
      }
      const own = this.clockOf(ref.target);
      const accessed = this.clockOf(ref.source);
      if (own.kind === 'error' || accessed.kind === 'error') continue;
      if (!clocksEqual(own, accessed)) {
        this.diagnostics.error(
          'IllegalLookahead',
          `'${reader.name}' (${this.describe(own)}) can only look ahead into streams on the same clock, but '${name}' is on ${this.describe(accessed)}`,
          ref.location,
          { streams }
        );
      }
    }
  }
}
