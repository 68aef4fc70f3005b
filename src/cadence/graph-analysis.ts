import type { DiagnosticCollector } from './diagnostics.js';
import type { StreamGraph } from './graph.js';
import type { MemoryBound, OffsetKind, Pacing, Reference, StreamId } from './ir.js';
import type { Quantity } from './units.js';

/** Thrown when the evaluation order cannot be built; never a user error. */
export class SchedulingCycleError extends Error {
  readonly streams: StreamId[];

  constructor(streams: StreamId[], names: string[]) {
    super(`Streams ${names.join(', ')} still depend on each other after cycle detection`);
    this.name = 'SchedulingCycleError';
    this.streams = streams;
  }
}

/** Offsets that need the accessed value within the same evaluation cycle. */
const synchronousOffsets: ReadonlySet<OffsetKind> = new Set<OffsetKind>(['current', 'hold']);

/** Offsets a dependency cycle may not pass through. */
const cycleBreaking: ReadonlySet<OffsetKind> = new Set<OffsetKind>(['lookback', 'window']);

/**
 * Strongly connected components in Tarjan's order, i.e. reverse topological
 * order of the condensed graph.
 */
export function stronglyConnectedComponents(graph: StreamGraph): StreamId[][] {
  let nextIndex = 0;
  const index = new Map<StreamId, number>();
  const lowLink = new Map<StreamId, number>();
  const onStack = new Set<StreamId>();
  const stack: StreamId[] = [];
  const components: StreamId[][] = [];

  const visit = (v: StreamId): void => {
    index.set(v, nextIndex);
    lowLink.set(v, nextIndex);
    nextIndex++;
    stack.push(v);
    onStack.add(v);

    for (const ref of graph.readersOf(v)) {
      const w = ref.target;
      const wIndex = index.get(w);
      if (wIndex === undefined) {
        visit(w);
        lowLink.set(v, Math.min(lowLink.get(v) ?? 0, lowLink.get(w) ?? 0));
      } else if (onStack.has(w)) {
        lowLink.set(v, Math.min(lowLink.get(v) ?? 0, wIndex));
      }
    }

    if (lowLink.get(v) === index.get(v)) {
      const component: StreamId[] = [];
      let w: StreamId | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      components.push(component.sort((a, b) => a - b));
    }
  };

  for (const node of graph.streams()) {
    if (!index.has(node.id)) visit(node.id);
  }
  return components;
}

/** Shortest chain of references from `from` to `to` inside `members`. */
function pathWithin(graph: StreamGraph, from: StreamId, to: StreamId, members: ReadonlySet<StreamId>): StreamId[] {
  const previous = new Map<StreamId, StreamId>();
  const queue: StreamId[] = [from];
  const seen = new Set<StreamId>([from]);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || current === to) break;
    for (const ref of graph.readersOf(current)) {
      if (!members.has(ref.target) || seen.has(ref.target)) continue;
      seen.add(ref.target);
      previous.set(ref.target, current);
      queue.push(ref.target);
    }
  }
  const path: StreamId[] = [to];
  let step = to;
  while (step !== from) {
    const before = previous.get(step);
    if (before === undefined) break;
    path.unshift(before);
    step = before;
  }
  return path;
}

/**
 * Reports every strongly connected component containing a reference that
 * needs a value from the same instant. Cycles made only of past-value and
 * window accesses are legal.
 */
export function detectIllegalCycles(graph: StreamGraph, diagnostics: DiagnosticCollector): number {
  const components = stronglyConnectedComponents(graph).sort((a, b) => a[0] - b[0]);
  let reported = 0;

  for (const component of components) {
    const members = new Set(component);
    const internal = graph.references().filter(ref => members.has(ref.source) && members.has(ref.target));
    const offending = internal.find(ref => !cycleBreaking.has(ref.offset.kind));
    if (!offending) continue;

    // Close the loop: from the reader back round to the stream it reads.
    const path = offending.source === offending.target
      ? [offending.source, offending.target]
      : [offending.source, ...pathWithin(graph, offending.target, offending.source, members)];
    const rendered = path.map(id => graph.nameOf(id)).join(' -> ');
    diagnostics.error(
      'IllegalCycle',
      `Illegal cycle: ${rendered}; a cycle must read at least one past value with offset(by: -n) or a window`,
      offending.location ?? graph.stream(offending.target).location,
      { streams: component }
    );
    reported++;
  }
  return reported;
}

export interface MemoryAnalysis {
  memory: Map<StreamId, MemoryBound>;
  /** Streams that read a lookahead, directly or through other streams. */
  futureDependent: Set<StreamId>;
}

function samplesFor(ref: Reference, pacing: Pacing | undefined): { samples: number; duration: Quantity | null } {
  const offset = ref.offset;
  switch (offset.kind) {
    case 'current':
    case 'hold':
      return { samples: 1, duration: null };
    case 'lookback':
    case 'lookahead':
      return { samples: offset.steps + 1, duration: null };
    case 'window':
      if (pacing?.kind === 'periodic') {
        return { samples: Number(offset.duration.value.mul(pacing.frequency).ceil()), duration: null };
      }
      return { samples: 1, duration: offset.duration };
  }
}

/**
 * Number of values each stream has to retain for its readers. Periodic
 * streams turn windows into sample counts; event-driven streams keep the
 * window length in time, since their rate is unknown.
 */
export function computeMemoryBounds(graph: StreamGraph, pacings: ReadonlyMap<StreamId, Pacing>): MemoryAnalysis {
  const memory = new Map<StreamId, MemoryBound>();
  for (const node of graph.streams()) {
    let samples = 1;
    let duration: Quantity | null = null;
    for (const ref of graph.readersOf(node.id)) {
      const need = samplesFor(ref, pacings.get(node.id));
      samples = Math.max(samples, need.samples);
      if (need.duration && (!duration || need.duration.compare(duration) > 0)) {
        duration = need.duration;
      }
    }
    memory.set(node.id, duration ? { kind: 'timed', samples, duration } : { kind: 'samples', samples });
  }

  const futureDependent = new Set<StreamId>();
  const pending: StreamId[] = [];
  for (const ref of graph.references()) {
    if (ref.offset.kind === 'lookahead' && !futureDependent.has(ref.target)) {
      futureDependent.add(ref.target);
      pending.push(ref.target);
    }
  }
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined) break;
    for (const ref of graph.readersOf(id)) {
      if (futureDependent.has(ref.target)) continue;
      futureDependent.add(ref.target);
      pending.push(ref.target);
    }
  }

  return { memory, futureDependent };
}

export interface EvaluationSchedule {
  order: StreamId[];
  /** Streams grouped by depth in the graph of same-instant references. */
  layers: StreamId[][];
  layerOf: Map<StreamId, number>;
}

/**
 * Kahn's algorithm over the references that need a same-instant value.
 * Among streams that are ready at the same time, the one declared first
 * goes first.
 */
export function computeEvaluationOrder(graph: StreamGraph): EvaluationSchedule {
  const blocking = (ref: Reference): boolean => synchronousOffsets.has(ref.offset.kind);
  const waitingOn = new Map<StreamId, number>();
  for (const node of graph.streams()) {
    waitingOn.set(node.id, graph.dependenciesOf(node.id).filter(blocking).length);
  }

  const ready = graph.streams().filter(node => waitingOn.get(node.id) === 0).map(node => node.id);
  const order: StreamId[] = [];
  const layerOf = new Map<StreamId, number>();

  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);

    const layer = graph
      .dependenciesOf(id)
      .filter(blocking)
      .reduce((deepest, ref) => Math.max(deepest, (layerOf.get(ref.source) ?? 0) + 1), 0);
    layerOf.set(id, layer);

    for (const ref of graph.readersOf(id)) {
      if (!blocking(ref)) continue;
      const remaining = (waitingOn.get(ref.target) ?? 0) - 1;
      waitingOn.set(ref.target, remaining);
      if (remaining === 0) ready.push(ref.target);
    }
  }

  if (order.length !== graph.size) {
    const stuck = graph.streams().filter(node => !layerOf.has(node.id)).map(node => node.id);
    throw new SchedulingCycleError(stuck, stuck.map(id => graph.nameOf(id)));
  }

  const layers: StreamId[][] = [];
  for (const id of order) {
    const layer = layerOf.get(id) ?? 0;
    while (layers.length <= layer) layers.push([]);
    layers[layer].push(id);
  }
  for (const layer of layers) layer.sort((a, b) => a - b);

  return { order, layers, layerOf };
}
