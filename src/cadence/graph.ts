import type { Location } from '../utils/index.js';
import type { Activation } from './activation.js';
import type { Rational } from './rational.js';
import type { Offset, Reference, ReferenceId, StreamExpr, StreamId, StreamKind } from './ir.js';
import type { StreamType } from './types.js';

export type PacingAnnotation =
  | { kind: 'periodic'; frequency: Rational; location?: Location }
  | { kind: 'event'; activation: Activation; location?: Location };

export interface StreamNode {
  readonly id: StreamId;
  readonly name: string;
  readonly kind: StreamKind;
  readonly location?: Location;
  readonly nameLocation?: Location;
  /** Declared type, if any; mandatory for inputs and `Bool` for triggers. */
  declaredType: StreamType | null;
  declaredTypeLocation?: Location;
  pacingAnnotation: PacingAnnotation | null;
  expr: StreamExpr | null;
  message: string | null;
}

export interface NewStream {
  name: string;
  kind: StreamKind;
  location?: Location;
  nameLocation?: Location;
}

export class GraphSealedError extends Error {
  constructor() {
    super('Stream graph is sealed; streams and references can no longer be added');
  }
}

/**
 * Arena of streams addressed by integer id, with references stored apart
 * and indexed per stream in both directions. Ids follow declaration order.
 */
export class StreamGraph {
  private readonly nodes: StreamNode[] = [];
  private readonly edges: Reference[] = [];
  private readonly readers: ReferenceId[][] = [];
  private readonly reads: ReferenceId[][] = [];
  private readonly byName = new Map<string, StreamId>();
  private sealed = false;

  get size(): number {
    return this.nodes.length;
  }

  addStream(stream: NewStream): StreamNode {
    this.requireOpen();
    const node: StreamNode = {
      id: this.nodes.length,
      name: stream.name,
      kind: stream.kind,
      location: stream.location,
      nameLocation: stream.nameLocation,
      declaredType: null,
      pacingAnnotation: null,
      expr: null,
      message: null,
    };
    this.nodes.push(node);
    this.readers.push([]);
    this.reads.push([]);
    if (!this.byName.has(node.name)) {
      this.byName.set(node.name, node.id);
    }
    return node;
  }

  addReference(source: StreamId, target: StreamId, offset: Offset, location?: Location): Reference {
    this.requireOpen();
    this.requireStream(source);
    this.requireStream(target);
    const reference: Reference = { id: this.edges.length, source, target, offset, location };
    this.edges.push(reference);
    this.readers[source].push(reference.id);
    this.reads[target].push(reference.id);
    return reference;
  }

  /** Ends lowering; the structure is fixed from here on. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  stream(id: StreamId): StreamNode {
    this.requireStream(id);
    return this.nodes[id];
  }

  streams(): readonly StreamNode[] {
    return this.nodes;
  }

  /** First stream declared under `name`. */
  lookup(name: string): StreamNode | undefined {
    const id = this.byName.get(name);
    return id === undefined ? undefined : this.nodes[id];
  }

  nameOf(id: StreamId): string {
    return this.nodes[id]?.name ?? `#${id}`;
  }

  reference(id: ReferenceId): Reference {
    const reference = this.edges[id];
    if (!reference) throw new RangeError(`Unknown reference ${id}`);
    return reference;
  }

  references(): readonly Reference[] {
    return this.edges;
  }

  /** References whose source is `id`, i.e. accesses of `id` by other streams. */
  readersOf(id: StreamId): Reference[] {
    this.requireStream(id);
    return this.readers[id].map(ref => this.edges[ref]);
  }

  /** References whose target is `id`, i.e. what `id`'s expression reads. */
  dependenciesOf(id: StreamId): Reference[] {
    this.requireStream(id);
    return this.reads[id].map(ref => this.edges[ref]);
  }

  private requireOpen(): void {
    if (this.sealed) throw new GraphSealedError();
  }

  private requireStream(id: StreamId): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodes.length) {
      throw new RangeError(`Unknown stream ${id}`);
    }
  }
}
