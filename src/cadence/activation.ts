import type { StreamId } from './ir.js';

/**
 * Activation condition of an event-driven stream: a positive boolean formula
 * over streams, kept in disjunctive normal form. `[[a, b], [c]]` reads
 * "a and b fired, or c fired". The representation is canonical: conjunctions
 * are sorted and duplicate-free, no conjunction contains another, and the
 * conjunctions themselves are sorted, so structural equality is logical
 * equality.
 */
export type Conjunction = readonly StreamId[];
export type Activation = readonly Conjunction[];

const compareConjunctions = (a: Conjunction, b: Conjunction): number => {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
};

const isSubset = (small: Conjunction, large: Conjunction): boolean =>
  small.every(id => large.includes(id));

export function normalizeActivation(conjunctions: readonly Conjunction[]): Activation {
  const cleaned = conjunctions.map(c => Array.from(new Set(c)).sort((a, b) => a - b));
  const minimal = cleaned.filter((candidate, index) =>
    !cleaned.some((other, otherIndex) =>
      otherIndex !== index &&
      isSubset(other, candidate) &&
      (other.length < candidate.length || otherIndex < index)
    )
  );
  return minimal.sort(compareConjunctions);
}

export function streamActivation(stream: StreamId): Activation {
  return [[stream]];
}

export function anyOf(...activations: Activation[]): Activation {
  return normalizeActivation(activations.flat());
}

export function allOf(...activations: Activation[]): Activation {
  let product: Conjunction[] = [[]];
  for (const activation of activations) {
    const next: Conjunction[] = [];
    for (const left of product) {
      for (const right of activation) {
        next.push([...left, ...right]);
      }
    }
    product = next;
  }
  return normalizeActivation(product);
}

/** Whenever `premise` holds, `conclusion` holds too. */
export function implies(premise: Activation, conclusion: Activation): boolean {
  return premise.every(conjunction => conclusion.some(required => isSubset(required, conjunction)));
}

export function activationsEqual(a: Activation, b: Activation): boolean {
  return a.length === b.length && a.every((conjunction, i) => compareConjunctions(conjunction, b[i]) === 0);
}

export function activationStreams(activation: Activation): StreamId[] {
  return Array.from(new Set(activation.flat())).sort((a, b) => a - b);
}

export function formatActivation(activation: Activation, nameOf: (id: StreamId) => string): string {
  if (activation.length === 0) return 'never';
  const parts = activation.map(conjunction => {
    if (conjunction.length === 0) return 'always';
    return conjunction.map(nameOf).join(' & ');
  });
  if (parts.length === 1) return parts[0];
  return parts.map((part, i) => (activation[i].length > 1 ? `(${part})` : part)).join(' | ');
}
