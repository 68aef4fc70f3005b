import type { ConstraintName, ValueType } from './types.js';

export type SignatureType =
  | { kind: 'generic'; index: number }
  | { kind: 'concrete'; type: ValueType };

/**
 * `preserve`: every argument and the result share one unit.
 * `dimensionless`: arguments and result are plain numbers.
 */
export type UnitRule = 'preserve' | 'dimensionless';

export interface FunctionSignature {
  name: string;
  module: string | null;
  generics: ConstraintName[];
  params: SignatureType[];
  returns: SignatureType;
  units: UnitRule;
}

const T: SignatureType = { kind: 'generic', index: 0 };

const unary = (name: string, module: string | null, constraint: ConstraintName, units: UnitRule): FunctionSignature => ({
  name,
  module,
  generics: [constraint],
  params: [T],
  returns: T,
  units,
});

const binary = (name: string, module: string | null, constraint: ConstraintName, units: UnitRule): FunctionSignature => ({
  name,
  module,
  generics: [constraint],
  params: [T, T],
  returns: T,
  units,
});

const signatures: FunctionSignature[] = [
  unary('abs', null, 'signed', 'preserve'),
  binary('min', null, 'numeric', 'preserve'),
  binary('max', null, 'numeric', 'preserve'),
  unary('sqrt', 'math', 'float', 'dimensionless'),
  unary('sin', 'math', 'float', 'dimensionless'),
  unary('cos', 'math', 'float', 'dimensionless'),
  unary('exp', 'math', 'float', 'dimensionless'),
  unary('ln', 'math', 'float', 'dimensionless'),
];

export const knownModules: ReadonlySet<string> = new Set(
  signatures.flatMap(signature => (signature.module ? [signature.module] : []))
);

/** Functions visible with the given modules imported. */
export function functionScope(imports: Iterable<string>): Map<string, FunctionSignature> {
  const imported = new Set(imports);
  const scope = new Map<string, FunctionSignature>();
  for (const signature of signatures) {
    if (signature.module === null || imported.has(signature.module)) {
      scope.set(signature.name, signature);
    }
  }
  return scope;
}

/** Module that would make `name` visible, if any. */
export function moduleProviding(name: string): string | null {
  return signatures.find(signature => signature.name === name)?.module ?? null;
}
