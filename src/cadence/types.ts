import type { VarId } from './unifier.js';
import { unitSymbol, type TimeExponent } from './units.js';

export type IntBits = 8 | 16 | 32 | 64;
export type FloatBits = 32 | 64;

/** Concrete value type of a fully analyzed stream or expression. */
export type ValueType =
  | { kind: 'bool' }
  | { kind: 'string' }
  | { kind: 'int'; bits: IntBits }
  | { kind: 'uint'; bits: IntBits }
  | { kind: 'float'; bits: FloatBits }
  | { kind: 'tuple'; elements: ValueType[] }
  | { kind: 'option'; inner: ValueType };

export interface StreamType {
  value: ValueType;
  /** Power of the time dimension; `0` for plain numbers and non-numeric types. */
  unit: TimeExponent;
}

export type TypeFamily = ValueType['kind'];

export const numericFamilies: ReadonlySet<TypeFamily> = new Set<TypeFamily>(['int', 'uint', 'float']);

/** Families admitted by the named constraints of the typing rules. */
export const constraints = {
  numeric: ['int', 'uint', 'float'],
  signed: ['int', 'float'],
  integer: ['int', 'uint'],
  float: ['float'],
  comparable: ['int', 'uint', 'float', 'string'],
  equatable: ['bool', 'string', 'int', 'uint', 'float', 'tuple', 'option'],
} as const satisfies Record<string, readonly TypeFamily[]>;

export type ConstraintName = keyof typeof constraints;

/**
 * Value of a type variable during inference. Compound types refer to their
 * components through variables of the same table.
 */
export type TypeTerm =
  | { kind: 'infer' }
  | { kind: 'constraint'; families: ReadonlySet<TypeFamily>; label: string }
  | { kind: 'bool' }
  | { kind: 'string' }
  | { kind: 'int'; bits: IntBits }
  | { kind: 'uint'; bits: IntBits }
  | { kind: 'float'; bits: FloatBits }
  | { kind: 'tuple'; elements: VarId[] }
  | { kind: 'option'; inner: VarId }
  | { kind: 'error' };

export type UnitTerm = { kind: 'infer' } | { kind: 'exponent'; exponent: TimeExponent } | { kind: 'error' };

export function constraintTerm(name: ConstraintName): TypeTerm {
  return { kind: 'constraint', families: new Set<TypeFamily>(constraints[name]), label: name };
}

const scalarTypes = new Map<string, ValueType>(Object.entries({
  Bool: { kind: 'bool' },
  String: { kind: 'string' },
  Int8: { kind: 'int', bits: 8 },
  Int16: { kind: 'int', bits: 16 },
  Int32: { kind: 'int', bits: 32 },
  Int64: { kind: 'int', bits: 64 },
  UInt8: { kind: 'uint', bits: 8 },
  UInt16: { kind: 'uint', bits: 16 },
  UInt32: { kind: 'uint', bits: 32 },
  UInt64: { kind: 'uint', bits: 64 },
  Float32: { kind: 'float', bits: 32 },
  Float64: { kind: 'float', bits: 64 },
} satisfies Record<string, ValueType>));

export function lookupScalarType(name: string): ValueType | undefined {
  return scalarTypes.get(name);
}

export function isNumericType(type: ValueType): boolean {
  return numericFamilies.has(type.kind);
}

export function formatValueType(type: ValueType): string {
  switch (type.kind) {
    case 'bool':
      return 'Bool';
    case 'string':
      return 'String';
    case 'int':
      return `Int${type.bits}`;
    case 'uint':
      return `UInt${type.bits}`;
    case 'float':
      return `Float${type.bits}`;
    case 'tuple':
      return `(${type.elements.map(formatValueType).join(', ')})`;
    case 'option':
      return `Option<${formatValueType(type.inner)}>`;
  }
}

export function formatStreamType(type: StreamType): string {
  const symbol = unitSymbol(type.unit);
  return symbol ? `${formatValueType(type.value)}[${symbol}]` : formatValueType(type.value);
}
