import { Rational } from './rational.js';

/**
 * Physical quantities over the time dimension.
 *
 * A quantity is a rational magnitude in the base unit of its dimension plus
 * the exponent of time: `1` for durations (seconds), `-1` for frequencies
 * (hertz) and `0` for plain numbers. Literals are converted to the base unit
 * as soon as they are read, so arithmetic never has to rescale.
 */

export type TimeExponent = number;

export interface UnitInfo {
  exponent: TimeExponent;
  /** Multiplier from this unit to the base unit of its dimension. */
  scale: Rational;
}

const units = new Map<string, UnitInfo>([
  ['ns', { exponent: 1, scale: Rational.of(1n, 1_000_000_000n) }],
  ['us', { exponent: 1, scale: Rational.of(1n, 1_000_000n) }],
  ['μs', { exponent: 1, scale: Rational.of(1n, 1_000_000n) }],
  ['ms', { exponent: 1, scale: Rational.of(1n, 1_000n) }],
  ['s', { exponent: 1, scale: Rational.ONE }],
  ['min', { exponent: 1, scale: Rational.of(60n) }],
  ['h', { exponent: 1, scale: Rational.of(3_600n) }],
  ['d', { exponent: 1, scale: Rational.of(86_400n) }],
  ['mHz', { exponent: -1, scale: Rational.of(1n, 1_000n) }],
  ['Hz', { exponent: -1, scale: Rational.ONE }],
  ['kHz', { exponent: -1, scale: Rational.of(1_000n) }],
  ['MHz', { exponent: -1, scale: Rational.of(1_000_000n) }],
  ['GHz', { exponent: -1, scale: Rational.of(1_000_000_000n) }],
]);

export function lookupUnit(symbol: string): UnitInfo | undefined {
  return units.get(symbol);
}

export function describeExponent(exponent: TimeExponent): string {
  if (exponent === 0) return 'dimensionless';
  if (exponent === 1) return 'duration';
  if (exponent === -1) return 'frequency';
  return `time^${exponent}`;
}

/** Unit symbol used when printing a value of the given exponent. */
export function unitSymbol(exponent: TimeExponent): string {
  if (exponent === 0) return '';
  if (exponent === 1) return 's';
  if (exponent === -1) return 'Hz';
  return `s^${exponent}`;
}

export class UnitMismatchError extends Error {
  readonly kind = 'UnitMismatch';
  left: TimeExponent;
  right: TimeExponent;

  constructor(operation: string, left: TimeExponent, right: TimeExponent) {
    super(`Cannot ${operation} a ${describeExponent(left)} value and a ${describeExponent(right)} value`);
    this.left = left;
    this.right = right;
  }
}

export class UnknownUnitError extends Error {
  readonly symbol: string;

  constructor(symbol: string) {
    super(`Unknown unit '${symbol}'`);
    this.symbol = symbol;
  }
}

export class Quantity {
  readonly value: Rational;
  readonly exponent: TimeExponent;

  constructor(value: Rational, exponent: TimeExponent = 0) {
    this.value = value;
    this.exponent = exponent;
  }

  static dimensionless(value: Rational): Quantity {
    return new Quantity(value, 0);
  }

  static seconds(value: Rational): Quantity {
    return new Quantity(value, 1);
  }

  static hertz(value: Rational): Quantity {
    return new Quantity(value, -1);
  }

  /** Reads a literal such as `500`, `2.5` with an optional unit symbol (`ms`, `Hz`). */
  static parse(raw: string, unit?: string | null): Quantity {
    const magnitude = Rational.parse(raw);
    if (!unit) return Quantity.dimensionless(magnitude);
    const info = lookupUnit(unit);
    if (!info) throw new UnknownUnitError(unit);
    return new Quantity(magnitude.mul(info.scale), info.exponent);
  }

  isDuration(): boolean {
    return this.exponent === 1;
  }

  isFrequency(): boolean {
    return this.exponent === -1;
  }

  isDimensionless(): boolean {
    return this.exponent === 0;
  }

  add(other: Quantity): Quantity {
    this.requireSameUnit('add', other);
    return new Quantity(this.value.add(other.value), this.exponent);
  }

  sub(other: Quantity): Quantity {
    this.requireSameUnit('subtract', other);
    return new Quantity(this.value.sub(other.value), this.exponent);
  }

  mul(other: Quantity): Quantity {
    return new Quantity(this.value.mul(other.value), this.exponent + other.exponent);
  }

  div(other: Quantity): Quantity {
    return new Quantity(this.value.div(other.value), this.exponent - other.exponent);
  }

  compare(other: Quantity): -1 | 0 | 1 {
    this.requireSameUnit('compare', other);
    return this.value.compare(other.value);
  }

  equals(other: Quantity): boolean {
    return this.exponent === other.exponent && this.value.equals(other.value);
  }

  /**
   * Frequency in hertz for a frequency, or for a duration read as a period.
   * Throws for anything else, including a zero period.
   */
  toFrequency(): Rational {
    if (this.isFrequency()) return this.value;
    if (this.isDuration()) {
      if (this.value.isZero()) {
        throw new RangeError('A period of zero has no frequency');
      }
      return this.value.inverse();
    }
    throw new UnitMismatchError('use as a frequency', this.exponent, -1);
  }

  toString(): string {
    const symbol = unitSymbol(this.exponent);
    return symbol ? `${this.value.toString()}${symbol}` : this.value.toString();
  }

  private requireSameUnit(operation: string, other: Quantity): void {
    if (this.exponent !== other.exponent) {
      throw new UnitMismatchError(operation, this.exponent, other.exponent);
    }
  }
}

/** Formats a frequency in hertz, e.g. `10Hz` or `0.5Hz`. */
export function formatFrequency(frequency: Rational): string {
  return `${frequency.toString()}Hz`;
}
