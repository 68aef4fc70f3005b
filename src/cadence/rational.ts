/**
 * Exact rational numbers over bigint.
 *
 * Every value is kept in lowest terms with a positive denominator, so two
 * rationals are equal exactly when their numerators and denominators are.
 * Frequencies, periods and window lengths are all expressed with this type;
 * nothing that feeds a scheduling decision goes through floating point.
 */

const absBig = (value: bigint): bigint => (value < 0n ? -value : value);

export function gcdBig(a: bigint, b: bigint): bigint {
  let x = absBig(a);
  let y = absBig(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

export function lcmBig(a: bigint, b: bigint): bigint {
  if (a === 0n || b === 0n) return 0n;
  return absBig(a / gcdBig(a, b) * b);
}

const DECIMAL = /^([+-])?(\d+)(?:\.(\d+))?$/;

export class Rational {
  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  static of(num: bigint | number, den: bigint | number = 1n): Rational {
    const n = typeof num === 'bigint' ? num : BigInt(num);
    const d = typeof den === 'bigint' ? den : BigInt(den);
    if (d === 0n) {
      throw new RangeError('Rational denominator must not be zero');
    }
    const sign = d < 0n ? -1n : 1n;
    const divisor = gcdBig(n, d) || 1n;
    return new Rational((sign * n) / divisor, (sign * d) / divisor);
  }

  static readonly ZERO = Rational.of(0n);
  static readonly ONE = Rational.of(1n);

  /** Parses `42`, `-3`, `0.25` or `1.5` without rounding. */
  static parse(raw: string): Rational {
    const match = DECIMAL.exec(raw.trim());
    if (!match) {
      throw new SyntaxError(`Not a decimal number: '${raw}'`);
    }
    const [, sign, whole, fraction = ''] = match;
    const scale = 10n ** BigInt(fraction.length);
    const magnitude = BigInt(whole) * scale + (fraction ? BigInt(fraction) : 0n);
    return Rational.of(sign === '-' ? -magnitude : magnitude, scale);
  }

  add(other: Rational): Rational {
    return Rational.of(this.num * other.den + other.num * this.den, this.den * other.den);
  }

  sub(other: Rational): Rational {
    return Rational.of(this.num * other.den - other.num * this.den, this.den * other.den);
  }

  mul(other: Rational): Rational {
    return Rational.of(this.num * other.num, this.den * other.den);
  }

  div(other: Rational): Rational {
    if (other.num === 0n) {
      throw new RangeError('Division of a rational by zero');
    }
    return Rational.of(this.num * other.den, this.den * other.num);
  }

  inverse(): Rational {
    return Rational.ONE.div(this);
  }

  compare(other: Rational): -1 | 0 | 1 {
    const lhs = this.num * other.den;
    const rhs = other.num * this.den;
    if (lhs < rhs) return -1;
    if (lhs > rhs) return 1;
    return 0;
  }

  equals(other: Rational): boolean {
    return this.num === other.num && this.den === other.den;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  isPositive(): boolean {
    return this.num > 0n;
  }

  isInteger(): boolean {
    return this.den === 1n;
  }

  floor(): bigint {
    const q = this.num / this.den;
    return this.num < 0n && q * this.den !== this.num ? q - 1n : q;
  }

  ceil(): bigint {
    const q = this.num / this.den;
    return this.num > 0n && q * this.den !== this.num ? q + 1n : q;
  }

  /** Largest rational `g` such that both values are integer multiples of `g`. */
  gcd(other: Rational): Rational {
    return Rational.of(gcdBig(this.num, other.num), lcmBig(this.den, other.den));
  }

  /** Smallest rational that is an integer multiple of both values. */
  lcm(other: Rational): Rational {
    return Rational.of(lcmBig(this.num, other.num), gcdBig(this.den, other.den));
  }

  /** True when `this` is `k * other` for some integer `k`. */
  isMultipleOf(other: Rational): boolean {
    if (other.isZero()) return this.isZero();
    return this.div(other).isInteger();
  }

  max(other: Rational): Rational {
    return this.compare(other) >= 0 ? this : other;
  }

  toString(): string {
    if (this.den === 1n) return this.num.toString();
    let den = this.den;
    let twos = 0;
    let fives = 0;
    while (den % 2n === 0n) {
      den /= 2n;
      twos++;
    }
    while (den % 5n === 0n) {
      den /= 5n;
      fives++;
    }
    if (den !== 1n) return `${this.num}/${this.den}`;
    const digits = Math.max(twos, fives);
    const scaled = absBig(this.num * 10n ** BigInt(digits) / this.den);
    const text = scaled.toString().padStart(digits + 1, '0');
    const sign = this.num < 0n ? '-' : '';
    return `${sign}${text.slice(0, -digits)}.${text.slice(-digits)}`;
  }
}

export function gcdAll(values: Rational[]): Rational {
  return values.reduce((acc, value) => acc.gcd(value));
}

export function lcmAll(values: Rational[]): Rational {
  return values.reduce((acc, value) => acc.lcm(value));
}
