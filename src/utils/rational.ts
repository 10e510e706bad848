/**
 * Exact rational arithmetic over bigint.
 *
 * Values are always kept in lowest terms with a positive denominator, so two
 * equal fractions (1/3 and 2/6) share one representation.
 *
 * @module rational
 */

const absBig = (n: bigint): bigint => (n < 0n ? -n : n);

const gcd = (a: bigint, b: bigint): bigint => {
  let x = absBig(a);
  let y = absBig(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
};

const toBigInt = (value: bigint | number, label: string): bigint => {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Rational ${label} must be a safe integer, got ${value}.`);
  }
  return BigInt(value);
};

// Plain or exponent decimal notation, as produced by Number#toFixed and String(number).
const DECIMAL_PATTERN = /^([+-]?)(\d+)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

export class Rational {
  readonly numerator: bigint;
  readonly denominator: bigint;

  private constructor(numerator: bigint, denominator: bigint) {
    this.numerator = numerator;
    this.denominator = denominator;
  }

  static readonly ZERO = new Rational(0n, 1n);

  static of(numerator: bigint | number, denominator: bigint | number = 1n): Rational {
    const n = toBigInt(numerator, 'numerator');
    const d = toBigInt(denominator, 'denominator');
    if (d === 0n) throw new RangeError('Rational denominator must not be zero.');
    if (n === 0n) return Rational.ZERO;

    const g = gcd(n, d);
    const sign = d < 0n ? -1n : 1n;
    return new Rational((sign * n) / g, (sign * d) / g);
  }

  /**
   * Parses decimal text exactly: `'0.1'` is 1/10, not the nearest binary double.
   */
  static parseDecimal(text: string): Rational {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) throw new SyntaxError(`Not a decimal number: '${text}'.`);

    const [, sign = '', whole = '0', fraction = '', exponentText = '0'] = match;
    const exponent = Number.parseInt(exponentText, 10) - fraction.length;
    let numerator = BigInt(`${whole}${fraction}`);
    if (sign === '-') numerator = -numerator;

    return exponent >= 0
      ? Rational.of(numerator * 10n ** BigInt(exponent))
      : Rational.of(numerator, 10n ** BigInt(-exponent));
  }

  add(other: Rational): Rational {
    return Rational.of(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator
    );
  }

  sub(other: Rational): Rational {
    return this.add(other.negate());
  }

  mul(other: Rational): Rational {
    return Rational.of(this.numerator * other.numerator, this.denominator * other.denominator);
  }

  div(other: Rational): Rational {
    if (other.isZero()) throw new RangeError('Division by zero.');
    return Rational.of(this.numerator * other.denominator, this.denominator * other.numerator);
  }

  negate(): Rational {
    return Rational.of(-this.numerator, this.denominator);
  }

  isZero(): boolean {
    return this.numerator === 0n;
  }

  isInteger(): boolean {
    return this.denominator === 1n;
  }

  sign(): -1 | 0 | 1 {
    if (this.numerator === 0n) return 0;
    return this.numerator < 0n ? -1 : 1;
  }

  equals(other: Rational): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator;
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator);
  }

  /** `3`, `-3`, `1/2`, `-1/2`. */
  toString(): string {
    return this.isInteger() ? `${this.numerator}` : `${this.numerator}/${this.denominator}`;
  }
}

/**
 * Rounds `value` to `digits` decimal places and returns the result as an exact
 * rational.
 *
 * The result is the decimal `toFixed` prints (`0.1` gives 1/10), not the binary
 * value of the double. Exact binary ties round away from zero, so `2.5` at zero
 * digits gives 3 where half-to-even rounding would give 2.
 */
export function roundToRational(value: number, digits: number): Rational {
  return Rational.parseDecimal(value.toFixed(digits));
}
