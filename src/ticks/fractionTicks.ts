/**
 * Evenly spaced ticks with exact fractional labels for typeset axes.
 *
 * Labels are LaTeX math strings (`$3\pi/4$`). Positions are plain numbers in
 * data space, ready to hand to an axis alongside the labels.
 *
 * @module fractionTicks
 */

import { Rational, roundToRational } from '../utils/rational';
import { InvalidTickCountError, InvalidTickRangeError } from '../errors';

export interface FractionTickOptions {
  /** Number of ticks, endpoints included. Must be an integer >= 2. Defaults to 10. */
  readonly count?: number;
  /** Unit the labels are expressed in, e.g. `Math.PI`. Defaults to 1. */
  readonly divisor?: number;
  /** Symbol printed for one `divisor`, e.g. `'\\pi'`. */
  readonly divisorSymbol?: string;
  /** Decimal digits the scaled bounds are rounded to. Defaults to 5. */
  readonly digits?: number;
}

export interface FractionTicks {
  readonly positions: ReadonlyArray<number>;
  readonly labels: ReadonlyArray<string>;
}

const DEFAULT_TICK_COUNT = 10;
const DEFAULT_DIGITS = 5;
// Number#toFixed accepts at most 100 fraction digits.
const MAX_DIGITS = 100;

/**
 * Formats one tick value, in units of `symbol` when given.
 *
 * - `0` and symbol-less values print as integers or fractions: `-1/2`
 * - integers: `\pi`, `-\pi`, `2\pi`
 * - unit numerators: `\pi/2`, `-\pi/2`
 * - anything else: `3\pi/4`, `-3\pi/4`
 */
export function formatFractionLabel(value: Rational, symbol?: string): string {
  if (symbol === undefined || value.isZero()) return `$${value.toString()}$`;

  const { numerator, denominator } = value;
  if (value.isInteger()) {
    if (numerator === 1n) return `$${symbol}$`;
    if (numerator === -1n) return `$-${symbol}$`;
    return `$${numerator}${symbol}$`;
  }
  if (numerator === 1n || numerator === -1n) {
    return value.sign() > 0 ? `$${symbol}/${denominator}$` : `$-${symbol}/${denominator}$`;
  }
  return `$${numerator}${symbol}/${denominator}$`;
}

/**
 * Divides `[start / divisor, stop / divisor]`, rounded to `digits` decimals, into
 * `count` evenly spaced exact steps.
 *
 * @example
 * ```typescript
 * const { positions, labels } = fractionTicks(-Math.PI, Math.PI, {
 *   count: 5,
 *   divisor: Math.PI,
 *   divisorSymbol: '\\pi',
 * });
 * // labels: ['$-\\pi$', '$-\\pi/2$', '$0$', '$\\pi/2$', '$\\pi$']
 * ```
 *
 * @throws {InvalidTickCountError} If `count` is not an integer >= 2.
 * @throws {InvalidTickRangeError} If a bound, the divisor or a bound divided by
 *   the divisor is not finite, the divisor is zero, or `digits` is out of range.
 */
export function fractionTicks(start: number, stop: number, options: FractionTickOptions = {}): FractionTicks {
  const count = options.count ?? DEFAULT_TICK_COUNT;
  const divisor = options.divisor ?? 1;
  const digits = options.digits ?? DEFAULT_DIGITS;

  if (!Number.isInteger(count) || count < 2) throw new InvalidTickCountError(count);
  if (!Number.isFinite(start) || !Number.isFinite(stop)) {
    throw new InvalidTickRangeError(`Invalid tick range: [${start}, ${stop}]. Bounds must be finite.`);
  }
  if (!Number.isFinite(divisor) || divisor === 0) {
    throw new InvalidTickRangeError(`Invalid divisor: ${divisor}. Must be finite and non-zero.`);
  }
  if (!Number.isInteger(digits) || digits < 0 || digits > MAX_DIGITS) {
    throw new InvalidTickRangeError(`Invalid digits: ${digits}. Must be an integer in [0, ${MAX_DIGITS}].`);
  }

  const scaledStart = start / divisor;
  const scaledStop = stop / divisor;
  if (!Number.isFinite(scaledStart) || !Number.isFinite(scaledStop)) {
    throw new InvalidTickRangeError(
      `Invalid tick range: [${start}, ${stop}] / ${divisor} overflows. Scaled bounds must be finite.`
    );
  }

  const first = roundToRational(scaledStart, digits);
  const last = roundToRational(scaledStop, digits);
  const step = last.sub(first).div(Rational.of(count - 1));

  const positions: number[] = new Array(count);
  const labels: string[] = new Array(count);
  for (let i = 0; i < count; i++) {
    const value = first.add(step.mul(Rational.of(i)));
    positions[i] = divisor * value.toNumber();
    labels[i] = formatFractionLabel(value, options.divisorSymbol);
  }

  return { positions, labels };
}
