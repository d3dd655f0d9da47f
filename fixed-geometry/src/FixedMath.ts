/**
 * Fixed-Point Scalar Module
 *
 * Binds the scalar type used by every vector and rectangle operation to
 * @hastom/fixed-point. All values are created at the same decimal precision,
 * so any two peers running the same operations get the same digits.
 *
 * The library's arithmetic works in place on its receiver. FP always runs
 * it on a private copy and freezes what it returns, so a value handed out
 * by FP (constants included) never changes afterwards.
 *
 * @example
 * ```typescript
 * import { FP } from 'fixed-geometry';
 *
 * const half = FP.FromFloat(0.5);
 * const angle = FP.Mul(FP.PiOver2, half);
 *
 * // Exact digits for logs, a float for rendering
 * console.log(FP.ToString(FP.Sin(angle)), FP.ToFloat(angle));
 * ```
 */

import { FixedPoint } from '@hastom/fixed-point';

// Re-export FixedPoint class as the number type
export { FixedPoint };

/** Decimal precision shared by every value in this package (18 places) */
export const DEFAULT_PRECISION = 18;

/** Number of Taylor terms after the leading one in Sin (x³ .. x¹¹) and Cos (x² .. x¹²) */
const TRIG_TERMS = 5;

/** Digits kept when a float is converted; the rest of a double's expansion is noise */
const FLOAT_DIGITS = 15;

const PRECISION = BigInt(DEFAULT_PRECISION);
const SCALE = 10n ** PRECISION;

function fp(base: bigint): FixedPoint {
  const value = new FixedPoint(base, PRECISION);
  Object.freeze(value);
  return value;
}

/** Raw integer of `a` at DEFAULT_PRECISION, whatever precision it was built with */
function baseOf(a: FixedPoint): bigint {
  return FixedPoint.convertToPrecision(a.getBase(), PRECISION, a.getPrecision());
}

/** Run one of the library's in-place operations on a fresh copy of `a` */
function apply(a: FixedPoint, op: (work: FixedPoint) => FixedPoint): FixedPoint {
  const result = op(new FixedPoint(baseOf(a), PRECISION));
  Object.freeze(result);
  return result;
}

function floorDiv(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && n < 0n ? q - 1n : q;
}

/** Quotient rounded half away from zero (d > 0) */
function roundDiv(n: bigint, d: bigint): bigint {
  const q = n / d;
  const r = n % d;
  if (2n * (r < 0n ? -r : r) < d) {
    return q;
  }
  return n < 0n ? q - 1n : q + 1n;
}

/** Integer square root (floor), Newton's method from an overestimate */
function isqrt(n: bigint): bigint {
  if (n < 2n) {
    return n;
  }
  let x = 1n << BigInt((n.toString(2).length >> 1) + 1);
  let y = (x + n / x) >> 1n;
  while (y < x) {
    x = y;
    y = (x + n / x) >> 1n;
  }
  return x;
}

function formatDecimal(base: bigint): string {
  const negative = base < 0n;
  const digits = (negative ? -base : base).toString().padStart(DEFAULT_PRECISION + 1, '0');
  const whole = digits.slice(0, -DEFAULT_PRECISION);
  const fraction = digits.slice(-DEFAULT_PRECISION).replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''}`;
}

const ZERO = fp(0n);
const ONE = fp(SCALE);
const MINUS_ONE = fp(-SCALE);
const PI = fp(3141592653589793238n);
const PI_2 = fp(6283185307179586477n);
const PI_OVER_2 = fp(1570796326794896619n);
const MINUS_PI = fp(-3141592653589793238n);
const MINUS_PI_OVER_2 = fp(-1570796326794896619n);

/**
 * FP - Fixed-point number creation, conversion, and math utilities
 */
export const FP = {
  // ============ Creation ============

  /**
   * Create a fixed-point number from a JavaScript number
   *
   * Goes through toFixed(15) so V8, JavaScriptCore and SpiderMonkey all see
   * the same decimal digits for the same double.
   * @throws RangeError for NaN, infinities and magnitudes of 1e21 or more
   */
  FromFloat: (value: number): FixedPoint => {
    if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
      throw new RangeError(`Cannot convert ${value} to a fixed-point number`);
    }
    const truncated = FixedPoint.fromDecimal(value, FLOAT_DIGITS);
    return fp(FixedPoint.convertToPrecision(truncated.getBase(), PRECISION, truncated.getPrecision()));
  },

  /**
   * Create a fixed-point number from an integer
   * @throws RangeError when `value` is a number that is not a safe integer
   */
  FromInt: (value: number | bigint): FixedPoint => {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new RangeError(`Expected a safe integer, got ${value}`);
    }
    return fp(BigInt(value) * SCALE);
  },

  /**
   * Convert a fixed-point number back to a JavaScript number.
   * For display and logging; never feed the result back into a simulation.
   */
  ToFloat: (a: FixedPoint): number => Number(formatDecimal(baseOf(a))),

  /** Exact decimal digits, trailing zeros trimmed: `1/3` is `0.333333333333333333` */
  ToString: (a: FixedPoint): string => formatDecimal(baseOf(a)),

  /**
   * The value times 10^fractionDigits, rounded half away from zero.
   * @throws RangeError when fractionDigits is not an integer in [0, DEFAULT_PRECISION]
   */
  ToScaledInt: (a: FixedPoint, fractionDigits: number): bigint => {
    if (!Number.isInteger(fractionDigits) || fractionDigits < 0 || fractionDigits > DEFAULT_PRECISION) {
      throw new RangeError(`Expected 0 to ${DEFAULT_PRECISION} fraction digits, got ${fractionDigits}`);
    }
    return roundDiv(baseOf(a), 10n ** BigInt(DEFAULT_PRECISION - fractionDigits));
  },

  // ============ Constants ============

  /** Zero constant */
  _0: ZERO,

  /** One constant */
  _1: ONE,

  /** Minus one constant */
  Minus_1: MINUS_ONE,

  /** Pi constant (18 decimal places) */
  Pi: PI,

  /** 2*Pi constant */
  Pi2: PI_2,

  /** Pi/2 constant */
  PiOver2: PI_OVER_2,

  // ============ Arithmetic Operations ============

  Add: (a: FixedPoint, b: FixedPoint): FixedPoint => apply(a, (work) => work.add(b)),

  Sub: (a: FixedPoint, b: FixedPoint): FixedPoint => apply(a, (work) => work.sub(b)),

  /** Multiply; the product is truncated toward zero at 18 places */
  Mul: (a: FixedPoint, b: FixedPoint): FixedPoint => apply(a, (work) => work.mul(b)),

  /** Divide two fixed-point numbers. A zero divisor throws from the underlying bigint division. */
  Div: (a: FixedPoint, b: FixedPoint): FixedPoint => apply(a, (work) => work.div(b)),

  Neg: (a: FixedPoint): FixedPoint => fp(-baseOf(a)),

  // ============ Math Functions ============

  /**
   * Square root, truncated to 18 places
   * @throws RangeError for a negative argument
   */
  Sqrt: (a: FixedPoint): FixedPoint => {
    const base = baseOf(a);
    if (base < 0n) {
      throw new RangeError(`Square root of negative value ${formatDecimal(base)}`);
    }
    return fp(isqrt(base * SCALE));
  },

  Abs: (a: FixedPoint): FixedPoint => {
    const base = baseOf(a);
    return base < 0n ? fp(-base) : fp(base);
  },

  /** Nearest integer, halves away from zero */
  Round: (a: FixedPoint): FixedPoint => fp(roundDiv(baseOf(a), SCALE) * SCALE),

  /** Largest integer not above `a` */
  Floor: (a: FixedPoint): FixedPoint => fp(floorDiv(baseOf(a), SCALE) * SCALE),

  Min: (a: FixedPoint, b: FixedPoint): FixedPoint => (a.lte(b) ? a : b),

  Max: (a: FixedPoint, b: FixedPoint): FixedPoint => (a.gte(b) ? a : b),

  // ============ Comparison ============

  IsZero: (a: FixedPoint): boolean => a.getBase() === 0n,

  Eq: (a: FixedPoint, b: FixedPoint): boolean => a.eq(b),

  Lt: (a: FixedPoint, b: FixedPoint): boolean => a.lt(b),

  Lte: (a: FixedPoint, b: FixedPoint): boolean => a.lte(b),

  Gt: (a: FixedPoint, b: FixedPoint): boolean => a.gt(b),

  Gte: (a: FixedPoint, b: FixedPoint): boolean => a.gte(b),

  // ============ Trigonometry ============

  /**
   * Sine approximation using Taylor series (deterministic)
   *
   * The angle is wrapped into (-π, π] and reflected into [-π/2, π/2]
   * (sin(π - x) = sin(x)) before the series is evaluated, which keeps the
   * truncation error below 1e-7. Sin(0) is exactly 0.
   *
   * Note: Input should be in radians
   */
  Sin: (x: FixedPoint): FixedPoint => {
    let reduced = FP.WrapAngle(x);
    if (reduced.gt(PI_OVER_2)) {
      reduced = FP.Sub(PI, reduced);
    } else if (reduced.lt(MINUS_PI_OVER_2)) {
      reduced = FP.Sub(MINUS_PI, reduced);
    }

    // sin(x) = x - x³/3! + x⁵/5! - ...
    const x2 = FP.Mul(reduced, reduced);
    let term = reduced;
    let sum = reduced;
    for (let k = 1; k <= TRIG_TERMS; k++) {
      term = FP.Neg(FP.Div(FP.Mul(term, x2), FP.FromInt(2 * k * (2 * k + 1))));
      sum = FP.Add(sum, term);
    }
    return sum;
  },

  /**
   * Cosine approximation using Taylor series (deterministic)
   *
   * Evaluated with its own even series rather than as a shifted sine, so
   * Cos(0) is exactly 1. Beyond π/2 the identity cos(x) = -cos(π - |x|) is used.
   *
   * Note: Input should be in radians
   */
  Cos: (x: FixedPoint): FixedPoint => {
    let reduced = FP.Abs(FP.WrapAngle(x));
    let negate = false;
    if (reduced.gt(PI_OVER_2)) {
      reduced = FP.Sub(PI, reduced);
      negate = true;
    }

    // cos(x) = 1 - x²/2! + x⁴/4! - ...
    const x2 = FP.Mul(reduced, reduced);
    let term = ONE;
    let sum = ONE;
    for (let k = 1; k <= TRIG_TERMS + 1; k++) {
      term = FP.Neg(FP.Div(FP.Mul(term, x2), FP.FromInt((2 * k - 1) * (2 * k))));
      sum = FP.Add(sum, term);
    }
    return negate ? FP.Neg(sum) : sum;
  },

  /**
   * Reduce an angle into (-π, π] with a single division, however many
   * turns it spans
   */
  WrapAngle: (x: FixedPoint): FixedPoint => {
    const turns = FP.Floor(FP.Div(x, PI_2));
    let reduced = FP.Sub(x, FP.Mul(turns, PI_2));
    if (reduced.gt(PI)) {
      reduced = FP.Sub(reduced, PI_2);
    } else if (reduced.lte(MINUS_PI)) {
      reduced = FP.Add(reduced, PI_2);
    }
    return reduced;
  },
};
