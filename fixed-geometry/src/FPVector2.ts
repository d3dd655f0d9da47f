/**
 * Fixed-point 2D vector
 *
 * Vectors are plain immutable records; FPVector2 holds the operations.
 * Nothing here normalizes or clamps implicitly, and division by a zero
 * component or scalar throws from the numeric library rather than being
 * checked first.
 *
 * @example
 * ```typescript
 * import { FP, FPVector2 } from 'fixed-geometry';
 *
 * const velocity = FPVector2.FromInt(3, 4);
 * const heading = FPVector2.Normalize(velocity); // (0.6, 0.8)
 * const turned = FPVector2.Rotate(velocity, FP.PiOver2);
 * ```
 */

import { FP, type FixedPoint } from './FixedMath.js';

/**
 * Fixed-point 2D vector interface
 */
export interface FPVector2 {
  readonly x: FixedPoint;
  readonly y: FixedPoint;
}

function vec(x: FixedPoint, y: FixedPoint): FPVector2 {
  return Object.freeze({ x, y });
}

/**
 * FPVector2 - Fixed-point 2D vector utilities
 */
export const FPVector2 = {
  // ============ Creation ============

  /** Create a new vector from FixedPoint values */
  Create: (x: FixedPoint, y: FixedPoint): FPVector2 => vec(x, y),

  /** Create a vector from integers */
  FromInt: (x: number, y: number): FPVector2 => vec(FP.FromInt(x), FP.FromInt(y)),

  /** Create a vector from float numbers */
  FromFloat: (x: number, y: number): FPVector2 => vec(FP.FromFloat(x), FP.FromFloat(y)),

  // ============ Constants ============

  /** Zero vector */
  Zero: vec(FP._0, FP._0),

  /** Left direction (-1, 0) */
  Left: vec(FP.Minus_1, FP._0),

  /** Right direction (1, 0) */
  Right: vec(FP._1, FP._0),

  /** Up direction (0, 1), y grows upwards */
  Up: vec(FP._0, FP._1),

  /** Down direction (0, -1) */
  Down: vec(FP._0, FP.Minus_1),

  // ============ Arithmetic ============

  /** Add two vectors */
  Add: (a: FPVector2, b: FPVector2): FPVector2 => vec(FP.Add(a.x, b.x), FP.Add(a.y, b.y)),

  /** Subtract two vectors */
  Sub: (a: FPVector2, b: FPVector2): FPVector2 => vec(FP.Sub(a.x, b.x), FP.Sub(a.y, b.y)),

  /** Negate both components */
  Neg: (v: FPVector2): FPVector2 => vec(FP.Neg(v.x), FP.Neg(v.y)),

  /** Component-wise product of two vectors */
  Mul: (a: FPVector2, b: FPVector2): FPVector2 => vec(FP.Mul(a.x, b.x), FP.Mul(a.y, b.y)),

  /** Component-wise quotient of two vectors */
  Div: (a: FPVector2, b: FPVector2): FPVector2 => vec(FP.Div(a.x, b.x), FP.Div(a.y, b.y)),

  /** Multiply a vector by a scalar (v * k) */
  MulScalar: (v: FPVector2, k: FixedPoint): FPVector2 => vec(FP.Mul(v.x, k), FP.Mul(v.y, k)),

  /** Multiply a scalar by a vector (k * v), same result as MulScalar */
  ScalarMul: (k: FixedPoint, v: FPVector2): FPVector2 => vec(FP.Mul(k, v.x), FP.Mul(k, v.y)),

  /** Divide a vector by a scalar */
  DivScalar: (v: FPVector2, k: FixedPoint): FPVector2 => vec(FP.Div(v.x, k), FP.Div(v.y, k)),

  /** Multiply a vector by an integer (v * n) */
  MulInt: (v: FPVector2, n: number): FPVector2 => FPVector2.MulScalar(v, FP.FromInt(n)),

  /** Multiply an integer by a vector (n * v), same result as MulInt */
  IntMul: (n: number, v: FPVector2): FPVector2 => FPVector2.ScalarMul(FP.FromInt(n), v),

  /** Divide a vector by an integer */
  DivInt: (v: FPVector2, n: number): FPVector2 => FPVector2.DivScalar(v, FP.FromInt(n)),

  /** Divide an integer by each component: (n / v.x, n / v.y) */
  IntDiv: (n: number, v: FPVector2): FPVector2 => {
    const numerator = FP.FromInt(n);
    return vec(FP.Div(numerator, v.x), FP.Div(numerator, v.y));
  },

  // ============ Geometry ============

  /** Get the squared magnitude of a vector (no square root) */
  SqrMagnitude: (v: FPVector2): FixedPoint => {
    return FP.Add(FP.Mul(v.x, v.x), FP.Mul(v.y, v.y));
  },

  /** Get the magnitude (length) of a vector */
  Magnitude: (v: FPVector2): FixedPoint => {
    return FP.Sqrt(FPVector2.SqrMagnitude(v));
  },

  /**
   * Scale a vector to length 1.
   * @returns null for a zero-length vector
   */
  Normalize: (v: FPVector2): FPVector2 | null => {
    const len = FPVector2.Magnitude(v);
    if (FP.IsZero(len)) {
      return null;
    }
    return vec(FP.Div(v.x, len), FP.Div(v.y, len));
  },

  /** Dot product of two vectors */
  Dot: (a: FPVector2, b: FPVector2): FixedPoint => {
    return FP.Add(FP.Mul(a.x, b.x), FP.Mul(a.y, b.y));
  },

  /**
   * 2D cross product (z of the 3D cross product).
   * Positive when b is counter-clockwise from a.
   */
  Cross: (a: FPVector2, b: FPVector2): FixedPoint => {
    return FP.Sub(FP.Mul(a.x, b.y), FP.Mul(a.y, b.x));
  },

  /** Scale a vector component-wise by another vector */
  Scale: (v: FPVector2, factor: FPVector2): FPVector2 => vec(FP.Mul(v.x, factor.x), FP.Mul(v.y, factor.y)),

  /**
   * Rotate counter-clockwise by an angle in radians.
   * Each call goes through the Taylor approximations in FP.Sin/FP.Cos, so
   * long chains of rotations accumulate their error.
   */
  Rotate: (v: FPVector2, angle: FixedPoint): FPVector2 => {
    const cos = FP.Cos(angle);
    const sin = FP.Sin(angle);
    return vec(
      FP.Sub(FP.Mul(v.x, cos), FP.Mul(v.y, sin)),
      FP.Add(FP.Mul(v.x, sin), FP.Mul(v.y, cos))
    );
  },

  /** Absolute value of each component */
  Abs: (v: FPVector2): FPVector2 => vec(FP.Abs(v.x), FP.Abs(v.y)),

  // ============ Comparison & Conversion ============

  /** Exact component-wise equality */
  Equals: (a: FPVector2, b: FPVector2): boolean => FP.Eq(a.x, b.x) && FP.Eq(a.y, b.y),

  /** Convert to plain object with float values (for display/serialization) */
  ToFloat: (v: FPVector2): { x: number; y: number } => ({
    x: FP.ToFloat(v.x),
    y: FP.ToFloat(v.y),
  }),

  /** Text form used in logs, exact to the last digit: `vec:<x>,<y>` */
  ToString: (v: FPVector2): string => `vec:${FP.ToString(v.x)},${FP.ToString(v.y)}`,
};
