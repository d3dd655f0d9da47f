/**
 * Fixed-point axis-aligned rectangle
 *
 * A rectangle is a corner (`pos`, the minimum x/y) plus a `size`. Sizes are
 * expected to be non-negative but nothing enforces it: Contracted can
 * produce a negative size, and Right/Top/containment/overlap are only
 * meaningful for non-negative ones.
 *
 * Boundary conventions differ between queries and are kept as they are:
 * - ContainsPoint / ContainsRect: half-open, `pos <= p < pos + size`
 * - IsOverlapping: touching edges overlap
 * - Intersection: touching edges give no intersection (null)
 */

import { FP, type FixedPoint } from './FixedMath.js';
import { FPVector2 } from './FPVector2.js';

/**
 * Fixed-point rectangle interface
 */
export interface FPRect {
  readonly pos: FPVector2;
  readonly size: FPVector2;
}

function rect(pos: FPVector2, size: FPVector2): FPRect {
  return Object.freeze({ pos, size });
}

function spanRect(
  minX: FixedPoint,
  minY: FixedPoint,
  maxX: FixedPoint,
  maxY: FixedPoint
): FPRect {
  return rect(FPVector2.Create(minX, minY), FPVector2.Create(FP.Sub(maxX, minX), FP.Sub(maxY, minY)));
}

/**
 * FPRect - Fixed-point rectangle utilities
 */
export const FPRect = {
  // ============ Creation ============

  /** Create a rectangle from a corner and a size */
  Create: (pos: FPVector2, size: FPVector2): FPRect => rect(pos, size),

  /** Create a rectangle from integer x, y, width, height */
  FromInt: (x: number, y: number, width: number, height: number): FPRect =>
    rect(FPVector2.FromInt(x, y), FPVector2.FromInt(width, height)),

  /** Create a rectangle from float x, y, width, height */
  FromFloat: (x: number, y: number, width: number, height: number): FPRect =>
    rect(FPVector2.FromFloat(x, y), FPVector2.FromFloat(width, height)),

  /** Empty rectangle at the origin */
  Zero: rect(FPVector2.Zero, FPVector2.Zero),

  // ============ Edges ============

  Left: (r: FPRect): FixedPoint => r.pos.x,

  Bottom: (r: FPRect): FixedPoint => r.pos.y,

  Right: (r: FPRect): FixedPoint => FP.Add(r.pos.x, r.size.x),

  Top: (r: FPRect): FixedPoint => FP.Add(r.pos.y, r.size.y),

  // ============ Measurements ============

  Area: (r: FPRect): FixedPoint => FP.Mul(r.size.x, r.size.y),

  Perimeter: (r: FPRect): FixedPoint => FP.Mul(FP.FromInt(2), FP.Add(r.size.x, r.size.y)),

  /** Width over height. A zero height throws from the numeric library. */
  AspectRatio: (r: FPRect): FixedPoint => FP.Div(r.size.x, r.size.y),

  // ============ Transforms ============

  /** Translate the corner, keeping the size */
  MoveBy: (r: FPRect, offset: FPVector2): FPRect => rect(FPVector2.Add(r.pos, offset), r.size),

  /**
   * Grow by `offset` on every side: pos - offset, size + 2 * offset.
   * A negative offset shrinks.
   */
  Expanded: (r: FPRect, offset: FPVector2): FPRect =>
    rect(FPVector2.Sub(r.pos, offset), FPVector2.Add(r.size, FPVector2.MulInt(offset, 2))),

  /**
   * Shrink by `offset` on every side: pos + offset, size - 2 * offset.
   * Offsets larger than half the size leave a negative size.
   */
  Contracted: (r: FPRect, offset: FPVector2): FPRect =>
    rect(FPVector2.Add(r.pos, offset), FPVector2.Sub(r.size, FPVector2.MulInt(offset, 2))),

  // ============ Queries ============

  /** Half-open containment on both axes */
  ContainsPoint: (r: FPRect, point: FPVector2): boolean => {
    return (
      FP.Gte(point.x, r.pos.x) &&
      FP.Lt(point.x, FPRect.Right(r)) &&
      FP.Gte(point.y, r.pos.y) &&
      FP.Lt(point.y, FPRect.Top(r))
    );
  },

  /**
   * Both the corner and the far corner of `other` pass ContainsPoint.
   * The far corner is exclusive too, so a rectangle is not inside itself.
   */
  ContainsRect: (r: FPRect, other: FPRect): boolean => {
    return (
      FPRect.ContainsPoint(r, other.pos) &&
      FPRect.ContainsPoint(r, FPVector2.Add(other.pos, other.size))
    );
  },

  /** False only when the rectangles are strictly separated on some axis */
  IsOverlapping: (a: FPRect, b: FPRect): boolean => {
    return !(
      FP.Lt(FPRect.Right(a), FPRect.Left(b)) ||
      FP.Gt(FPRect.Left(a), FPRect.Right(b)) ||
      FP.Gt(FPRect.Bottom(a), FPRect.Top(b)) ||
      FP.Lt(FPRect.Top(a), FPRect.Bottom(b))
    );
  },

  /**
   * Overlapping region of two rectangles.
   * @returns null when the overlap is empty or has zero width or height
   */
  Intersection: (a: FPRect, b: FPRect): FPRect | null => {
    const minX = FP.Max(FPRect.Left(a), FPRect.Left(b));
    const maxX = FP.Min(FPRect.Right(a), FPRect.Right(b));
    const minY = FP.Max(FPRect.Bottom(a), FPRect.Bottom(b));
    const maxY = FP.Min(FPRect.Top(a), FPRect.Top(b));

    if (FP.Lte(maxX, minX) || FP.Lte(maxY, minY)) {
      return null;
    }
    return spanRect(minX, minY, maxX, maxY);
  },

  /** Smallest rectangle enclosing both, whether or not they overlap */
  Union: (a: FPRect, b: FPRect): FPRect => {
    return spanRect(
      FP.Min(FPRect.Left(a), FPRect.Left(b)),
      FP.Min(FPRect.Bottom(a), FPRect.Bottom(b)),
      FP.Max(FPRect.Right(a), FPRect.Right(b)),
      FP.Max(FPRect.Top(a), FPRect.Top(b))
    );
  },

  // ============ Comparison & Conversion ============

  Equals: (a: FPRect, b: FPRect): boolean =>
    FPVector2.Equals(a.pos, b.pos) && FPVector2.Equals(a.size, b.size),

  /** Display form: `(<x>, <y>, <width>, <height>)` */
  ToString: (r: FPRect): string =>
    `(${FP.ToString(r.pos.x)}, ${FP.ToString(r.pos.y)}, ${FP.ToString(r.size.x)}, ${FP.ToString(r.size.y)})`,

  /** Debug form: `rect:(<x>,<y>,<width>,<height>)` */
  ToDebugString: (r: FPRect): string =>
    `rect:(${FP.ToString(r.pos.x)},${FP.ToString(r.pos.y)},${FP.ToString(r.size.x)},${FP.ToString(r.size.y)})`,
};
