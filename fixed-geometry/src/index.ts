/**
 * fixed-geometry - Deterministic Fixed-Point 2D Geometry
 *
 * Vectors and axis-aligned rectangles on fixed-point numbers, for lockstep
 * simulations where every peer must compute the same bits.
 *
 * @packageDocumentation
 */

export { FixedPoint, FP, DEFAULT_PRECISION } from './FixedMath.js';
export { FPVector2 } from './FPVector2.js';
export { FPRect } from './FPRect.js';
export {
  StateHasher,
  DEFAULT_HASHER_CONFIG,
  MAX_FRACTION_DIGITS,
  validateHasherConfig,
} from './StateHasher.js';

// Interfaces under separate names (type-only export to avoid conflict with const)
export type { FPVector2 as FPVector2Interface } from './FPVector2.js';
export type { FPRect as FPRectInterface } from './FPRect.js';
export type { StateHasherConfig } from './StateHasher.js';
