/**
 * StateHasher - Deterministic state hasher using FNV-1a (32-bit)
 *
 * Lockstep peers hash their geometry each tick and compare the results;
 * any divergence in a vector or rectangle changes the hash.
 *
 * @example
 * ```typescript
 * const hash = new StateHasher()
 *   .addInt(tick)
 *   .addVector(unit.position)
 *   .addRect(unit.bounds)
 *   .addString(unit.state)
 *   .finalize();
 * ```
 */

import { DEFAULT_PRECISION, FP, type FixedPoint } from './FixedMath.js';
import type { FPRect } from './FPRect.js';
import type { FPVector2 } from './FPVector2.js';

/**
 * Options for StateHasher
 */
export interface StateHasherConfig {
  /**
   * Decimal places kept when hashing a fixed-point value (0-18).
   * Values that agree to this many places hash identically.
   */
  fractionDigits: number;

  /** Log each finalized hash to the console */
  debug: boolean;
}

/** Every stored digit of a fixed-point value */
export const MAX_FRACTION_DIGITS = DEFAULT_PRECISION;

/**
 * Default StateHasher configuration
 */
export const DEFAULT_HASHER_CONFIG: StateHasherConfig = {
  // 1e-6 world units is below anything a renderer shows
  fractionDigits: 6,
  debug: false,
};

/**
 * Validates and merges user configuration with defaults
 * @param userConfig - Partial user configuration
 * @returns Complete validated configuration
 */
export function validateHasherConfig(
  userConfig: Partial<StateHasherConfig> = {}
): StateHasherConfig {
  const config: StateHasherConfig = {
    ...DEFAULT_HASHER_CONFIG,
    ...userConfig,
  };

  // Validate fractionDigits
  if (
    !Number.isInteger(config.fractionDigits) ||
    config.fractionDigits < 0 ||
    config.fractionDigits > MAX_FRACTION_DIGITS
  ) {
    throw new Error(
      `Invalid fractionDigits: ${config.fractionDigits}. Must be an integer between 0 and ${MAX_FRACTION_DIGITS}.`
    );
  }

  if (typeof config.debug !== 'boolean') {
    throw new Error(`Invalid debug: ${String(config.debug)}. Must be a boolean.`);
  }

  return config;
}

export class StateHasher {
  private static readonly FNV_OFFSET = 2166136261n;
  private static readonly FNV_PRIME = 16777619n;
  private static readonly MASK_32 = 0xffffffffn;

  private readonly config: StateHasherConfig;
  private hash: bigint;

  /**
   * @throws Error when the configuration is invalid
   */
  constructor(config: Partial<StateHasherConfig> = {}) {
    this.config = validateHasherConfig(config);
    this.hash = StateHasher.FNV_OFFSET;
  }

  private mixByte(byte: bigint): void {
    this.hash ^= byte;
    this.hash = (this.hash * StateHasher.FNV_PRIME) & StateHasher.MASK_32;
  }

  private mixWord(word: bigint): void {
    let bits = word;
    for (let i = 0; i < 8; i++) {
      this.mixByte(bits & 0xffn);
      bits >>= 8n;
    }
  }

  /**
   * Add a 32-bit integer to the hash
   * @returns this (for chaining)
   */
  addInt(value: number): this {
    const int = Math.floor(value) | 0;

    this.mixByte(BigInt(int & 0xff));
    this.mixByte(BigInt((int >> 8) & 0xff));
    this.mixByte(BigInt((int >> 16) & 0xff));
    this.mixByte(BigInt((int >> 24) & 0xff));

    return this;
  }

  /**
   * Add a fixed-point value, rounded to `fractionDigits` decimal places.
   * The scaled integer is hashed as little-endian 64-bit two's-complement
   * words; anything that fits an int64 takes exactly one word.
   * @returns this (for chaining)
   */
  addFixed(value: FixedPoint): this {
    let rest = FP.ToScaledInt(value, this.config.fractionDigits);
    do {
      const word = BigInt.asIntN(64, rest);
      this.mixWord(BigInt.asUintN(64, word));
      rest = (rest - word) >> 64n;
    } while (rest !== 0n);
    return this;
  }

  /**
   * Add both components of a vector
   * @returns this (for chaining)
   */
  addVector(value: FPVector2): this {
    return this.addFixed(value.x).addFixed(value.y);
  }

  /**
   * Add the corner and size of a rectangle
   * @returns this (for chaining)
   */
  addRect(value: FPRect): this {
    return this.addVector(value.pos).addVector(value.size);
  }

  /**
   * Add a string to the hash, followed by a terminator
   * @returns this (for chaining)
   */
  addString(value: string): this {
    for (let i = 0; i < value.length; i++) {
      this.mixByte(BigInt(value.charCodeAt(i)));
    }
    this.mixByte(0n);
    return this;
  }

  /**
   * Add a boolean to the hash
   * @returns this (for chaining)
   */
  addBool(value: boolean): this {
    this.mixByte(value ? 1n : 0n);
    return this;
  }

  /**
   * Finalize and get the hash as a hex string
   * @returns 8-character hex string (32-bit hash)
   */
  finalize(): string {
    const hex = this.hash.toString(16).padStart(8, '0');
    this.log('finalize', hex);
    return hex;
  }

  /**
   * Reset hasher to initial state (for reuse)
   * @returns this (for chaining)
   */
  reset(): this {
    this.hash = StateHasher.FNV_OFFSET;
    return this;
  }

  static create(config: Partial<StateHasherConfig> = {}): StateHasher {
    return new StateHasher(config);
  }

  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.log('[StateHasher]', ...args);
    }
  }
}
