import { describe, it, expect, vi, afterEach } from 'vitest';
import { FP } from '../src/FixedMath.js';
import { FPRect } from '../src/FPRect.js';
import { FPVector2 } from '../src/FPVector2.js';
import {
  DEFAULT_HASHER_CONFIG,
  StateHasher,
  validateHasherConfig,
  type StateHasherConfig,
} from '../src/StateHasher.js';

describe('StateHasher', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Primitives', () => {
    it('should finalize an empty hash to the FNV offset basis', () => {
      expect(new StateHasher().finalize()).toBe('811c9dc5');
    });

    it('should hash booleans, integers and strings', () => {
      expect(new StateHasher().addBool(true).finalize()).toBe('040c5b8c');
      expect(new StateHasher().addInt(1).finalize()).toBe('fb69b604');
      expect(new StateHasher().addString('ab').finalize()).toBe('3b481cfe');
    });

    it('should depend on the order of inputs', () => {
      const ab = new StateHasher().addInt(1).addInt(2).finalize();
      const ba = new StateHasher().addInt(2).addInt(1).finalize();
      expect(ab).not.toBe(ba);
    });
  });

  describe('Fixed-point values', () => {
    it('should hash fixed-point values as scaled 64-bit integers', () => {
      expect(new StateHasher().addFixed(FP._1).finalize()).toBe('c1dda868');
      expect(new StateHasher().addFixed(FP.Minus_1).finalize()).toBe('e1b5f6d3');
    });

    it('should hash a vector as its two components', () => {
      const v = FPVector2.FromFloat(3.25, -8);
      const byVector = new StateHasher().addVector(v).finalize();
      const byComponents = new StateHasher().addFixed(v.x).addFixed(v.y).finalize();
      expect(byVector).toBe(byComponents);
    });

    it('should hash a rectangle as its corner and size', () => {
      const r = FPRect.FromInt(10, 33, 20, 30);
      const byRect = new StateHasher().addRect(r).finalize();
      const byVectors = new StateHasher().addVector(r.pos).addVector(r.size).finalize();
      expect(byRect).toBe(byVectors);
    });

    it('should agree on equal geometry built different ways', () => {
      const moved = FPRect.MoveBy(FPRect.FromInt(10, 33, 20, 30), FPVector2.FromInt(18, -2));
      const direct = FPRect.FromFloat(28, 31, 20, 30);
      expect(new StateHasher().addRect(moved).finalize()).toBe(new StateHasher().addRect(direct).finalize());
    });

    it('should ignore digits beyond fractionDigits', () => {
      const coarse = { fractionDigits: 0 };
      expect(new StateHasher(coarse).addFixed(FP.FromFloat(0.4)).finalize()).toBe(
        new StateHasher(coarse).addFixed(FP._0).finalize()
      );
      expect(new StateHasher().addFixed(FP.FromFloat(0.4)).finalize()).not.toBe(
        new StateHasher().addFixed(FP._0).finalize()
      );
    });

    it('should tell apart large values that differ in the last kept digit', () => {
      const fine = { fractionDigits: 9 };
      const base = FP.FromInt(10_000_000);
      const nudged = FP.Add(base, FP.FromFloat(0.000000001));
      expect(new StateHasher(fine).addFixed(base).finalize()).not.toBe(
        new StateHasher(fine).addFixed(nudged).finalize()
      );
    });

    it('should hash values beyond 64 bits without wrapping', () => {
      const full = { fractionDigits: 18 };
      // 2^64 units of the last digit: equal to ten modulo a single 64-bit word
      const wrap = FP.Div(FP.FromInt(2n ** 64n), FP.FromInt(10n ** 18n));
      const ten = FP.FromInt(10);
      expect(new StateHasher(full).addFixed(ten).finalize()).not.toBe(
        new StateHasher(full).addFixed(FP.Sub(ten, wrap)).finalize()
      );
    });
  });

  describe('Lifecycle', () => {
    it('should reset to the initial state', () => {
      const hasher = new StateHasher().addString('tick').addInt(42);
      expect(hasher.reset().finalize()).toBe('811c9dc5');
    });

    it('should create through the static factory', () => {
      expect(StateHasher.create().addBool(true).finalize()).toBe('040c5b8c');
    });
  });

  describe('Configuration', () => {
    it('should return the defaults when nothing is given', () => {
      expect(validateHasherConfig()).toEqual({ fractionDigits: 6, debug: false });
      expect(validateHasherConfig({})).toEqual(DEFAULT_HASHER_CONFIG);
    });

    it('should merge user values over the defaults', () => {
      expect(validateHasherConfig({ debug: true })).toEqual({ fractionDigits: 6, debug: true });
      expect(validateHasherConfig({ fractionDigits: 0 })).toEqual({ fractionDigits: 0, debug: false });
      expect(validateHasherConfig({ fractionDigits: 18 }).fractionDigits).toBe(18);
    });

    it('should not mutate the defaults', () => {
      validateHasherConfig({ fractionDigits: 2, debug: true });
      expect(DEFAULT_HASHER_CONFIG).toEqual({ fractionDigits: 6, debug: false });
    });

    it('should name the invalid field', () => {
      expect(() => validateHasherConfig({ fractionDigits: 19 })).toThrow(
        'Invalid fractionDigits: 19. Must be an integer between 0 and 18.'
      );
      expect(() => validateHasherConfig({ fractionDigits: Number.NaN })).toThrow('Invalid fractionDigits');
    });

    it('should reject a non-boolean debug flag', () => {
      // Untyped input, as it arrives from a parsed settings file
      const config: Partial<StateHasherConfig> = JSON.parse('{"debug": "yes"}');
      expect(() => validateHasherConfig(config)).toThrow('Invalid debug: yes. Must be a boolean.');
    });

    it('should reject invalid fractionDigits', () => {
      expect(() => new StateHasher({ fractionDigits: 19 })).toThrow('Invalid fractionDigits');
      expect(() => new StateHasher({ fractionDigits: -1 })).toThrow('Invalid fractionDigits');
      expect(() => new StateHasher({ fractionDigits: 1.5 })).toThrow('Invalid fractionDigits');
    });
  });

  describe('Logging', () => {
    it('should log finalized hashes in debug mode', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      new StateHasher({ debug: true }).finalize();
      expect(log).toHaveBeenCalledWith('[StateHasher]', 'finalize', '811c9dc5');
    });

    it('should stay silent by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      new StateHasher().addInt(7).finalize();
      expect(log).not.toHaveBeenCalled();
    });
  });
});
