import { describe, it, expect } from 'vitest';
import { Matrix2x2, Matrix3x3 } from '../src/Matrix.js';
import { BigIntNumeric, IntegerNumeric } from '../src/Numeric.js';

describe('Matrix', () => {
  describe('Matrix2x2', () => {
    it('should address values by column then row', () => {
      const m = new Matrix2x2([1n, 2n, 3n, 4n]);
      expect(m.at(0, 0)).toBe(1n);
      expect(m.at(1, 0)).toBe(2n);
      expect(m.at(0, 1)).toBe(3n);
      expect(m.at(1, 1)).toBe(4n);
    });

    it('should compute a·d − b·c', () => {
      expect(new Matrix2x2([1n, 2n, 3n, 4n]).determinant(BigIntNumeric)).toBe(-2n);
      expect(new Matrix2x2([-4, -4, -4, 4]).determinant(IntegerNumeric)).toBe(-32);
    });

    it('should return zero for linearly dependent rows', () => {
      expect(new Matrix2x2([0, 0, 4, 4]).determinant(IntegerNumeric)).toBe(0);
      expect(new Matrix2x2([2n, 4n, 3n, 6n]).determinant(BigIntNumeric)).toBe(0n);
    });

    it('should reject the wrong number of values', () => {
      expect(() => new Matrix2x2([1n, 2n, 3n])).toThrow('Matrix2x2 expects 4 values, got 3');
    });

    it('should reject out of range indices', () => {
      const m = new Matrix2x2([1n, 2n, 3n, 4n]);
      expect(() => m.at(2, 0)).toThrow(RangeError);
      expect(() => m.at(0, -1)).toThrow(RangeError);
    });

    it('should not be affected by later changes to the source array', () => {
      const values = [1n, 2n, 3n, 4n];
      const m = new Matrix2x2(values);
      values[0] = 100n;
      expect(m.at(0, 0)).toBe(1n);
    });
  });

  describe('Matrix3x3', () => {
    it('should compute the determinant of a diagonal matrix', () => {
      const m = new Matrix3x3([2n, 0n, 0n, 0n, 3n, 0n, 0n, 0n, 4n]);
      expect(m.determinant(BigIntNumeric)).toBe(24n);
    });

    it('should compute the six-term rule', () => {
      const m = new Matrix3x3([1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 10n]);
      expect(m.determinant(BigIntNumeric)).toBe(-3n);
    });

    it('should give zero for homogeneous rows of collinear points', () => {
      const m = new Matrix3x3([0, 0, 1, 2, 2, 1, 5, 5, 1]);
      expect(m.determinant(IntegerNumeric)).toBe(0);
    });

    it('should address values by column then row', () => {
      const m = new Matrix3x3([1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 9n]);
      expect(m.at(2, 0)).toBe(3n);
      expect(m.at(0, 2)).toBe(7n);
    });

    it('should reject the wrong number of values', () => {
      expect(() => new Matrix3x3([1, 2, 3, 4])).toThrow('Matrix3x3 expects 9 values, got 4');
    });

    it('should reject out of range indices', () => {
      const m = new Matrix3x3([1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n, 9n]);
      expect(() => m.at(3, 0)).toThrow(RangeError);
      expect(() => m.at(0, 3)).toThrow('Matrix index (0, 3) out of bounds for 3x3');
      expect(() => m.at(-1, 1)).toThrow(RangeError);
      expect(() => m.at(1.5, 1)).toThrow(RangeError);
    });
  });
});
