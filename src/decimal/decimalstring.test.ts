// src/decimal/decimalstring.test.ts

import { describe, it, expect } from 'vitest';

import decimalstring, { MAX_WORD_OPERAND } from './decimalstring.js';
import { DivideByZeroError, MagnitudeError } from '../util/errors.js';

describe('decimalstring', () => {
	describe('isIntegralString', () => {
		it('should accept canonical decimal integers', () => {
			expect(decimalstring.isIntegralString('0')).toBe(true);
			expect(decimalstring.isIntegralString('7')).toBe(true);
			expect(decimalstring.isIntegralString('-123')).toBe(true);
			expect(decimalstring.isIntegralString('98765432109876543210')).toBe(true);
		});

		it('should reject empty, sign-only and leading-zero strings', () => {
			expect(decimalstring.isIntegralString('')).toBe(false);
			expect(decimalstring.isIntegralString('-')).toBe(false);
			expect(decimalstring.isIntegralString('007')).toBe(false);
			expect(decimalstring.isIntegralString('-01')).toBe(false);
		});

		it('should reject anything that is not an ASCII digit', () => {
			expect(decimalstring.isIntegralString('1a')).toBe(false);
			expect(decimalstring.isIntegralString('+1')).toBe(false);
			expect(decimalstring.isIntegralString(' 1')).toBe(false);
			expect(decimalstring.isIntegralString('1.0')).toBe(false);
			expect(decimalstring.isIntegralString('١')).toBe(false);
		});
	});

	describe('compareMagnitudes', () => {
		it('should order by length first, then lexically', () => {
			expect(decimalstring.compareMagnitudes('99', '100')).toBe(-1);
			expect(decimalstring.compareMagnitudes('100', '99')).toBe(1);
			expect(decimalstring.compareMagnitudes('42', '42')).toBe(0);
			expect(decimalstring.greaterOrEqual('42', '42')).toBe(true);
			expect(decimalstring.greaterOrEqual('41', '42')).toBe(false);
		});
	});

	describe('trimZeros', () => {
		it('should trim strings at either end', () => {
			expect(decimalstring.trimZeros('000120', 'leading')).toBe('120');
			expect(decimalstring.trimZeros('1200', 'trailing')).toBe('12');
			expect(decimalstring.trimZeros('000', 'leading')).toBe('0');
		});

		it('should trim digit arrays without modifying the input', () => {
			const digits = [0, 1, 0, 0];
			expect(decimalstring.trimZeros(digits, 'trailing')).toEqual([0, 1]);
			expect(decimalstring.trimZeros(digits, 'leading')).toEqual([1, 0, 0]);
			expect(decimalstring.trimZeros([0, 0], 'leading')).toEqual([0]);
			expect(digits).toEqual([0, 1, 0, 0]);
		});
	});

	describe('add', () => {
		it('should carry into a new digit', () => {
			expect(decimalstring.add('999', '1')).toBe('1000');
			expect(decimalstring.add('1', '999')).toBe('1000');
		});

		it('should add zeros', () => {
			expect(decimalstring.add('0', '0')).toBe('0');
			expect(decimalstring.add('0', '15')).toBe('15');
		});
	});

	describe('subtract', () => {
		it('should borrow across digits and drop leading zeros', () => {
			expect(decimalstring.subtract('1000', '1')).toBe('999');
			expect(decimalstring.subtract('10', '7')).toBe('3');
		});

		it('should return zero for equal magnitudes', () => {
			expect(decimalstring.subtract('5', '5')).toBe('0');
		});

		it('should throw MagnitudeError when the result would be negative', () => {
			expect(() => decimalstring.subtract('1', '2')).toThrow(MagnitudeError);
		});
	});

	describe('multiply', () => {
		it('should multiply two magnitudes', () => {
			expect(decimalstring.multiply('123', '456')).toBe('56088');
			expect(decimalstring.multiply('0', '456')).toBe('0');
		});

		it('should multiply by a native word', () => {
			expect(decimalstring.multiplyByWord('12345', 1000)).toBe('12345000');
			expect(decimalstring.multiplyByWord('12345', 0)).toBe('0');
			expect(decimalstring.multiplyByWord('12345', 1)).toBe('12345');
		});

		it('should reject factors that would lose precision', () => {
			expect(() => decimalstring.multiplyByWord('1', MAX_WORD_OPERAND + 1)).toThrow(RangeError);
		});
	});

	describe('divideByWord', () => {
		it('should return the quotient and the remainder', () => {
			expect(decimalstring.divideByWord('123', 10)).toEqual({ quotient: '12', remainder: 3 });
			expect(decimalstring.divideByWord('7', 9)).toEqual({ quotient: '0', remainder: 7 });
		});

		it('should return zero for a zero or empty dividend', () => {
			expect(decimalstring.divideByWord('0', 7)).toEqual({ quotient: '0', remainder: 0 });
			expect(decimalstring.divideByWord('', 7)).toEqual({ quotient: '0', remainder: 0 });
		});

		it('should throw DivideByZeroError for a zero divisor', () => {
			expect(() => decimalstring.divideByWord('5', 0)).toThrow(DivideByZeroError);
		});
	});

	describe('divideByString', () => {
		it('should return the quotient and the remainder', () => {
			expect(decimalstring.divideByString('100', '7')).toEqual({ quotient: '14', remainder: '2' });
			expect(decimalstring.divideByString('56088', '456')).toEqual({ quotient: '123', remainder: '0' });
		});

		it('should return the dividend as remainder when it is smaller', () => {
			expect(decimalstring.divideByString('3', '10')).toEqual({ quotient: '0', remainder: '3' });
		});

		it('should throw DivideByZeroError for a zero divisor', () => {
			expect(() => decimalstring.divideByString('5', '0')).toThrow(DivideByZeroError);
		});
	});
});
