// src/engines/factorialinteger.test.ts

import { describe, it, expect } from 'vitest';

import { FactorialInteger } from './factorialinteger.js';
import { DivideByZeroError, DomainError, InvalidFormatError, OverflowError, RadixViolationError } from '../util/errors.js';

const LARGE = '123456789012345678901234567890';

describe('FactorialInteger', () => {
	describe('construction', () => {
		it('should use the configured word width', () => {
			expect(FactorialInteger.WORD_BITS).toBe(8);
		});

		it('should expose factorial digits, least significant first', () => {
			// 5 = 2*2! + 1*1!
			const five = FactorialInteger.fromNumber(5);
			expect(five.digits()).toEqual([0, 1, 2]);
			expect(five.highestIndex).toBe(2);
			expect(five.words).toEqual([5]);
			expect(FactorialInteger.fromNumber(24).digits()).toEqual([0, 0, 0, 0, 1]);
		});

		it('should keep zero without words', () => {
			const zero = FactorialInteger.zero();
			expect(zero.words).toEqual([]);
			expect(zero.digits()).toEqual([]);
			expect(zero.toString()).toBe('0');
		});

		it('should round-trip decimal strings', () => {
			expect(FactorialInteger.fromString(LARGE).toString()).toBe(LARGE);
			expect(FactorialInteger.fromString(`-${LARGE}`).toString()).toBe(`-${LARGE}`);
		});

		it('should store 20! as a single top digit', () => {
			const digits = FactorialInteger.fromString('2432902008176640000').digits();
			expect(digits.length).toBe(21);
			expect(digits[20]).toBe(1);
			expect(digits.slice(0, 20).every(digit => digit === 0)).toBe(true);
		});

		it('should reject malformed input', () => {
			expect(() => FactorialInteger.fromString('0x10')).toThrow(InvalidFormatError);
			expect(() => FactorialInteger.fromNumber(0.5)).toThrow(InvalidFormatError);
		});
	});

	describe('signed arithmetic', () => {
		it('should add across sign combinations', () => {
			expect(FactorialInteger.fromNumber(5).plus(-8).toString()).toBe('-3');
			expect(FactorialInteger.fromNumber(-5).plus(8).toString()).toBe('3');
			expect(FactorialInteger.fromNumber(-5).plus(-8).toString()).toBe('-13');
			expect(FactorialInteger.fromNumber(1).minus(2).toString()).toBe('-1');
		});

		it('should satisfy x + (-x) == 0, x * 1 == x and x / x == 1', () => {
			const x = FactorialInteger.fromString(LARGE);
			const sum = x.plus(x.negate());
			expect(sum.isZero()).toBe(true);
			expect(sum.sign).toBe(false);
			expect(x.times(FactorialInteger.one()).eq(x)).toBe(true);
			expect(x.dividedBy(x).toString()).toBe('1');
		expect(x.mod(x).isZero()).toBe(true);
		});

		it('should multiply, divide and take remainders', () => {
			expect(FactorialInteger.fromNumber(123).times(456).toString()).toBe('56088');
			expect(FactorialInteger.fromNumber(-7).dividedBy(2).toString()).toBe('-3');
			expect(FactorialInteger.fromNumber(-7).mod(2).toString()).toBe('-1');
		});

		it('should throw DivideByZeroError when dividing by zero', () => {
			expect(() => FactorialInteger.fromNumber(1).dividedBy(0)).toThrow(DivideByZeroError);
			expect(() => FactorialInteger.fromNumber(1).mod(0)).toThrow(DivideByZeroError);
		});

		it('should refuse a raw magnitude subtraction with a larger right operand', () => {
			expect(() => FactorialInteger.fromNumber(1).subtract(2)).toThrow(RadixViolationError);
		});

		it('should increment into a new digit', () => {
			const next = FactorialInteger.fromNumber(23).increment();
			expect(next.toString()).toBe('24');
			expect(next.highestIndex).toBe(4);
			expect(next.decrement().highestIndex).toBe(3);
		});
	});

	describe('comparison and derived operators', () => {
		it('should compare values of different digit counts', () => {
			expect(FactorialInteger.fromNumber(24).gt(23)).toBe(true);
			expect(FactorialInteger.fromNumber(-24).lt(-23)).toBe(true);
			expect(FactorialInteger.fromNumber(6).eq('6')).toBe(true);
			expect(FactorialInteger.fromNumber(6).ne(7n)).toBe(true);
		});

		it('should compute abs, pow and sqrt', () => {
			expect(FactorialInteger.fromNumber(-9).abs().toString()).toBe('9');
			expect(FactorialInteger.fromNumber(2).pow(10).toString()).toBe('1024');
			expect(FactorialInteger.fromNumber(-2).pow(3).toString()).toBe('-8');
			expect(FactorialInteger.fromNumber(625).sqrt().toString()).toBe('25');
			expect(FactorialInteger.fromNumber(2).sqrt().toString()).toBe('1');
			expect(() => FactorialInteger.fromNumber(-1).sqrt()).toThrow(DomainError);
		});
	});

	describe('conversion', () => {
		it('should convert to native integers', () => {
			expect(FactorialInteger.fromString('-9223372036854775808').toBigInt()).toBe(-9223372036854775808n);
			expect(() => FactorialInteger.fromString('9223372036854775808').toBigInt()).toThrow(OverflowError);
			expect(FactorialInteger.fromNumber(-42).toNumber()).toBe(-42);
			expect(JSON.stringify([FactorialInteger.fromNumber(120)])).toBe('["120"]');
		});
	});

	describe('cell', () => {
		it('should replace the held value on compound assignment', () => {
			const cell = FactorialInteger.cell('23');
			expect(cell.preIncrement().highestIndex).toBe(4);
			expect(cell.subtractAssign(FactorialInteger.fromNumber(30)).toString()).toBe('-6');
		});
	});
});
