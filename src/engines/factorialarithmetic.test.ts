// src/engines/factorialarithmetic.test.ts

import { describe, it, expect } from 'vitest';

import factoraccess from '../codec/factoraccess.js';
import factorialarithmetic from './factorialarithmetic.js';
import { DigitStorage } from '../storage/wordstorage.js';
import { DivideByZeroError, InvalidFormatError, OverflowError, RadixViolationError } from '../util/errors.js';

function parse(str: string): DigitStorage {
	return factorialarithmetic.fromDecimalString(str, 8);
}

function render(storage: DigitStorage): string {
	return factorialarithmetic.toDecimalString(storage);
}

describe('factorialarithmetic', () => {
	describe('getFactorialString', () => {
		it('should return decimal factorials', () => {
			expect(factorialarithmetic.getFactorialString(0)).toBe('1');
			expect(factorialarithmetic.getFactorialString(5)).toBe('120');
			expect(factorialarithmetic.getFactorialString(20)).toBe('2432902008176640000');
			expect(factorialarithmetic.getFactorialString(3)).toBe('6');
		});
	});

	describe('fromDecimalString', () => {
		it('should decompose into factorial digits', () => {
			// 23 = 3*3! + 2*2! + 1*1!
			const storage = parse('23');
			expect(storage.highestIndex).toBe(3);
			expect([1, 2, 3].map(index => factoraccess.extract(storage, index))).toEqual([1, 2, 3]);
		});

		it('should give zero no words and no sign', () => {
			const zero = parse('-0');
			expect(zero.words).toEqual([]);
			expect(zero.highestIndex).toBe(0);
			expect(zero.sign).toBe(false);
			expect(render(zero)).toBe('0');
		});

		it('should throw InvalidFormatError for malformed input', () => {
			expect(() => parse('--1')).toThrow(InvalidFormatError);
		});

		it('should agree with fromBigInt', () => {
			expect(factorialarithmetic.fromBigInt(-2432902008176640000n, 8).words).toEqual(parse('-2432902008176640000').words);
		});
	});

	describe('trim', () => {
		it('should drop words above the highest nonzero digit', () => {
			const storage = new DigitStorage(8);
			factoraccess.put(storage, 1, 1);
			factoraccess.put(storage, 5, 0);
			expect(storage.words).toEqual([1, 0]);
			expect(storage.highestIndex).toBe(5);

			factorialarithmetic.trim(storage);
			expect(storage.words).toEqual([1]);
			expect(storage.highestIndex).toBe(1);
		});

		it('should turn an all-zero storage into canonical zero', () => {
			const storage = new DigitStorage(8, [0, 0], true);
			storage.setHighestIndex(5);

			factorialarithmetic.trim(storage);
			expect(storage.words).toEqual([]);
			expect(storage.highestIndex).toBe(0);
			expect(storage.sign).toBe(false);
		});
	});

	describe('add and subtract', () => {
		it('should carry through every digit', () => {
			// 23 + 1 = 24 = 1*4!
			const sum = factorialarithmetic.add(parse('23'), parse('1'));
			expect(sum.highestIndex).toBe(4);
			expect(render(sum)).toBe('24');
		});

		it('should borrow through every digit', () => {
			const difference = factorialarithmetic.subtract(parse('24'), parse('1'));
			expect(difference.highestIndex).toBe(3);
			expect(render(difference)).toBe('23');
		});

		it('should give canonical zero for equal magnitudes', () => {
			const difference = factorialarithmetic.subtract(parse('-7'), parse('7'));
			expect(difference.words).toEqual([]);
			expect(difference.sign).toBe(false);
		});

		it('should surface a leftover borrow as a RadixViolationError', () => {
			expect(() => factorialarithmetic.subtract(parse('1'), parse('2'))).toThrow(RadixViolationError);
		});
	});

	describe('compare', () => {
		it('should order by sign, then by digits from the top', () => {
			expect(factorialarithmetic.compare(parse('-5'), parse('3'))).toBe(-1);
			expect(factorialarithmetic.compare(parse('24'), parse('23'))).toBe(1);
			expect(factorialarithmetic.compare(parse('-24'), parse('-23'))).toBe(-1);
			expect(factorialarithmetic.compare(parse('0'), parse('-1'))).toBe(1);
			expect(factorialarithmetic.compare(parse('6'), parse('6'))).toBe(0);
		});
	});

	describe('multiply, divide and modulo', () => {
		it('should round-trip through decimal strings', () => {
			expect(render(factorialarithmetic.multiply(parse('123'), parse('-456')))).toBe('-56088');
			expect(render(factorialarithmetic.divide(parse('-100'), parse('7')))).toBe('-14');
			expect(render(factorialarithmetic.modulo(parse('-100'), parse('7')))).toBe('-2');
			expect(render(factorialarithmetic.modulo(parse('100'), parse('-7')))).toBe('2');
		});

		it('should throw DivideByZeroError for a zero divisor', () => {
			expect(() => factorialarithmetic.divide(parse('0'), parse('0'))).toThrow(DivideByZeroError);
			expect(() => factorialarithmetic.modulo(parse('3'), parse('0'))).toThrow(DivideByZeroError);
		});
	});

	describe('toBigInt', () => {
		it('should accumulate within the bounds of the target type', () => {
			expect(factorialarithmetic.toBigInt(parse('127'), 8, true)).toBe(127n);
			expect(factorialarithmetic.toBigInt(parse('-128'), 8, true)).toBe(-128n);
			expect(factorialarithmetic.toBigInt(parse('255'), 8, false)).toBe(255n);
		});

		it('should throw OverflowError once the accumulation passes the bound', () => {
			expect(() => factorialarithmetic.toBigInt(parse('128'), 8, true)).toThrow(OverflowError);
			expect(() => factorialarithmetic.toBigInt(parse('256'), 8, false)).toThrow(OverflowError);
			expect(() => factorialarithmetic.toBigInt(parse('-1'), 8, false)).toThrow(OverflowError);
		});
	});
});
