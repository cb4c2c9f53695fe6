// src/decimal/decimalstring.ts

/**
 * Arithmetic on non-negative base-10 integers stored as strings.
 *
 * This is how values are read from and written back to decimal text, and the
 * factorial engine multiplies and divides through it. Every operand is an
 * unsigned magnitude without leading zeros; signs are the caller's business.
 */

import * as z from 'zod';

import { DivideByZeroError, MagnitudeError } from '../util/errors.js';


// Types ========================================================


/** Which end of a digit sequence {@link trimZeros} removes zeros from. */
type TrimMode = 'leading' | 'trailing';

interface WordDivision {
	quotient: string;
	remainder: number;
}

interface StringDivision {
	quotient: string;
	remainder: string;
}


// Constants ====================================================


const ZERO = '0';
const CHAR_CODE_ZERO = 48;

/**
 * The largest number {@link multiplyByWord} and {@link divideByWord} accept.
 * Keeps `remainder * 10 + digit` and `digit * factor + carry` exact.
 */
const MAX_WORD_OPERAND: number = Math.floor(Number.MAX_SAFE_INTEGER / 10);

/** An optional minus sign, then either a lone zero or digits without a leading zero. */
const DecimalStringSchema = z.string().regex(/^-?(0|[1-9][0-9]*)$/);


// Helpers ======================================================


function digitAt(str: string, index: number): number {
	return str.charCodeAt(index) - CHAR_CODE_ZERO;
}

function assertWordOperand(value: number, name: string): void {
	if (!Number.isSafeInteger(value) || value < 0 || value > MAX_WORD_OPERAND) {
		throw new RangeError(`${name} must be an integer between 0 and ${MAX_WORD_OPERAND}. Received: ${value}`);
	}
}


// Validation ===================================================


/**
 * Tests whether a string is a canonical decimal integer:
 * an optional leading `-`, and no leading zeros other than the single `"0"`.
 */
function isIntegralString(str: string): boolean {
	return DecimalStringSchema.safeParse(str).success;
}

/** Compares two magnitudes. */
function compareMagnitudes(a: string, b: string): -1 | 0 | 1 {
	if (a.length !== b.length) return a.length > b.length ? 1 : -1;
	return a > b ? 1 : a < b ? -1 : 0;
}

function greaterOrEqual(a: string, b: string): boolean {
	return compareMagnitudes(a, b) >= 0;
}

/**
 * Removes zeros from one end of a digit sequence. If that empties
 * the sequence, a single zero is put back so the result is still a number.
 * @param value - A decimal string, or an array of digits.
 * @param mode - Which end to trim.
 */
function trimZeros(value: string, mode: TrimMode): string;
function trimZeros(value: readonly number[], mode: TrimMode): number[];
function trimZeros(value: string | readonly number[], mode: TrimMode): string | number[] {
	if (typeof value === 'string') {
		const trimmed = mode === 'leading' ? value.replace(/^0+/, '') : value.replace(/0+$/, '');
		return trimmed.length === 0 ? ZERO : trimmed;
	}

	const digits = [...value];
	if (mode === 'leading') {
		let firstNonZero = 0;
		while (firstNonZero < digits.length && digits[firstNonZero] === 0) firstNonZero++;
		digits.splice(0, firstNonZero);
	} else {
		while (digits.length > 0 && digits[digits.length - 1] === 0) digits.pop();
	}
	if (digits.length === 0) digits.push(0);
	return digits;
}


// Arithmetic ===================================================


function add(a: string, b: string): string {
	if (a.length < b.length) [a, b] = [b, a];

	const reversed: number[] = [];
	let carry = 0;
	for (let i = a.length - 1, j = b.length - 1; i >= 0 || carry; i--, j--) {
		const sum = (i >= 0 ? digitAt(a, i) : 0) + (j >= 0 ? digitAt(b, j) : 0) + carry;
		reversed.push(sum % 10);
		carry = Math.floor(sum / 10);
	}

	return trimZeros(reversed.reverse().join(''), 'leading');
}

/**
 * Subtracts `b` from `a`.
 * @throws {MagnitudeError} if `a` is smaller than `b`, since the result would be negative.
 */
function subtract(a: string, b: string): string {
	if (b === ZERO) return a;
	if (a === b) return ZERO;
	if (!greaterOrEqual(a, b)) throw new MagnitudeError();

	const reversed: number[] = [];
	let borrow = 0;
	for (let i = a.length - 1, j = b.length - 1; i >= 0; i--, j--) {
		let difference = digitAt(a, i) - (j >= 0 ? digitAt(b, j) : 0) - borrow;
		if (difference < 0) {
			difference += 10;
			borrow = 1;
		} else {
			borrow = 0;
		}
		reversed.push(difference);
	}

	return trimZeros(reversed.reverse().join(''), 'leading');
}

/** Long multiplication of two magnitudes. */
function multiply(a: string, b: string): string {
	if (a === ZERO || b === ZERO) return ZERO;

	const resultDigits: number[] = new Array<number>(a.length + b.length).fill(0);
	for (let i = a.length - 1; i >= 0; i--) {
		const digitA = digitAt(a, i);
		for (let j = b.length - 1; j >= 0; j--) {
			const sum = digitA * digitAt(b, j) + (resultDigits[i + j + 1] ?? 0);
			resultDigits[i + j + 1] = sum % 10;
			resultDigits[i + j] = (resultDigits[i + j] ?? 0) + Math.floor(sum / 10);
		}
	}

	return trimZeros(resultDigits.join(''), 'leading');
}

/**
 * Multiplies a magnitude by a native integer.
 * @param factor - An integer in `[0, MAX_WORD_OPERAND]`.
 */
function multiplyByWord(a: string, factor: number): string {
	assertWordOperand(factor, 'Factor');
	if (factor === 0 || a === ZERO) return ZERO;
	if (factor === 1) return a;

	const reversed: string[] = [];
	let carry = 0;
	for (let i = a.length - 1; i >= 0; i--) {
		const product = digitAt(a, i) * factor + carry;
		reversed.push(String(product % 10));
		carry = Math.floor(product / 10);
	}
	while (carry > 0) {
		reversed.push(String(carry % 10));
		carry = Math.floor(carry / 10);
	}

	return reversed.reverse().join('');
}

/**
 * Short division of a magnitude by a native integer.
 * @param divisor - An integer in `[1, MAX_WORD_OPERAND]`.
 * @returns The quotient, and the remainder as a number.
 * @throws {DivideByZeroError} if the divisor is 0.
 */
function divideByWord(str: string, divisor: number): WordDivision {
	if (divisor === 0) throw new DivideByZeroError();
	assertWordOperand(divisor, 'Divisor');
	if (str.length === 0 || str === ZERO) return { quotient: ZERO, remainder: 0 };

	let quotient = '';
	let remainder = 0;
	for (let i = 0; i < str.length; i++) {
		const accumulated = remainder * 10 + digitAt(str, i);
		quotient += String(Math.floor(accumulated / divisor));
		remainder = accumulated % divisor;
	}

	return { quotient: trimZeros(quotient, 'leading'), remainder };
}

/**
 * Long division of two magnitudes.
 * @returns The quotient and the remainder.
 * @throws {DivideByZeroError} if `b` is `"0"`.
 */
function divideByString(a: string, b: string): StringDivision {
	if (b === ZERO) throw new DivideByZeroError();
	if (a === ZERO) return { quotient: ZERO, remainder: ZERO };
	if (!greaterOrEqual(a, b)) return { quotient: ZERO, remainder: a };

	let quotient = '';
	let remainder = '';
	for (const digit of a) {
		remainder = trimZeros(remainder + digit, 'leading');
		let count = 0;
		while (greaterOrEqual(remainder, b)) {
			remainder = subtract(remainder, b);
			count++;
		}
		quotient += String(count);
	}

	return {
		quotient: trimZeros(quotient, 'leading'),
		remainder: trimZeros(remainder, 'leading'),
	};
}


export type { TrimMode, WordDivision, StringDivision };

export { MAX_WORD_OPERAND };

export default {
	// Validation
	isIntegralString,
	compareMagnitudes,
	greaterOrEqual,
	trimZeros,
	// Arithmetic
	add,
	subtract,
	multiply,
	multiplyByWord,
	divideByWord,
	divideByString,
};
