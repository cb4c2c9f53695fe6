// src/engines/factorialarithmetic.ts

/**
 * The factorial engine's primitives: integers in the factorial number system,
 * `N = Σ digit[i] * i!` with `digit[i]` in `[0, i]`, packed through the
 * {@link factoraccess} codec.
 *
 * Addition and subtraction work digit by digit in the mixed radix.
 * Multiplication, division and modulo go through decimal strings instead.
 *
 * Canonical form: zero has no words and is never negative. A nonzero value keeps only
 * the words holding digits up to its highest nonzero digit, whose index is cached.
 */

import type { Ordering } from '../operators/operators.js';
import type { WordBits } from '../storage/wordstorage.js';

import factoraccess from '../codec/factoraccess.js';
import decimalstring from '../decimal/decimalstring.js';
import { DigitStorage } from '../storage/wordstorage.js';
import { logDebug } from '../util/logEvents.js';
import { DivideByZeroError, InvalidFormatError, OverflowError } from '../util/errors.js';


// Constants ====================================================


const ZERO: bigint = 0n;
const ONE: bigint = 1n;


// Factorials ===================================================


/**
 * Returns `index!` as a decimal string.
 * The table grows on demand and is kept for later calls.
 * @param index - A non-negative integer.
 */
const getFactorialString: (index: number) => string = (function() {

	// 0! = 1
	const factorials: string[] = ['1'];

	// Appends factorials until the table reaches the requested index
	function addMoreFactorials(indexCap: number): void {
		logDebug(`Adding more decimal factorials, up to ${indexCap}!`);
		for (let i = factorials.length; i <= indexCap; i++) {
			factorials.push(decimalstring.multiplyByWord(factorials[i - 1]!, i));
		}
	}

	return (index: number): string => {
		if (index >= factorials.length) addMoreFactorials(index);
		return factorials[index]!;
	};
})();


// Helpers ======================================================


function createZero(wordBits: WordBits): DigitStorage {
	return new DigitStorage(wordBits);
}

function isZero(storage: DigitStorage): boolean {
	return storage.isAllZero();
}

/**
 * Cuts the storage down to its highest nonzero digit and refreshes the
 * cached index. Without any nonzero digit it becomes canonical zero.
 */
function trim(storage: DigitStorage): DigitStorage {
	let highest = 0;
	for (let idx = storage.highestIndex; idx >= 1; idx--) {
		if ((factoraccess.extract(storage, idx) ?? 0) !== 0) {
			highest = idx;
			break;
		}
	}

	if (highest === 0) {
		storage.clear();
		storage.setHighestIndex(0);
		storage.setSign(false);
		return storage;
	}

	// Only the words covering the bits of digits 0..highest are kept
	const bitsUsed = factoraccess.bitOffset(highest + 1);
	const wordsUsed = Math.ceil(bitsUsed / storage.wordBits);
	if (storage.size > wordsUsed) storage.resize(wordsUsed);
	storage.setHighestIndex(highest);
	return storage;
}

/** A copy with the given sign. Zero stays non-negative. */
function withSign(storage: DigitStorage, negative: boolean): DigitStorage {
	const copy = storage.clone();
	copy.setSign(negative && !isZero(copy));
	return copy;
}

/** Writes a list of digits, least significant first, into a fresh storage. */
function fromDigits(digits: readonly number[], negative: boolean, wordBits: WordBits): DigitStorage {
	const storage = createZero(wordBits);
	decimalstring.trimZeros(digits, 'trailing').forEach((digit, index) => factoraccess.put(storage, index, digit));
	trim(storage);
	storage.setSign(negative && !isZero(storage));
	return storage;
}


// Comparison ===================================================


/** Signed three-way comparison, digit by digit from the highest cached index down. */
function compare(a: DigitStorage, b: DigitStorage): Ordering {
	if (a.sign !== b.sign) return a.sign ? -1 : 1;

	const lhsIsZero = isZero(a);
	const rhsIsZero = isZero(b);
	if (lhsIsZero && rhsIsZero) return 0;
	if (lhsIsZero) return -1;
	if (rhsIsZero) return 1;

	for (let i = Math.max(a.highestIndex, b.highestIndex); i >= 0; i--) {
		const lhsDigit = factoraccess.extract(a, i) ?? 0;
		const rhsDigit = factoraccess.extract(b, i) ?? 0;
		if (lhsDigit < rhsDigit) return a.sign ? 1 : -1;
		if (lhsDigit > rhsDigit) return a.sign ? -1 : 1;
	}
	return 0;
}


// Arithmetic ===================================================


/** The sum of the magnitudes, carrying at radix `i + 1` for digit `i`. The result is non-negative. */
function add(a: DigitStorage, b: DigitStorage): DigitStorage {
	const result = createZero(a.wordBits);
	let carry = 0;
	for (let idx = 0; ; idx++) {
		const lhs = factoraccess.extract(a, idx);
		const rhs = factoraccess.extract(b, idx);
		// Both operands are exhausted and nothing is carried
		if (lhs === undefined && rhs === undefined && carry === 0) break;

		const radix = idx + 1;
		let sum = (lhs ?? 0) + (rhs ?? 0) + carry;
		carry = 0;
		if (sum >= radix) {
			carry = 1;
			sum -= radix;
		}
		factoraccess.put(result, idx, sum);
	}
	return trim(result);
}

/**
 * The difference of the magnitudes, borrowing at radix `i + 1` for digit `i`.
 * The result is non-negative.
 *
 * Requires `|a| >= |b|`. Otherwise a borrow is left over once both operands are
 * exhausted. It is written as the digit `-borrow`, which no digit position
 * accepts, so the call fails with a RadixViolationError.
 */
function subtract(a: DigitStorage, b: DigitStorage): DigitStorage {
	const result = createZero(a.wordBits);
	let borrow = 0;
	let idx = 0;
	for (; ; idx++) {
		const lhs = factoraccess.extract(a, idx);
		const rhs = factoraccess.extract(b, idx);
		if (lhs === undefined && rhs === undefined) break;

		const radix = idx + 1;
		let difference = (lhs ?? 0) - (rhs ?? 0) - borrow;
		if (difference < 0) {
			difference += radix;
			borrow = 1;
		} else {
			borrow = 0;
		}
		factoraccess.put(result, idx, difference);
	}

	// A leftover borrow means |a| < |b|
	if (borrow !== 0) factoraccess.put(result, idx, -borrow);
	return trim(result);
}

/** The decimal magnitude of a value, without its sign. */
function magnitudeString(storage: DigitStorage): string {
	return toDecimalString(withSign(storage, false));
}

/** Parses a decimal magnitude back in, negated if requested and nonzero. */
function fromSignedMagnitude(magnitude: string, negative: boolean, wordBits: WordBits): DigitStorage {
	return fromDecimalString(negative && magnitude !== '0' ? `-${magnitude}` : magnitude, wordBits);
}

/** Multiplies through decimal strings. The sign is the XOR of the operands' signs. */
function multiply(a: DigitStorage, b: DigitStorage): DigitStorage {
	if (isZero(a) || isZero(b)) return createZero(a.wordBits);
	const product = decimalstring.multiply(magnitudeString(a), magnitudeString(b));
	return fromSignedMagnitude(product, a.sign !== b.sign, a.wordBits);
}

/**
 * Truncating division through decimal strings.
 * @throws {DivideByZeroError} if the divisor is zero.
 */
function divide(a: DigitStorage, b: DigitStorage): DigitStorage {
	if (isZero(b)) throw new DivideByZeroError();
	if (isZero(a)) return createZero(a.wordBits);
	const { quotient } = decimalstring.divideByString(magnitudeString(a), magnitudeString(b));
	return fromSignedMagnitude(quotient, a.sign !== b.sign, a.wordBits);
}

/**
 * The remainder of truncating division, through decimal strings.
 * It always carries the dividend's sign.
 * @throws {DivideByZeroError} if the divisor is zero.
 */
function modulo(a: DigitStorage, b: DigitStorage): DigitStorage {
	if (isZero(b)) throw new DivideByZeroError();
	if (isZero(a)) return createZero(a.wordBits);
	const { remainder } = decimalstring.divideByString(magnitudeString(a), magnitudeString(b));
	return fromSignedMagnitude(remainder, a.sign, a.wordBits);
}


// Conversion ===================================================


/**
 * Reads a decimal string by dividing it by the radices 1, 2, 3, ... in turn.
 * Each remainder is the next digit, until the quotient reaches 0.
 * @throws {InvalidFormatError} if the string is not a canonical decimal integer.
 */
function fromDecimalString(str: string, wordBits: WordBits): DigitStorage {
	if (!decimalstring.isIntegralString(str)) throw new InvalidFormatError(str);

	const negative = str.startsWith('-');
	let value = negative ? str.slice(1) : str;

	const digits: number[] = [];
	for (let digitIdx = 0; value !== '0'; digitIdx++) {
		// The divisor for digit i is i + 1
		const { quotient, remainder } = decimalstring.divideByWord(value, digitIdx + 1);
		value = quotient;
		digits.push(remainder);
	}

	return fromDigits(digits, negative, wordBits);
}

function fromBigInt(value: bigint, wordBits: WordBits): DigitStorage {
	const negative = value < ZERO;
	let magnitude = negative ? -value : value;

	const digits: number[] = [];
	for (let radix = ONE; magnitude !== ZERO; radix++) {
		digits.push(Number(magnitude % radix));
		magnitude /= radix;
	}

	return fromDigits(digits, negative, wordBits);
}

/**
 * Converts to a native bigint confined to a fixed-width integer type,
 * accumulating `digit * i!` and checking the bound before every step.
 * @param width - The width of the target type, in bits.
 * @param signed - Whether the target type is signed.
 * @throws {OverflowError} if the accumulation passes the bound of the target type.
 */
function toBigInt(storage: DigitStorage, width: number, signed: boolean): bigint {
	if (isZero(storage)) return ZERO;
	if (!signed && storage.sign) throw new OverflowError('A negative value cannot be held by an unsigned integral type');

	const limit = signed
		? (ONE << BigInt(width - 1)) - (storage.sign ? ZERO : ONE)
		: (ONE << BigInt(width)) - ONE;

	let result = ZERO;
	let factorial = ONE;
	for (let idx = 0; idx <= storage.highestIndex; idx++) {
		const digit = factoraccess.extract(storage, idx);
		if (digit === undefined) break;

		const term = BigInt(digit) * factorial;
		if (result > limit - term) throw new OverflowError();
		result += term;
		factorial *= BigInt(idx + 1);
	}

	return storage.sign ? -result : result;
}

/** Renders canonical decimal text by accumulating `digit[i] * i!` from the lowest digit up. */
function toDecimalString(storage: DigitStorage): string {
	if (isZero(storage)) return '0';

	let decimalSum = '0';
	for (let idx = 0; idx <= storage.highestIndex; idx++) {
		const digit = factoraccess.extract(storage, idx);
		if (digit === undefined) break;
		if (digit !== 0) decimalSum = decimalstring.add(decimalSum, decimalstring.multiplyByWord(getFactorialString(idx), digit));
	}

	return storage.sign ? `-${decimalSum}` : decimalSum;
}


export default {
	// Factorials
	getFactorialString,
	// Helpers
	createZero,
	isZero,
	trim,
	withSign,
	// Comparison
	compare,
	// Arithmetic
	add,
	subtract,
	multiply,
	divide,
	modulo,
	// Conversion
	fromDecimalString,
	fromBigInt,
	toBigInt,
	toDecimalString,
};
